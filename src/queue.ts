/**
 * @fileoverview Mutation Queue
 *
 * Single-writer queue for one store's remote mutations. Tasks run strictly
 * one after another in enqueue order, so the server sees a store's creates,
 * updates and deletes in the order the user issued them, and two mutations
 * on the same entity can never interleave.
 *
 * The optimistic apply happens at call time, before the task is enqueued;
 * only the remote call and its settlement wait their turn.
 *
 * A task that fails does not stop the queue: its rejection goes to the
 * caller of {@link MutationQueue.enqueue} and the next task runs.
 */

import { debugLog } from './debug';

export interface MutationQueue {
  /** Run `task` after every previously enqueued task has settled. */
  enqueue<R>(task: () => Promise<R>): Promise<R>;
  /** Enqueued tasks not yet settled (including the running one). */
  readonly size: number;
  /** Resolves once the queue is empty. */
  drain(): Promise<void>;
  /** Called with the new size whenever it changes. Returns an unsubscribe function. */
  onSizeChange(callback: (size: number) => void): () => void;
}

export function createMutationQueue(name = 'store'): MutationQueue {
  let tail: Promise<void> = Promise.resolve();
  let size = 0;
  const listeners = new Set<(size: number) => void>();

  function setSize(next: number): void {
    size = next;
    for (const listener of listeners) listener(size);
  }

  return {
    enqueue<R>(task: () => Promise<R>): Promise<R> {
      setSize(size + 1);
      if (size > 1) debugLog(`[Queue] ${name}: ${size - 1} mutation(s) ahead`);

      const run = tail.then(task);
      const done = () => setSize(size - 1);
      // The tail only orders tasks; the outcome reaches the caller through `run`
      tail = run.then(done, done);
      return run;
    },

    get size() {
      return size;
    },

    async drain(): Promise<void> {
      while (size > 0) await tail;
    },

    onSizeChange(callback) {
      listeners.add(callback);
      return () => {
        listeners.delete(callback);
      };
    }
  };
}
