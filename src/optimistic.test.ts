import { describe, expect, it } from 'vitest';
import { applyMutation, isProvisionalId, replay, retargetMutation, settleMutation, type Mutation } from './optimistic';
import { err, ok } from './result';

interface Guest {
  id: string;
  name: string;
}

const ada: Guest = { id: 'g1', name: 'Ada' };
const grace: Guest = { id: 'g2', name: 'Grace' };
const alan: Guest = { id: 'g3', name: 'Alan' };

describe('applyMutation', () => {
  it('appends a create', () => {
    const provisional = { id: 'provisional-1', name: 'Alan' };
    expect(applyMutation([ada], { type: 'create', provisional })).toEqual([ada, provisional]);
  });

  it('replaces an update in place', () => {
    const next = { ...grace, name: 'Grace H.' };
    expect(applyMutation([ada, grace, alan], { type: 'update', previous: grace, next })).toEqual([ada, next, alan]);
  });

  it('removes a delete', () => {
    expect(applyMutation([ada, grace, alan], { type: 'delete', removed: grace })).toEqual([ada, alan]);
  });
});

describe('settleMutation', () => {
  it('leaves the confirmed collection alone on failure', () => {
    const confirmed = [ada, grace];
    const settled = settleMutation(confirmed, { type: 'delete', removed: grace }, err(new Error('offline')));
    expect(settled).toEqual([ada, grace]);
    expect(settled).not.toBe(confirmed);
  });

  it('adds the server entity for a create', () => {
    const provisional = { id: 'provisional-1', name: 'Alan' };
    expect(settleMutation([ada], { type: 'create', provisional }, ok(alan))).toEqual([ada, alan]);
  });

  it('is idempotent for a settled create', () => {
    const mutation: Mutation<Guest> = { type: 'create', provisional: { id: 'provisional-1', name: 'Alan' } };
    const once = settleMutation([ada], mutation, ok(alan));
    expect(settleMutation(once, mutation, ok(alan))).toEqual([ada, alan]);
  });

  it('takes the server copy of an update', () => {
    const next = { ...ada, name: 'Ada L.' };
    const server = { ...ada, name: 'Ada Lovelace' };
    expect(settleMutation([ada, grace], { type: 'update', previous: ada, next }, ok(server))).toEqual([server, grace]);
  });

  it('removes a deleted entity', () => {
    expect(settleMutation([ada, grace], { type: 'delete', removed: ada }, ok(null))).toEqual([grace]);
  });
});

describe('retargetMutation', () => {
  it('moves mutations on a provisional entity to the server id', () => {
    const provisional = { id: 'provisional-1', name: 'Alan' };
    const update: Mutation<Guest> = { type: 'update', previous: provisional, next: { ...provisional, name: 'Alan T.' } };

    expect(retargetMutation(update, 'provisional-1', 'g3')).toEqual({
      type: 'update',
      previous: { id: 'g3', name: 'Alan' },
      next: { id: 'g3', name: 'Alan T.' }
    });
  });

  it('leaves other mutations unchanged', () => {
    const remove: Mutation<Guest> = { type: 'delete', removed: ada };
    expect(retargetMutation(remove, 'provisional-1', 'g3')).toBe(remove);
  });
});

describe('replay', () => {
  it('applies pending mutations in issue order', () => {
    const provisional = { id: 'provisional-1', name: 'Alan' };
    const pending: Mutation<Guest>[] = [
      { type: 'create', provisional },
      { type: 'update', previous: provisional, next: { ...provisional, name: 'Alan T.' } },
      { type: 'delete', removed: ada }
    ];
    expect(replay([ada, grace], pending)).toEqual([grace, { id: 'provisional-1', name: 'Alan T.' }]);
  });
});

describe('isProvisionalId', () => {
  it('recognizes the provisional prefix', () => {
    expect(isProvisionalId('provisional-1')).toBe(true);
    expect(isProvisionalId('g1')).toBe(false);
  });
});
