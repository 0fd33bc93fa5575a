/**
 * @fileoverview Notes
 *
 * Free-form notes (`notes`), optionally attached to another planning
 * record through `relatedType` / `relatedId`.
 */

import { z } from 'zod';
import type { EntityDefinition, Repository } from '../repository';
import { createEntityStore, type EntityStore } from '../stores/entityStore';
import { provisionalFields, ownedRow, SERVER_MANAGED, toTime, type StoreDeps } from './shared';

export const noteRelatedTypeSchema = z.enum([
  'vendor',
  'guest',
  'task',
  'milestone',
  'budget',
  'visual_element',
  'payment',
  'document'
]);
export type NoteRelatedType = z.infer<typeof noteRelatedTypeSchema>;

export const noteSchema = z.object({
  ...ownedRow,
  title: z.string().nullish(),
  content: z.string(),
  relatedType: noteRelatedTypeSchema.nullish(),
  relatedId: z.coerce.string().nullish()
});

export type Note = z.infer<typeof noteSchema>;

export const noteInsertSchema = noteSchema
  .omit(SERVER_MANAGED)
  .extend({ content: z.string().trim().min(1, 'Note content is required') })
  .partial()
  .required({ content: true })
  .refine((note) => !note.relatedType === !note.relatedId, {
    message: 'relatedType and relatedId must be set together',
    path: ['relatedId']
  });

export type NoteInsert = z.infer<typeof noteInsertSchema>;

export const noteDefinition: EntityDefinition<Note, NoteInsert> = {
  feature: 'note',
  table: 'notes',
  schema: noteSchema,
  insertSchema: noteInsertSchema
};

/** Notes attached to one record, most recently edited first. */
export function notesFor(notes: readonly Note[], relatedType: NoteRelatedType, relatedId: string): Note[] {
  return notes
    .filter((note) => note.relatedType === relatedType && note.relatedId === relatedId)
    .sort((a, b) => (toTime(b.updatedAt ?? b.createdAt) ?? 0) - (toTime(a.updatedAt ?? a.createdAt) ?? 0));
}

/** Case-insensitive match on title and content. An empty query matches everything. */
export function searchNotes(notes: readonly Note[], query: string): Note[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [...notes];
  return notes.filter(
    (note) => note.content.toLowerCase().includes(needle) || (note.title?.toLowerCase().includes(needle) ?? false)
  );
}

export type NoteStore = EntityStore<Note, NoteInsert>;

export function createNoteStore(repository: Repository<Note, NoteInsert>, deps: StoreDeps = {}): NoteStore {
  return createEntityStore<Note, NoteInsert>({
    ...deps,
    repository,
    label: 'Note',
    provisional: (insert, id) => ({ ...insert, ...provisionalFields(id) })
  });
}
