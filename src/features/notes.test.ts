import { describe, expect, it } from 'vitest';
import { noteInsertSchema, noteSchema, notesFor, searchNotes, type Note } from './notes';

function note(id: string, extra: Partial<Note> = {}): Note {
  return noteSchema.parse({ id, coupleId: 'c1', createdAt: '2026-01-01T00:00:00.000Z', content: `Note ${id}`, ...extra });
}

describe('noteInsertSchema', () => {
  it('needs relatedType and relatedId together', () => {
    expect(noteInsertSchema.safeParse({ content: 'Call back', relatedType: 'vendor' }).success).toBe(false);
    expect(noteInsertSchema.safeParse({ content: 'Call back', relatedId: '42' }).success).toBe(false);
    expect(noteInsertSchema.safeParse({ content: 'Call back', relatedType: 'vendor', relatedId: '42' }).success).toBe(true);
    expect(noteInsertSchema.safeParse({ content: 'Call back' }).success).toBe(true);
  });
});

describe('notesFor', () => {
  it('lists notes for one record, most recently edited first', () => {
    const notes = [
      note('n1', { relatedType: 'vendor', relatedId: '42' }),
      note('n2', { relatedType: 'vendor', relatedId: '42', updatedAt: '2026-03-01T00:00:00.000Z' }),
      note('n3', { relatedType: 'guest', relatedId: '42' }),
      note('n4', { relatedType: 'vendor', relatedId: '7' })
    ];
    expect(notesFor(notes, 'vendor', '42').map((n) => n.id)).toEqual(['n2', 'n1']);
  });

  it('coerces numeric related ids', () => {
    expect(note('n5', { relatedType: 'payment' }).relatedId).toBeUndefined();
    expect(noteSchema.parse({ id: 'n6', coupleId: 'c1', createdAt: '2026-01-01', content: 'x', relatedId: 42 }).relatedId).toBe('42');
  });
});

describe('searchNotes', () => {
  const notes = [note('n1', { title: 'Florist', content: 'Peonies in June' }), note('n2', { content: 'Ask about the DJ' })];

  it('matches title or content without case', () => {
    expect(searchNotes(notes, 'florist').map((n) => n.id)).toEqual(['n1']);
    expect(searchNotes(notes, 'dj').map((n) => n.id)).toEqual(['n2']);
    expect(searchNotes(notes, ' ')).toEqual(notes);
  });
});
