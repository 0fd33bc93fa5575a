import { describe, expect, it } from 'vitest';
import { FakeRepository } from '../testing/fakeRepository';
import {
  createDocumentStore,
  documentSchema,
  documentsByType,
  documentsForVendor,
  type PlannerDocument,
  type PlannerDocumentInsert
} from './documents';

function document(id: string, extra: Partial<PlannerDocument> = {}): PlannerDocument {
  return documentSchema.parse({
    id,
    coupleId: 'c1',
    originalFilename: `${id}.pdf`,
    storagePath: `c1/${id}.pdf`,
    fileSize: 1024,
    mimeType: 'application/pdf',
    uploadedAt: '2026-01-01T00:00:00.000Z',
    ...extra
  });
}

describe('documentSchema', () => {
  it('applies storage defaults', () => {
    expect(document('d1')).toMatchObject({ bucketName: 'invoices-and-contracts', documentType: 'other', tags: [] });
  });
});

describe('document views', () => {
  const documents = [
    document('d1', { documentType: 'contract', vendorId: '42' }),
    document('d2', { documentType: 'invoice', vendorId: '42', uploadedAt: '2026-02-01T00:00:00.000Z' }),
    document('d3', { documentType: 'invoice', vendorId: '7' }),
    document('d4')
  ];

  it('groups by type', () => {
    const groups = documentsByType(documents);
    expect(groups.contract.map((d) => d.id)).toEqual(['d1']);
    expect(groups.invoice.map((d) => d.id)).toEqual(['d2', 'd3']);
    expect(groups.other.map((d) => d.id)).toEqual(['d4']);
    expect(groups.receipt).toEqual([]);
  });

  it("lists a vendor's documents, newest first", () => {
    expect(documentsForVendor(documents, '42').map((d) => d.id)).toEqual(['d2', 'd1']);
  });
});

describe('createDocumentStore', () => {
  it('shows a provisional document with defaults', async () => {
    const repository = new FakeRepository<PlannerDocument, PlannerDocumentInsert>({
      feature: 'document',
      build: (insert, id) => documentSchema.parse({ ...insert, id, coupleId: 'c1', uploadedAt: '2026-03-01T00:00:00.000Z' })
    });
    const store = createDocumentStore(repository);
    repository.hold('create');

    const created = store.create({
      originalFilename: 'contract.pdf',
      storagePath: 'c1/contract.pdf',
      fileSize: 2048,
      mimeType: 'application/pdf',
      documentType: 'contract'
    });
    expect(store.getItems()[0]).toMatchObject({
      originalFilename: 'contract.pdf',
      bucketName: 'invoices-and-contracts',
      documentType: 'contract',
      tags: []
    });

    repository.release('create');
    await expect(created).resolves.toMatchObject({ ok: true, value: { id: 'document-1', coupleId: 'c1' } });
  });
});
