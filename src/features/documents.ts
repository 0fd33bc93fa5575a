/**
 * @fileoverview Documents
 *
 * Metadata for uploaded files (`documents`). The file bytes live in
 * Supabase Storage under `bucketName` / `storagePath`; only the metadata
 * row goes through the repository.
 */

import { z } from 'zod';
import type { EntityDefinition, Repository } from '../repository';
import { createEntityStore, type EntityStore } from '../stores/entityStore';
import { now } from '../utils';
import { toTime, type StoreDeps } from './shared';

export const DOCUMENT_TYPES = ['contract', 'invoice', 'receipt', 'photo', 'other'] as const;
export const documentTypeSchema = z.enum(DOCUMENT_TYPES);
export type DocumentType = z.infer<typeof documentTypeSchema>;

export const documentSchema = z.object({
  id: z.string(),
  coupleId: z.string(),
  originalFilename: z.string(),
  storagePath: z.string(),
  bucketName: z.string().default('invoices-and-contracts'),
  fileSize: z.number().int().nonnegative(),
  mimeType: z.string(),
  documentType: documentTypeSchema.default('other'),
  vendorId: z.coerce.string().nullish(),
  expenseId: z.string().nullish(),
  paymentId: z.coerce.string().nullish(),
  tags: z.array(z.string()).default([]),
  uploadedBy: z.string().nullish(),
  uploadedAt: z.string(),
  updatedAt: z.string().nullish()
});

export type PlannerDocument = z.infer<typeof documentSchema>;

export const documentInsertSchema = documentSchema
  .omit({ id: true, coupleId: true, uploadedAt: true, updatedAt: true })
  .partial()
  .required({ originalFilename: true, storagePath: true, fileSize: true, mimeType: true });

export type PlannerDocumentInsert = z.infer<typeof documentInsertSchema>;

export const documentDefinition: EntityDefinition<PlannerDocument, PlannerDocumentInsert> = {
  feature: 'document',
  table: 'documents',
  schema: documentSchema,
  insertSchema: documentInsertSchema
};

export function documentsByType(documents: readonly PlannerDocument[]): Record<DocumentType, PlannerDocument[]> {
  const groups: Record<DocumentType, PlannerDocument[]> = {
    contract: [],
    invoice: [],
    receipt: [],
    photo: [],
    other: []
  };
  for (const document of documents) groups[document.documentType].push(document);
  return groups;
}

/** Documents linked to a vendor, newest upload first. */
export function documentsForVendor(documents: readonly PlannerDocument[], vendorId: string): PlannerDocument[] {
  return documents
    .filter((document) => document.vendorId === vendorId)
    .sort((a, b) => (toTime(b.uploadedAt) ?? 0) - (toTime(a.uploadedAt) ?? 0));
}

export type DocumentStore = EntityStore<PlannerDocument, PlannerDocumentInsert>;

export function createDocumentStore(
  repository: Repository<PlannerDocument, PlannerDocumentInsert>,
  deps: StoreDeps = {}
): DocumentStore {
  return createEntityStore<PlannerDocument, PlannerDocumentInsert>({
    ...deps,
    repository,
    label: 'Document',
    provisional: (insert, id) => {
      const timestamp = now();
      return {
        bucketName: 'invoices-and-contracts',
        documentType: 'other',
        tags: [],
        ...insert,
        id,
        coupleId: '',
        uploadedAt: timestamp,
        updatedAt: timestamp
      };
    }
  });
}
