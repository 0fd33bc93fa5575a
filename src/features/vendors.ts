/**
 * @fileoverview Vendors
 *
 * Vendor directory (`vendor_information`). Vendor ids are bigint on the
 * server; they are carried as strings like every other entity id.
 */

import { derived, type Readable } from 'svelte/store';
import { z } from 'zod';
import type { EntityDefinition, Repository } from '../repository';
import { createEntityStore, type EntityStore } from '../stores/entityStore';
import { provisionalFields, ownedRow, SERVER_MANAGED, type StoreDeps } from './shared';

export const vendorSchema = z.object({
  ...ownedRow,
  id: z.coerce.string(),
  vendorName: z.string(),
  vendorType: z.string().nullish(),
  contactName: z.string().nullish(),
  phoneNumber: z.string().nullish(),
  email: z.string().nullish(),
  website: z.string().nullish(),
  quotedAmount: z.number().nonnegative().nullish(),
  isBooked: z.boolean().nullish(),
  dateBooked: z.string().nullish(),
  budgetCategoryId: z.string().nullish(),
  isArchived: z.boolean().default(false),
  archivedAt: z.string().nullish(),
  includeInExport: z.boolean().default(true),
  notes: z.string().nullish()
});

export type Vendor = z.infer<typeof vendorSchema>;

export const vendorInsertSchema = vendorSchema
  .omit(SERVER_MANAGED)
  .extend({
    vendorName: z.string().trim().min(1, 'Vendor name is required'),
    email: z.string().trim().email().nullish()
  })
  .partial()
  .required({ vendorName: true });

export type VendorInsert = z.infer<typeof vendorInsertSchema>;

export const vendorDefinition: EntityDefinition<Vendor, VendorInsert> = {
  feature: 'vendor',
  table: 'vendor_information',
  schema: vendorSchema,
  insertSchema: vendorInsertSchema
};

// =============================================================================
// Derived Views
// =============================================================================

/** Counts over vendors that are not archived. */
export interface VendorStats {
  total: number;
  booked: number;
  available: number;
  totalQuoted: number;
}

export function activeVendors(vendors: readonly Vendor[]): Vendor[] {
  return vendors.filter((vendor) => !vendor.isArchived);
}

export function vendorStats(vendors: readonly Vendor[]): VendorStats {
  const active = activeVendors(vendors);
  const booked = active.filter((vendor) => vendor.isBooked === true).length;
  return {
    total: active.length,
    booked,
    available: active.length - booked,
    totalQuoted: active.reduce((sum, vendor) => sum + (vendor.quotedAmount ?? 0), 0)
  };
}

// =============================================================================
// Store
// =============================================================================

export interface VendorStore extends EntityStore<Vendor, VendorInsert> {
  stats: Readable<VendorStats>;
  active: Readable<Vendor[]>;
}

export function createVendorStore(repository: Repository<Vendor, VendorInsert>, deps: StoreDeps = {}): VendorStore {
  const store = createEntityStore<Vendor, VendorInsert>({
    ...deps,
    repository,
    label: 'Vendor',
    provisional: (insert, id) => ({ isArchived: false, includeInExport: true, ...insert, ...provisionalFields(id) })
  });

  return {
    ...store,
    stats: derived(store, ($store) => vendorStats($store.items)),
    active: derived(store, ($store) => activeVendors($store.items))
  };
}
