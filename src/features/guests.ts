/**
 * @fileoverview Guests
 *
 * The guest list (`guest_list`): RSVP tracking, plus-ones, seating and
 * wedding-party flags. Besides the common CRUD, the repository serves RSVP
 * statistics, cached next to the collection under the tenant's `stats` key
 * and dropped with it on every mutation.
 */

import { derived, type Readable } from 'svelte/store';
import { z } from 'zod';
import { TableRepository, type EntityDefinition, type Repository } from '../repository';
import { createEntityStore, type EntityStore } from '../stores/entityStore';
import type { RemoteTable } from '../supabase/table';
import { percent, provisionalFields, ownedRow, SERVER_MANAGED, toTime, type RepositoryDeps, type StoreDeps } from './shared';

// =============================================================================
// Schema
// =============================================================================

export const RSVP_STATUSES = [
  'attending',
  'confirmed',
  'maybe',
  'pending',
  'invited',
  'save_the_date_sent',
  'invitation_sent',
  'reminded',
  'declined',
  'no_response'
] as const;

export const rsvpStatusSchema = z.enum(RSVP_STATUSES);
export type RsvpStatus = z.infer<typeof rsvpStatusSchema>;

/** Which partner invited the guest. */
export const invitedBySchema = z.enum(['bride1', 'bride2', 'both']);
export type InvitedBy = z.infer<typeof invitedBySchema>;

export const guestSchema = z.object({
  ...ownedRow,
  firstName: z.string(),
  lastName: z.string(),
  email: z.string().nullish(),
  phone: z.string().nullish(),
  guestGroupId: z.string().nullish(),
  relationshipToCouple: z.string().nullish(),
  invitedBy: invitedBySchema.nullish(),
  rsvpStatus: rsvpStatusSchema.default('pending'),
  rsvpDate: z.string().nullish(),
  plusOneAllowed: z.boolean().default(false),
  plusOneName: z.string().nullish(),
  plusOneAttending: z.boolean().default(false),
  dietaryRestrictions: z.string().nullish(),
  mealOption: z.string().nullish(),
  tableAssignment: z.number().int().nullish(),
  seatNumber: z.number().int().nullish(),
  isWeddingParty: z.boolean().default(false),
  weddingPartyRole: z.string().nullish(),
  notes: z.string().nullish()
});

export type Guest = z.infer<typeof guestSchema>;

export const guestInsertSchema = guestSchema
  .omit(SERVER_MANAGED)
  .extend({
    firstName: z.string().trim().min(1, 'First name is required'),
    lastName: z.string().trim(),
    email: z.string().trim().email().nullish()
  })
  .partial()
  .required({ firstName: true, lastName: true });

export type GuestInsert = z.infer<typeof guestInsertSchema>;

export const guestDefinition: EntityDefinition<Guest, GuestInsert> = {
  feature: 'guest',
  table: 'guest_list',
  schema: guestSchema,
  insertSchema: guestInsertSchema
};

// =============================================================================
// Derived Views
// =============================================================================

export interface GuestStats {
  totalGuests: number;
  attendingGuests: number;
  pendingGuests: number;
  declinedGuests: number;
  /** Share of guests who answered, 0..100. */
  responseRate: number;
}

export interface GuestFilters {
  /** Case-insensitive match on full name, email or phone. */
  search?: string;
  status?: RsvpStatus;
  invitedBy?: InvitedBy;
}

export type GuestSortOption = 'name_asc' | 'name_desc' | 'date_added_newest' | 'date_added_oldest' | 'table_number';

export function fullName(guest: Pick<Guest, 'firstName' | 'lastName'>): string {
  return `${guest.firstName} ${guest.lastName}`.trim();
}

export function isAttending(guest: Pick<Guest, 'rsvpStatus'>): boolean {
  return guest.rsvpStatus === 'attending' || guest.rsvpStatus === 'confirmed';
}

function isAwaitingResponse(guest: Pick<Guest, 'rsvpStatus'>): boolean {
  return guest.rsvpStatus === 'pending' || guest.rsvpStatus === 'invited';
}

export function computeGuestStats(guests: readonly Guest[]): GuestStats {
  const totalGuests = guests.length;
  const pendingGuests = guests.filter(isAwaitingResponse).length;
  return {
    totalGuests,
    attendingGuests: guests.filter(isAttending).length,
    pendingGuests,
    declinedGuests: guests.filter((g) => g.rsvpStatus === 'declined').length,
    responseRate: percent(totalGuests - pendingGuests, totalGuests)
  };
}

export function filterGuests(guests: readonly Guest[], filters: GuestFilters): Guest[] {
  const needle = filters.search?.trim().toLowerCase() ?? '';
  return guests.filter((guest) => {
    if (filters.status && guest.rsvpStatus !== filters.status) return false;
    if (filters.invitedBy && guest.invitedBy !== filters.invitedBy) return false;
    if (!needle) return true;
    return [fullName(guest), guest.email, guest.phone].some((field) => field?.toLowerCase().includes(needle));
  });
}

export function sortGuests(guests: readonly Guest[], option: GuestSortOption): Guest[] {
  const sorted = [...guests];
  switch (option) {
    case 'name_asc':
      return sorted.sort((a, b) => fullName(a).localeCompare(fullName(b)));
    case 'name_desc':
      return sorted.sort((a, b) => fullName(b).localeCompare(fullName(a)));
    case 'date_added_newest':
      return sorted.sort((a, b) => (toTime(b.createdAt) ?? 0) - (toTime(a.createdAt) ?? 0));
    case 'date_added_oldest':
      return sorted.sort((a, b) => (toTime(a.createdAt) ?? 0) - (toTime(b.createdAt) ?? 0));
    case 'table_number':
      // Unseated guests last
      return sorted.sort(
        (a, b) => (a.tableAssignment ?? Number.MAX_SAFE_INTEGER) - (b.tableAssignment ?? Number.MAX_SAFE_INTEGER)
      );
  }
}

// =============================================================================
// Repository & Store
// =============================================================================

export class GuestRepository extends TableRepository<Guest, GuestInsert> {
  constructor(table: RemoteTable, deps: RepositoryDeps) {
    super({ ...deps, definition: guestDefinition, table });
  }

  /** RSVP statistics, cached with the collection. */
  fetchStats(): Promise<GuestStats> {
    return this.fetchDerived('stats', computeGuestStats);
  }
}

export interface GuestStore extends EntityStore<Guest, GuestInsert> {
  stats: Readable<GuestStats>;
  filtered(filters: GuestFilters): Readable<Guest[]>;
}

export function createGuestStore(repository: Repository<Guest, GuestInsert>, deps: StoreDeps = {}): GuestStore {
  const store = createEntityStore<Guest, GuestInsert>({
    ...deps,
    repository,
    label: 'Guest',
    provisional: (insert, id) => ({
      rsvpStatus: 'pending',
      plusOneAllowed: false,
      plusOneAttending: false,
      isWeddingParty: false,
      ...insert,
      ...provisionalFields(id)
    })
  });

  return {
    ...store,
    stats: derived(store, ($store) => computeGuestStats($store.items)),
    filtered: (filters) => derived(store, ($store) => filterGuests($store.items, filters))
  };
}
