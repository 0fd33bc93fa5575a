/**
 * @fileoverview Visual Planning
 *
 * Seating charts (`seating_charts`), mood boards (`mood_boards`) and the
 * elements placed on a board (`visual_elements`). Seating table layouts
 * are edited by the layout tools and reach this layer as the chart's
 * `totalTables` / `totalSeats` counters.
 *
 * Board elements have no couple column; they belong to a board. Their
 * repository is scoped by `mood_board_id` instead, through a tenant that
 * yields the board id while a couple is selected and nothing otherwise.
 */

import { derived, type Readable } from 'svelte/store';
import { z } from 'zod';
import type { PlannerError } from '../errors';
import { TableRepository, type EntityDefinition, type Repository } from '../repository';
import type { Result } from '../result';
import type { TenantContext } from '../session';
import { createEntityStore, type EntityStore } from '../stores/entityStore';
import type { RemoteTable } from '../supabase/table';
import { now } from '../utils';
import { byDate, ownedRow, provisionalFields, SERVER_MANAGED, type RepositoryDeps, type StoreDeps } from './shared';

const count = z.number().int().nonnegative();

// =============================================================================
// Seating Charts
// =============================================================================

export const venueLayoutSchema = z.enum(['round', 'rectangular', 'mixed', 'u_shape', 'theater', 'custom']);
export type VenueLayout = z.infer<typeof venueLayoutSchema>;

export const seatingChartSchema = z.object({
  ...ownedRow,
  chartName: z.string(),
  eventId: z.string().nullish(),
  venueLayoutType: venueLayoutSchema.default('round'),
  totalTables: count.default(0),
  totalSeats: count.default(0),
  isActive: z.boolean().default(true),
  isFinalized: z.boolean().default(false),
  notes: z.string().nullish()
});

export type SeatingChart = z.infer<typeof seatingChartSchema>;

export const seatingChartInsertSchema = seatingChartSchema
  .omit(SERVER_MANAGED)
  .extend({ chartName: z.string().trim().min(1, 'Chart name is required') })
  .partial()
  .required({ chartName: true });

export type SeatingChartInsert = z.infer<typeof seatingChartInsertSchema>;

export const seatingChartDefinition: EntityDefinition<SeatingChart, SeatingChartInsert> = {
  feature: 'seating chart',
  table: 'seating_charts',
  schema: seatingChartSchema,
  insertSchema: seatingChartInsertSchema,
  orderBy: { column: 'created_at' }
};

// =============================================================================
// Mood Boards
// =============================================================================

export const moodBoardSchema = z.object({
  ...ownedRow,
  boardName: z.string(),
  boardDescription: z.string().nullish(),
  styleCategory: z.string().nullish(),
  colorScheme: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  isTemplate: z.boolean().default(false),
  isPublic: z.boolean().default(false)
});

export type MoodBoard = z.infer<typeof moodBoardSchema>;

export const moodBoardInsertSchema = moodBoardSchema
  .omit(SERVER_MANAGED)
  .extend({ boardName: z.string().trim().min(1, 'Board name is required') })
  .partial()
  .required({ boardName: true });

export type MoodBoardInsert = z.infer<typeof moodBoardInsertSchema>;

export const moodBoardDefinition: EntityDefinition<MoodBoard, MoodBoardInsert> = {
  feature: 'mood board',
  table: 'mood_boards',
  schema: moodBoardSchema,
  insertSchema: moodBoardInsertSchema,
  orderBy: { column: 'created_at', ascending: false }
};

// =============================================================================
// Mood Board Elements
// =============================================================================

export const elementTypeSchema = z.enum(['image', 'color', 'text', 'inspiration']);
export type ElementType = z.infer<typeof elementTypeSchema>;

export const moodBoardElementSchema = z.object({
  id: z.string(),
  moodBoardId: z.string(),
  createdAt: z.string(),
  updatedAt: z.string().nullish(),
  elementType: elementTypeSchema,
  /** Type-specific payload: image URLs, a color, text and font. */
  elementData: z.record(z.unknown()).default({}),
  positionX: z.number().default(100),
  positionY: z.number().default(100),
  width: z.number().positive().default(200),
  height: z.number().positive().default(200),
  rotation: z.number().default(0),
  opacity: z.number().min(0).max(1).default(1),
  zIndex: z.number().int().default(0),
  isLocked: z.boolean().default(false),
  notes: z.string().nullish()
});

export type MoodBoardElement = z.infer<typeof moodBoardElementSchema>;

export const moodBoardElementInsertSchema = moodBoardElementSchema
  .omit({ id: true, moodBoardId: true, createdAt: true, updatedAt: true })
  .partial()
  .required({ elementType: true });

export type MoodBoardElementInsert = z.infer<typeof moodBoardElementInsertSchema>;

export const moodBoardElementDefinition: EntityDefinition<MoodBoardElement, MoodBoardElementInsert> = {
  feature: 'mood board element',
  table: 'visual_elements',
  tenantColumn: 'mood_board_id',
  schema: moodBoardElementSchema,
  insertSchema: moodBoardElementInsertSchema,
  orderBy: { column: 'z_index' },
  jsonColumns: ['element_data']
};

/** `boardId` while `couple` has a tenant, `null` otherwise. */
export function boardTenant(couple: TenantContext, boardId: string): TenantContext {
  return { getTenantId: () => (couple.getTenantId() ? boardId : null) };
}

export class MoodBoardElementRepository extends TableRepository<MoodBoardElement, MoodBoardElementInsert> {
  readonly boardId: string;

  constructor(table: RemoteTable, deps: RepositoryDeps, boardId: string) {
    super({ ...deps, tenant: boardTenant(deps.tenant, boardId), definition: moodBoardElementDefinition, table });
    this.boardId = boardId;
  }
}

// =============================================================================
// Derived Views
// =============================================================================

export interface SeatingCoverage {
  seats: number;
  guests: number;
  /** Guests without a seat; 0 when there is room for everyone. */
  shortfall: number;
  /** Seats left over; 0 when the chart is full or short. */
  spare: number;
}

/**
 * The chart the couple is working on: the most recently created active one,
 * preferring a finalized chart.
 */
export function currentSeatingChart(charts: readonly SeatingChart[]): SeatingChart | null {
  const active = charts.filter((chart) => chart.isActive);
  const pool = active.some((chart) => chart.isFinalized) ? active.filter((chart) => chart.isFinalized) : active;
  return [...pool].sort(byDate((chart) => chart.createdAt)).at(-1) ?? null;
}

/** How well `chart` seats `guests` attendees. */
export function seatingCoverage(chart: SeatingChart | null, guests: number): SeatingCoverage {
  const seats = chart?.totalSeats ?? 0;
  return { seats, guests, shortfall: Math.max(0, guests - seats), spare: Math.max(0, seats - guests) };
}

/** Boards grouped by style category; uncategorized boards under `'uncategorized'`. */
export function moodBoardsByStyle(boards: readonly MoodBoard[]): Record<string, MoodBoard[]> {
  const groups: Record<string, MoodBoard[]> = {};
  for (const board of boards) {
    const style = board.styleCategory?.trim() || 'uncategorized';
    (groups[style] ??= []).push(board);
  }
  return groups;
}

/** Elements bottom layer first; ties keep their order. */
export function layerOrder(elements: readonly MoodBoardElement[]): MoodBoardElement[] {
  return [...elements].sort((a, b) => a.zIndex - b.zIndex);
}

/** z-index that puts a new element above every existing one. */
export function nextZIndex(elements: readonly MoodBoardElement[]): number {
  return elements.reduce((top, element) => Math.max(top, element.zIndex + 1), 0);
}

// =============================================================================
// Stores
// =============================================================================

export interface SeatingChartStore extends EntityStore<SeatingChart, SeatingChartInsert> {
  current: Readable<SeatingChart | null>;
}

export function createSeatingChartStore(
  repository: Repository<SeatingChart, SeatingChartInsert>,
  deps: StoreDeps = {}
): SeatingChartStore {
  const store = createEntityStore<SeatingChart, SeatingChartInsert>({
    ...deps,
    repository,
    label: 'Seating chart',
    provisional: (insert, id) => ({
      venueLayoutType: 'round',
      totalTables: 0,
      totalSeats: 0,
      isActive: true,
      isFinalized: false,
      ...insert,
      ...provisionalFields(id)
    })
  });
  return { ...store, current: derived(store, ($store) => currentSeatingChart($store.items)) };
}

export interface MoodBoardStore extends EntityStore<MoodBoard, MoodBoardInsert> {
  /** Boards the couple made, templates excluded. */
  boards: Readable<MoodBoard[]>;
  templates: Readable<MoodBoard[]>;
}

export function createMoodBoardStore(
  repository: Repository<MoodBoard, MoodBoardInsert>,
  deps: StoreDeps = {}
): MoodBoardStore {
  const store = createEntityStore<MoodBoard, MoodBoardInsert>({
    ...deps,
    repository,
    label: 'Mood board',
    provisional: (insert, id) => ({
      colorScheme: [],
      tags: [],
      isTemplate: false,
      isPublic: false,
      ...insert,
      ...provisionalFields(id)
    })
  });
  return {
    ...store,
    boards: derived(store, ($store) => $store.items.filter((board) => !board.isTemplate)),
    templates: derived(store, ($store) => $store.items.filter((board) => board.isTemplate))
  };
}

export interface MoodBoardElementStore extends EntityStore<MoodBoardElement, MoodBoardElementInsert> {
  readonly boardId: string;
  layers: Readable<MoodBoardElement[]>;
  /** Add an element on top of the board. */
  place(insert: Omit<MoodBoardElementInsert, 'zIndex'>): Promise<Result<MoodBoardElement, PlannerError>>;
}

export function createMoodBoardElementStore(repository: MoodBoardElementRepository, deps: StoreDeps = {}): MoodBoardElementStore {
  const store = createEntityStore<MoodBoardElement, MoodBoardElementInsert>({
    ...deps,
    repository,
    label: 'Element',
    provisional: (insert, id) => {
      const timestamp = now();
      return {
        elementData: {},
        positionX: 100,
        positionY: 100,
        width: 200,
        height: 200,
        rotation: 0,
        opacity: 1,
        zIndex: 0,
        isLocked: false,
        ...insert,
        id,
        moodBoardId: repository.boardId,
        createdAt: timestamp,
        updatedAt: timestamp
      };
    }
  });

  return {
    ...store,
    boardId: repository.boardId,
    layers: derived(store, ($store) => layerOrder($store.items)),
    place: (insert) => store.create({ ...insert, zIndex: nextZIndex(store.getItems()) })
  };
}
