/**
 * @fileoverview Couple Settings
 *
 * One `couple_settings` row per couple, holding a JSON `settings` document
 * split into sections (global, theme, budget, tasks, guests, vendors,
 * notifications). Every section has defaults, so a partial or older
 * document still decodes to a complete {@link CoupleSettings}.
 *
 * The first read for a couple without a row creates one with the defaults.
 * Updates take a per-section patch, merge it into the stored document and
 * write the whole document back.
 */

import { derived, get, type Readable } from 'svelte/store';
import { z } from 'zod';
import { PlannerError, toPlannerError } from '../errors';
import { createMutationQueue } from '../queue';
import { TableRepository, type EntityDefinition } from '../repository';
import { err, settle, type Result } from '../result';
import { createDetailStore, type DetailStore } from '../stores/factories';
import type { RemoteTable } from '../supabase/table';
import { ownedRow, type RepositoryDeps, type StoreDeps } from './shared';

// =============================================================================
// Schema
// =============================================================================

const weddingEventSchema = z.object({
  id: z.string(),
  eventName: z.string(),
  eventDate: z.string().default(''),
  eventTime: z.string().default(''),
  venueLocation: z.string().default(''),
  description: z.string().default(''),
  isMainEvent: z.boolean().default(false),
  eventOrder: z.number().int().default(0)
});

export type SettingsWeddingEvent = z.infer<typeof weddingEventSchema>;

const DEFAULT_EVENTS: SettingsWeddingEvent[] = [
  {
    id: 'default-ceremony',
    eventName: 'Wedding Ceremony',
    eventDate: '',
    eventTime: '',
    venueLocation: '',
    description: 'The main wedding ceremony',
    isMainEvent: true,
    eventOrder: 1
  },
  {
    id: 'default-reception',
    eventName: 'Wedding Reception',
    eventDate: '',
    eventTime: '',
    venueLocation: '',
    description: 'The wedding reception and celebration',
    isMainEvent: false,
    eventOrder: 2
  }
];

const globalSettingsSchema = z.object({
  currency: z.string().default('USD'),
  weddingDate: z.string().default(''),
  isWeddingDateTbd: z.boolean().default(false),
  timezone: z.string().default('America/Los_Angeles'),
  partner1FullName: z.string().default('Partner 1'),
  partner1Nickname: z.string().default(''),
  partner2FullName: z.string().default('Partner 2'),
  partner2Nickname: z.string().default(''),
  weddingEvents: z.array(weddingEventSchema).default(DEFAULT_EVENTS)
});

const themeSettingsSchema = z.object({
  colorScheme: z.string().default('blush-romance'),
  darkMode: z.boolean().default(false),
  useCustomWeddingColors: z.boolean().default(false),
  weddingColor1: z.string().nullish(),
  weddingColor2: z.string().nullish()
});

const budgetSettingsSchema = z.object({
  totalBudget: z.number().nonnegative().default(0),
  baseBudget: z.number().nonnegative().default(0),
  includesEngagementRings: z.boolean().default(false),
  engagementRingAmount: z.number().nonnegative().default(0),
  autoCategorize: z.boolean().default(true),
  paymentReminders: z.boolean().default(true),
  notes: z.string().default('')
});

const tasksSettingsSchema = z.object({
  defaultView: z.string().default('kanban'),
  showCompleted: z.boolean().default(true),
  notificationsEnabled: z.boolean().default(true),
  customResponsibleParties: z.array(z.string()).default([])
});

const guestsSettingsSchema = z.object({
  defaultView: z.string().default('list'),
  showMealPreferences: z.boolean().default(true),
  rsvpReminders: z.boolean().default(true),
  customMealOptions: z.array(z.string()).default([])
});

const vendorsSettingsSchema = z.object({
  defaultView: z.string().default('grid'),
  showPaymentStatus: z.boolean().default(true),
  autoReminders: z.boolean().default(true),
  hiddenStandardCategories: z.array(z.string()).default([])
});

const notificationsSettingsSchema = z.object({
  emailEnabled: z.boolean().default(true),
  pushEnabled: z.boolean().default(true),
  digestFrequency: z.enum(['daily', 'weekly', 'never']).default('weekly')
});

export const coupleSettingsSchema = z.object({
  global: globalSettingsSchema.default({}),
  theme: themeSettingsSchema.default({}),
  budget: budgetSettingsSchema.default({}),
  tasks: tasksSettingsSchema.default({}),
  guests: guestsSettingsSchema.default({}),
  vendors: vendorsSettingsSchema.default({}),
  notifications: notificationsSettingsSchema.default({})
});

export type CoupleSettings = z.infer<typeof coupleSettingsSchema>;

/** Per-section partial update. */
export type SettingsPatch = { [Section in keyof CoupleSettings]?: Partial<CoupleSettings[Section]> };

export const DEFAULT_SETTINGS: CoupleSettings = coupleSettingsSchema.parse({});

export const settingsRowSchema = z.object({
  ...ownedRow,
  settings: coupleSettingsSchema.default({})
});

export type SettingsRow = z.infer<typeof settingsRowSchema>;

export const settingsInsertSchema = z.object({ settings: coupleSettingsSchema });
export type SettingsInsert = z.infer<typeof settingsInsertSchema>;

export const settingsDefinition: EntityDefinition<SettingsRow, SettingsInsert> = {
  feature: 'settings',
  table: 'couple_settings',
  schema: settingsRowSchema,
  insertSchema: settingsInsertSchema,
  jsonColumns: ['settings']
};

/** Merge `patch` into `current` one section deep; arrays are replaced. */
export function mergeSettings(current: CoupleSettings, patch: SettingsPatch): CoupleSettings {
  return coupleSettingsSchema.parse({
    global: { ...current.global, ...patch.global },
    theme: { ...current.theme, ...patch.theme },
    budget: { ...current.budget, ...patch.budget },
    tasks: { ...current.tasks, ...patch.tasks },
    guests: { ...current.guests, ...patch.guests },
    vendors: { ...current.vendors, ...patch.vendors },
    notifications: { ...current.notifications, ...patch.notifications }
  });
}

// =============================================================================
// Repository
// =============================================================================

export class SettingsRepository extends TableRepository<SettingsRow, SettingsInsert> {
  constructor(table: RemoteTable, deps: RepositoryDeps) {
    super({ ...deps, definition: settingsDefinition, table });
  }

  /** The couple's settings row, created with the defaults if missing. */
  async fetchSettings(): Promise<SettingsRow> {
    const [row] = await this.fetchAll();
    return row ?? this.create({ settings: DEFAULT_SETTINGS });
  }

  /** Merge `patch` into the stored document and write it back. */
  async updateSettings(patch: SettingsPatch): Promise<SettingsRow> {
    const row = await this.fetchSettings();
    return this.update({ ...row, settings: mergeSettings(row.settings, patch) });
  }
}

// =============================================================================
// Store
// =============================================================================

export interface SettingsStore extends Omit<DetailStore<SettingsRow>, 'load'> {
  /** The current document, or the defaults before the first load. */
  settings: Readable<CoupleSettings>;
  load(): Promise<void>;
  /**
   * Apply `patch` now and persist it. Updates are sent one at a time; a
   * failed one restores the document it replaced.
   */
  update(patch: SettingsPatch): Promise<Result<SettingsRow, PlannerError>>;
  /** Forget the loaded document and drop queued updates. */
  reset(): void;
}

/** Detail-store key for "the current couple's row". */
const CURRENT = 'current';

export function createSettingsStore(repository: SettingsRepository, deps: StoreDeps = {}): SettingsStore {
  const { activity } = deps;
  const detail = createDetailStore<SettingsRow>({
    feature: repository.feature,
    fetchById: () => repository.fetchSettings()
  });
  const queue = createMutationQueue(repository.feature);
  let epoch = 0;
  /* Updates sent in the current epoch and not yet settled */
  let inFlight = 0;

  return {
    ...detail,
    settings: derived(detail, ($row) => $row?.settings ?? DEFAULT_SETTINGS),

    async load(): Promise<void> {
      await detail.load(CURRENT);
      const failure = get(detail.error);
      if (failure) activity?.recordError(failure, 'load', null);
    },

    update(patch: SettingsPatch): Promise<Result<SettingsRow, PlannerError>> {
      const previous = get(detail);
      const startedIn = epoch;
      if (previous) detail.set({ ...previous, settings: mergeSettings(previous.settings, patch) });
      inFlight++;
      activity?.adjustPending(1);

      return queue.enqueue(async () => {
        if (epoch !== startedIn) {
          return err(new PlannerError('updateFailed', repository.feature, new Error('Tenant changed before the request was sent')));
        }
        const outcome = await settle(repository.updateSettings(patch), (e) => toPlannerError('updateFailed', repository.feature, e));
        if (epoch !== startedIn) return outcome;

        inFlight--;
        activity?.adjustPending(-1);
        if (outcome.ok) {
          detail.set(outcome.value);
          activity?.recordSuccess();
          return outcome;
        }
        detail.set(previous);
        activity?.recordError(outcome.error, 'update', previous?.id ?? null);
        return outcome;
      });
    },

    reset(): void {
      epoch++;
      activity?.adjustPending(-inFlight);
      inFlight = 0;
      detail.clear();
    }
  };
}
