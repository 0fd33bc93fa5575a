/**
 * @fileoverview Affordability
 *
 * What-if savings plans (`affordability_scenarios`): each scenario states
 * what both partners (and anyone else) put aside every month from a start
 * date until the wedding, on top of savings already in hand. The derived
 * views project that plan against the budget total.
 */

import { derived, type Readable } from 'svelte/store';
import { z } from 'zod';
import type { EntityDefinition, Repository } from '../repository';
import { createEntityStore, type EntityStore } from '../stores/entityStore';
import { ownedRow, provisionalFields, SERVER_MANAGED, toTime, type StoreDeps } from './shared';

const money = z.number().nonnegative();
const validDate = z.string().refine((value) => toTime(value) !== null, 'Invalid date');

// =============================================================================
// Schema
// =============================================================================

export const affordabilityScenarioSchema = z.object({
  ...ownedRow,
  scenarioName: z.string(),
  partner1Monthly: money.default(0),
  partner2Monthly: money.default(0),
  otherMonthly: money.default(0),
  currentSavings: money.default(0),
  startDate: z.string(),
  weddingDate: z.string().nullish(),
  isPrimary: z.boolean().default(false),
  notes: z.string().nullish()
});

export type AffordabilityScenario = z.infer<typeof affordabilityScenarioSchema>;

export const affordabilityScenarioInsertSchema = affordabilityScenarioSchema
  .omit(SERVER_MANAGED)
  .extend({
    scenarioName: z.string().trim().min(1, 'Scenario name is required'),
    startDate: validDate,
    weddingDate: validDate.nullish()
  })
  .partial()
  .required({ scenarioName: true, startDate: true });

export type AffordabilityScenarioInsert = z.infer<typeof affordabilityScenarioInsertSchema>;

export const affordabilityScenarioDefinition: EntityDefinition<AffordabilityScenario, AffordabilityScenarioInsert> = {
  feature: 'affordability scenario',
  table: 'affordability_scenarios',
  schema: affordabilityScenarioSchema,
  insertSchema: affordabilityScenarioInsertSchema,
  orderBy: { column: 'created_at', ascending: false }
};

// =============================================================================
// Projection
// =============================================================================

export interface AffordabilityProjection {
  monthlyContribution: number;
  /** Whole months of saving before the wedding. */
  months: number;
  projectedSavings: number;
  budget: number;
  /** Budget not covered by the plan; 0 when affordable. */
  shortfall: number;
  affordable: boolean;
}

/**
 * Calendar months from `start` up to `end`, counting a month only once its
 * day of month is reached. 0 when `end` is not after `start`.
 */
export function monthsBetween(start: string, end: string): number {
  const from = toTime(start);
  const to = toTime(end);
  if (from === null || to === null || to <= from) return 0;
  const a = new Date(from);
  const b = new Date(to);
  const months = (b.getUTCFullYear() - a.getUTCFullYear()) * 12 + (b.getUTCMonth() - a.getUTCMonth());
  return b.getUTCDate() < a.getUTCDate() ? months - 1 : months;
}

/** Project `scenario` against `budget`. Without a wedding date only current savings count. */
export function projectScenario(scenario: AffordabilityScenario, budget: number): AffordabilityProjection {
  const monthlyContribution = scenario.partner1Monthly + scenario.partner2Monthly + scenario.otherMonthly;
  const months = scenario.weddingDate ? monthsBetween(scenario.startDate, scenario.weddingDate) : 0;
  const projectedSavings = scenario.currentSavings + monthlyContribution * months;
  return {
    monthlyContribution,
    months,
    projectedSavings,
    budget,
    shortfall: Math.max(0, budget - projectedSavings),
    affordable: projectedSavings >= budget
  };
}

/** The scenario flagged primary, else the first one (newest first from the server). */
export function primaryScenario(scenarios: readonly AffordabilityScenario[]): AffordabilityScenario | null {
  return scenarios.find((scenario) => scenario.isPrimary) ?? scenarios[0] ?? null;
}

// =============================================================================
// Store
// =============================================================================

export interface AffordabilityStore extends EntityStore<AffordabilityScenario, AffordabilityScenarioInsert> {
  primary: Readable<AffordabilityScenario | null>;
  /** Every scenario projected against the budget `budget` emits. */
  projections(budget: Readable<number>): Readable<Array<{ scenario: AffordabilityScenario; projection: AffordabilityProjection }>>;
}

export function createAffordabilityStore(
  repository: Repository<AffordabilityScenario, AffordabilityScenarioInsert>,
  deps: StoreDeps = {}
): AffordabilityStore {
  const store = createEntityStore<AffordabilityScenario, AffordabilityScenarioInsert>({
    ...deps,
    repository,
    label: 'Scenario',
    provisional: (insert, id) => ({
      partner1Monthly: 0,
      partner2Monthly: 0,
      otherMonthly: 0,
      currentSavings: 0,
      isPrimary: false,
      ...insert,
      ...provisionalFields(id)
    })
  });

  return {
    ...store,
    primary: derived(store, ($store) => primaryScenario($store.items)),
    projections: (budget) =>
      derived([store, budget], ([$store, $budget]) =>
        $store.items.map((scenario) => ({ scenario, projection: projectScenario(scenario, $budget) }))
      )
  };
}
