/**
 * @fileoverview Budget
 *
 * Three entity families:
 *   - `budget_categories`: allocation and running spend per category
 *   - `expenses`         : individual costs, optionally tied to a category and vendor
 *   - `payment_plans`    : scheduled payments (bigint ids on the server)
 */

import { derived, type Readable } from 'svelte/store';
import { z } from 'zod';
import type { EntityDefinition, Repository } from '../repository';
import { createEntityStore, type EntityStore } from '../stores/entityStore';
import {
  byDate,
  isBefore,
  isWithinDays,
  percent,
  provisionalFields,
  ownedRow,
  SERVER_MANAGED,
  toTime,
  type StoreDeps
} from './shared';

const money = z.number().nonnegative();
const validDate = z.string().refine((value) => toTime(value) !== null, 'Invalid date');

// =============================================================================
// Categories
// =============================================================================

export const budgetCategorySchema = z.object({
  ...ownedRow,
  categoryName: z.string(),
  parentCategoryId: z.string().nullish(),
  allocatedAmount: money.default(0),
  spentAmount: money.default(0),
  color: z.string().nullish(),
  notes: z.string().nullish()
});

export type BudgetCategory = z.infer<typeof budgetCategorySchema>;

export const budgetCategoryInsertSchema = budgetCategorySchema
  .omit(SERVER_MANAGED)
  .extend({ categoryName: z.string().trim().min(1, 'Category name is required') })
  .partial()
  .required({ categoryName: true });

export type BudgetCategoryInsert = z.infer<typeof budgetCategoryInsertSchema>;

export const budgetCategoryDefinition: EntityDefinition<BudgetCategory, BudgetCategoryInsert> = {
  feature: 'budget category',
  table: 'budget_categories',
  schema: budgetCategorySchema,
  insertSchema: budgetCategoryInsertSchema
};

// =============================================================================
// Expenses
// =============================================================================

export const expensePaymentStatusSchema = z.enum(['pending', 'partial', 'paid', 'overdue', 'cancelled']);
export type ExpensePaymentStatus = z.infer<typeof expensePaymentStatusSchema>;

export const expenseSchema = z.object({
  ...ownedRow,
  expenseName: z.string(),
  amount: money,
  expenseDate: z.string().nullish(),
  budgetCategoryId: z.string().nullish(),
  vendorId: z.coerce.string().nullish(),
  paymentStatus: expensePaymentStatusSchema.default('pending'),
  notes: z.string().nullish()
});

export type Expense = z.infer<typeof expenseSchema>;

export const expenseInsertSchema = expenseSchema
  .omit(SERVER_MANAGED)
  .extend({ expenseName: z.string().trim().min(1, 'Expense name is required') })
  .partial()
  .required({ expenseName: true, amount: true });

export type ExpenseInsert = z.infer<typeof expenseInsertSchema>;

export const expenseDefinition: EntityDefinition<Expense, ExpenseInsert> = {
  feature: 'expense',
  table: 'expenses',
  schema: expenseSchema,
  insertSchema: expenseInsertSchema
};

// =============================================================================
// Payment Plans
// =============================================================================

export const paymentSchema = z.object({
  ...ownedRow,
  id: z.coerce.string(),
  paymentDescription: z.string().nullish(),
  paymentAmount: money,
  paymentDate: z.string(),
  paid: z.boolean().default(false),
  vendor: z.string().nullish(),
  vendorId: z.coerce.string().nullish(),
  expenseId: z.string().nullish(),
  notes: z.string().nullish()
});

export type Payment = z.infer<typeof paymentSchema>;

export const paymentInsertSchema = paymentSchema
  .omit(SERVER_MANAGED)
  .extend({ paymentDate: validDate })
  .partial()
  .required({ paymentAmount: true, paymentDate: true });

export type PaymentInsert = z.infer<typeof paymentInsertSchema>;

export const paymentDefinition: EntityDefinition<Payment, PaymentInsert> = {
  feature: 'payment schedule',
  table: 'payment_plans',
  schema: paymentSchema,
  insertSchema: paymentInsertSchema,
  orderBy: { column: 'payment_date' }
};

// =============================================================================
// Derived Views
// =============================================================================

export interface CategoryOverspend {
  categoryId: string;
  categoryName: string;
  overspend: number;
}

export interface BudgetSummary {
  totalAllocated: number;
  totalSpent: number;
  /** Negative when over budget. */
  remaining: number;
  /** 0..100+, 0 when nothing is allocated. */
  percentageUsed: number;
  overBudget: CategoryOverspend[];
}

export function budgetSummary(categories: readonly BudgetCategory[]): BudgetSummary {
  const totalAllocated = categories.reduce((sum, c) => sum + c.allocatedAmount, 0);
  const totalSpent = categories.reduce((sum, c) => sum + c.spentAmount, 0);
  return {
    totalAllocated,
    totalSpent,
    remaining: totalAllocated - totalSpent,
    percentageUsed: percent(totalSpent, totalAllocated),
    overBudget: categories
      .filter((c) => c.spentAmount > c.allocatedAmount)
      .map((c) => ({ categoryId: c.id, categoryName: c.categoryName, overspend: c.spentAmount - c.allocatedAmount }))
  };
}

/** Sum of expense amounts per category id. Uncategorized expenses are skipped. */
export function expensesByCategory(expenses: readonly Expense[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const expense of expenses) {
    if (!expense.budgetCategoryId || expense.paymentStatus === 'cancelled') continue;
    totals.set(expense.budgetCategoryId, (totals.get(expense.budgetCategoryId) ?? 0) + expense.amount);
  }
  return totals;
}

/** Unpaid payments due in `[now, now + days)`, soonest first. */
export function upcomingPayments(payments: readonly Payment[], now: Date = new Date(), days = 30): Payment[] {
  return payments
    .filter((payment) => !payment.paid && isWithinDays(payment.paymentDate, now, days))
    .sort(byDate((payment) => payment.paymentDate));
}

/** Unpaid payments due before `now`, oldest first. */
export function overduePayments(payments: readonly Payment[], now: Date = new Date()): Payment[] {
  return payments
    .filter((payment) => !payment.paid && isBefore(payment.paymentDate, now))
    .sort(byDate((payment) => payment.paymentDate));
}

// =============================================================================
// Stores
// =============================================================================

export interface BudgetCategoryStore extends EntityStore<BudgetCategory, BudgetCategoryInsert> {
  summary: Readable<BudgetSummary>;
}

export function createBudgetCategoryStore(
  repository: Repository<BudgetCategory, BudgetCategoryInsert>,
  deps: StoreDeps = {}
): BudgetCategoryStore {
  const store = createEntityStore<BudgetCategory, BudgetCategoryInsert>({
    ...deps,
    repository,
    label: 'Budget category',
    provisional: (insert, id) => ({ allocatedAmount: 0, spentAmount: 0, ...insert, ...provisionalFields(id) })
  });
  return { ...store, summary: derived(store, ($store) => budgetSummary($store.items)) };
}

export type ExpenseStore = EntityStore<Expense, ExpenseInsert>;

export function createExpenseStore(repository: Repository<Expense, ExpenseInsert>, deps: StoreDeps = {}): ExpenseStore {
  return createEntityStore<Expense, ExpenseInsert>({
    ...deps,
    repository,
    label: 'Expense',
    provisional: (insert, id) => ({ paymentStatus: 'pending', ...insert, ...provisionalFields(id) })
  });
}

export interface PaymentStore extends EntityStore<Payment, PaymentInsert> {
  upcoming(days?: number, now?: () => Date): Readable<Payment[]>;
  overdue(now?: () => Date): Readable<Payment[]>;
}

export function createPaymentStore(repository: Repository<Payment, PaymentInsert>, deps: StoreDeps = {}): PaymentStore {
  const store = createEntityStore<Payment, PaymentInsert>({
    ...deps,
    repository,
    label: 'Payment',
    provisional: (insert, id) => ({ paid: false, ...insert, ...provisionalFields(id) })
  });
  return {
    ...store,
    upcoming: (days, now = () => new Date()) => derived(store, ($store) => upcomingPayments($store.items, now(), days)),
    overdue: (now = () => new Date()) => derived(store, ($store) => overduePayments($store.items, now()))
  };
}
