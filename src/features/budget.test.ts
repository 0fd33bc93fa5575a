import { get } from 'svelte/store';
import { describe, expect, it } from 'vitest';
import { FakeRepository } from '../testing/fakeRepository';
import {
  budgetCategorySchema,
  budgetSummary,
  createBudgetCategoryStore,
  expenseSchema,
  expensesByCategory,
  overduePayments,
  paymentSchema,
  upcomingPayments,
  type BudgetCategory,
  type BudgetCategoryInsert,
  type Expense,
  type Payment
} from './budget';

const base = { coupleId: 'c1', createdAt: '2026-01-01T00:00:00.000Z' };
const now = new Date('2026-06-01T00:00:00.000Z');

function category(id: string, categoryName: string, allocatedAmount: number, spentAmount: number): BudgetCategory {
  return budgetCategorySchema.parse({ ...base, id, categoryName, allocatedAmount, spentAmount });
}

function expense(id: string, amount: number, extra: Partial<Expense> = {}): Expense {
  return expenseSchema.parse({ ...base, id, expenseName: `Expense ${id}`, amount, ...extra });
}

function payment(id: string | number, paymentDate: string, extra: Partial<Payment> = {}): Payment {
  return paymentSchema.parse({ ...base, id, paymentAmount: 100, paymentDate, ...extra });
}

describe('budgetSummary', () => {
  it('totals allocations and flags overspent categories', () => {
    const categories = [category('b1', 'Flowers', 1000, 1200), category('b2', 'Venue', 3000, 800)];

    expect(budgetSummary(categories)).toEqual({
      totalAllocated: 4000,
      totalSpent: 2000,
      remaining: 2000,
      percentageUsed: 50,
      overBudget: [{ categoryId: 'b1', categoryName: 'Flowers', overspend: 200 }]
    });
  });

  it('reports 0% used when nothing is allocated', () => {
    expect(budgetSummary([])).toMatchObject({ totalAllocated: 0, percentageUsed: 0, overBudget: [] });
  });
});

describe('expensesByCategory', () => {
  it('skips uncategorized and cancelled expenses', () => {
    const totals = expensesByCategory([
      expense('e1', 250, { budgetCategoryId: 'b1' }),
      expense('e2', 100, { budgetCategoryId: 'b1' }),
      expense('e3', 900, { budgetCategoryId: 'b2', paymentStatus: 'cancelled' }),
      expense('e4', 40)
    ]);
    expect([...totals]).toEqual([['b1', 350]]);
  });
});

describe('payments', () => {
  const payments = [
    payment(1, '2026-06-10'),
    payment(2, '2026-07-01'),
    payment(3, '2026-06-02', { paid: true }),
    payment(4, '2026-05-20'),
    payment(5, '2026-06-01')
  ];

  it('carries bigint ids as strings', () => {
    expect(payments[0].id).toBe('1');
  });

  it('lists unpaid payments due within the window', () => {
    expect(upcomingPayments(payments, now).map((p) => p.id)).toEqual(['5', '1']);
    expect(upcomingPayments(payments, now, 31).map((p) => p.id)).toEqual(['5', '1', '2']);
  });

  it('lists unpaid payments past due', () => {
    expect(overduePayments(payments, now).map((p) => p.id)).toEqual(['4']);
  });
});

describe('createBudgetCategoryStore', () => {
  it('summarizes the visible categories', async () => {
    const repository = new FakeRepository<BudgetCategory, BudgetCategoryInsert>({
      feature: 'budget category',
      build: (insert, id) => budgetCategorySchema.parse({ ...insert, ...base, id }),
      seed: [category('b1', 'Flowers', 1000, 1200)]
    });
    const store = createBudgetCategoryStore(repository);
    await store.load();

    repository.hold('create');
    const created = store.create({ categoryName: 'Music', allocatedAmount: 1000 });
    expect(get(store.summary)).toMatchObject({ totalAllocated: 2000, totalSpent: 1200, remaining: 800, percentageUsed: 60 });

    repository.release('create');
    await created;
    expect(get(store).successMessage).toBe('Budget category added successfully');
  });
});
