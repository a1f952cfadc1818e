import { isCategory } from './task.js';
import { SORT_KEYS } from './types.js';
import type { CategoryFilter, SortKey, Task, ViewOptions } from './types.js';

export const DEFAULT_VIEW: ViewOptions = { showDone: true, category: 'all', sort: 'created' };

// Sorts after any real YYYY-MM-DD.
const NO_DUE = '9999-99-99';

const PRIORITY_RANK = new Map<string, number>([
  ['High', 0],
  ['Medium', 1],
  ['Low', 2]
]);

// Records written by hand may carry anything.
function priorityRank(p: string): number {
  return PRIORITY_RANK.get(p) ?? 1;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareBy(sort: SortKey): (a: Task, b: Task) => number {
  if (sort === 'due') {
    return (a, b) => compareText(a.due || NO_DUE, b.due || NO_DUE);
  }
  if (sort === 'priority') {
    return (a, b) => priorityRank(a.priority) - priorityRank(b.priority);
  }
  // newest first
  return (a, b) => compareText(b.created_at, a.created_at);
}

/**
 * Filtered and sorted projection of the store's list.
 * Ties keep their store order.
 */
export function projectTasks(tasks: readonly Task[], opts: ViewOptions): Task[] {
  const cmp = compareBy(opts.sort);
  return tasks
    .filter((t) => opts.showDone || !t.done)
    .filter((t) => opts.category === 'all' || t.category === opts.category)
    .map((item, idx) => ({ item, idx }))
    .sort((A, B) => cmp(A.item, B.item) || A.idx - B.idx)
    .map(({ item }) => item);
}

export function isSortKey(x: unknown): x is SortKey {
  return SORT_KEYS.some((k) => k === x);
}

export function isCategoryFilter(x: unknown): x is CategoryFilter {
  return x === 'all' || isCategory(x);
}

function parseBool(raw: unknown, fallback: boolean): boolean {
  if (raw === undefined || raw === null || raw === '') return fallback;
  if (raw === true || raw === 'true' || raw === '1') return true;
  if (raw === false || raw === 'false' || raw === '0') return false;
  return fallback;
}

/** Untrusted query-string values to view options; unknown values fall back to defaults. */
export function parseViewOptions(query: unknown): ViewOptions {
  if (typeof query !== 'object' || query === null) return { ...DEFAULT_VIEW };
  const q = query as Record<string, unknown>;

  const category = isCategoryFilter(q.category) ? q.category : DEFAULT_VIEW.category;
  const sort = isSortKey(q.sort) ? q.sort : DEFAULT_VIEW.sort;

  return {
    showDone: parseBool(q.showDone, DEFAULT_VIEW.showDone),
    category,
    sort
  };
}
