import { TaskValidationError } from './errors.js';
import { CATEGORY_VALUES, PRIORITY_VALUES } from './types.js';
import type { CreateTaskInput, Task, TaskCategory, TaskPatch, TaskPriority } from './types.js';

export const TITLE_FALLBACK_LENGTH = 60;
export const UNTITLED = '(untitled)';

const DUE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isString(x: unknown): x is string {
  return typeof x === 'string';
}

export function isPriority(x: unknown): x is TaskPriority {
  return PRIORITY_VALUES.some((p) => p === x);
}

export function isCategory(x: unknown): x is TaskCategory {
  return CATEGORY_VALUES.some((c) => c === x);
}

/** Title shown when the user only typed a description. */
export function deriveTitle(description: string): string {
  const d = description.trim();
  if (d.length <= TITLE_FALLBACK_LENGTH) return d;
  return `${d.slice(0, TITLE_FALLBACK_LENGTH)}...`;
}

export function isValidDue(due: string): boolean {
  if (due === '') return true;
  const m = DUE_RE.exec(due);
  if (!m) return false;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const dt = new Date(Date.UTC(y, mo - 1, d));
  return dt.getUTCFullYear() === y && dt.getUTCMonth() === mo - 1 && dt.getUTCDate() === d;
}

function cleanDue(raw: string | undefined): string {
  const due = (raw ?? '').trim();
  if (!isValidDue(due)) throw new TaskValidationError(`Invalid due date: ${due} (expected YYYY-MM-DD)`, 'due');
  return due;
}

export function buildTask(id: number, input: CreateTaskInput, createdAt: string): Task {
  const title = (input.title ?? '').trim();
  const description = (input.description ?? '').trim();
  if (!title && !description) {
    throw new TaskValidationError('Please provide at least a title or description.', 'title');
  }

  if (input.priority !== undefined && !isPriority(input.priority)) {
    throw new TaskValidationError(`Invalid priority: ${String(input.priority)}`, 'priority');
  }
  if (input.category !== undefined && !isCategory(input.category)) {
    throw new TaskValidationError(`Invalid category: ${String(input.category)}`, 'category');
  }

  return {
    id,
    title: title || deriveTitle(description),
    description,
    created_at: createdAt,
    due: cleanDue(input.due),
    priority: input.priority ?? 'Medium',
    category: input.category ?? 'uncategorized',
    done: false
  };
}

export function applyTaskPatch(task: Task, patch: TaskPatch): Task {
  const next: Task = { ...task };

  if (patch.description !== undefined) next.description = patch.description.trim();
  if (patch.title !== undefined) next.title = patch.title.trim();
  if (patch.due !== undefined) next.due = cleanDue(patch.due);
  if (patch.priority !== undefined) {
    if (!isPriority(patch.priority)) throw new TaskValidationError(`Invalid priority: ${String(patch.priority)}`, 'priority');
    next.priority = patch.priority;
  }
  if (patch.category !== undefined) {
    if (!isCategory(patch.category)) throw new TaskValidationError(`Invalid category: ${String(patch.category)}`, 'category');
    next.category = patch.category;
  }
  if (patch.done !== undefined) next.done = patch.done;

  if (!next.title) {
    if (!next.description) throw new TaskValidationError('Please provide at least a title or description.', 'title');
    next.title = deriveTitle(next.description);
  }

  return next;
}

function idToIso(id: number): string {
  const d = new Date(id);
  return Number.isNaN(d.getTime()) ? new Date(0).toISOString() : d.toISOString();
}

/**
 * Coerces one record read from disk. Returns null when the record has no usable id.
 */
export function normalizeTaskRecord(raw: unknown): Task | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;
  const r = raw as Record<string, unknown>;

  if (typeof r.id !== 'number' || !Number.isSafeInteger(r.id)) return null;

  const description = isString(r.description) ? r.description : '';
  let title = isString(r.title) ? r.title.trim() : '';
  if (!title) title = deriveTitle(description) || UNTITLED;

  return {
    id: r.id,
    title,
    description,
    created_at: isString(r.created_at) ? r.created_at : idToIso(r.id),
    due: isString(r.due) && isValidDue(r.due) ? r.due : '',
    priority: isPriority(r.priority) ? r.priority : 'Medium',
    category: isCategory(r.category) ? r.category : 'uncategorized',
    done: r.done === true
  };
}
