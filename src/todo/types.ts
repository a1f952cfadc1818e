export const PRIORITY_VALUES = ['High', 'Medium', 'Low'] as const;
export const CATEGORY_VALUES = ['uncategorized', 'work', 'personal', 'shopping', 'errands', 'learning', 'other'] as const;
export const SORT_KEYS = ['created', 'due', 'priority'] as const;

export type TaskPriority = (typeof PRIORITY_VALUES)[number];
export type TaskCategory = (typeof CATEGORY_VALUES)[number];
export type CategoryFilter = TaskCategory | 'all';
export type SortKey = (typeof SORT_KEYS)[number];

export interface Task {
  id: number; // ms timestamp at creation
  title: string;
  description: string;
  created_at: string; // ISO-8601, UTC
  due: string; // YYYY-MM-DD or ''
  priority: TaskPriority;
  category: TaskCategory;
  done: boolean;
}

export interface CreateTaskInput {
  title?: string;
  description?: string;
  due?: string;
  priority?: TaskPriority;
  category?: TaskCategory;
}

export type TaskPatch = Partial<Pick<Task, 'title' | 'description' | 'due' | 'priority' | 'category' | 'done'>>;

export interface ViewOptions {
  showDone: boolean;
  category: CategoryFilter;
  sort: SortKey;
}

export type LoadResult =
  | { status: 'loaded'; tasks: Task[]; skipped: number }
  | { status: 'missing'; tasks: Task[] }
  | { status: 'corrupt'; tasks: Task[]; reason: string };
