export const PRIORITIES = ['High', 'Medium', 'Low'] as const
export const CATEGORIES = ['uncategorized', 'work', 'personal', 'shopping', 'errands', 'learning', 'other'] as const
export const SORT_KEYS = ['created', 'due', 'priority'] as const

export type Priority = (typeof PRIORITIES)[number]
export type Category = (typeof CATEGORIES)[number]
export type CategoryFilter = Category | 'all'
export type SortKey = (typeof SORT_KEYS)[number]

export type Task = {
  id: number
  title: string
  description: string
  created_at: string
  due: string
  priority: Priority
  category: Category
  done: boolean
}

export type ViewOptions = {
  showDone: boolean
  category: CategoryFilter
  sort: SortKey
}

export type Meta = {
  aiEnabled: boolean
  model: string
  dataFile: string
}

export type CreateTaskInput = {
  title: string
  description: string
  due: string
  priority: Priority
  category: Category
}

export type TaskPatch = Partial<CreateTaskInput> & { done?: boolean }
