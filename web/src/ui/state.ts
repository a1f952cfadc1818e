import type { Category, CreateTaskInput, Meta, Priority, Task, ViewOptions } from '../api/types'

export type TaskDraft = {
  title: string
  description: string
  due: string
  priority: Priority
  category: Category
}

export type EditDraft = TaskDraft & { id: number }

export type NoticeKind = 'success' | 'info' | 'warning' | 'error'
export type Notice = { id: number; kind: NoticeKind; text: string }

export type AiOp = 'suggest' | 'categorize'

/**
 * Everything the page renders from. Created when the page mounts, replaced on
 * every action, dropped on unload.
 */
export type AppState = {
  meta: Meta | null
  tasks: Task[]
  total: number
  loading: boolean
  filters: ViewOptions
  form: TaskDraft
  submitting: boolean
  edit: EditDraft | null
  aiPending: AiOp | null
  notices: Notice[]
  nextNoticeId: number
}

export type Action =
  | { type: 'metaLoaded'; meta: Meta }
  | { type: 'loadStarted' }
  | { type: 'tasksLoaded'; tasks: Task[]; total: number }
  | { type: 'requestFailed'; error: string }
  | { type: 'filtersChanged'; patch: Partial<ViewOptions> }
  | { type: 'formChanged'; patch: Partial<TaskDraft> }
  | { type: 'submitStarted' }
  | { type: 'submitRejected'; error: string }
  | { type: 'taskAdded'; task: Task }
  | { type: 'editStarted'; task: Task }
  | { type: 'editChanged'; patch: Partial<TaskDraft> }
  | { type: 'editCancelled' }
  | { type: 'editSaved'; task: Task | null }
  | { type: 'taskDeleted'; id: number; deleted: boolean }
  | { type: 'doneToggled'; id: number; task: Task | null }
  | { type: 'aiStarted'; op: AiOp }
  | { type: 'titleSuggested'; title: string; warning?: string }
  | { type: 'categorySuggested'; category: Category | null; warning?: string }
  | { type: 'noticeDismissed'; id: number }

export const EMPTY_DRAFT: TaskDraft = {
  title: '',
  description: '',
  due: '',
  priority: 'Medium',
  category: 'uncategorized',
}

export const INITIAL_STATE: AppState = {
  meta: null,
  tasks: [],
  total: 0,
  loading: false,
  filters: { showDone: true, category: 'all', sort: 'created' },
  form: EMPTY_DRAFT,
  submitting: false,
  edit: null,
  aiPending: null,
  notices: [],
  nextNoticeId: 1,
}

// Older notices are dropped past this.
const MAX_NOTICES = 5

export function validateDraft(draft: TaskDraft): string | null {
  if (!draft.title.trim() && !draft.description.trim()) {
    return 'Please provide at least a title or description.'
  }
  return null
}

export function draftToInput(draft: TaskDraft): CreateTaskInput {
  return {
    title: draft.title.trim(),
    description: draft.description.trim(),
    due: draft.due.trim(),
    priority: draft.priority,
    category: draft.category,
  }
}

export function draftFromTask(task: Task): EditDraft {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    due: task.due,
    priority: task.priority,
    category: task.category,
  }
}

function notify(state: AppState, kind: NoticeKind, text: string): AppState {
  const notice: Notice = { id: state.nextNoticeId, kind, text }
  return {
    ...state,
    notices: [...state.notices, notice].slice(-MAX_NOTICES),
    nextNoticeId: state.nextNoticeId + 1,
  }
}

function replaceTask(tasks: Task[], task: Task): Task[] {
  return tasks.map((t) => (t.id === task.id ? task : t))
}

export function reduce(state: AppState, action: Action): AppState {
  switch (action.type) {
    case 'metaLoaded':
      return { ...state, meta: action.meta }

    case 'loadStarted':
      return { ...state, loading: true }

    case 'tasksLoaded':
      return { ...state, loading: false, tasks: action.tasks, total: action.total }

    case 'requestFailed':
      return notify({ ...state, loading: false, submitting: false, aiPending: null }, 'error', action.error)

    case 'filtersChanged':
      return { ...state, filters: { ...state.filters, ...action.patch } }

    case 'formChanged':
      return { ...state, form: { ...state.form, ...action.patch } }

    case 'submitStarted':
      return { ...state, submitting: true }

    case 'submitRejected':
      return notify({ ...state, submitting: false }, 'error', action.error)

    case 'taskAdded':
      return notify({ ...state, submitting: false, form: EMPTY_DRAFT }, 'success', 'Task added!')

    case 'editStarted':
      return { ...state, edit: draftFromTask(action.task) }

    case 'editChanged':
      if (!state.edit) return state
      return { ...state, edit: { ...state.edit, ...action.patch } }

    case 'editCancelled':
      return { ...state, edit: null }

    case 'editSaved': {
      // A vanished task is not an error.
      if (!action.task) return { ...state, edit: null }
      return notify({ ...state, edit: null, tasks: replaceTask(state.tasks, action.task) }, 'success', 'Saved')
    }

    case 'taskDeleted': {
      const edit = state.edit?.id === action.id ? null : state.edit
      const tasks = state.tasks.filter((t) => t.id !== action.id)
      const next = { ...state, edit, tasks }
      return action.deleted ? notify(next, 'success', 'Deleted') : next
    }

    case 'doneToggled': {
      if (!action.task) return { ...state, tasks: state.tasks.filter((t) => t.id !== action.id) }
      const task = action.task
      const tasks =
        task.done && !state.filters.showDone
          ? state.tasks.filter((t) => t.id !== task.id)
          : replaceTask(state.tasks, task)
      return { ...state, tasks }
    }

    case 'aiStarted':
      return { ...state, aiPending: action.op }

    case 'titleSuggested': {
      let next: AppState = { ...state, aiPending: null }
      if (action.warning) next = notify(next, 'warning', action.warning)
      if (!action.title) return notify(next, 'info', "Couldn't get suggestion.")
      return { ...next, form: { ...next.form, title: action.title } }
    }

    case 'categorySuggested': {
      let next: AppState = { ...state, aiPending: null }
      if (action.warning) next = notify(next, 'warning', action.warning)
      if (!action.category) return next
      next = { ...next, form: { ...next.form, category: action.category } }
      return notify(next, 'info', `AI suggests category: ${action.category}`)
    }

    case 'noticeDismissed':
      return { ...state, notices: state.notices.filter((n) => n.id !== action.id) }
  }
}
