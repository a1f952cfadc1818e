import { useCallback, useEffect, useReducer } from 'react'
import {
  categorize,
  createTask,
  deleteTask,
  fetchMeta,
  fetchTasks,
  moveTaskToTop,
  patchTask,
  setTaskDone,
  suggestTitle,
} from '../api/client'
import { CATEGORIES, SORT_KEYS } from '../api/types'
import type { CategoryFilter, SortKey, Task } from '../api/types'
import { EditPanel } from './EditPanel'
import { Notices } from './Notices'
import { TaskFields } from './TaskFields'
import { TaskRow } from './TaskRow'
import { INITIAL_STATE, draftToInput, reduce, validateDraft } from './state'

const CATEGORY_FILTERS: CategoryFilter[] = ['all', ...CATEGORIES]

function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

function isCategoryFilter(v: string): v is CategoryFilter {
  return CATEGORY_FILTERS.some((c) => c === v)
}

function isSortKey(v: string): v is SortKey {
  return SORT_KEYS.some((k) => k === v)
}

export function App() {
  const [state, dispatch] = useReducer(reduce, INITIAL_STATE)
  const { filters } = state

  const reload = useCallback(
    async (signal?: AbortSignal) => {
      dispatch({ type: 'loadStarted' })
      try {
        const { tasks, total } = await fetchTasks(filters, signal)
        dispatch({ type: 'tasksLoaded', tasks, total })
      } catch (e) {
        if (signal?.aborted) return
        dispatch({ type: 'requestFailed', error: errorText(e) })
      }
    },
    [filters],
  )

  useEffect(() => {
    const ctrl = new AbortController()
    fetchMeta(ctrl.signal)
      .then((meta) => dispatch({ type: 'metaLoaded', meta }))
      .catch((e: unknown) => {
        if (!ctrl.signal.aborted) dispatch({ type: 'requestFailed', error: errorText(e) })
      })
    return () => ctrl.abort()
  }, [])

  useEffect(() => {
    const ctrl = new AbortController()
    void reload(ctrl.signal)
    return () => ctrl.abort()
  }, [reload])

  async function onSubmit() {
    const invalid = validateDraft(state.form)
    if (invalid) {
      dispatch({ type: 'submitRejected', error: invalid })
      return
    }
    dispatch({ type: 'submitStarted' })
    try {
      const task = await createTask(draftToInput(state.form))
      dispatch({ type: 'taskAdded', task })
      await reload()
    } catch (e) {
      dispatch({ type: 'requestFailed', error: errorText(e) })
    }
  }

  async function onSuggestTitle() {
    const description = state.form.description.trim()
    if (!description) return
    dispatch({ type: 'aiStarted', op: 'suggest' })
    try {
      const res = await suggestTitle(description)
      dispatch({ type: 'titleSuggested', title: res.title, warning: res.warning })
    } catch (e) {
      dispatch({ type: 'requestFailed', error: errorText(e) })
    }
  }

  async function onCategorize() {
    const title = state.form.title.trim()
    const description = state.form.description.trim()
    if (!title && !description) return
    dispatch({ type: 'aiStarted', op: 'categorize' })
    try {
      const res = await categorize(title, description)
      dispatch({ type: 'categorySuggested', category: res.category, warning: res.warning })
    } catch (e) {
      dispatch({ type: 'requestFailed', error: errorText(e) })
    }
  }

  async function onToggleDone(task: Task, done: boolean) {
    try {
      const updated = await setTaskDone(task.id, done)
      dispatch({ type: 'doneToggled', id: task.id, task: updated })
    } catch (e) {
      dispatch({ type: 'requestFailed', error: errorText(e) })
    }
  }

  async function onDelete(task: Task) {
    try {
      const deleted = await deleteTask(task.id)
      dispatch({ type: 'taskDeleted', id: task.id, deleted })
      await reload()
    } catch (e) {
      dispatch({ type: 'requestFailed', error: errorText(e) })
    }
  }

  async function onMoveToTop(task: Task) {
    try {
      await moveTaskToTop(task.id)
      await reload()
    } catch (e) {
      dispatch({ type: 'requestFailed', error: errorText(e) })
    }
  }

  async function onSaveEdit() {
    const edit = state.edit
    if (!edit) return
    const invalid = validateDraft(edit)
    if (invalid) {
      dispatch({ type: 'submitRejected', error: invalid })
      return
    }
    try {
      const task = await patchTask(edit.id, draftToInput(edit))
      dispatch({ type: 'editSaved', task })
      await reload()
    } catch (e) {
      dispatch({ type: 'requestFailed', error: errorText(e) })
    }
  }

  const aiEnabled = state.meta?.aiEnabled ?? false
  const busy = state.submitting || state.aiPending !== null

  return (
    <div className="app">
      <header className="topbar">
        <div className="brand">Smart To-Do List</div>
      </header>

      <Notices notices={state.notices} onDismiss={(id) => dispatch({ type: 'noticeDismissed', id })} />

      <section className="panel">
        <div className="panel-header">
          <div className="panel-title">Add a task</div>
        </div>
        <form
          onSubmit={(e) => {
            e.preventDefault()
            void onSubmit()
          }}
        >
          <TaskFields
            draft={state.form}
            disabled={state.submitting}
            onChange={(patch) => dispatch({ type: 'formChanged', patch })}
          />
          <div className="panel-actions">
            <button className="btn" type="submit" disabled={busy}>
              {state.submitting ? 'Adding…' : 'Add task'}
            </button>
            {aiEnabled ? (
              <>
                <button
                  className="btn btn--ghost"
                  type="button"
                  onClick={() => void onSuggestTitle()}
                  disabled={busy || !state.form.description.trim()}
                >
                  {state.aiPending === 'suggest' ? 'Thinking…' : 'Suggest title from description'}
                </button>
                <button
                  className="btn btn--ghost"
                  type="button"
                  onClick={() => void onCategorize()}
                  disabled={busy || (!state.form.title.trim() && !state.form.description.trim())}
                >
                  {state.aiPending === 'categorize' ? 'Thinking…' : 'Auto-categorize'}
                </button>
              </>
            ) : null}
          </div>
        </form>
      </section>

      <div className="controls">
        <label className="control control--inline">
          <input
            type="checkbox"
            checked={filters.showDone}
            onChange={(e) => dispatch({ type: 'filtersChanged', patch: { showDone: e.target.checked } })}
          />
          <span>Show done</span>
        </label>

        <label className="control">
          <span>Filter by category</span>
          <select
            value={filters.category}
            onChange={(e) => {
              const v = e.target.value
              if (isCategoryFilter(v)) dispatch({ type: 'filtersChanged', patch: { category: v } })
            }}
          >
            {CATEGORY_FILTERS.map((c) => (
              <option key={c} value={c}>
                {c}
              </option>
            ))}
          </select>
        </label>

        <label className="control">
          <span>Sort by</span>
          <select
            value={filters.sort}
            onChange={(e) => {
              const v = e.target.value
              if (isSortKey(v)) dispatch({ type: 'filtersChanged', patch: { sort: v } })
            }}
          >
            {SORT_KEYS.map((k) => (
              <option key={k} value={k}>
                {k}
              </option>
            ))}
          </select>
        </label>

        <button className="btn" onClick={() => void reload()} disabled={state.loading}>
          {state.loading ? 'Loading…' : 'Refresh'}
        </button>
      </div>

      <main className="list">
        <h2 className="list-title">
          Tasks ({state.tasks.length}
          {state.total !== state.tasks.length ? ` of ${state.total}` : ''})
        </h2>
        {!state.tasks.length && !state.loading ? <div className="muted">No tasks found.</div> : null}
        {state.tasks.map((t) => (
          <TaskRow
            key={t.id}
            task={t}
            onToggleDone={(task, done) => void onToggleDone(task, done)}
            onEdit={(task) => dispatch({ type: 'editStarted', task })}
            onDelete={(task) => void onDelete(task)}
            onMoveToTop={(task) => void onMoveToTop(task)}
            disabled={busy}
          />
        ))}
      </main>

      {state.edit ? (
        <EditPanel
          draft={state.edit}
          onChange={(patch) => dispatch({ type: 'editChanged', patch })}
          onSave={onSaveEdit}
          onCancel={() => dispatch({ type: 'editCancelled' })}
        />
      ) : null}

      <footer className="footer">
        <span className="muted">Data stored locally in {state.meta?.dataFile ?? 'tasks.json'}</span>
        <span className="muted">
          {aiEnabled
            ? `AI features enabled via Perplexity (${state.meta?.model ?? 'sonar-pro'})`
            : 'AI features disabled: set PERPLEXITY_API_KEY to enable optional smart features'}
        </span>
      </footer>
    </div>
  )
}
