import { CATEGORIES, PRIORITIES } from '../api/types'
import type { Category, Priority } from '../api/types'
import type { TaskDraft } from './state'

function isPriority(v: string): v is Priority {
  return PRIORITIES.some((p) => p === v)
}

function isCategory(v: string): v is Category {
  return CATEGORIES.some((c) => c === v)
}

/** Inputs shared by the add form and the edit panel. */
export function TaskFields(props: {
  draft: TaskDraft
  disabled?: boolean
  autoFocus?: boolean
  onChange: (patch: Partial<TaskDraft>) => void
}) {
  const { draft, onChange } = props

  return (
    <div className="form">
      <label className="field">
        <span>Title</span>
        <input
          value={draft.title}
          onChange={(e) => onChange({ title: e.target.value })}
          placeholder="What needs to be done?"
          disabled={props.disabled}
          autoFocus={props.autoFocus}
        />
      </label>

      <label className="field">
        <span>Description</span>
        <textarea
          value={draft.description}
          onChange={(e) => onChange({ description: e.target.value })}
          rows={3}
          disabled={props.disabled}
        />
      </label>

      <div className="row">
        <label className="field">
          <span>Due</span>
          <input
            type="date"
            value={draft.due}
            onChange={(e) => onChange({ due: e.target.value })}
            disabled={props.disabled}
          />
        </label>

        <label className="field">
          <span>Priority</span>
          <select
            value={draft.priority}
            onChange={(e) => {
              const v = e.target.value
              if (isPriority(v)) onChange({ priority: v })
            }}
            disabled={props.disabled}
          >
            {PRIORITIES.map((p) => (
              <option key={p} value={p}>
                {p}
              </option>
            ))}
          </select>
        </label>

        <label className="field">
          <span>Category</span>
          <select
            value={draft.category}
            onChange={(e) => {
              const v = e.target.value
              if (isCategory(v)) onChange({ category: v })
            }}
            disabled={props.disabled}
          >
            {CATEGORIES.map((c) => (
              <option key={c} value={c}>
                {c}
              </option>
            ))}
          </select>
        </label>
      </div>
    </div>
  )
}
