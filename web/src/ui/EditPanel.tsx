import { useEffect, useState } from 'react'
import type { EditDraft, TaskDraft } from './state'
import { TaskFields } from './TaskFields'

export function EditPanel(props: {
  draft: EditDraft
  onChange: (patch: Partial<TaskDraft>) => void
  onSave: () => Promise<void>
  onCancel: () => void
}) {
  const [saving, setSaving] = useState(false)

  useEffect(() => {
    setSaving(false)
  }, [props.draft.id])

  async function save() {
    setSaving(true)
    try {
      await props.onSave()
    } finally {
      setSaving(false)
    }
  }

  return (
    <section
      className="panel"
      onKeyDown={(e) => {
        if (e.key === 'Escape') props.onCancel()
      }}
    >
      <div className="panel-header">
        <div className="panel-title">Edit task</div>
        <span className="pill">{props.draft.id}</span>
      </div>

      <TaskFields draft={props.draft} disabled={saving} autoFocus onChange={props.onChange} />

      <div className="panel-actions">
        <button className="btn" onClick={() => void save()} disabled={saving}>
          {saving ? 'Saving…' : 'Save changes'}
        </button>
        <button className="btn btn--ghost" onClick={props.onCancel} disabled={saving}>
          Cancel
        </button>
      </div>
    </section>
  )
}
