import type { Task } from '../api/types'

export function TaskRow(props: {
  task: Task
  disabled?: boolean
  onToggleDone: (task: Task, done: boolean) => void
  onEdit: (task: Task) => void
  onDelete: (task: Task) => void
  onMoveToTop: (task: Task) => void
}) {
  const { task } = props

  return (
    <article className={`card ${task.done ? 'card--done' : ''}`}>
      <input
        type="checkbox"
        aria-label="Task done"
        checked={task.done}
        disabled={props.disabled}
        onChange={(e) => props.onToggleDone(task, e.target.checked)}
      />
      <div className="card-body">
        <div className="task-title">{task.title}</div>
        <div className="task-meta">
          <span className="pill">{task.category}</span>
          <span className={`pill pill--${task.priority.toLowerCase()}`}>{task.priority}</span>
          {task.due ? <span className="pill">Due {task.due}</span> : null}
        </div>
        {task.description ? <div className="task-description">{task.description}</div> : null}
        <div className="card-actions">
          <button className="btn btn--ghost" onClick={() => props.onEdit(task)} disabled={props.disabled}>
            Edit
          </button>
          <button className="btn btn--ghost" onClick={() => props.onDelete(task)} disabled={props.disabled}>
            Delete
          </button>
          <button className="btn btn--ghost" onClick={() => props.onMoveToTop(task)} disabled={props.disabled}>
            Move to top
          </button>
        </div>
      </div>
    </article>
  )
}
