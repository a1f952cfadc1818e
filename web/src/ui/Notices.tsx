import type { Notice } from './state'

const TITLES: Record<Notice['kind'], string> = {
  success: 'Done',
  info: 'Info',
  warning: 'Warning',
  error: 'Error',
}

export function Notices(props: { notices: Notice[]; onDismiss: (id: number) => void }) {
  if (!props.notices.length) return null

  return (
    <div className="notices" role="status">
      {props.notices.map((n) => (
        <div key={n.id} className={`notice notice--${n.kind}`}>
          <div className="notice-title">{TITLES[n.kind]}</div>
          <div className="notice-body">{n.text}</div>
          <button className="btn btn--ghost" aria-label="Dismiss" onClick={() => props.onDismiss(n.id)}>
            ×
          </button>
        </div>
      ))}
    </div>
  )
}
