export class ApiError extends Error {
  status: number
  bodyText?: string

  constructor(message: string, status: number, bodyText?: string) {
    super(message)
    this.name = 'ApiError'
    this.status = status
    this.bodyText = bodyText
  }
}

function mergeHeaders(a?: HeadersInit, b?: HeadersInit): Headers {
  const h = new Headers(a)
  if (b) {
    for (const [k, v] of new Headers(b).entries()) h.set(k, v)
  }
  return h
}

export async function apiFetch(input: RequestInfo | URL, init: RequestInit = {}): Promise<Response> {
  return await fetch(input, {
    ...init,
    headers: mergeHeaders({ Accept: 'application/json' }, init.headers),
  })
}

export async function readErrorBody(res: Response): Promise<string> {
  // Prefer JSON error payloads, fallback to text.
  const ct = res.headers.get('content-type') ?? ''
  try {
    if (ct.includes('application/json')) {
      const data: unknown = await res.json()
      if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
        return data.error
      }
      return JSON.stringify(data)
    }
  } catch {
    return ''
  }
  try {
    return await res.text()
  } catch {
    return ''
  }
}

/** Sends a JSON request and returns the parsed body; non-2xx becomes an ApiError. */
export async function requestJson<T>(method: string, url: string, body?: unknown, signal?: AbortSignal): Promise<T> {
  const res = await apiFetch(url, {
    method,
    signal,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  })
  if (!res.ok) {
    const msg = await readErrorBody(res)
    throw new ApiError(msg || `${method} ${url} failed: ${res.status}`, res.status, msg)
  }
  return (await res.json()) as T
}
