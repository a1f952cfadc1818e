import type { Category, CreateTaskInput, Meta, Task, TaskPatch, ViewOptions } from './types'
import { requestJson } from './apiFetch'

export async function fetchMeta(signal?: AbortSignal): Promise<Meta> {
  const data = await requestJson<Meta & { ok: true }>('GET', '/api/meta', undefined, signal)
  return { aiEnabled: data.aiEnabled, model: data.model, dataFile: data.dataFile }
}

export async function fetchTasks(view: ViewOptions, signal?: AbortSignal): Promise<{ tasks: Task[]; total: number }> {
  const qs = new URLSearchParams({
    showDone: String(view.showDone),
    category: view.category,
    sort: view.sort,
  })
  const data = await requestJson<{ ok: true; tasks: Task[]; total: number }>('GET', `/api/tasks?${qs}`, undefined, signal)
  return { tasks: data.tasks, total: data.total }
}

export async function createTask(input: CreateTaskInput): Promise<Task> {
  const data = await requestJson<{ ok: true; task: Task }>('POST', '/api/tasks', input)
  return data.task
}

/** PATCH task fields. `null` means the task is gone. */
export async function patchTask(id: number, patch: TaskPatch): Promise<Task | null> {
  const data = await requestJson<{ ok: true; task: Task | null }>('PATCH', `/api/task/${id}`, patch)
  return data.task
}

export async function deleteTask(id: number): Promise<boolean> {
  const data = await requestJson<{ ok: true; deleted: boolean }>('DELETE', `/api/task/${id}`)
  return data.deleted
}

export async function moveTaskToTop(id: number): Promise<Task | null> {
  const data = await requestJson<{ ok: true; task: Task | null }>('POST', `/api/task/${id}/top`, {})
  return data.task
}

export async function setTaskDone(id: number, done: boolean): Promise<Task | null> {
  const data = await requestJson<{ ok: true; task: Task | null }>('POST', `/api/task/${id}/done`, { done })
  return data.task
}

export async function suggestTitle(description: string): Promise<{ title: string; warning?: string }> {
  const data = await requestJson<{ ok: true; title: string; warning?: string }>('POST', '/api/ai/suggest-title', {
    description,
  })
  return { title: data.title, warning: data.warning }
}

export async function categorize(title: string, description: string): Promise<{ category: Category | null; warning?: string }> {
  const data = await requestJson<{ ok: true; category: Category | null; warning?: string }>('POST', '/api/ai/categorize', {
    title,
    description,
  })
  return { category: data.category, warning: data.warning }
}
