import { fileExists, readText, writeJson } from './fs.js';
import { applyTaskPatch, buildTask, normalizeTaskRecord } from './task.js';
import type { CreateTaskInput, LoadResult, Task, TaskPatch } from './types.js';

export interface TaskStoreOptions {
  filePath: string; // path to tasks.json
  now?: () => Date;
}

export interface SetDoneResult {
  task: Task;
  changed: boolean;
}

/**
 * Ordered task list mirrored to a single JSON file.
 * Mutations run one at a time; each rewrites the whole file and only then
 * replaces the in-memory list, so a failed write changes nothing.
 */
export class TaskStore {
  readonly filePath: string;
  private readonly now: () => Date;
  private tasks: Task[] = [];
  private lastId = 0;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: TaskStoreOptions) {
    this.filePath = opts.filePath;
    this.now = opts.now ?? (() => new Date());
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    // The caller gets the rejection through `run`; the queue keeps going.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async commit(next: Task[]): Promise<void> {
    await writeJson(this.filePath, next);
    this.tasks = next;
  }

  async load(): Promise<LoadResult> {
    return await this.exclusive(() => this.readFile());
  }

  private async readFile(): Promise<LoadResult> {
    this.tasks = [];
    this.lastId = 0;

    if (!(await fileExists(this.filePath))) {
      return { status: 'missing', tasks: [] };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readText(this.filePath));
    } catch (err) {
      return { status: 'corrupt', tasks: [], reason: err instanceof Error ? err.message : String(err) };
    }

    if (!Array.isArray(parsed)) {
      return { status: 'corrupt', tasks: [], reason: 'expected a JSON array of tasks' };
    }

    const seen = new Set<number>();
    const tasks: Task[] = [];
    let skipped = 0;
    for (const raw of parsed) {
      const task = normalizeTaskRecord(raw);
      if (!task || seen.has(task.id)) {
        skipped++;
        continue;
      }
      seen.add(task.id);
      tasks.push(task);
      if (task.id > this.lastId) this.lastId = task.id;
    }
    this.tasks = tasks;

    return { status: 'loaded', tasks: this.list(), skipped };
  }

  async save(): Promise<void> {
    await this.exclusive(() => writeJson(this.filePath, this.tasks));
  }

  list(): Task[] {
    return this.tasks.map((t) => ({ ...t }));
  }

  get(id: number): Task | null {
    const task = this.tasks.find((t) => t.id === id);
    return task ? { ...task } : null;
  }

  private nextId(at: Date): number {
    let id = at.getTime();
    if (id <= this.lastId) id = this.lastId + 1;
    while (this.tasks.some((t) => t.id === id)) id++;
    return id;
  }

  async add(input: CreateTaskInput): Promise<Task> {
    const at = this.now();
    // Validate before queueing.
    const draft = buildTask(0, input, at.toISOString());
    return await this.exclusive(async () => {
      const task: Task = { ...draft, id: this.nextId(at) };
      await this.commit([...this.tasks, task]);
      this.lastId = task.id;
      return { ...task };
    });
  }

  async update(id: number, patch: TaskPatch): Promise<Task | null> {
    return await this.exclusive(async () => {
      const current = this.tasks.find((t) => t.id === id);
      if (!current) return null;
      const updated = applyTaskPatch(current, patch);
      await this.commit(this.tasks.map((t) => (t.id === id ? updated : t)));
      return { ...updated };
    });
  }

  async delete(id: number): Promise<boolean> {
    return await this.exclusive(async () => {
      const next = this.tasks.filter((t) => t.id !== id);
      if (next.length === this.tasks.length) return false;
      await this.commit(next);
      return true;
    });
  }

  async moveToTop(id: number): Promise<Task | null> {
    return await this.exclusive(async () => {
      const task = this.tasks.find((t) => t.id === id);
      if (!task) return null;
      await this.commit([task, ...this.tasks.filter((t) => t.id !== id)]);
      return { ...task };
    });
  }

  async setDone(id: number, done: boolean): Promise<SetDoneResult | null> {
    return await this.exclusive(async () => {
      const task = this.tasks.find((t) => t.id === id);
      if (!task) return null;
      if (task.done === done) return { task: { ...task }, changed: false };
      const updated: Task = { ...task, done };
      await this.commit(this.tasks.map((t) => (t.id === id ? updated : t)));
      return { task: { ...updated }, changed: true };
    });
  }
}
