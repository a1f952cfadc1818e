import Fastify from 'fastify';
import type { FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import { fileURLToPath } from 'node:url';

import { resolveConfig } from './config.js';
import type { AppConfig } from './config.js';
import { AiAssistClient } from './todo/ai.js';
import type { AiResult } from './todo/ai.js';
import { TaskValidationError, isTaskValidationError } from './todo/errors.js';
import { TaskStore } from './todo/store.js';
import { isCategory, isPriority, isString } from './todo/task.js';
import { CATEGORY_VALUES, PRIORITY_VALUES } from './todo/types.js';
import type { CreateTaskInput, LoadResult, TaskPatch } from './todo/types.js';
import { projectTasks, parseViewOptions } from './todo/view.js';

type IdParams = { Params: { id: string } };

function asRecord(body: unknown): Record<string, unknown> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return {};
  return body as Record<string, unknown>;
}

function optionalString(b: Record<string, unknown>, key: string): string | undefined {
  const v = b[key];
  if (v === undefined || v === null) return undefined;
  if (!isString(v)) throw new TaskValidationError(`${key} must be a string`, key);
  return v;
}

export function parseTaskId(raw: string): number {
  const id = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(id)) throw new TaskValidationError(`Invalid task id: ${raw}`, 'id');
  return id;
}

function pickCreateInput(body: unknown): CreateTaskInput {
  const b = asRecord(body);
  const out: CreateTaskInput = {
    title: optionalString(b, 'title'),
    description: optionalString(b, 'description'),
    due: optionalString(b, 'due')
  };

  const priority = optionalString(b, 'priority');
  if (priority !== undefined && priority !== '') {
    if (!isPriority(priority)) throw new TaskValidationError(`Invalid priority: ${priority}`, 'priority');
    out.priority = priority;
  }

  const category = optionalString(b, 'category');
  if (category !== undefined && category !== '') {
    if (!isCategory(category)) throw new TaskValidationError(`Invalid category: ${category}`, 'category');
    out.category = category;
  }

  return out;
}

function pickPatch(body: unknown): TaskPatch {
  const b = asRecord(body);
  const out: TaskPatch = {};

  const title = optionalString(b, 'title');
  if (title !== undefined) out.title = title;
  const description = optionalString(b, 'description');
  if (description !== undefined) out.description = description;
  const due = optionalString(b, 'due');
  if (due !== undefined) out.due = due;

  const priority = optionalString(b, 'priority');
  if (priority !== undefined) {
    if (!isPriority(priority)) throw new TaskValidationError(`Invalid priority: ${priority}`, 'priority');
    out.priority = priority;
  }

  const category = optionalString(b, 'category');
  if (category !== undefined) {
    if (!isCategory(category)) throw new TaskValidationError(`Invalid category: ${category}`, 'category');
    out.category = category;
  }

  if (b.done !== undefined) {
    if (typeof b.done !== 'boolean') throw new TaskValidationError('done must be a boolean', 'done');
    out.done = b.done;
  }

  return out;
}

function aiWarning(res: AiResult<unknown>): string | undefined {
  if (res.ok) return undefined;
  if (res.reason === 'disabled') return 'AI features are disabled';
  return `AI request failed: ${res.message}`;
}

export function logLoadResult(log: FastifyBaseLogger, res: LoadResult, filePath: string): void {
  if (res.status === 'missing') {
    log.info({ filePath }, 'no task file yet, starting empty');
  } else if (res.status === 'corrupt') {
    log.warn({ filePath, reason: res.reason }, 'task file unreadable, starting empty');
  } else {
    log.info({ filePath, count: res.tasks.length, skipped: res.skipped }, 'tasks loaded');
  }
}

type ServerOptions = {
  config?: AppConfig;
  store?: TaskStore;
  ai?: AiAssistClient;
  logger?: boolean;
};

export async function buildApp(opts: ServerOptions = {}) {
  const config = opts.config ?? resolveConfig();
  const app = Fastify({ logger: opts.logger === false ? false : { level: config.logLevel } });

  const store = opts.store ?? new TaskStore({ filePath: config.dataFile });
  const ai = opts.ai ?? new AiAssistClient(config.ai);

  logLoadResult(app.log, await store.load(), store.filePath);

  if (config.cors.enabled) {
    await app.register(cors, {
      origin: config.cors.origin
    });
  }

  // Error handling: return JSON consistently.
  app.setErrorHandler((err, req, reply) => {
    if (isTaskValidationError(err)) {
      reply.status(400).send({ ok: false, error: err.message, field: err.field });
      return;
    }
    const statusCode = typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : 500;
    if (statusCode === 500) {
      req.log.error({ err }, 'request failed');
      reply.status(500).send({ ok: false, error: 'Internal server error' });
      return;
    }
    reply.status(statusCode).send({ ok: false, error: err.message });
  });

  app.get('/', async () => {
    return {
      ok: true,
      service: 'smart-todo',
      endpoints: ['/api/meta', '/api/tasks', '/api/task/:id (PATCH, DELETE)', '/api/task/:id/top', '/api/task/:id/done']
    };
  });

  app.get('/favicon.ico', async (_req, reply) => {
    reply.code(204).send();
  });

  app.get('/api/meta', async () => {
    return {
      ok: true,
      aiEnabled: ai.enabled,
      model: ai.model,
      dataFile: store.filePath,
      categories: CATEGORY_VALUES,
      priorities: PRIORITY_VALUES
    };
  });

  app.get('/api/tasks', async (req) => {
    const view = parseViewOptions(req.query);
    const all = store.list();
    return { ok: true, tasks: projectTasks(all, view), total: all.length, view };
  });

  app.post('/api/tasks', async (req, reply) => {
    const task = await store.add(pickCreateInput(req.body));
    req.log.info({ id: task.id }, 'task added');
    reply.status(201);
    return { ok: true, task };
  });

  app.patch<IdParams>('/api/task/:id', async (req) => {
    const id = parseTaskId(req.params.id);
    const task = await store.update(id, pickPatch(req.body));
    return { ok: true, task };
  });

  app.delete<IdParams>('/api/task/:id', async (req) => {
    const id = parseTaskId(req.params.id);
    const deleted = await store.delete(id);
    if (deleted) req.log.info({ id }, 'task deleted');
    return { ok: true, deleted };
  });

  app.post<IdParams>('/api/task/:id/top', async (req) => {
    const id = parseTaskId(req.params.id);
    const task = await store.moveToTop(id);
    return { ok: true, task };
  });

  app.post<IdParams>('/api/task/:id/done', async (req) => {
    const id = parseTaskId(req.params.id);
    const b = asRecord(req.body);
    if (typeof b.done !== 'boolean') throw new TaskValidationError('Missing body.done (boolean)', 'done');
    const res = await store.setDone(id, b.done);
    return { ok: true, task: res?.task ?? null, changed: res?.changed ?? false };
  });

  app.post('/api/ai/suggest-title', async (req) => {
    const description = (optionalString(asRecord(req.body), 'description') ?? '').trim();
    if (!description) throw new TaskValidationError('description is required', 'description');

    const res = await ai.suggestTitle(description);
    const warning = aiWarning(res);
    if (!res.ok && res.reason === 'failed') req.log.warn({ reason: res.message }, 'title suggestion failed');
    return { ok: true, title: res.ok ? res.value : '', warning };
  });

  app.post('/api/ai/categorize', async (req) => {
    const b = asRecord(req.body);
    const title = (optionalString(b, 'title') ?? '').trim();
    const description = (optionalString(b, 'description') ?? '').trim();
    if (!title && !description) throw new TaskValidationError('title or description is required', 'title');

    const res = await ai.categorize(title, description);
    const warning = aiWarning(res);
    if (!res.ok && res.reason === 'failed') req.log.warn({ reason: res.message }, 'categorization failed');
    return { ok: true, category: res.ok ? res.value : null, warning };
  });

  return app;
}

async function main(): Promise<void> {
  const config = resolveConfig();
  const app = await buildApp({ config });
  app.log.info({ aiEnabled: config.ai.apiKey !== undefined, model: config.ai.model }, 'AI assist');
  await app.listen({ host: config.host, port: config.port });
}

const isMain = process.argv[1] === fileURLToPath(import.meta.url);
if (isMain) {
  main().catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(1);
  });
}
