#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { resolveConfig } from './config.js';
import { AiAssistClient } from './todo/ai.js';
import { isTaskValidationError } from './todo/errors.js';
import { TaskStore } from './todo/store.js';
import { isCategory, isPriority } from './todo/task.js';
import type { CreateTaskInput, Task, TaskPatch } from './todo/types.js';
import { isCategoryFilter, isSortKey, parseViewOptions, projectTasks } from './todo/view.js';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDeps {
  store: TaskStore;
  ai: AiAssistClient;
  io: CliIo;
}

const USAGE = `todo CLI

Usage:
  todo list [--hide-done] [--category <c|all>] [--sort created|due|priority]
  todo add [--title <t>] [--description <d>] [--due YYYY-MM-DD] [--priority High|Medium|Low] [--category <c>]
  todo edit <id> [--title <t>] [--description <d>] [--due YYYY-MM-DD] [--priority p] [--category c]
  todo done <id>
  todo undone <id>
  todo rm <id>
  todo top <id>
  todo suggest <description>
  todo categorize [--title <t>] [--description <d>]
`;

function readFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  return args[idx + 1];
}

function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

export function formatTaskLine(t: Task): string {
  const tail: string[] = [t.category, t.priority];
  if (t.due) tail.push(`due ${t.due}`);
  return `${t.id}\t[${t.done ? 'x' : ' '}] ${t.title} (${tail.join(', ')})`;
}

function pickFields(rest: string[]): { fields: CreateTaskInput; error?: string } {
  const fields: CreateTaskInput = {
    title: readFlag(rest, '--title'),
    description: readFlag(rest, '--description'),
    due: readFlag(rest, '--due')
  };

  const priority = readFlag(rest, '--priority');
  if (priority !== undefined) {
    if (!isPriority(priority)) return { fields, error: `Invalid priority: ${priority}` };
    fields.priority = priority;
  }

  const category = readFlag(rest, '--category');
  if (category !== undefined) {
    if (!isCategory(category)) return { fields, error: `Invalid category: ${category}` };
    fields.category = category;
  }

  return { fields };
}

function toPatch(fields: CreateTaskInput): TaskPatch {
  const patch: TaskPatch = {};
  if (fields.title !== undefined) patch.title = fields.title;
  if (fields.description !== undefined) patch.description = fields.description;
  if (fields.due !== undefined) patch.due = fields.due;
  if (fields.priority !== undefined) patch.priority = fields.priority;
  if (fields.category !== undefined) patch.category = fields.category;
  return patch;
}

async function runCommand(cmd: string, rest: string[], deps: CliDeps): Promise<number> {
  const { store, ai, io } = deps;

  if (cmd === 'list') {
    const category = readFlag(rest, '--category');
    if (category !== undefined && !isCategoryFilter(category)) {
      io.err(`Invalid category: ${category}`);
      return 2;
    }
    const sort = readFlag(rest, '--sort');
    if (sort !== undefined && !isSortKey(sort)) {
      io.err(`Invalid sort: ${sort}`);
      return 2;
    }
    const view = parseViewOptions({
      showDone: rest.includes('--hide-done') ? 'false' : 'true',
      category,
      sort
    });
    const tasks = projectTasks(store.list(), view);
    if (!tasks.length) io.out('No tasks found.');
    for (const t of tasks) io.out(formatTaskLine(t));
    return 0;
  }

  if (cmd === 'add') {
    const { fields, error } = pickFields(rest);
    if (error) {
      io.err(error);
      return 2;
    }
    const task = await store.add(fields);
    io.out(String(task.id));
    return 0;
  }

  if (cmd === 'edit') {
    const id = parseId(rest[0]);
    if (id === null) return usage(io);
    const { fields, error } = pickFields(rest.slice(1));
    if (error) {
      io.err(error);
      return 2;
    }
    const task = await store.update(id, toPatch(fields));
    if (task) io.out(formatTaskLine(task));
    return 0;
  }

  if (cmd === 'done' || cmd === 'undone') {
    const id = parseId(rest[0]);
    if (id === null) return usage(io);
    const res = await store.setDone(id, cmd === 'done');
    if (res) io.out(formatTaskLine(res.task));
    return 0;
  }

  if (cmd === 'rm') {
    const id = parseId(rest[0]);
    if (id === null) return usage(io);
    if (await store.delete(id)) io.out(`deleted:${id}`);
    return 0;
  }

  if (cmd === 'top') {
    const id = parseId(rest[0]);
    if (id === null) return usage(io);
    const task = await store.moveToTop(id);
    if (task) io.out(formatTaskLine(task));
    return 0;
  }

  if (cmd === 'suggest') {
    const description = rest.join(' ').trim();
    if (!description) return usage(io);
    const res = await ai.suggestTitle(description);
    if (res.ok) {
      io.out(res.value);
    } else if (res.reason === 'disabled') {
      io.err('AI features disabled: set PERPLEXITY_API_KEY to enable');
    } else {
      io.err(`AI request failed: ${res.message}`);
    }
    return 0;
  }

  if (cmd === 'categorize') {
    const title = (readFlag(rest, '--title') ?? '').trim();
    const description = (readFlag(rest, '--description') ?? '').trim();
    if (!title && !description) return usage(io);
    const res = await ai.categorize(title, description);
    if (res.ok) {
      io.out(res.value);
    } else if (res.reason === 'disabled') {
      io.err('AI features disabled: set PERPLEXITY_API_KEY to enable');
    } else {
      io.err(`AI request failed: ${res.message}`);
    }
    return 0;
  }

  return usage(io);
}

function usage(io: CliIo): number {
  io.err(USAGE);
  return 2;
}

/** Runs one command against an already constructed store; returns the exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const [cmd, ...rest] = argv;
  if (!cmd) return usage(deps.io);

  const loaded = await deps.store.load();
  if (loaded.status === 'corrupt') {
    deps.io.err(`warning: ${deps.store.filePath} is unreadable (${loaded.reason}); treating it as empty`);
  }

  try {
    return await runCommand(cmd, rest, deps);
  } catch (err) {
    if (isTaskValidationError(err)) {
      deps.io.err(err.message);
      return 2;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const config = resolveConfig();
  return await runCli(process.argv.slice(2), {
    store: new TaskStore({ filePath: config.dataFile }),
    ai: new AiAssistClient(config.ai),
    io: {
      out: (line) => console.log(line),
      err: (line) => console.error(line)
    }
  });
}

// npm links bin scripts, so compare resolved paths.
const isMain = !!process.argv[1] && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);
if (isMain) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
