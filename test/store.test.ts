import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { TaskStore } from '../src/todo/store.js';

async function makeTempFile(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'smart-todo-store-'));
  return path.join(dir, 'tasks.json');
}

function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}

async function readFileTasks(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf8'));
}

test('load reports a missing file as an empty list', async () => {
  const store = new TaskStore({ filePath: await makeTempFile() });
  const res = await store.load();
  assert.deepEqual(res, { status: 'missing', tasks: [] });
  assert.deepEqual(store.list(), []);
});

test('load reports unparsable JSON as corrupt and starts empty', async () => {
  const filePath = await makeTempFile();
  await fs.writeFile(filePath, '[{"id": 1,', 'utf8');
  const store = new TaskStore({ filePath });
  const res = await store.load();
  assert.equal(res.status, 'corrupt');
  assert.deepEqual(res.tasks, []);
  assert.deepEqual(store.list(), []);
});

test('load reports a non-array document as corrupt', async () => {
  const filePath = await makeTempFile();
  await fs.writeFile(filePath, '{"tasks": []}', 'utf8');
  const res = await new TaskStore({ filePath }).load();
  assert.deepEqual(res, { status: 'corrupt', tasks: [], reason: 'expected a JSON array of tasks' });
});

test('load skips records without an id and duplicate ids', async () => {
  const filePath = await makeTempFile();
  const rec = { title: 'a', description: '', created_at: '2026-01-01T00:00:00.000Z', due: '', priority: 'Low', category: 'work', done: false };
  await fs.writeFile(filePath, JSON.stringify([{ ...rec, id: 1 }, { ...rec }, { ...rec, id: 1, title: 'dup' }]), 'utf8');
  const res = await new TaskStore({ filePath }).load();
  assert.equal(res.status, 'loaded');
  if (res.status !== 'loaded') return;
  assert.equal(res.skipped, 2);
  assert.deepEqual(res.tasks.map((t) => t.title), ['a']);
});

test('add to an empty store persists a single default task', async () => {
  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath, now: fixedClock('2026-03-01T10:00:00.000Z') });
  await store.load();

  const task = await store.add({ title: 'Buy milk' });
  assert.equal(task.done, false);
  assert.equal(task.category, 'uncategorized');
  assert.equal(task.priority, 'Medium');
  assert.equal(task.id, Date.parse('2026-03-01T10:00:00.000Z'));
  assert.equal(store.list().length, 1);

  const reloaded = new TaskStore({ filePath });
  const res = await reloaded.load();
  assert.equal(res.status, 'loaded');
  assert.deepEqual(reloaded.list(), [task]);
});

test('file is pretty-printed with two-space indentation', async () => {
  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath, now: fixedClock('2026-03-01T10:00:00.000Z') });
  await store.load();
  await store.add({ title: 'Buy milk' });

  const raw = await fs.readFile(filePath, 'utf8');
  assert.ok(raw.startsWith('[\n  {\n    "id": 1772359200000,\n'));
  assert.ok(raw.endsWith(']\n'));
});

test('add never reuses an id within the same millisecond', async () => {
  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath, now: fixedClock('2026-03-01T10:00:00.000Z') });
  await store.load();

  const a = await store.add({ title: 'a' });
  const b = await store.add({ title: 'b' });
  const c = await store.add({ title: 'c' });
  assert.deepEqual([b.id - a.id, c.id - b.id], [1, 1]);
  assert.equal(new Set(store.list().map((t) => t.id)).size, 3);
});

test('failed validation leaves the store and file untouched', async () => {
  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath });
  await store.load();
  await assert.rejects(store.add({ title: '', description: '   ' }));
  assert.deepEqual(store.list(), []);
  await assert.rejects(fs.access(filePath));
});

test('moveToTop on [A,B,C] selecting B yields [B,A,C]', async () => {
  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath, now: fixedClock('2026-03-01T10:00:00.000Z') });
  await store.load();
  const a = await store.add({ title: 'A' });
  const b = await store.add({ title: 'B' });
  const c = await store.add({ title: 'C' });

  const moved = await store.moveToTop(b.id);
  assert.equal(moved?.id, b.id);
  assert.deepEqual(store.list().map((t) => t.title), ['B', 'A', 'C']);

  const onDisk = (await readFileTasks(filePath)) as Array<{ id: number }>;
  assert.deepEqual(onDisk.map((t) => t.id), [b.id, a.id, c.id]);
});

test('update overwrites fields in place and ignores unknown ids', async () => {
  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath, now: fixedClock('2026-03-01T10:00:00.000Z') });
  await store.load();
  const a = await store.add({ title: 'A' });
  await store.add({ title: 'B' });

  const updated = await store.update(a.id, { title: 'A2', priority: 'High', category: 'work', due: '2026-04-01' });
  assert.equal(updated?.title, 'A2');
  assert.deepEqual(store.list().map((t) => t.title), ['A2', 'B']);
  assert.equal(store.get(a.id)?.priority, 'High');
  assert.equal(store.get(a.id)?.created_at, a.created_at);

  assert.equal(await store.update(999, { title: 'ghost' }), null);
  assert.equal(store.list().length, 2);
});

test('delete removes the task and reports misses', async () => {
  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath, now: fixedClock('2026-03-01T10:00:00.000Z') });
  await store.load();
  const a = await store.add({ title: 'A' });
  const b = await store.add({ title: 'B' });

  assert.equal(await store.delete(a.id), true);
  assert.equal(await store.delete(a.id), false);
  assert.deepEqual(store.list().map((t) => t.id), [b.id]);

  const onDisk = (await readFileTasks(filePath)) as Array<{ id: number }>;
  assert.deepEqual(onDisk.map((t) => t.id), [b.id]);
});

test('setDone only writes when the value changes', async () => {
  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath, now: fixedClock('2026-03-01T10:00:00.000Z') });
  await store.load();
  const a = await store.add({ title: 'A' });

  const first = await store.setDone(a.id, true);
  assert.equal(first?.changed, true);
  assert.equal(first?.task.done, true);

  // Overwrite the file so an unexpected save would be visible.
  await fs.writeFile(filePath, 'sentinel', 'utf8');
  const second = await store.setDone(a.id, true);
  assert.equal(second?.changed, false);
  assert.equal(await fs.readFile(filePath, 'utf8'), 'sentinel');

  assert.equal(await store.setDone(12345, true), null);
});

test('a mixed sequence of mutations round-trips through the file', async () => {
  const filePath = await makeTempFile();
  let tick = Date.parse('2026-03-01T10:00:00.000Z');
  const store = new TaskStore({ filePath, now: () => new Date(tick++) });
  await store.load();

  const a = await store.add({ title: 'A', due: '2026-05-01', category: 'shopping' });
  const b = await store.add({ description: 'only a description' });
  const c = await store.add({ title: 'C', priority: 'Low' });
  await store.update(a.id, { description: 'edited' });
  await store.setDone(b.id, true);
  await store.moveToTop(c.id);
  const d = await store.add({ title: 'D' });
  await store.delete(a.id);

  const reloaded = new TaskStore({ filePath });
  await reloaded.load();
  assert.deepEqual(reloaded.list(), store.list());
  assert.deepEqual(reloaded.list().map((t) => t.id), [c.id, b.id, d.id]);
});

test('overlapping mutations all reach the file', async () => {
  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath, now: fixedClock('2026-03-01T10:00:00.000Z') });
  await store.load();

  const added = await Promise.all(Array.from({ length: 10 }, (_, i) => store.add({ title: `t${i}` })));
  assert.equal(new Set(added.map((t) => t.id)).size, 10);

  await Promise.all(added.map((t) => store.setDone(t.id, true)));

  const reloaded = new TaskStore({ filePath });
  const res = await reloaded.load();
  assert.equal(res.status, 'loaded');
  assert.equal(res.tasks.length, 10);
  assert.deepEqual(
    res.tasks.map((t) => t.done),
    Array.from({ length: 10 }, () => true)
  );
  assert.deepEqual(reloaded.list(), store.list());
});

test('a failed write leaves the in-memory list unchanged', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'smart-todo-store-'));
  const blocker = path.join(dir, 'not-a-dir');
  await fs.writeFile(blocker, 'x', 'utf8');
  const broken = new TaskStore({ filePath: path.join(blocker, 'tasks.json') });
  await broken.load();
  await assert.rejects(broken.add({ title: 'lost' }));
  assert.deepEqual(broken.list(), []);

  const filePath = await makeTempFile();
  const store = new TaskStore({ filePath });
  await store.load();
  const task = await store.add({ title: 'keep' });

  // A directory at the destination makes the rename fail.
  await fs.rm(filePath);
  await fs.mkdir(filePath);
  await assert.rejects(store.setDone(task.id, true));
  await assert.rejects(store.delete(task.id));
  assert.deepEqual(store.list(), [task]);

  const leftovers = (await fs.readdir(path.dirname(filePath))).filter((f) => f.endsWith('.tmp'));
  assert.deepEqual(leftovers, []);
});
