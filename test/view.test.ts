import test from 'node:test';
import assert from 'node:assert/strict';

import type { Task } from '../src/todo/types.js';
import { parseViewOptions, projectTasks } from '../src/todo/view.js';

function task(id: number, fields: Partial<Task> = {}): Task {
  return {
    id,
    title: `T${id}`,
    description: '',
    created_at: new Date(Date.UTC(2026, 0, id)).toISOString(),
    due: '',
    priority: 'Medium',
    category: 'uncategorized',
    done: false,
    ...fields
  };
}

const ids = (tasks: Task[]) => tasks.map((t) => t.id);

test('showDone=false drops every completed task', () => {
  const tasks = [task(1, { done: true }), task(2), task(3, { done: true }), task(4)];
  const out = projectTasks(tasks, { showDone: false, category: 'all', sort: 'created' });
  assert.equal(out.filter((t) => t.done).length, 0);
  assert.deepEqual(ids(out), [4, 2]);
});

test('category filter keeps only matching tasks; all is a no-op', () => {
  const tasks = [task(1, { category: 'work' }), task(2, { category: 'personal' }), task(3, { category: 'work' })];
  const work = projectTasks(tasks, { showDone: true, category: 'work', sort: 'created' });
  assert.ok(work.every((t) => t.category === 'work'));
  assert.deepEqual(ids(work), [3, 1]);

  const all = projectTasks(tasks, { showDone: true, category: 'all', sort: 'created' });
  assert.equal(all.length, 3);
});

test('created sort is newest first', () => {
  const tasks = [task(2), task(5), task(1)];
  assert.deepEqual(ids(projectTasks(tasks, { showDone: true, category: 'all', sort: 'created' })), [5, 2, 1]);
});

test('due sort is ascending with empty dates last', () => {
  const tasks = [
    task(1, { due: '' }),
    task(2, { due: '2026-06-01' }),
    task(3, { due: '2026-01-15' }),
    task(4, { due: '' }),
    task(5, { due: '2026-03-10' })
  ];
  assert.deepEqual(ids(projectTasks(tasks, { showDone: true, category: 'all', sort: 'due' })), [3, 5, 2, 1, 4]);
});

test('priority sort orders High, Medium, Low and keeps ties in store order', () => {
  const tasks = [
    task(1, { priority: 'Low' }),
    task(2, { priority: 'Medium' }),
    task(3, { priority: 'High' }),
    task(4, { priority: 'Low' }),
    task(5, { priority: 'High' })
  ];
  assert.deepEqual(ids(projectTasks(tasks, { showDone: true, category: 'all', sort: 'priority' })), [3, 5, 2, 1, 4]);
});

test('unknown priority ranks like Medium', () => {
  const odd = { ...task(2), priority: 'Urgent' } as unknown as Task;
  const tasks = [task(1, { priority: 'Low' }), odd, task(3, { priority: 'Medium' })];
  assert.deepEqual(ids(projectTasks(tasks, { showDone: true, category: 'all', sort: 'priority' })), [2, 3, 1]);
});

test('projectTasks does not mutate its input', () => {
  const tasks = [task(1, { priority: 'Low' }), task(2, { priority: 'High' })];
  projectTasks(tasks, { showDone: true, category: 'all', sort: 'priority' });
  assert.deepEqual(ids(tasks), [1, 2]);
});

test('parseViewOptions falls back to defaults for unknown values', () => {
  assert.deepEqual(parseViewOptions(undefined), { showDone: true, category: 'all', sort: 'created' });
  assert.deepEqual(parseViewOptions({ showDone: 'false', category: 'work', sort: 'due' }), {
    showDone: false,
    category: 'work',
    sort: 'due'
  });
  assert.deepEqual(parseViewOptions({ showDone: 'maybe', category: 'chores', sort: 'title' }), {
    showDone: true,
    category: 'all',
    sort: 'created'
  });
});
