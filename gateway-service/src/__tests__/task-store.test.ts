import { describe, it, expect, beforeEach } from 'vitest';
import { TaskStore } from '../lib/task-store.js';
import { InvalidTransitionError, TaskNotFoundError } from '../lib/errors.js';
import { TaskInput } from '../types/index.js';

const voiceInput = (): TaskInput => ({
  module: 'voice_design',
  payload: { text: 'hello', instruct: '', language: 'English' },
});

describe('TaskStore', () => {
  let clock: number;
  let store: TaskStore;

  beforeEach(() => {
    clock = 1_000;
    store = new TaskStore(() => clock);
  });

  it('should create queued records with unique ids', () => {
    const a = store.create(voiceInput());
    const b = store.create(voiceInput());

    expect(a.task_id).not.toBe(b.task_id);
    expect(a.status).toBe('queued');
    expect(a.created_at).toBe(1_000);
    expect(a.started_at).toBeUndefined();
    expect(a.result).toBeUndefined();
    expect(a.error).toBeUndefined();
    expect(store.get(a.task_id)?.status).toBe('queued');
  });

  it('should keep an explicit id and refuse to reuse it', () => {
    store.create(voiceInput(), 'fixed-id');
    expect(store.get('fixed-id')?.module).toBe('voice_design');
    expect(() => store.create(voiceInput(), 'fixed-id')).toThrow('already in use');
  });

  it('should freeze the payload at creation', () => {
    const input = voiceInput();
    const record = store.create(input);

    expect(Object.isFrozen(record.payload)).toBe(true);
    expect(() => {
      Object.assign(record.payload, { text: 'changed' });
    }).toThrow(TypeError);
    expect(store.get(record.task_id)?.payload).toEqual({ text: 'hello', instruct: '', language: 'English' });
  });

  it('should return copies that do not leak mutations', () => {
    const record = store.create(voiceInput());
    const copy = store.get(record.task_id);
    if (!copy) throw new Error('missing record');
    copy.status = 'done';

    expect(store.get(record.task_id)?.status).toBe('queued');
  });

  it('should walk queued -> running -> done and stamp times once', () => {
    const { task_id } = store.create(voiceInput());

    clock = 2_000;
    const running = store.markRunning(task_id);
    expect(running.status).toBe('running');
    expect(running.started_at).toBe(2_000);

    clock = 3_000;
    const done = store.markDone(task_id, { size: 4 }, '/tmp/out.wav');
    expect(done.status).toBe('done');
    expect(done.result).toEqual({ size: 4 });
    expect(done.output_file).toBe('/tmp/out.wav');
    expect(done.started_at).toBe(2_000);
    expect(done.finished_at).toBe(3_000);
    expect(done.error).toBeUndefined();
  });

  it('should record failures without a result', () => {
    const { task_id } = store.create(voiceInput());
    store.markRunning(task_id);
    const failed = store.markFailed(task_id, 'BackendTimeoutError: timeout after 5ms');

    expect(failed.status).toBe('failed');
    expect(failed.error).toBe('BackendTimeoutError: timeout after 5ms');
    expect(failed.result).toBeUndefined();
    expect(failed.output_file).toBeUndefined();
  });

  it('should refuse transitions that move backwards or skip running', () => {
    const { task_id } = store.create(voiceInput());

    expect(() => store.markDone(task_id, {})).toThrow(InvalidTransitionError);
    store.markRunning(task_id);
    expect(() => store.markRunning(task_id)).toThrow(InvalidTransitionError);
    store.markDone(task_id, {});
    expect(() => store.markFailed(task_id, 'late')).toThrow(InvalidTransitionError);
    expect(() => store.markRunning('missing')).toThrow(TaskNotFoundError);
  });

  it('should count records by status', () => {
    const a = store.create(voiceInput());
    const b = store.create(voiceInput());
    store.create(voiceInput());
    store.markRunning(a.task_id);
    store.markDone(a.task_id, {});
    store.markRunning(b.task_id);

    expect(store.countByStatus()).toEqual({ queued: 1, running: 1, done: 1, failed: 0 });
  });

  it('should only delete terminal records', () => {
    const { task_id } = store.create(voiceInput());
    expect(() => store.delete(task_id)).toThrow(InvalidTransitionError);

    store.markRunning(task_id);
    store.markFailed(task_id, 'Error: boom');
    expect(store.delete(task_id)).toBe(true);
    expect(store.has(task_id)).toBe(false);
    expect(store.delete(task_id)).toBe(false);
  });
});
