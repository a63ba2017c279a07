import { v4 as uuidv4 } from 'uuid';
import { GatewayError, InvalidTransitionError, TaskNotFoundError } from './errors.js';
import { StatusTotals, TaskInput, TaskRecord, TaskStatus } from '../types/index.js';

/**
 * 記憶體內的任務紀錄表，進程結束即消失。
 * 提交端只能 create；狀態推進只由 Worker Loop 經 markRunning / markDone / markFailed 完成。
 */
export class TaskStore {
  private records = new Map<string, TaskRecord>();

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.records.size;
  }

  create(input: TaskInput, taskId: string = uuidv4()): TaskRecord {
    if (this.records.has(taskId)) {
      throw new GatewayError(`Task id already in use: ${taskId}`, 'DUPLICATE_TASK_ID', 409);
    }

    // payload 建立後即凍結，之後不再變動
    Object.freeze(input.payload);
    const record: TaskRecord = {
      task_id: taskId,
      status: 'queued',
      created_at: this.now(),
      ...input,
    };
    this.records.set(taskId, record);
    return snapshot(record);
  }

  has(taskId: string): boolean {
    return this.records.has(taskId);
  }

  /** 回傳複本，外部修改不影響內部紀錄 */
  get(taskId: string): TaskRecord | undefined {
    const record = this.records.get(taskId);
    return record ? snapshot(record) : undefined;
  }

  values(): TaskRecord[] {
    return [...this.records.values()].map(snapshot);
  }

  countByStatus(): StatusTotals {
    const totals: StatusTotals = { queued: 0, running: 0, done: 0, failed: 0 };
    for (const record of this.records.values()) {
      totals[record.status] += 1;
    }
    return totals;
  }

  markRunning(taskId: string): TaskRecord {
    const record = this.transition(taskId, 'queued', 'running');
    record.started_at = this.now();
    return snapshot(record);
  }

  markDone(taskId: string, result: unknown, outputFile?: string): TaskRecord {
    const record = this.transition(taskId, 'running', 'done');
    record.result = result;
    if (outputFile) {
      record.output_file = outputFile;
    }
    record.finished_at = this.now();
    return snapshot(record);
  }

  markFailed(taskId: string, error: string): TaskRecord {
    const record = this.transition(taskId, 'running', 'failed');
    record.error = error || 'Error: unknown failure';
    record.finished_at = this.now();
    return snapshot(record);
  }

  /** 只允許刪除終態紀錄，供保留期清理使用 */
  delete(taskId: string): boolean {
    const record = this.records.get(taskId);
    if (!record) return false;
    if (record.status === 'queued' || record.status === 'running') {
      throw new InvalidTransitionError(taskId, record.status, 'deleted');
    }
    return this.records.delete(taskId);
  }

  private transition(taskId: string, from: TaskStatus, to: TaskStatus): TaskRecord {
    const record = this.records.get(taskId);
    if (!record) {
      throw new TaskNotFoundError(taskId);
    }
    if (record.status !== from) {
      throw new InvalidTransitionError(taskId, record.status, to);
    }
    record.status = to;
    return record;
  }
}

function snapshot(record: TaskRecord): TaskRecord {
  return { ...record };
}
