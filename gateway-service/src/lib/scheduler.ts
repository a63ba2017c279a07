import type { FastifyBaseLogger } from 'fastify';
import { describeError, QueueFullError, SchedulerStoppedError } from './errors.js';
import { FileManager } from './files.js';
import { WorkQueue } from './queue.js';
import { ReclaimHook, runReclaimHook } from './reclaim.js';
import { TaskStore } from './task-store.js';
import { DispatchOutcome, QueueSnapshot, TaskInput, TaskRecord } from '../types/index.js';

/** Worker Loop 只需要 dispatch，方便測試替換 */
export interface TaskDispatcher {
  dispatch(record: TaskRecord, signal?: AbortSignal): Promise<DispatchOutcome>;
}

export interface SchedulerOptions {
  store: TaskStore;
  queue: WorkQueue<string>;
  dispatcher: TaskDispatcher;
  files: FileManager;
  reclaimHook: ReclaimHook;
  reclaimTimeoutMs: number;
  /** 終態任務保留時間，0 表示永久保留 */
  retentionMs: number;
  sweepIntervalMs: number;
  log: FastifyBaseLogger;
  now?: () => number;
}

/**
 * 任務排程器：持有紀錄表、佇列與「目前執行中」指標，生命週期與進程一致。
 * 唯一的消費者逐一取出任務，保證任何時刻最多一個任務處於 running。
 */
export class Scheduler {
  readonly store: TaskStore;
  private readonly queue: WorkQueue<string>;
  private readonly dispatcher: TaskDispatcher;
  private readonly files: FileManager;
  private readonly reclaimHook: ReclaimHook;
  private readonly reclaimTimeoutMs: number;
  private readonly retentionMs: number;
  private readonly sweepIntervalMs: number;
  private readonly log: FastifyBaseLogger;
  private readonly now: () => number;

  private runningTaskId: string | null = null;
  private loop: Promise<void> | null = null;
  private inFlight: AbortController | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private idleWaiters: Array<() => void> = [];
  /** 已提交但尚未結束的任務數 */
  private outstanding = 0;
  private stopping = false;

  constructor(options: SchedulerOptions) {
    this.store = options.store;
    this.queue = options.queue;
    this.dispatcher = options.dispatcher;
    this.files = options.files;
    this.reclaimHook = options.reclaimHook;
    this.reclaimTimeoutMs = options.reclaimTimeoutMs;
    this.retentionMs = options.retentionMs;
    this.sweepIntervalMs = options.sweepIntervalMs;
    this.log = options.log;
    this.now = options.now ?? Date.now;
  }

  /** 提交前先檢查容量與是否已停止，避免暫存上傳檔後才被拒絕 */
  assertCapacity(): void {
    if (this.stopping || this.queue.isClosed) {
      throw new SchedulerStoppedError();
    }
    if (!this.queue.hasRoom()) {
      throw new QueueFullError(this.queue.capacity ?? 0);
    }
  }

  /** 建立 queued 紀錄並排入佇列；佇列已滿時不建立紀錄 */
  submit(input: TaskInput, taskId?: string): TaskRecord {
    this.assertCapacity();
    const record = this.store.create(input, taskId);
    this.queue.push(record.task_id);
    this.outstanding += 1;
    this.log.info({ taskId: record.task_id, module: record.module, queueSize: this.queue.size }, 'Task queued');
    return record;
  }

  get(taskId: string): TaskRecord | undefined {
    return this.store.get(taskId);
  }

  snapshot(): QueueSnapshot {
    return {
      queue_size: this.queue.size,
      queue_capacity: this.queue.capacity,
      running_task_id: this.runningTaskId,
      totals: this.store.countByStatus(),
    };
  }

  /** 啟動唯一的 Worker Loop 與保留期清理 */
  start(): void {
    if (this.loop) return;
    this.stopping = false;
    this.loop = this.runLoop();

    if (this.retentionMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.sweep().catch((err) => this.log.error({ err }, 'Retention sweep failed'));
      }, this.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /** 關閉佇列、中止進行中的後端呼叫，等待 Worker Loop 結束；尚未開始的任務維持 queued */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.queue.close();
    this.inFlight?.abort();
    await this.loop;
    this.loop = null;
  }

  /** 佇列清空且沒有任務執行時 resolve，供測試與優雅關閉使用 */
  whenIdle(): Promise<void> {
    if (this.outstanding === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * 移除完成時間早於保留期的終態任務，連同其輸出檔與上傳暫存。
   * 回傳移除筆數。
   */
  async sweep(): Promise<number> {
    if (this.retentionMs <= 0) return 0;
    const cutoff = this.now() - this.retentionMs;
    let removed = 0;

    for (const record of this.store.values()) {
      if (record.status !== 'done' && record.status !== 'failed') continue;
      if (record.finished_at === undefined || record.finished_at > cutoff) continue;

      this.store.delete(record.task_id);
      removed += 1;
      if (record.output_file) {
        await this.files.removeOutput(record.output_file);
      }
      await this.files.removeTaskUploads(record.task_id);
    }

    if (removed > 0) {
      this.log.info({ removed }, 'Expired tasks removed');
    }
    return removed;
  }

  private async runLoop(): Promise<void> {
    for (;;) {
      const taskId = await this.queue.take();
      if (taskId === null || this.stopping) break;
      try {
        await this.execute(taskId);
      } finally {
        this.outstanding -= 1;
        this.notifyIdle();
      }
    }
  }

  /** 單一任務的完整生命週期；任何 dispatch 例外都只記錄在任務上 */
  private async execute(taskId: string): Promise<void> {
    if (!this.store.has(taskId)) {
      return;
    }

    this.runningTaskId = taskId;
    const record = this.store.markRunning(taskId);
    const controller = new AbortController();
    this.inFlight = controller;

    try {
      const { result, outputFile } = await this.dispatcher.dispatch(record, controller.signal);
      this.store.markDone(taskId, result, outputFile);
      this.log.info({ taskId, outputFile }, 'Task done');
    } catch (err) {
      const message = describeError(err);
      this.store.markFailed(taskId, message);
      this.log.warn({ taskId, error: message }, 'Task failed');
    } finally {
      this.inFlight = null;
      await runReclaimHook(this.reclaimHook, this.reclaimTimeoutMs, this.log);
      this.runningTaskId = null;
    }
  }

  private notifyIdle(): void {
    if (this.outstanding > 0) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
