/** 閘道錯誤基底，statusCode 供 Fastify error handler 轉為 HTTP 回應 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode = 500,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class UnknownModuleError extends GatewayError {
  constructor(module: string) {
    super(`Unknown module: ${module}`, 'UNKNOWN_MODULE', 400);
    this.name = 'UnknownModuleError';
  }
}

/** 佇列已滿：拒絕提交，不建立任務紀錄 */
export class QueueFullError extends GatewayError {
  constructor(capacity: number) {
    super(`Queue is full (capacity ${capacity})`, 'QUEUE_FULL', 503);
    this.name = 'QueueFullError';
  }
}

/** 排程器已停止（關機中），不再接受新任務 */
export class SchedulerStoppedError extends GatewayError {
  constructor() {
    super('Scheduler is stopped; no new tasks are accepted', 'SCHEDULER_STOPPED', 503);
    this.name = 'SchedulerStoppedError';
  }
}

export class TaskNotFoundError extends GatewayError {
  constructor(taskId: string) {
    super(`Task not found: ${taskId}`, 'TASK_NOT_FOUND', 404);
    this.name = 'TaskNotFoundError';
  }
}

export class ArtifactNotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, 'ARTIFACT_NOT_FOUND', 404);
    this.name = 'ArtifactNotFoundError';
  }
}

export class InvalidTransitionError extends GatewayError {
  constructor(taskId: string, from: string, to: string) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`, 'INVALID_TRANSITION', 409);
    this.name = 'InvalidTransitionError';
  }
}

/** 後端呼叫失敗，只會記錄在任務上，不會往外拋 */
export class DispatchError extends GatewayError {
  constructor(message: string, code = 'DISPATCH_ERROR', cause?: Error) {
    super(message, code, 502, cause);
    this.name = 'DispatchError';
  }
}

export class BackendTimeoutError extends DispatchError {
  constructor(url: string, timeoutMs: number, cause?: Error) {
    super(`timeout after ${timeoutMs}ms calling ${url}`, 'BACKEND_TIMEOUT', cause);
    this.name = 'BackendTimeoutError';
  }
}

export class BackendStatusError extends DispatchError {
  constructor(url: string, public status: number, detail: string) {
    super(`${url} responded ${status}${detail ? `: ${detail}` : ''}`, 'BACKEND_STATUS');
    this.name = 'BackendStatusError';
  }
}

export class BackendUnreachableError extends DispatchError {
  constructor(url: string, cause?: Error) {
    super(`cannot reach ${url}${cause ? ` (${cause.message})` : ''}`, 'BACKEND_UNREACHABLE', cause);
    this.name = 'BackendUnreachableError';
  }
}

export class MalformedResponseError extends DispatchError {
  constructor(message: string, cause?: Error) {
    super(message, 'MALFORMED_RESPONSE', cause);
    this.name = 'MalformedResponseError';
  }
}

/** 任務失敗描述：錯誤種類 + 訊息 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return `Error: ${String(err)}`;
}
