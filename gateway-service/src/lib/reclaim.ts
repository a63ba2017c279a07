import { spawn } from 'child_process';
import type { FastifyBaseLogger } from 'fastify';

/** 每個任務結束後執行的資源回收（例如釋放 GPU 顯存），失敗不影響任務狀態 */
export interface ReclaimHook {
  readonly name: string;
  run(signal: AbortSignal): Promise<void>;
}

export class NoopReclaimHook implements ReclaimHook {
  readonly name = 'noop';

  async run(): Promise<void> {}
}

/** 以 shell 執行設定的指令，非 0 結束碼視為失敗 */
export class CommandReclaimHook implements ReclaimHook {
  readonly name: string;

  constructor(private readonly command: string) {
    this.name = `command(${command})`;
  }

  run(signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.command, { shell: true, stdio: 'ignore', signal });
      child.once('error', reject);
      child.once('exit', (code, sig) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`reclaim command exited with ${code ?? sig}`));
        }
      });
    });
  }
}

export function createReclaimHook(command: string): ReclaimHook {
  return command.trim() ? new CommandReclaimHook(command.trim()) : new NoopReclaimHook();
}

/**
 * 在 timeoutMs 內執行 hook；逾時即中止。
 * 任何錯誤只記 warn，永不往外拋。
 */
export async function runReclaimHook(hook: ReclaimHook, timeoutMs: number, log: FastifyBaseLogger): Promise<void> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`reclaim hook timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    await Promise.race([hook.run(controller.signal), timeout]);
  } catch (err) {
    log.warn({ hook: hook.name, err }, 'Reclaim hook failed');
  } finally {
    clearTimeout(timer);
  }
}
