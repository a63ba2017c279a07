import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import taskRoutes from './routes/tasks.js';
import { GatewayConfig } from './lib/config.js';
import { Dispatcher } from './lib/dispatcher.js';
import { GatewayError } from './lib/errors.js';
import { FileManager } from './lib/files.js';
import { WorkQueue } from './lib/queue.js';
import { createReclaimHook, ReclaimHook } from './lib/reclaim.js';
import { Scheduler, TaskDispatcher } from './lib/scheduler.js';
import { TaskStore } from './lib/task-store.js';

export interface BuildOptions {
  /** 預設使用 config.server.logLevel 的 pino logger */
  logger?: FastifyServerOptions['logger'];
  /** 測試時可替換 Dispatcher 或 reclaim hook */
  dispatcher?: TaskDispatcher;
  reclaimHook?: ReclaimHook;
}

export interface Gateway {
  app: FastifyInstance;
  scheduler: Scheduler;
  files: FileManager;
}

/**
 * 組裝 Fastify app 與其擁有的 Scheduler。
 * Scheduler 隨 app 的 onReady / onClose 啟停，路由透過 plugin options 取得它。
 */
export async function buildGateway(config: GatewayConfig, options: BuildOptions = {}): Promise<Gateway> {
  const app = Fastify({
    logger: options.logger ?? { level: config.server.logLevel },
    bodyLimit: config.server.maxUploadBytes,
  });

  const files = new FileManager(config.storage.uploadDir, config.storage.outputDir, config.storage.strictUploadTypes);
  await files.init();

  const dispatcher = options.dispatcher ?? new Dispatcher(
    { fields: config.fields, backends: config.backends },
    files,
    app.log.child({ component: 'dispatcher' }),
  );

  const scheduler = new Scheduler({
    store: new TaskStore(),
    queue: new WorkQueue<string>(config.queue.capacity),
    dispatcher,
    files,
    reclaimHook: options.reclaimHook ?? createReclaimHook(config.reclaim.command),
    reclaimTimeoutMs: config.reclaim.timeoutMs,
    retentionMs: config.queue.retentionMs,
    sweepIntervalMs: config.queue.sweepIntervalMs,
    log: app.log.child({ component: 'scheduler' }),
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof GatewayError) {
      if (error.statusCode >= 500) request.log.error(error);
      return reply.code(error.statusCode).send({ error: error.message, code: error.code });
    }
    return reply.send(error);
  });

  app.register(cors);
  app.register(multipart, {
    limits: {
      fileSize: config.server.maxUploadBytes,
      files: 1,
    },
  });
  app.register(taskRoutes, { scheduler, files });

  /** 健康檢查端點 */
  app.get('/health', async () => ({ status: 'ok' }));

  app.addHook('onReady', async () => {
    scheduler.start();
  });
  app.addHook('onClose', async () => {
    await scheduler.stop();
  });

  return { app, scheduler, files };
}
