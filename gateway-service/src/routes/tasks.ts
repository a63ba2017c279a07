// routes/tasks.ts — 任務提交、查詢、下載與佇列狀態路由
import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { TaskNotFoundError, ValidationError } from '../lib/errors.js';
import { FileManager } from '../lib/files.js';
import { AnyModuleHandler, MODULE_HANDLERS, resolveHandler } from '../lib/modules.js';
import { Scheduler } from '../lib/scheduler.js';
import { MODULE_NAMES, TaskRecord } from '../types/index.js';

export interface TaskRoutesOptions {
  scheduler: Scheduler;
  files: FileManager;
}

interface Submission {
  fields: Record<string, unknown>;
  uploadPath?: string;
}

const CONTENT_TYPES: Record<string, string> = {
  '.wav': 'audio/wav',
  '.mp4': 'video/mp4',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Content-Disposition：filename 為 ASCII 後備名稱，filename* 以 RFC 5987 帶出完整檔名，
 * 避免非 Latin-1 字元或引號讓 Node 拒絕 header。
 */
export function contentDisposition(name: string): string {
  const fallback = name.replace(/[^\x20-\x7e]|["\\]/g, '_');
  const encoded = encodeURIComponent(name).replace(
    /['()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

/** 任務查詢回應：完整紀錄，有輸出檔時附上下載路徑與檔名 */
export function presentTask(record: TaskRecord): Record<string, unknown> {
  const data: Record<string, unknown> = { ...record };
  if (record.output_file) {
    data.download_url = `/api/download/${record.task_id}`;
    data.output_file_name = path.basename(record.output_file);
  }
  return data;
}

/**
 * 任務路由插件。Scheduler 與 FileManager 由 options 注入，不使用全域狀態。
 */
export default async function taskRoutes(fastify: FastifyInstance, options: TaskRoutesOptions) {
  const { scheduler, files } = options;

  /**
   * 讀取提交內容：multipart 逐一處理欄位與檔案（檔案直接串流寫入任務目錄），
   * 其他情況使用 JSON body。
   */
  async function collectSubmission(
    request: FastifyRequest,
    handler: AnyModuleHandler,
    taskId: string,
  ): Promise<Submission> {
    if (!request.isMultipart()) {
      return { fields: isRecord(request.body) ? request.body : {} };
    }

    const submission: Submission = { fields: {} };
    try {
      for await (const part of request.parts()) {
        if (part.type === 'field') {
          submission.fields[part.fieldname] = part.value;
          continue;
        }

        const upload = handler.upload;
        if (!upload || part.fieldname !== upload.field || submission.uploadPath) {
          // 非預期的檔案欄位：讀完丟棄，否則後續 part 無法讀取
          part.file.resume();
          continue;
        }

        submission.uploadPath = await files.stageUpload(taskId, upload.subdir, part.filename, part.file, {
          expect: upload.expect,
        });
      }
    } catch (err) {
      await files.removeTaskUploads(taskId);
      throw err;
    }
    return submission;
  }

  /**
   * POST /api/submit/:module — 提交任務。
   * 未知模組、欄位驗證失敗或佇列已滿時不建立任何紀錄。
   */
  fastify.post(
    '/api/submit/:module',
    async (request: FastifyRequest<{ Params: { module: string } }>, reply: FastifyReply) => {
      const handler = resolveHandler(request.params.module);
      scheduler.assertCapacity();

      const taskId = uuidv4();
      const { fields, uploadPath } = await collectSubmission(request, handler, taskId);

      try {
        const record = scheduler.submit(handler.parse(fields, uploadPath), taskId);
        return reply.code(200).send({ task_id: record.task_id, status: record.status });
      } catch (err) {
        if (uploadPath) await files.removeTaskUploads(taskId);
        throw err;
      }
    },
  );

  /** GET /api/task/:id — 查詢單一任務 */
  fastify.get('/api/task/:id', async (request: FastifyRequest<{ Params: { id: string } }>) => {
    const record = scheduler.get(request.params.id);
    if (!record) throw new TaskNotFoundError(request.params.id);
    return presentTask(record);
  });

  /**
   * GET /api/download/:id — 下載輸出檔。
   * 任務不存在、沒有輸出檔或檔案已從磁碟刪除皆回 404。
   */
  fastify.get('/api/download/:id', async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
    const record = scheduler.get(request.params.id);
    if (!record) throw new TaskNotFoundError(request.params.id);

    const artifact = await files.resolveOutput(record.output_file);
    const contentType = CONTENT_TYPES[path.extname(artifact.name).toLowerCase()] ?? 'application/octet-stream';

    return reply
      .header('Content-Disposition', contentDisposition(artifact.name))
      .header('Content-Length', artifact.size)
      .type(contentType)
      .send(fs.createReadStream(artifact.path));
  });

  /** GET /api/queue — 佇列深度、執行中任務與各狀態統計 */
  fastify.get('/api/queue', async () => scheduler.snapshot());

  /** GET /api/status — 聯調用別名 */
  fastify.get('/api/status', async () => ({ ok: true, ...scheduler.snapshot() }));

  fastify.get('/api/health', async () => {
    const { queue_size, running_task_id } = scheduler.snapshot();
    return { ok: true, queue_size, running_task_id };
  });

  fastify.get('/api/modules', async () => ({
    modules: MODULE_NAMES.map((id) => ({ id, name: MODULE_HANDLERS[id].label })),
  }));

  /**
   * POST /api/run/:app — 聯調入口。
   * app1 / voice_design 直接排入語音設計；需要上傳檔案的模組只回覆正式 multipart 路由。
   */
  fastify.post(
    '/api/run/:app',
    async (request: FastifyRequest<{ Params: { app: string } }>, reply: FastifyReply) => {
      const appName = request.params.app;
      const name = appName.trim().toLowerCase();
      const body = isRecord(request.body) ? request.body : {};

      if (name === 'app1' || name === 'voice_design') {
        const text = typeof body.text === 'string' ? body.text.trim() : '';
        if (!text) {
          throw new ValidationError('app1/voice_design requires a "text" field');
        }
        const record = scheduler.submit(MODULE_HANDLERS.voice_design.parse({ ...body, text }));
        return {
          ok: true,
          message: 'accepted, queued',
          app: appName,
          task_id: record.task_id,
          status: record.status,
        };
      }

      if (['app2', 'tts', 'app3', 'env_audio'].includes(name)) {
        return {
          ok: true,
          message: 'accepted; this module needs a file upload, use the multipart submit route',
          app: appName,
          next: {
            tts: `/api/submit/${MODULE_HANDLERS.tts.route}`,
            env_audio: `/api/submit/${MODULE_HANDLERS.env_audio.route}`,
          },
        };
      }

      return reply.code(404).send({ error: `Unknown app: ${appName}`, code: 'UNKNOWN_APP' });
    },
  );
}
