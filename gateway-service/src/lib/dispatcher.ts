import axios, { AxiosInstance, AxiosResponse } from 'axios';
import fs from 'fs';
import path from 'path';
import type { FastifyBaseLogger } from 'fastify';
import {
  BackendStatusError,
  BackendTimeoutError,
  BackendUnreachableError,
  DispatchError,
  MalformedResponseError,
} from './errors.js';
import { FileManager } from './files.js';
import { BackendContext, BackendRequest, envAudio, tts, voiceDesign } from './modules.js';
import { DispatchOutcome, TaskRecord } from '../types/index.js';

const BODY_EXCERPT_LENGTH = 300;

/** 依模組把任務 payload 轉成後端請求，新增模組時此處的 switch 會要求補上分支 */
export function buildRequest(record: TaskRecord, ctx: BackendContext): BackendRequest {
  switch (record.module) {
    case 'voice_design':
      return voiceDesign.toRequest(record.payload, ctx);
    case 'tts':
      return tts.toRequest(record.payload, ctx);
    case 'env_audio':
      return envAudio.toRequest(record.payload, ctx);
    default: {
      const unreachable: never = record;
      throw new DispatchError(`Unsupported module: ${JSON.stringify(unreachable)}`);
    }
  }
}

/** 依 Content-Type 決定輸出副檔名；非二進位內容回傳 null */
export function binaryExtension(contentType: string): string | null {
  if (contentType.startsWith('audio/')) return '.wav';
  if (contentType.startsWith('video/')) return '.mp4';
  if (contentType.includes('octet-stream')) return '.bin';
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 每個任務恰好一次對外呼叫，並把 JSON / 二進位 / 純文字回應統一成 DispatchOutcome。
 * 所有失敗都轉成 DispatchError 系列，由 Worker Loop 記錄在任務上。
 */
export class Dispatcher {
  private readonly http: AxiosInstance;

  constructor(
    private readonly ctx: BackendContext,
    private readonly files: FileManager,
    private readonly log: FastifyBaseLogger,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({
      headers: { 'User-Agent': 'media-job-gateway/1.0.0' },
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    });
  }

  async dispatch(record: TaskRecord, signal?: AbortSignal): Promise<DispatchOutcome> {
    const request = buildRequest(record, this.ctx);
    const startTime = Date.now();
    this.log.info({ taskId: record.task_id, module: record.module, url: request.url, kind: request.kind }, 'Dispatching task');

    const response = await this.send(request, signal);
    const outcome = await this.interpret(request.url, response);

    this.log.info(
      { taskId: record.task_id, status: response.status, outputFile: outcome.outputFile, ms: Date.now() - startTime },
      'Backend call finished',
    );
    return outcome;
  }

  private async send(request: BackendRequest, signal?: AbortSignal): Promise<AxiosResponse<ArrayBuffer>> {
    const body = request.kind === 'json' ? request.body : await this.buildForm(request);
    // axios 的 timeout 只管連線閒置；整個呼叫的上限由 deadline 負責
    const deadline = AbortSignal.timeout(request.timeoutMs);

    try {
      return await this.http.post<ArrayBuffer>(request.url, body, {
        timeout: request.timeoutMs,
        responseType: 'arraybuffer',
        // 狀態碼由 interpret 自行判斷，才能附上後端回應內容
        validateStatus: () => true,
        signal: signal ? AbortSignal.any([signal, deadline]) : deadline,
      });
    } catch (err) {
      throw this.translateError(err, request, deadline);
    }
  }

  private async buildForm(request: Extract<BackendRequest, { kind: 'multipart' }>): Promise<FormData> {
    let content: Buffer;
    try {
      content = await fs.promises.readFile(request.filePath);
    } catch (err) {
      throw new DispatchError(
        `cannot read staged upload ${request.filePath}`,
        'UPLOAD_MISSING',
        err instanceof Error ? err : undefined,
      );
    }

    const form = new FormData();
    for (const [key, value] of Object.entries(request.fields)) {
      form.append(key, value);
    }
    form.append(request.fileField, new Blob([content]), path.basename(request.filePath));
    return form;
  }

  private translateError(err: unknown, request: BackendRequest, deadline: AbortSignal): Error {
    if (deadline.aborted) {
      return new BackendTimeoutError(request.url, request.timeoutMs, err instanceof Error ? err : undefined);
    }
    if (axios.isCancel(err)) {
      return new DispatchError(`request to ${request.url} was aborted`, 'DISPATCH_ABORTED');
    }
    if (axios.isAxiosError(err)) {
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        return new BackendTimeoutError(request.url, request.timeoutMs, err);
      }
      return new BackendUnreachableError(request.url, err);
    }
    return err instanceof Error ? err : new DispatchError(String(err));
  }

  private async interpret(url: string, response: AxiosResponse<ArrayBuffer>): Promise<DispatchOutcome> {
    const body = Buffer.from(response.data);
    const contentType = String(response.headers['content-type'] ?? '').toLowerCase();

    if (response.status < 200 || response.status >= 300) {
      throw new BackendStatusError(url, response.status, body.toString('utf8').slice(0, BODY_EXCERPT_LENGTH).trim());
    }

    if (contentType.includes('json')) {
      return this.interpretJson(body);
    }

    const ext = binaryExtension(contentType);
    if (ext) {
      const outputFile = await this.files.saveOutput(body, ext);
      return {
        result: { message: 'binary saved', kind: contentType.split(';')[0].trim(), size: body.length },
        outputFile,
      };
    }

    return { result: { text: body.toString('utf8') } };
  }

  private async interpretJson(body: Buffer): Promise<DispatchOutcome> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body.toString('utf8'));
    } catch (err) {
      throw new MalformedResponseError(
        `backend declared JSON but sent an unparsable body (${body.length} bytes)`,
        err instanceof Error ? err : undefined,
      );
    }

    // 後端自行回報的輸出檔，只在檔案確實存在時採用
    if (isRecord(parsed) && typeof parsed.output_file === 'string' && parsed.output_file) {
      if (await this.files.exists(parsed.output_file)) {
        return { result: parsed, outputFile: parsed.output_file };
      }
      this.log.warn({ outputFile: parsed.output_file }, 'Backend reported an output file that does not exist');
    }

    return { result: parsed };
  }
}
