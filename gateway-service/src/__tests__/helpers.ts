import Fastify, { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import multipart from '@fastify/multipart';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { GatewayConfig, loadConfig } from '../lib/config.js';

/** 最小可被辨識為 audio/wav 的位元組 */
export function wavBytes(size = 64): Buffer {
  const buf = Buffer.alloc(size);
  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(size - 8, 4);
  buf.write('WAVE', 8, 'ascii');
  buf.write('fmt ', 12, 'ascii');
  return buf;
}

/** 最小可被辨識為 video/mp4 的位元組 */
export function mp4Bytes(size = 64): Buffer {
  const buf = Buffer.alloc(size);
  buf.writeUInt32BE(24, 0);
  buf.write('ftyp', 4, 'ascii');
  buf.write('isom', 8, 'ascii');
  buf.write('isomiso2', 16, 'ascii');
  return buf;
}

export const silentLog: FastifyBaseLogger = Fastify({ logger: false }).log;

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'job-gateway-'));
}

export function testConfig(root: string, env: Record<string, string> = {}): GatewayConfig {
  return loadConfig({
    LOG_LEVEL: 'silent',
    UPLOAD_DIR: path.join(root, 'uploads'),
    OUTPUT_DIR: path.join(root, 'outputs'),
    TASK_RETENTION_MS: '0',
    ...env,
  });
}

export interface ReceivedCall {
  path: string;
  contentType: string;
  body: unknown;
  fields: Record<string, unknown>;
  file?: { field: string; filename: string; content: Buffer };
}

export type StubBehavior = (
  call: ReceivedCall,
  request: FastifyRequest,
  reply: FastifyReply,
) => Promise<unknown> | unknown;

/**
 * 在同一進程內啟動的假後端，綁定 127.0.0.1 隨機埠。
 * 收到的每個請求都記錄在 calls，回應由 behavior 決定。
 */
export class StubBackend {
  readonly calls: ReceivedCall[] = [];
  behavior: StubBehavior = (_call, _request, reply) => reply.type('application/json').send({ ok: true });
  private server: FastifyInstance = Fastify({ logger: false });
  baseUrl = '';

  async start(): Promise<string> {
    this.server.register(multipart);
    this.server.post('/*', async (request, reply) => {
      const call: ReceivedCall = {
        path: request.url,
        contentType: String(request.headers['content-type'] ?? ''),
        body: undefined,
        fields: {},
      };

      if (request.isMultipart()) {
        for await (const part of request.parts()) {
          if (part.type === 'file') {
            call.file = { field: part.fieldname, filename: part.filename, content: await part.toBuffer() };
          } else {
            call.fields[part.fieldname] = part.value;
          }
        }
      } else {
        call.body = request.body;
      }

      this.calls.push(call);
      return this.behavior(call, request, reply);
    });

    this.baseUrl = await this.server.listen({ port: 0, host: '127.0.0.1' });
    return this.baseUrl;
  }

  async stop(): Promise<void> {
    await this.server.close();
  }
}

/** 以 Node 內建 FormData 編碼 multipart，供 app.inject 使用 */
export async function encodeForm(
  fields: Record<string, string>,
  file?: { field: string; filename: string; content: Buffer },
): Promise<{ payload: Buffer; headers: Record<string, string> }> {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  if (file) {
    form.append(file.field, new Blob([file.content]), file.filename);
  }

  const encoded = new Response(form);
  return {
    payload: Buffer.from(await encoded.arrayBuffer()),
    headers: { 'content-type': encoded.headers.get('content-type') ?? '' },
  };
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** 輪詢直到條件成立 */
export async function waitFor(check: () => boolean, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error('waitFor timed out');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
