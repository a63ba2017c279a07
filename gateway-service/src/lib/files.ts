import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { fileTypeFromFile } from 'file-type';
import { ArtifactNotFoundError, ValidationError } from './errors.js';

/** 上傳檔案預期的媒體種類 */
export type MediaKind = 'audio' | 'video';

export interface StageOptions {
  /** 設定後會以 magic number 驗證檔案種類 */
  expect?: MediaKind;
}

export interface ResolvedArtifact {
  path: string;
  name: string;
  size: number;
}

/**
 * 上傳暫存與輸出保留。
 * 路徑隔離格式：{uploadDir}/{subdir}/{taskId}/{filename}、{outputDir}/{uuid}{ext}
 */
export class FileManager {
  constructor(
    readonly uploadDir: string,
    readonly outputDir: string,
    private readonly strictTypes = true,
  ) {}

  /** 建立 uploads 與 outputs 目錄 */
  async init(): Promise<void> {
    await fs.promises.mkdir(this.uploadDir, { recursive: true });
    await fs.promises.mkdir(this.outputDir, { recursive: true });
  }

  /**
   * 串流寫入上傳檔案，回傳絕對路徑。
   * 檔名只保留 basename，避免 ../ 路徑穿越；種類不符時刪除暫存並拋 ValidationError。
   */
  async stageUpload(
    taskId: string,
    subdir: string,
    filename: string | undefined,
    source: Readable,
    options: StageOptions = {},
  ): Promise<string> {
    const taskDir = this.taskUploadDir(taskId, subdir);
    await fs.promises.mkdir(taskDir, { recursive: true });

    const filePath = path.join(taskDir, safeFileName(filename));

    try {
      await pipeline(source, fs.createWriteStream(filePath));
    } catch (err) {
      await fs.promises.rm(filePath, { force: true });
      throw err;
    }

    if (options.expect && this.strictTypes) {
      const type = await fileTypeFromFile(filePath);
      if (!type || !type.mime.startsWith(`${options.expect}/`)) {
        await fs.promises.rm(taskDir, { recursive: true, force: true });
        throw new ValidationError(
          `Invalid file type: ${type?.mime ?? 'unknown'}. Only ${options.expect} files are allowed.`,
        );
      }
    }

    return filePath;
  }

  /** 將後端回傳的二進位內容寫入 outputs，檔名為新的 uuid */
  async saveOutput(content: Buffer, ext: string): Promise<string> {
    await fs.promises.mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, `${uuidv4().replace(/-/g, '')}${ext}`);
    await fs.promises.writeFile(filePath, content);
    return filePath;
  }

  /** 檢查檔案是否仍存在 */
  async exists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.promises.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  /** 解析任務輸出檔；未設定或已從磁碟消失都視為 not found */
  async resolveOutput(filePath: string | undefined): Promise<ResolvedArtifact> {
    if (!filePath) {
      throw new ArtifactNotFoundError('output not found');
    }
    try {
      const stat = await fs.promises.stat(filePath);
      if (!stat.isFile()) {
        throw new ArtifactNotFoundError('output file missing on disk');
      }
      return { path: filePath, name: path.basename(filePath), size: stat.size };
    } catch (err) {
      if (err instanceof ArtifactNotFoundError) throw err;
      throw new ArtifactNotFoundError('output file missing on disk');
    }
  }

  /** 刪除任務的所有上傳暫存（各 subdir 底下的 taskId 目錄） */
  async removeTaskUploads(taskId: string): Promise<void> {
    const subdirs = await fs.promises.readdir(this.uploadDir).catch(() => []);
    await Promise.all(
      subdirs.map((subdir) => fs.promises.rm(this.taskUploadDir(taskId, subdir), { recursive: true, force: true })),
    );
  }

  /** 只刪除位於 outputDir 內的檔案，後端回報的外部路徑不動 */
  async removeOutput(filePath: string): Promise<void> {
    if (!isInside(this.outputDir, filePath)) return;
    await fs.promises.rm(filePath, { force: true });
  }

  private taskUploadDir(taskId: string, subdir: string): string {
    return path.join(this.uploadDir, path.basename(subdir), path.basename(taskId));
  }
}

/** 取 basename，同時處理 Windows 分隔符；空值時產生隨機名稱 */
export function safeFileName(filename: string | undefined): string {
  const base = path.basename((filename ?? '').replace(/\\/g, '/')).trim();
  if (!base || base === '.' || base === '..') {
    return `${uuidv4().replace(/-/g, '')}.bin`;
  }
  return base;
}

function isInside(dir: string, filePath: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(filePath));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}
