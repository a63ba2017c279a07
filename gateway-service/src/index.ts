import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { buildGateway } from './app.js';
import { loadConfig } from './lib/config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// 原始碼位於 gateway-service/src，編譯後位於 dist，兩者都指向專案根目錄的 .env
dotenv.config({ path: [path.join(__dirname, '../../.env'), path.join(__dirname, '../.env')] });

/**
 * 啟動流程：載入設定 → 建立目錄與 Scheduler → 開始監聽。
 * 設定無效或無法監聽時直接終止進程，由外部的 restart 策略重啟。
 */
const start = async () => {
  const config = loadConfig();
  const { app, scheduler } = await buildGateway(config);

  const shutdown = async (signal: string) => {
    app.log.info({ signal, ...scheduler.snapshot() }, 'Shutting down');
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      app.log.error(err);
      process.exit(1);
    }
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    app.log.info(
      {
        voiceDesign: config.backends.voiceDesignUrl,
        tts: config.backends.ttsUrl,
        envAudio: config.backends.envAudioUrl,
        queueCapacity: config.queue.capacity || 'unbounded',
        retentionMs: config.queue.retentionMs,
      },
      `Job gateway listening on port ${config.server.port}`,
    );
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
