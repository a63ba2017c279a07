import Joi from 'joi';
import path from 'path';

/** 語音設計後端欄位名稱 */
export interface VoiceDesignFields {
  text: string;
  instruct: string;
  language: string;
}

/** 語音合成後端欄位名稱，referenceAudio 為檔案欄位 */
export interface TtsFields {
  text: string;
  referenceAudio: string;
  emotionHappy: string;
  emotionAngry: string;
  emotionSad: string;
  emotionFear: string;
  emotionDisgust: string;
  emotionMelancholy: string;
  emotionSurprise: string;
  emotionCalm: string;
  useRandom: string;
}

/** 環境音效後端欄位名稱，video 為檔案欄位 */
export interface EnvAudioFields {
  video: string;
  prompt: string;
  negativePrompt: string;
  audioMixMode: string;
  ambientVolume: string;
  bgmVolume: string;
  numSteps: string;
  cfgStrength: string;
}

export interface FieldMaps {
  voiceDesign: VoiceDesignFields;
  tts: TtsFields;
  envAudio: EnvAudioFields;
}

export interface BackendEndpoints {
  voiceDesignUrl: string;
  ttsUrl: string;
  envAudioUrl: string;
  /** JSON 呼叫逾時（毫秒） */
  jsonTimeoutMs: number;
  /** multipart 呼叫逾時（毫秒） */
  multipartTimeoutMs: number;
}

export interface GatewayConfig {
  server: {
    host: string;
    port: number;
    logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
    maxUploadBytes: number;
  };
  storage: {
    uploadDir: string;
    outputDir: string;
    /** 上傳檔案是否必須偵測為對應的音訊 / 影片格式 */
    strictUploadTypes: boolean;
  };
  queue: {
    /** 0 表示不限 */
    capacity: number;
    /** 終態任務保留時間，0 表示永久保留 */
    retentionMs: number;
    sweepIntervalMs: number;
  };
  reclaim: {
    /** 空字串表示停用 */
    command: string;
    timeoutMs: number;
  };
  backends: BackendEndpoints;
  fields: FieldMaps;
}

const field = (name: string) => Joi.string().trim().min(1).default(name);

export const configSchema = Joi.object<GatewayConfig>({
  server: Joi.object({
    host: Joi.string().default('0.0.0.0'),
    port: Joi.number().port().default(8000),
    logLevel: Joi.string().valid('fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent').default('info'),
    maxUploadBytes: Joi.number().integer().positive().default(1024 * 1024 * 1024),
  }).default(),

  storage: Joi.object({
    uploadDir: Joi.string().default('./uploads'),
    outputDir: Joi.string().default('./outputs'),
    strictUploadTypes: Joi.boolean().default(true),
  }).default(),

  queue: Joi.object({
    capacity: Joi.number().integer().min(0).default(0),
    retentionMs: Joi.number().integer().min(0).default(24 * 60 * 60 * 1000),
    sweepIntervalMs: Joi.number().integer().positive().default(10 * 60 * 1000),
  }).default(),

  reclaim: Joi.object({
    command: Joi.string().allow('').default(''),
    timeoutMs: Joi.number().integer().positive().default(10 * 1000),
  }).default(),

  backends: Joi.object({
    voiceDesignUrl: Joi.string().uri().default('http://127.0.0.1:9101/infer'),
    ttsUrl: Joi.string().uri().default('http://127.0.0.1:9102/infer'),
    envAudioUrl: Joi.string().uri().default('http://127.0.0.1:9103/infer'),
    jsonTimeoutMs: Joi.number().integer().positive().default(900 * 1000),
    multipartTimeoutMs: Joi.number().integer().positive().default(1800 * 1000),
  }).default(),

  fields: Joi.object({
    voiceDesign: Joi.object({
      text: field('text'),
      instruct: field('instruct'),
      language: field('language'),
    }).default(),
    tts: Joi.object({
      text: field('text_input'),
      referenceAudio: field('reference_audio'),
      emotionHappy: field('emotion_happy'),
      emotionAngry: field('emotion_angry'),
      emotionSad: field('emotion_sad'),
      emotionFear: field('emotion_fear'),
      emotionDisgust: field('emotion_disgust'),
      emotionMelancholy: field('emotion_melancholy'),
      emotionSurprise: field('emotion_surprise'),
      emotionCalm: field('emotion_calm'),
      useRandom: field('use_random'),
    }).default(),
    envAudio: Joi.object({
      video: field('video'),
      prompt: field('prompt'),
      negativePrompt: field('negative_prompt'),
      audioMixMode: field('audio_mix_mode'),
      ambientVolume: field('ambient_volume'),
      bgmVolume: field('bgm_volume'),
      numSteps: field('num_steps'),
      cfgStrength: field('cfg_strength'),
    }).default(),
  }).default(),
});

type Env = Record<string, string | undefined>;

function int(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function bool(value: string | undefined): boolean | undefined {
  return value === undefined || value === '' ? undefined : value.toLowerCase() === 'true';
}

/** 遞迴移除 undefined，讓 Joi 套用預設值 */
function removeUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue;
    cleaned[key] = value !== null && typeof value === 'object' && !Array.isArray(value)
      ? removeUndefined({ ...value })
      : value;
  }
  return cleaned;
}

/**
 * 從環境變數組裝設定並驗證，欄位名稱覆寫在啟動時一次解析完成。
 * 驗證失敗直接拋錯，由啟動流程終止進程。
 */
export function loadConfig(env: Env = process.env): GatewayConfig {
  const raw = {
    server: {
      host: env.HOST,
      port: int(env.PORT),
      logLevel: env.LOG_LEVEL,
      maxUploadBytes: int(env.MAX_UPLOAD_BYTES),
    },
    storage: {
      uploadDir: env.UPLOAD_DIR,
      outputDir: env.OUTPUT_DIR,
      strictUploadTypes: bool(env.UPLOAD_STRICT_TYPES),
    },
    queue: {
      capacity: int(env.QUEUE_CAPACITY),
      retentionMs: int(env.TASK_RETENTION_MS),
      sweepIntervalMs: int(env.RETENTION_SWEEP_MS),
    },
    reclaim: {
      command: env.RECLAIM_COMMAND,
      timeoutMs: int(env.RECLAIM_TIMEOUT_MS),
    },
    backends: {
      voiceDesignUrl: env.VOICE_DESIGN_URL,
      ttsUrl: env.TTS_URL,
      envAudioUrl: env.ENV_AUDIO_URL,
      jsonTimeoutMs: int(env.BACKEND_JSON_TIMEOUT_MS),
      multipartTimeoutMs: int(env.BACKEND_MULTIPART_TIMEOUT_MS),
    },
    fields: {
      voiceDesign: {
        text: env.VOICE_DESIGN_TEXT_FIELD,
        instruct: env.VOICE_DESIGN_INSTRUCT_FIELD,
        language: env.VOICE_DESIGN_LANGUAGE_FIELD,
      },
      tts: {
        text: env.TTS_TEXT_FIELD,
        referenceAudio: env.TTS_REF_AUDIO_FIELD,
        emotionHappy: env.TTS_EMOTION_HAPPY_FIELD,
        emotionAngry: env.TTS_EMOTION_ANGRY_FIELD,
        emotionSad: env.TTS_EMOTION_SAD_FIELD,
        emotionFear: env.TTS_EMOTION_FEAR_FIELD,
        emotionDisgust: env.TTS_EMOTION_DISGUST_FIELD,
        emotionMelancholy: env.TTS_EMOTION_MELANCHOLY_FIELD,
        emotionSurprise: env.TTS_EMOTION_SURPRISE_FIELD,
        emotionCalm: env.TTS_EMOTION_CALM_FIELD,
        useRandom: env.TTS_USE_RANDOM_FIELD,
      },
      envAudio: {
        video: env.ENV_VIDEO_FIELD,
        prompt: env.ENV_PROMPT_FIELD,
        negativePrompt: env.ENV_NEGATIVE_PROMPT_FIELD,
        audioMixMode: env.ENV_AUDIO_MIX_MODE_FIELD,
        ambientVolume: env.ENV_AMBIENT_VOLUME_FIELD,
        bgmVolume: env.ENV_BGM_VOLUME_FIELD,
        numSteps: env.ENV_NUM_STEPS_FIELD,
        cfgStrength: env.ENV_CFG_STRENGTH_FIELD,
      },
    },
  };

  const validated = configSchema.validate(removeUndefined(raw), {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (validated.error || !validated.value) {
    throw new Error(`Configuration validation failed: ${validated.error?.message ?? 'empty config'}`);
  }

  const value = validated.value;

  return {
    ...value,
    storage: {
      ...value.storage,
      uploadDir: path.resolve(value.storage.uploadDir),
      outputDir: path.resolve(value.storage.outputDir),
    },
  };
}
