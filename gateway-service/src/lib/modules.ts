import Joi from 'joi';
import { BackendEndpoints, FieldMaps } from './config.js';
import { UnknownModuleError, ValidationError } from './errors.js';
import { MediaKind } from './files.js';
import {
  EnvAudioPayload,
  ModuleName,
  TaskInput,
  TaskPayloadMap,
  TtsPayload,
  VoiceDesignPayload,
} from '../types/index.js';

/** 後端請求的兩種形態：JSON body，或 multipart（純量欄位 + 一個檔案） */
export type BackendRequest =
  | {
      kind: 'json';
      url: string;
      body: Record<string, string | number>;
      timeoutMs: number;
    }
  | {
      kind: 'multipart';
      url: string;
      fields: Record<string, string>;
      fileField: string;
      filePath: string;
      timeoutMs: number;
    };

export interface BackendContext {
  fields: FieldMaps;
  backends: BackendEndpoints;
}

/** 需要上傳檔案的模組：表單欄位名稱、暫存子目錄與預期種類 */
export interface UploadSpec {
  field: string;
  subdir: string;
  expect: MediaKind;
}

/**
 * 單一模組的提交與派送規則。
 * parse 驗證表單並產生 TaskInput；toRequest 把 payload 轉成後端欄位。
 */
export interface ModuleHandler<M extends ModuleName> {
  module: M;
  /** 路由片段，例如 /api/submit/voice-design */
  route: string;
  label: string;
  upload: UploadSpec | null;
  parse(fields: Record<string, unknown>, uploadPath?: string): TaskInput;
  toRequest(payload: Readonly<TaskPayloadMap[M]>, ctx: BackendContext): BackendRequest;
}

function validate<T>(schema: Joi.ObjectSchema<T>, input: Record<string, unknown>): T {
  const result = schema.validate(input, { abortEarly: false, stripUnknown: true, convert: true });
  if (result.error || result.value === undefined) {
    throw new ValidationError(result.error?.message ?? 'Invalid submission');
  }
  return result.value;
}

function requireUpload(uploadPath: string | undefined, field: string): string {
  if (!uploadPath) {
    throw new ValidationError(`"${field}" file is required`);
  }
  return uploadPath;
}

const slider = () => Joi.number().min(0).max(100).empty('').default(0);

const voiceDesignSchema = Joi.object<VoiceDesignPayload>({
  text: Joi.string().trim().min(1).required(),
  instruct: Joi.string().allow('').default(''),
  language: Joi.string().trim().empty('').default('Chinese'),
});

export const voiceDesign: ModuleHandler<'voice_design'> = {
  module: 'voice_design',
  route: 'voice-design',
  label: '个性化语音（语音设计）',
  upload: null,
  parse(fields) {
    return { module: 'voice_design', payload: validate(voiceDesignSchema, fields) };
  },
  toRequest(payload, { fields, backends }) {
    const f = fields.voiceDesign;
    return {
      kind: 'json',
      url: backends.voiceDesignUrl,
      timeoutMs: backends.jsonTimeoutMs,
      body: {
        [f.text]: payload.text,
        [f.instruct]: payload.instruct,
        [f.language]: payload.language,
      },
    };
  },
};

type TtsForm = Omit<TtsPayload, 'reference_audio_path' | 'use_random'> & { use_random: boolean };

const ttsSchema = Joi.object<TtsForm>({
  text_input: Joi.string().trim().min(1).required(),
  emotion_happy: slider(),
  emotion_angry: slider(),
  emotion_sad: slider(),
  emotion_fear: slider(),
  emotion_disgust: slider(),
  emotion_melancholy: slider(),
  emotion_surprise: slider(),
  emotion_calm: slider(),
  use_random: Joi.boolean().empty('').default(false),
});

export const tts: ModuleHandler<'tts'> = {
  module: 'tts',
  route: 'tts',
  label: '语音生成（语音合成）',
  upload: { field: 'reference_audio', subdir: 'tts', expect: 'audio' },
  parse(fields, uploadPath) {
    const form = validate(ttsSchema, fields);
    return {
      module: 'tts',
      payload: {
        ...form,
        // 後端只接受 'True' / 'False' 字串
        use_random: form.use_random ? 'True' : 'False',
        reference_audio_path: requireUpload(uploadPath, 'reference_audio'),
      },
    };
  },
  toRequest(payload, { fields, backends }) {
    const f = fields.tts;
    return {
      kind: 'multipart',
      url: backends.ttsUrl,
      timeoutMs: backends.multipartTimeoutMs,
      fileField: f.referenceAudio,
      filePath: payload.reference_audio_path,
      fields: {
        [f.text]: payload.text_input,
        [f.emotionHappy]: String(payload.emotion_happy),
        [f.emotionAngry]: String(payload.emotion_angry),
        [f.emotionSad]: String(payload.emotion_sad),
        [f.emotionFear]: String(payload.emotion_fear),
        [f.emotionDisgust]: String(payload.emotion_disgust),
        [f.emotionMelancholy]: String(payload.emotion_melancholy),
        [f.emotionSurprise]: String(payload.emotion_surprise),
        [f.emotionCalm]: String(payload.emotion_calm),
        [f.useRandom]: payload.use_random,
      },
    };
  },
};

type EnvAudioForm = Omit<EnvAudioPayload, 'video_path'>;

const envAudioSchema = Joi.object<EnvAudioForm>({
  prompt: Joi.string().allow('').default(''),
  negative_prompt: Joi.string().allow('').default(''),
  audio_mix_mode: Joi.string().trim().empty('').default('mix'),
  ambient_volume: Joi.number().min(0).empty('').default(0.25),
  bgm_volume: Joi.number().min(0).empty('').default(0.3),
  num_steps: Joi.number().integer().min(1).empty('').default(25),
  cfg_strength: Joi.number().min(0).empty('').default(4.5),
});

export const envAudio: ModuleHandler<'env_audio'> = {
  module: 'env_audio',
  route: 'env-audio',
  label: '环境音效（视频环境音）',
  upload: { field: 'video', subdir: 'env_audio', expect: 'video' },
  parse(fields, uploadPath) {
    return {
      module: 'env_audio',
      payload: { ...validate(envAudioSchema, fields), video_path: requireUpload(uploadPath, 'video') },
    };
  },
  toRequest(payload, { fields, backends }) {
    const f = fields.envAudio;
    return {
      kind: 'multipart',
      url: backends.envAudioUrl,
      timeoutMs: backends.multipartTimeoutMs,
      fileField: f.video,
      filePath: payload.video_path,
      fields: {
        [f.prompt]: payload.prompt,
        [f.negativePrompt]: payload.negative_prompt,
        [f.audioMixMode]: payload.audio_mix_mode,
        [f.ambientVolume]: String(payload.ambient_volume),
        [f.bgmVolume]: String(payload.bgm_volume),
        [f.numSteps]: String(payload.num_steps),
        [f.cfgStrength]: String(payload.cfg_strength),
      },
    };
  },
};

export type AnyModuleHandler = ModuleHandler<'voice_design'> | ModuleHandler<'tts'> | ModuleHandler<'env_audio'>;

export const MODULE_HANDLERS: { [M in ModuleName]: ModuleHandler<M> } = {
  voice_design: voiceDesign,
  tts,
  env_audio: envAudio,
};

export function isModuleName(value: string): value is ModuleName {
  return Object.prototype.hasOwnProperty.call(MODULE_HANDLERS, value);
}

/** 依模組名稱或路由片段（voice-design / voice_design）查找，未知即拒絕 */
export function resolveHandler(name: string): AnyModuleHandler {
  const key = name.trim().toLowerCase().replace(/-/g, '_');
  if (!isModuleName(key)) {
    throw new UnknownModuleError(name);
  }
  return MODULE_HANDLERS[key];
}
