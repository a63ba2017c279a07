import { describe, it, expect } from 'vitest';
import { envAudio, resolveHandler, tts, voiceDesign } from '../lib/modules.js';
import { buildRequest } from '../lib/dispatcher.js';
import { UnknownModuleError, ValidationError } from '../lib/errors.js';
import { loadConfig } from '../lib/config.js';
import { TaskStore } from '../lib/task-store.js';

const config = loadConfig({});
const ctx = { fields: config.fields, backends: config.backends };

describe('module handlers', () => {
  describe('resolveHandler', () => {
    it('should accept module names and route slugs', () => {
      expect(resolveHandler('voice_design').module).toBe('voice_design');
      expect(resolveHandler('voice-design').module).toBe('voice_design');
      expect(resolveHandler('env-audio').module).toBe('env_audio');
      expect(resolveHandler('TTS').module).toBe('tts');
    });

    it('should reject unknown modules', () => {
      expect(() => resolveHandler('music')).toThrow(UnknownModuleError);
      expect(() => resolveHandler('constructor')).toThrow(UnknownModuleError);
    });
  });

  describe('voice design', () => {
    it('should fill defaults and trim text', () => {
      expect(voiceDesign.parse({ text: '  hello ' })).toEqual({
        module: 'voice_design',
        payload: { text: 'hello', instruct: '', language: 'Chinese' },
      });
    });

    it('should require non-blank text', () => {
      expect(() => voiceDesign.parse({ text: '   ' })).toThrow(ValidationError);
      expect(() => voiceDesign.parse({})).toThrow('"text" is required');
    });

    it('should map fields to the configured backend names', () => {
      const custom = loadConfig({ VOICE_DESIGN_TEXT_FIELD: 'prompt_text' });
      const request = voiceDesign.toRequest(
        { text: 'hello', instruct: 'warm', language: 'English' },
        { fields: custom.fields, backends: custom.backends },
      );

      expect(request).toEqual({
        kind: 'json',
        url: 'http://127.0.0.1:9101/infer',
        timeoutMs: 900_000,
        body: { prompt_text: 'hello', instruct: 'warm', language: 'English' },
      });
    });
  });

  describe('tts', () => {
    it('should convert slider strings and the random flag', () => {
      const input = tts.parse(
        { text_input: 'hi there', emotion_happy: '40', emotion_calm: '', use_random: 'true' },
        '/data/uploads/tts/t1/ref.wav',
      );

      expect(input).toEqual({
        module: 'tts',
        payload: {
          text_input: 'hi there',
          emotion_happy: 40,
          emotion_angry: 0,
          emotion_sad: 0,
          emotion_fear: 0,
          emotion_disgust: 0,
          emotion_melancholy: 0,
          emotion_surprise: 0,
          emotion_calm: 0,
          use_random: 'True',
          reference_audio_path: '/data/uploads/tts/t1/ref.wav',
        },
      });
    });

    it('should reject out-of-range sliders and a missing reference clip', () => {
      expect(() => tts.parse({ text_input: 'hi', emotion_sad: '150' }, '/x.wav')).toThrow(ValidationError);
      expect(() => tts.parse({ text_input: 'hi' })).toThrow('"reference_audio" file is required');
    });

    it('should build a multipart request with string fields', () => {
      const parsed = tts.parse({ text_input: 'hi' }, '/data/ref.wav');
      if (parsed.module !== 'tts') throw new Error('unexpected module');

      expect(tts.toRequest(parsed.payload, ctx)).toEqual({
        kind: 'multipart',
        url: 'http://127.0.0.1:9102/infer',
        timeoutMs: 1_800_000,
        fileField: 'reference_audio',
        filePath: '/data/ref.wav',
        fields: {
          text_input: 'hi',
          emotion_happy: '0',
          emotion_angry: '0',
          emotion_sad: '0',
          emotion_fear: '0',
          emotion_disgust: '0',
          emotion_melancholy: '0',
          emotion_surprise: '0',
          emotion_calm: '0',
          use_random: 'False',
        },
      });
    });
  });

  describe('env audio', () => {
    it('should apply generation defaults', () => {
      expect(envAudio.parse({ prompt: 'rain on a roof' }, '/data/clip.mp4')).toEqual({
        module: 'env_audio',
        payload: {
          prompt: 'rain on a roof',
          negative_prompt: '',
          audio_mix_mode: 'mix',
          ambient_volume: 0.25,
          bgm_volume: 0.3,
          num_steps: 25,
          cfg_strength: 4.5,
          video_path: '/data/clip.mp4',
        },
      });
    });

    it('should reject a fractional step count', () => {
      expect(() => envAudio.parse({ num_steps: '2.5' }, '/data/clip.mp4')).toThrow(ValidationError);
    });
  });

  describe('buildRequest', () => {
    it('should route a stored record to its module handler', () => {
      const store = new TaskStore();
      const record = store.create(envAudio.parse({ num_steps: '30' }, '/data/clip.mp4'));
      const request = buildRequest(record, ctx);

      expect(request.kind).toBe('multipart');
      expect(request.url).toBe('http://127.0.0.1:9103/infer');
      if (request.kind !== 'multipart') throw new Error('expected multipart');
      expect(request.fileField).toBe('video');
      expect(request.fields.num_steps).toBe('30');
      expect(request.fields.ambient_volume).toBe('0.25');
    });
  });
});
