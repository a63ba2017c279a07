/** 任務狀態，單向推進：queued → running → done | failed */
export type TaskStatus = 'queued' | 'running' | 'done' | 'failed';

/** 語音設計：純文字欄位，以 JSON 送出 */
export interface VoiceDesignPayload {
  text: string;
  /** 聲音風格描述，可為空字串 */
  instruct: string;
  language: string;
}

/** 語音合成：參考音檔 + 八個情緒滑桿 (0–100) */
export interface TtsPayload {
  text_input: string;
  emotion_happy: number;
  emotion_angry: number;
  emotion_sad: number;
  emotion_fear: number;
  emotion_disgust: number;
  emotion_melancholy: number;
  emotion_surprise: number;
  emotion_calm: number;
  /** 後端以字串 'True' / 'False' 解讀 */
  use_random: string;
  /** 已暫存於 uploads 的參考音檔絕對路徑 */
  reference_audio_path: string;
}

/** 環境音效：來源影片 + 生成參數 */
export interface EnvAudioPayload {
  prompt: string;
  negative_prompt: string;
  audio_mix_mode: string;
  ambient_volume: number;
  bgm_volume: number;
  num_steps: number;
  cfg_strength: number;
  /** 已暫存於 uploads 的影片絕對路徑 */
  video_path: string;
}

export interface TaskPayloadMap {
  voice_design: VoiceDesignPayload;
  tts: TtsPayload;
  env_audio: EnvAudioPayload;
}

export type ModuleName = keyof TaskPayloadMap;

export const MODULE_NAMES: readonly ModuleName[] = ['voice_design', 'tts', 'env_audio'];

/** 提交端建立任務時的輸入：module 與對應 payload */
export type TaskInput = {
  [M in ModuleName]: { module: M; payload: TaskPayloadMap[M] };
}[ModuleName];

/** 任務紀錄共用欄位，時間戳皆為 epoch 毫秒 */
interface TaskRecordBase {
  task_id: string;
  status: TaskStatus;
  created_at: number;
  started_at?: number;
  finished_at?: number;
  result?: unknown;
  output_file?: string;
  error?: string;
}

/** 以 module 為判別欄位的任務紀錄，payload 型別隨 module 而定 */
export type TaskRecord = {
  [M in ModuleName]: TaskRecordBase & { module: M; payload: Readonly<TaskPayloadMap[M]> };
}[ModuleName];

/** 各狀態任務數 */
export type StatusTotals = Record<TaskStatus, number>;

/** 佇列概況，供 /api/queue 與 /api/health 使用 */
export interface QueueSnapshot {
  queue_size: number;
  queue_capacity: number | null;
  running_task_id: string | null;
  totals: StatusTotals;
}

/** Dispatcher 單次呼叫的產出 */
export interface DispatchOutcome {
  result: unknown;
  outputFile?: string;
}
