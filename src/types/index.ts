import type { PersistMode } from './state.js';

export * from './youtube.js';
export * from './state.js';
export * from './pipeline.js';
export * from './result.js';

export interface MonitorConfig {
  channels: string[];
  maxVideosPerChannel: number;
  summaryMaxWords: number;
  summaryMinWords: number;
  maxAgeDays?: number;
  locale: string;
  statePath: string;
  persistMode: PersistMode;
  promptsPath?: string;
  digest: boolean;
  deliveryIntervalMs: number;
}

export type GeminiCredentials =
  | { apiKey: string; model: string }
  | { projectId: string; location: string; model: string };

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

export interface Credentials {
  youtubeApiKey: string;
  gemini: GeminiCredentials;
  telegram: TelegramConfig;
}

export interface AppConfig {
  monitor: MonitorConfig;
  credentials: Credentials;
}
