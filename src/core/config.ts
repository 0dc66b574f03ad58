import { ConfigurationError } from './errors.js';
import { parseChannelId } from './youtube/client.js';
import type {
  AppConfig,
  Credentials,
  GeminiCredentials,
  MonitorConfig,
  PersistMode,
} from '../types/index.js';

/** Raw CLI option values, as commander hands them over. */
export interface RunOptions {
  channel?: string[];
  maxVideos?: string;
  maxWords?: string;
  minWords?: string;
  maxAgeDays?: string;
  locale?: string;
  state?: string;
  persist?: string;
  prompts?: string;
  digest?: boolean;
  interval?: string;
  model?: string;
}

export type Env = Record<string, string | undefined>;

export const DEFAULTS = {
  maxVideosPerChannel: 3,
  summaryMaxWords: 500,
  summaryMinWords: 50,
  locale: 'en',
  statePath: './data/processed-videos.json',
  persistMode: 'incremental',
  deliveryIntervalMs: 1000,
  model: 'gemini-2.5-flash',
  location: 'us-central1',
} as const;

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseInteger(
  raw: string | undefined,
  name: string,
  fallback: number | undefined,
  problems: string[],
  min: number
): number | undefined {
  const value = blankToUndefined(raw);
  if (value === undefined) return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    problems.push(`${name} must be an integer >= ${min} (got "${value}")`);
    return fallback;
  }
  return parsed;
}

function parsePersistMode(raw: string | undefined, problems: string[]): PersistMode {
  const value = blankToUndefined(raw);
  if (value === undefined) return DEFAULTS.persistMode;
  if (value === 'incremental' || value === 'end-of-run') return value;

  problems.push(`persist mode must be "incremental" or "end-of-run" (got "${value}")`);
  return DEFAULTS.persistMode;
}

function parseChannels(options: RunOptions, env: Env, problems: string[]): string[] {
  const raw =
    options.channel && options.channel.length > 0
      ? options.channel
      : (env.YOUTUBE_CHANNELS ?? '').split(',');

  const channels: string[] = [];
  for (const entry of raw) {
    if (!entry.trim()) continue;
    try {
      const channelId = parseChannelId(entry);
      if (!channels.includes(channelId)) channels.push(channelId);
    } catch (error) {
      problems.push(error instanceof Error ? error.message : String(error));
    }
  }

  if (channels.length === 0) {
    problems.push('no channels configured (use --channel or YOUTUBE_CHANNELS)');
  }
  return channels;
}

function parseCredentials(options: RunOptions, env: Env, problems: string[]): Credentials {
  const missing: string[] = [];
  const read = (name: string): string => {
    const value = blankToUndefined(env[name]);
    if (value === undefined) missing.push(name);
    return value ?? '';
  };

  const youtubeApiKey = read('YOUTUBE_API_KEY');
  const botToken = read('TELEGRAM_BOT_TOKEN');
  const chatId = read('TELEGRAM_CHAT_ID');

  const model = blankToUndefined(options.model) ?? blankToUndefined(env.GEMINI_MODEL) ?? DEFAULTS.model;
  const apiKey = blankToUndefined(env.GEMINI_API_KEY);
  const projectId = blankToUndefined(env.GOOGLE_CLOUD_PROJECT);

  let gemini: GeminiCredentials;
  if (apiKey) {
    gemini = { apiKey, model };
  } else if (projectId) {
    gemini = {
      projectId,
      location: blankToUndefined(env.GOOGLE_CLOUD_LOCATION) ?? DEFAULTS.location,
      model,
    };
  } else {
    missing.push('GEMINI_API_KEY or GOOGLE_CLOUD_PROJECT');
    gemini = { apiKey: '', model };
  }

  if (missing.length > 0) {
    problems.push(`missing environment variables: ${missing.join(', ')}`);
  }

  return { youtubeApiKey, gemini, telegram: { botToken, chatId } };
}

/**
 * Merges CLI options over environment variables. Every problem found is
 * reported at once in a single ConfigurationError.
 */
export function loadConfig(options: RunOptions, env: Env): AppConfig {
  const problems: string[] = [];

  const channels = parseChannels(options, env, problems);
  const maxVideosPerChannel = parseInteger(
    options.maxVideos ?? env.MAX_VIDEOS_PER_CHANNEL,
    'max videos per channel',
    DEFAULTS.maxVideosPerChannel,
    problems,
    1
  );
  const summaryMaxWords = parseInteger(
    options.maxWords ?? env.SUMMARY_MAX_WORDS,
    'summary max words',
    DEFAULTS.summaryMaxWords,
    problems,
    1
  );
  const summaryMinWords = parseInteger(
    options.minWords ?? env.SUMMARY_MIN_WORDS,
    'summary min words',
    DEFAULTS.summaryMinWords,
    problems,
    1
  );
  const maxAgeDays = parseInteger(
    options.maxAgeDays ?? env.MAX_AGE_DAYS,
    'max age in days',
    undefined,
    problems,
    1
  );
  const deliveryIntervalMs = parseInteger(
    options.interval ?? env.DELIVERY_INTERVAL_MS,
    'delivery interval',
    DEFAULTS.deliveryIntervalMs,
    problems,
    0
  );

  const maxWords = summaryMaxWords ?? DEFAULTS.summaryMaxWords;
  const minWords = summaryMinWords ?? DEFAULTS.summaryMinWords;
  if (minWords > maxWords) {
    problems.push(`summary min words (${minWords}) must not exceed max words (${maxWords})`);
  }

  const monitor: MonitorConfig = {
    channels,
    maxVideosPerChannel: maxVideosPerChannel ?? DEFAULTS.maxVideosPerChannel,
    summaryMaxWords: maxWords,
    summaryMinWords: minWords,
    ...(maxAgeDays !== undefined && { maxAgeDays }),
    locale: blankToUndefined(options.locale) ?? blankToUndefined(env.SUMMARY_LOCALE) ?? DEFAULTS.locale,
    statePath: blankToUndefined(options.state) ?? blankToUndefined(env.STATE_PATH) ?? DEFAULTS.statePath,
    persistMode: parsePersistMode(options.persist ?? env.PERSIST_MODE, problems),
    promptsPath: blankToUndefined(options.prompts) ?? blankToUndefined(env.PROMPTS_PATH),
    digest: options.digest === true || env.SEND_DIGEST === 'true',
    deliveryIntervalMs: deliveryIntervalMs ?? DEFAULTS.deliveryIntervalMs,
  };

  const credentials = parseCredentials(options, env, problems);

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return { monitor, credentials };
}
