import { Pipeline, type PipelineCallbacks } from './pipeline.js';
import { YouTubeClient } from './youtube/index.js';
import { GeminiClient } from './gemini/index.js';
import { TelegramClient } from './telegram/index.js';
import { StateManager } from './state/index.js';
import { PromptRegistry } from './prompts/index.js';
import type { Logger } from './logger.js';
import type { AppConfig } from '../types/index.js';

/** Wires the concrete YouTube, Gemini and Telegram clients into a pipeline. */
export async function createPipeline(
  config: AppConfig,
  logger: Logger,
  callbacks: PipelineCallbacks = {}
): Promise<Pipeline> {
  const { monitor, credentials } = config;

  const prompts = monitor.promptsPath
    ? await PromptRegistry.fromFile(monitor.promptsPath)
    : new PromptRegistry();
  if (prompts.size > 0) {
    logger.debug(`Loaded ${prompts.size} channel prompt(s) from ${monitor.promptsPath}`);
  }

  return new Pipeline(
    monitor,
    {
      source: new YouTubeClient(credentials.youtubeApiKey, {
        preferredLanguages: [monitor.locale, 'en'],
        logger,
      }),
      summarizer: new GeminiClient(credentials.gemini, { locale: monitor.locale, logger }),
      notifier: new TelegramClient(credentials.telegram, { logger }),
      store: new StateManager(monitor.statePath, logger),
      prompts,
      logger,
    },
    callbacks
  );
}
