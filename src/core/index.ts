export {
  Pipeline,
  sortByRecency,
  type PipelineCallbacks,
  type PipelineDependencies,
  type PipelineOptions,
  type SkipReason,
} from './pipeline.js';
export { createPipeline } from './factory.js';
export { loadConfig, DEFAULTS, type RunOptions } from './config.js';
export * from './errors.js';
export * from './logger.js';
export { YouTubeClient, type VideoSource } from './youtube/index.js';
export { GeminiClient, type Summarizer } from './gemini/index.js';
export { TelegramClient, type Notifier } from './telegram/index.js';
export { StateManager, type StateStore } from './state/index.js';
export { PromptRegistry } from './prompts/index.js';
export { MessageFormatter } from './output/index.js';
