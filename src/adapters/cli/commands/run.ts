import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import {
  ConfigurationError,
  createConsoleLogger,
  createPipeline,
  isLogLevel,
  loadConfig,
  describeError,
  toError,
  type Logger,
  type Pipeline,
  type PipelineCallbacks,
  type RunOptions,
} from '../../../core/index.js';
import type { AppConfig, RunReport } from '../../../types/index.js';

loadEnv();

export interface RunCommandOptions extends RunOptions {
  verbose?: boolean;
}

export type PipelineBuilder = (
  config: AppConfig,
  logger: Logger,
  callbacks: PipelineCallbacks
) => Promise<Pipeline>;

export function formatReport(report: RunReport): string[] {
  const row = (label: string, value: number) =>
    `│ ${label.padEnd(28)} ${String(value).padStart(5)} │`;

  return [
    '┌────────────────────────────────────┐',
    row('Videos seen', report.videosSeen),
    row('Already notified', report.videosAlreadyProcessed),
    row('Skipped (too old)', report.videosSkippedOutdated),
    row('Skipped (no transcript)', report.videosSkippedNoTranscript),
    row('Skipped (summarize error)', report.videosSkippedSummarizeError),
    row('Notifications sent', report.notificationsSent),
    row('Notifications failed', report.notificationsFailed),
    row('Channels failed', report.channelsFailed),
    '└────────────────────────────────────┘',
  ];
}

/**
 * Runs one pass over the configured channels and returns the process exit
 * code: 0 for a completed run, 1 when configuration is invalid.
 */
export async function executeRun(
  options: RunCommandOptions,
  env: Record<string, string | undefined>,
  logger: Logger,
  build: PipelineBuilder = createPipeline
): Promise<number> {
  const callbacks: PipelineCallbacks = {
    onChannelStart: (channelId, index, total) =>
      logger.info(`📺 [${index}/${total}] Channel ${channelId}`),
    onVideoStart: (video, index, total) =>
      logger.info(`🎬 [${index}/${total}] ${video.title}`),
    onVideoNotified: (video) => logger.info(`✅ Notified: ${video.title}`),
    onVideoSkipped: (video, reason) => logger.debug(`Skipped ${video.id} (${reason})`),
  };

  try {
    const config = loadConfig(options, env);
    const pipeline = await build(config, logger, callbacks);
    const { report, digest } = await pipeline.run(
      config.monitor.channels,
      config.monitor.maxVideosPerChannel
    );

    if (digest) {
      logger.info(digest.delivered ? '📰 Digest sent' : `Digest not sent: ${digest.error ?? 'unknown error'}`);
    }
    for (const line of formatReport(report)) {
      console.log(line);
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      for (const problem of error.problems) {
        logger.error(problem);
      }
      return 1;
    }

    const err = toError(error);
    logger.error(`Run failed: ${describeError(err)}`);
    if (options.verbose && err.stack) {
      console.error(`📋 Stack trace:\n${err.stack}`);
    }
    return 1;
  }
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Summarize new videos from the configured channels and post them to Telegram')
    .option('-c, --channel <id...>', 'YouTube channel id, @handle or channel URL (repeatable)')
    .option('-n, --max-videos <number>', 'videos to check per channel')
    .option('--max-words <number>', 'upper bound on summary length in words')
    .option('--min-words <number>', 'lower bound on summary length in words')
    .option('--max-age-days <number>', 'skip videos published more than this many days ago')
    .option('-l, --locale <locale>', 'summary language')
    .option('-s, --state <file>', 'processed-videos state file')
    .option('--persist <mode>', 'when to save state: incremental | end-of-run')
    .option('--prompts <file>', 'JSON file mapping channel id to system prompt')
    .option('--digest', 'also send one digest of all summaries at the end of the run')
    .option('--interval <ms>', 'pause between Telegram messages')
    .option('-m, --model <model>', 'Gemini model name')
    .option('--verbose', 'verbose logging')
    .action(async (options: RunCommandOptions) => {
      const envLevel = process.env.LOG_LEVEL ?? '';
      const logger = createConsoleLogger({
        level: options.verbose ? 'debug' : isLogLevel(envLevel) ? envLevel : 'info',
        format: process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
      });

      process.exitCode = await executeRun(options, process.env, logger);
    });

  return command;
}
