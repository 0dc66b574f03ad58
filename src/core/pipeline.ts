import { ConfigurationError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { createDigestSystemPrompt } from './gemini/prompts.js';
import { MessageFormatter } from './output/message.js';
import { PromptRegistry } from './prompts/registry.js';
import type { VideoSource } from './youtube/client.js';
import type { Summarizer } from './gemini/client.js';
import type { Notifier } from './telegram/client.js';
import type { StateStore } from './state/manager.js';
import {
  createEmptyReport,
  type MonitorConfig,
  type NotificationResult,
  type PipelineResult,
  type ProcessedSet,
  type RunReport,
  type Summary,
  type VideoInfo,
} from '../types/index.js';

export type SkipReason = 'no_transcript' | 'summarize_error' | 'delivery_failed';

export interface PipelineCallbacks {
  onChannelStart?: (channelId: string, index: number, total: number) => void;
  onVideoStart?: (video: VideoInfo, index: number, total: number) => void;
  onVideoNotified?: (video: VideoInfo, summary: Summary) => void;
  onVideoSkipped?: (video: VideoInfo, reason: SkipReason, error?: Error) => void;
}

export type PipelineOptions = Pick<
  MonitorConfig,
  | 'summaryMaxWords'
  | 'summaryMinWords'
  | 'maxAgeDays'
  | 'persistMode'
  | 'digest'
  | 'deliveryIntervalMs'
>;

export interface PipelineDependencies {
  source: VideoSource;
  summarizer: Summarizer;
  notifier: Notifier;
  store: StateStore;
  logger?: Logger;
  prompts?: PromptRegistry;
  formatter?: MessageFormatter;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function publishedTime(video: VideoInfo): number {
  const time = Date.parse(video.publishedAt);
  return Number.isNaN(time) ? Number.MIN_SAFE_INTEGER : time;
}

/**
 * Newest first. Array#sort is stable, so equal (or unparseable) dates keep
 * the order the source returned them in.
 */
export function sortByRecency(videos: VideoInfo[]): VideoInfo[] {
  return [...videos].sort((a, b) => publishedTime(b) - publishedTime(a));
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

interface RunState {
  report: RunReport;
  processed: ProcessedSet;
  notifications: NotificationResult[];
  summaries: Summary[];
  dirty: boolean;
  delivered: number;
}

export class Pipeline {
  private options: PipelineOptions;
  private source: VideoSource;
  private summarizer: Summarizer;
  private notifier: Notifier;
  private store: StateStore;
  private logger: Logger;
  private prompts: PromptRegistry;
  private formatter: MessageFormatter;
  private now: () => Date;
  private sleep: (ms: number) => Promise<void>;
  private callbacks: PipelineCallbacks;

  constructor(
    options: PipelineOptions,
    dependencies: PipelineDependencies,
    callbacks: PipelineCallbacks = {}
  ) {
    this.options = options;
    this.source = dependencies.source;
    this.summarizer = dependencies.summarizer;
    this.notifier = dependencies.notifier;
    this.store = dependencies.store;
    this.logger = dependencies.logger ?? silentLogger;
    this.prompts = dependencies.prompts ?? new PromptRegistry();
    this.formatter = dependencies.formatter ?? new MessageFormatter();
    this.now = dependencies.now ?? (() => new Date());
    this.sleep =
      dependencies.sleep ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
    this.callbacks = callbacks;
  }

  async run(channels: string[], maxPerChannel: number): Promise<PipelineResult> {
    this.validate(channels, maxPerChannel);

    const state: RunState = {
      report: createEmptyReport(),
      processed: await this.store.load(),
      notifications: [],
      summaries: [],
      dirty: false,
      delivered: 0,
    };
    this.logger.info(`Loaded ${state.processed.size} processed video(s)`);

    for (let i = 0; i < channels.length; i++) {
      const channelId = channels[i];
      this.callbacks.onChannelStart?.(channelId, i + 1, channels.length);
      await this.processChannel(channelId, maxPerChannel, state);
    }

    let digest: NotificationResult | undefined;
    if (this.options.digest) {
      digest = await this.sendDigest(state);
    }

    if (state.dirty) {
      await this.store.persist(state.processed);
    }

    const { report } = state;
    this.logger.info('Run complete', { ...report });

    return {
      report,
      notifications: state.notifications,
      summaries: state.summaries,
      ...(digest && { digest }),
    };
  }

  private validate(channels: string[], maxPerChannel: number): void {
    const problems: string[] = [];

    if (channels.length === 0) {
      problems.push('at least one channel is required');
    }
    if (channels.some((channel) => !channel.trim())) {
      problems.push('channel ids must not be empty');
    }
    if (!isPositiveInteger(maxPerChannel)) {
      problems.push(`max videos per channel must be a positive integer (got ${maxPerChannel})`);
    }
    if (!isPositiveInteger(this.options.summaryMaxWords)) {
      problems.push(`summary max words must be a positive integer (got ${this.options.summaryMaxWords})`);
    }
    if (
      !isPositiveInteger(this.options.summaryMinWords) ||
      this.options.summaryMinWords > this.options.summaryMaxWords
    ) {
      problems.push(
        `summary min words must be a positive integer no larger than max words (got ${this.options.summaryMinWords})`
      );
    }

    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }
  }

  private async processChannel(
    channelId: string,
    maxPerChannel: number,
    state: RunState
  ): Promise<void> {
    const listed = await this.source.listRecentVideos(channelId, maxPerChannel);
    if (!listed.ok) {
      state.report.channelsFailed++;
      this.logger.error(`Skipping channel ${channelId}: ${listed.error.message}`);
      return;
    }

    const candidates = sortByRecency(listed.value).slice(0, maxPerChannel);
    const cutoff =
      this.options.maxAgeDays !== undefined
        ? this.now().getTime() - this.options.maxAgeDays * DAY_MS
        : null;

    const eligible: VideoInfo[] = [];
    const queued = new Set<string>();
    for (const video of candidates) {
      if (queued.has(video.id)) {
        this.logger.debug(`Ignoring repeated listing of ${video.id}`);
        continue;
      }
      if (state.processed.has(video.id)) {
        state.report.videosAlreadyProcessed++;
        continue;
      }
      const published = Date.parse(video.publishedAt);
      if (cutoff !== null && !Number.isNaN(published) && published < cutoff) {
        state.report.videosSkippedOutdated++;
        continue;
      }
      queued.add(video.id);
      eligible.push(video);
    }

    this.logger.info(
      `Channel ${channelId}: ${candidates.length} recent, ${eligible.length} new`
    );

    for (let i = 0; i < eligible.length; i++) {
      state.report.videosSeen++;
      this.callbacks.onVideoStart?.(eligible[i], i + 1, eligible.length);
      await this.processVideo(eligible[i], state);
    }
  }

  private async processVideo(video: VideoInfo, state: RunState): Promise<void> {
    const { report } = state;

    const fetched = await this.source.fetchTranscript(video.id);
    const transcript = fetched.ok ? fetched.value : null;
    if (transcript === null) {
      report.videosSkippedNoTranscript++;
      const error = fetched.ok ? undefined : fetched.error;
      this.logger.warn(`No transcript for ${video.id} (${video.title})`, {
        ...(error && { error: error.message }),
      });
      this.callbacks.onVideoSkipped?.(video, 'no_transcript', error);
      return;
    }

    const summarized = await this.summarizer.summarize(
      transcript.text,
      this.options.summaryMaxWords,
      this.options.summaryMinWords,
      this.prompts.get(video.channelId)
    );
    if (!summarized.ok) {
      report.videosSkippedSummarizeError++;
      this.logger.error(`Summarization failed for ${video.id}: ${summarized.error.message}`);
      this.callbacks.onVideoSkipped?.(video, 'summarize_error', summarized.error);
      return;
    }

    const summary: Summary = {
      video,
      text: summarized.value,
      generatedAt: this.now().toISOString(),
    };

    const result = await this.deliver(this.formatter.format(summary), video.id, state);
    state.notifications.push(result);

    if (!result.delivered) {
      report.notificationsFailed++;
      this.logger.error(`Delivery failed for ${video.id}: ${result.error ?? 'unknown error'}`);
      this.callbacks.onVideoSkipped?.(
        video,
        'delivery_failed',
        new Error(result.error ?? 'unknown error')
      );
      return;
    }

    report.notificationsSent++;
    state.summaries.push(summary);
    state.processed.set(video.id, {
      notifiedAt: this.now().toISOString(),
      channelId: video.channelId,
      title: video.title,
    });
    state.dirty = true;

    if (this.options.persistMode === 'incremental') {
      if (await this.store.persist(state.processed)) {
        state.dirty = false;
      }
    }

    this.callbacks.onVideoNotified?.(video, summary);
  }

  private async deliver(
    message: string,
    videoId: string,
    state: RunState
  ): Promise<NotificationResult> {
    if (state.delivered > 0 && this.options.deliveryIntervalMs > 0) {
      await this.sleep(this.options.deliveryIntervalMs);
    }
    state.delivered++;

    const delivered = await this.notifier.deliver(message);
    return delivered.ok
      ? { videoId, delivered: true }
      : { videoId, delivered: false, error: delivered.error.message };
  }

  // Digest outcomes never touch the processed set or the per-video counters.
  private async sendDigest(state: RunState): Promise<NotificationResult | undefined> {
    if (state.summaries.length < 2) {
      this.logger.debug('Skipping digest: fewer than two summaries delivered');
      return undefined;
    }

    const combined = state.summaries
      .map((s) => `${s.video.channelTitle || s.video.channelId} - ${s.video.title}: ${s.text}`)
      .join('\n\n');

    const summarized = await this.summarizer.summarize(
      combined,
      this.options.summaryMaxWords,
      this.options.summaryMinWords,
      createDigestSystemPrompt()
    );
    if (!summarized.ok) {
      this.logger.warn(`Digest summarization failed: ${summarized.error.message}`);
      return { videoId: 'digest', delivered: false, error: summarized.error.message };
    }

    const message = this.formatter.formatDigest(summarized.value, state.summaries.length);
    const result = await this.deliver(message, 'digest', state);
    if (!result.delivered) {
      this.logger.warn(`Digest delivery failed: ${result.error ?? 'unknown error'}`);
    }
    return result;
  }
}
