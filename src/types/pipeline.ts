import type { VideoInfo } from './youtube.js';

export interface Summary {
  video: VideoInfo;
  text: string;
  generatedAt: string;
}

export interface NotificationResult {
  videoId: string;
  delivered: boolean;
  error?: string;
}

export interface DeliveryReceipt {
  messageId: number;
}

export interface RunReport {
  videosSeen: number;
  videosAlreadyProcessed: number;
  videosSkippedOutdated: number;
  videosSkippedNoTranscript: number;
  videosSkippedSummarizeError: number;
  notificationsSent: number;
  notificationsFailed: number;
  channelsFailed: number;
}

export interface PipelineResult {
  report: RunReport;
  notifications: NotificationResult[];
  summaries: Summary[];
  digest?: NotificationResult;
}

export function createEmptyReport(): RunReport {
  return {
    videosSeen: 0,
    videosAlreadyProcessed: 0,
    videosSkippedOutdated: 0,
    videosSkippedNoTranscript: 0,
    videosSkippedSummarizeError: 0,
    notificationsSent: 0,
    notificationsFailed: 0,
    channelsFailed: 0,
  };
}
