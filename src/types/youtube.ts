export interface VideoInfo {
  id: string;
  title: string;
  channelId: string;
  channelTitle: string;
  publishedAt: string; // ISO 8601
  url: string;
}

export interface Transcript {
  videoId: string;
  text: string;
  language?: string;
}

export type CaptionTrackKind = 'standard' | 'ASR';

export interface CaptionInfo {
  id: string;
  videoId: string;
  languageCode: string;
  trackKind: CaptionTrackKind;
  isAutoGenerated: boolean;
}
