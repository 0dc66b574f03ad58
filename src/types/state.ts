export interface ProcessedVideo {
  notifiedAt: string;
  channelId: string;
  title: string;
}

/** Video ids that were confirmed delivered in some past run. */
export type ProcessedSet = Map<string, ProcessedVideo>;

export interface ProcessedStateFile {
  version: 1;
  createdAt: string;
  updatedAt: string;
  videos: Record<string, ProcessedVideo>;
}

export type PersistMode = 'incremental' | 'end-of-run';
