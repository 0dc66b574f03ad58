import { readFile, writeFile, mkdir, access, rename } from 'fs/promises';
import { dirname } from 'path';
import type { Logger } from '../logger.js';
import { toErrorMessage } from '../errors.js';
import type {
  ProcessedSet,
  ProcessedStateFile,
  ProcessedVideo,
} from '../../types/index.js';

export interface StateStore {
  load(): Promise<ProcessedSet>;
  persist(set: ProcessedSet): Promise<boolean>;
}

export interface ProcessedEntry extends ProcessedVideo {
  videoId: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isProcessedVideo(value: unknown): value is ProcessedVideo {
  return (
    isRecord(value) &&
    typeof value.notifiedAt === 'string' &&
    typeof value.channelId === 'string' &&
    typeof value.title === 'string'
  );
}

export class StateManager implements StateStore {
  private statePath: string;
  private logger: Logger;
  private createdAt: string | null = null;

  constructor(statePath: string, logger: Logger) {
    this.statePath = statePath;
    this.logger = logger;
  }

  getPath(): string {
    return this.statePath;
  }

  /**
   * Reads the processed-video file. A missing, unreadable or malformed file
   * yields an empty set; the run then starts cold.
   */
  async load(): Promise<ProcessedSet> {
    const set: ProcessedSet = new Map();

    try {
      await access(this.statePath);
    } catch {
      this.logger.warn(`State file not found, starting with an empty set: ${this.statePath}`);
      return set;
    }

    let parsed: unknown;
    try {
      const content = await readFile(this.statePath, 'utf-8');
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn(`State file unreadable, starting with an empty set: ${this.statePath}`, {
        error: toErrorMessage(error),
      });
      return set;
    }

    if (!isRecord(parsed) || !isRecord(parsed.videos)) {
      this.logger.warn(`State file has an unexpected shape, starting with an empty set: ${this.statePath}`);
      return set;
    }

    if (typeof parsed.createdAt === 'string') {
      this.createdAt = parsed.createdAt;
    }

    for (const [videoId, entry] of Object.entries(parsed.videos)) {
      if (isProcessedVideo(entry)) {
        set.set(videoId, {
          notifiedAt: entry.notifiedAt,
          channelId: entry.channelId,
          title: entry.title,
        });
      } else {
        this.logger.warn(`Dropping malformed state entry for video ${videoId}`);
      }
    }

    this.logger.debug(`Loaded ${set.size} processed video(s) from ${this.statePath}`);
    return set;
  }

  /**
   * Writes the whole set to a sibling temp file, then renames it over the
   * state file so an interrupted write never leaves a torn file behind.
   * Returns false (and logs) when either step fails.
   */
  async persist(set: ProcessedSet): Promise<boolean> {
    const now = new Date().toISOString();
    this.createdAt ??= now;

    const state: ProcessedStateFile = {
      version: 1,
      createdAt: this.createdAt,
      updatedAt: now,
      videos: Object.fromEntries(set),
    };

    try {
      const tempPath = `${this.statePath}.tmp`;
      await mkdir(dirname(this.statePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(state, null, 2));
      await rename(tempPath, this.statePath);
      this.logger.debug(`Saved ${set.size} processed video(s) to ${this.statePath}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to save state file ${this.statePath}`, {
        error: toErrorMessage(error),
      });
      return false;
    }
  }

  getStats(set: ProcessedSet): { total: number; lastNotifiedAt: string | null } {
    const [latest] = this.recent(set, 1);
    return {
      total: set.size,
      lastNotifiedAt: latest?.notifiedAt ?? null,
    };
  }

  /** Newest-first entries by notification time. */
  recent(set: ProcessedSet, limit: number): ProcessedEntry[] {
    return Array.from(set, ([videoId, video]) => ({ videoId, ...video }))
      .sort((a, b) => Date.parse(b.notifiedAt) - Date.parse(a.notifiedAt))
      .slice(0, Math.max(0, limit));
  }
}
