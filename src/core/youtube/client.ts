import { google, youtube_v3 } from 'googleapis';
import { SourceError, describeError, toError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { ok, err } from '../../types/index.js';
import type {
  CaptionInfo,
  Result,
  Transcript,
  VideoInfo,
} from '../../types/index.js';

export interface VideoSource {
  listRecentVideos(channelId: string, limit: number): Promise<Result<VideoInfo[], SourceError>>;
  fetchTranscript(videoId: string): Promise<Result<Transcript | null, SourceError>>;
}

export interface YouTubeClientOptions {
  preferredLanguages?: string[];
  logger?: Logger;
}

const PLAYLIST_PAGE_LIMIT = 50;

export function buildVideoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function isChannelHandle(channel: string): boolean {
  return channel.startsWith('@');
}

/**
 * Accepts a bare channel id (`UC...`), a `/channel/<id>` URL, an `@handle`
 * or a `/@handle` URL. Handles keep their leading `@`.
 */
export function parseChannelId(input: string): string {
  const value = input.trim();
  const match = value.match(/youtube\.com\/channel\/([a-zA-Z0-9_-]+)/);
  if (match) return match[1];

  const handleMatch = value.match(/youtube\.com\/(@[\w.-]+)/);
  if (handleMatch) return handleMatch[1];

  if (/^[a-zA-Z0-9_-]+$/.test(value) || /^@[\w.-]+$/.test(value)) return value;

  throw new Error(`Invalid channel id: ${input}`);
}

export class YouTubeClient implements VideoSource {
  private youtube: youtube_v3.Youtube;
  private preferredLanguages: string[];
  private logger: Logger;

  constructor(apiKey: string, options: YouTubeClientOptions = {}) {
    this.youtube = google.youtube({
      version: 'v3',
      auth: apiKey,
    });
    this.preferredLanguages = options.preferredLanguages ?? ['en'];
    this.logger = options.logger ?? silentLogger;
  }

  async listRecentVideos(
    channelId: string,
    limit: number
  ): Promise<Result<VideoInfo[], SourceError>> {
    try {
      const channelResponse = await this.youtube.channels.list({
        part: ['snippet', 'contentDetails'],
        ...(isChannelHandle(channelId)
          ? { forHandle: channelId }
          : { id: [channelId] }),
      });

      const channel = channelResponse.data.items?.[0];
      const uploadsPlaylistId = channel?.contentDetails?.relatedPlaylists?.uploads;
      if (!channel || !uploadsPlaylistId) {
        return err(new SourceError(`Channel not found: ${channelId}`, { channelId }));
      }

      const playlistResponse = await this.youtube.playlistItems.list({
        part: ['snippet', 'contentDetails'],
        playlistId: uploadsPlaylistId,
        maxResults: Math.min(limit, PLAYLIST_PAGE_LIMIT),
      });

      const videos: VideoInfo[] = [];
      for (const item of playlistResponse.data.items ?? []) {
        const videoId = item.contentDetails?.videoId;
        if (!videoId) continue;

        videos.push({
          id: videoId,
          title: item.snippet?.title || '',
          channelId,
          channelTitle: item.snippet?.channelTitle || channel.snippet?.title || '',
          publishedAt:
            item.contentDetails?.videoPublishedAt || item.snippet?.publishedAt || '',
          url: buildVideoUrl(videoId),
        });
      }

      this.logger.debug(`Found ${videos.length} video(s) for channel ${channelId}`);
      return ok(videos);
    } catch (error) {
      const cause = toError(error);
      return err(
        new SourceError(`Failed to list videos for channel ${channelId}: ${describeError(cause)}`, {
          channelId,
          cause,
        })
      );
    }
  }

  /**
   * Resolves `null` when the video has no caption track or the chosen track
   * is empty. Manual tracks in a preferred language win over any other manual
   * track, which wins over the auto-generated one.
   */
  async fetchTranscript(videoId: string): Promise<Result<Transcript | null, SourceError>> {
    try {
      const response = await this.youtube.captions.list({
        part: ['snippet'],
        videoId,
      });

      const tracks: CaptionInfo[] = (response.data.items ?? []).flatMap((track): CaptionInfo[] => {
        if (!track.id) return [];
        const isAsr = track.snippet?.trackKind?.toLowerCase() === 'asr';
        return [
          {
            id: track.id,
            videoId,
            languageCode: track.snippet?.language || '',
            trackKind: isAsr ? 'ASR' : 'standard',
            isAutoGenerated: isAsr,
          },
        ];
      });

      const selected = this.selectCaption(tracks);
      if (!selected) {
        this.logger.debug(`No caption tracks for video ${videoId}`);
        return ok(null);
      }

      const text = await this.downloadCaption(videoId, selected);
      if (!text) return ok(null);

      this.logger.debug(`Retrieved transcript for video ${videoId} (${text.length} chars)`);
      return ok({ videoId, text, language: selected.languageCode || undefined });
    } catch (error) {
      const cause = toError(error);
      return err(
        new SourceError(`Failed to fetch transcript for ${videoId}: ${describeError(cause)}`, {
          videoId,
          cause,
        })
      );
    }
  }

  private selectCaption(tracks: CaptionInfo[]): CaptionInfo | null {
    for (const lang of this.preferredLanguages) {
      const manual = tracks.find(
        (t) => !t.isAutoGenerated && t.languageCode.startsWith(lang)
      );
      if (manual) return manual;
    }

    return (
      tracks.find((t) => !t.isAutoGenerated) ??
      tracks.find((t) => t.isAutoGenerated) ??
      null
    );
  }

  private async downloadCaption(videoId: string, caption: CaptionInfo): Promise<string | null> {
    const params = new URLSearchParams({ v: videoId, lang: caption.languageCode, fmt: 'json3' });
    if (caption.isAutoGenerated) {
      params.set('kind', 'asr');
    }

    const response = await fetch(`https://www.youtube.com/api/timedtext?${params.toString()}`, {
      headers: {
        'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
      },
    });

    if (!response.ok) {
      throw new Error(`timedtext request failed (${response.status})`);
    }

    const body = await response.text();
    if (!body.trim()) return null;

    const data = JSON.parse(body) as {
      events?: Array<{ segs?: Array<{ utf8?: string }> }>;
    };

    const segments: string[] = [];
    for (const event of data.events ?? []) {
      const text = (event.segs ?? [])
        .map((seg) => seg.utf8 ?? '')
        .join('')
        .replace(/\s+/g, ' ')
        .trim();
      if (text) segments.push(text);
    }

    return segments.length > 0 ? segments.join(' ') : null;
  }
}
