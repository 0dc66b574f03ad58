import type { Summary } from '../../types/index.js';

/** Telegram rejects messages longer than this many characters. */
export const MAX_MESSAGE_LENGTH = 4096;

const ELLIPSIS = '…';

export function escapeMarkdown(text: string): string {
  return text.replace(/[_*[\]()~`>#+\-=|{}.!\\]/g, '\\$&');
}

function escapeLinkUrl(url: string): string {
  return url.replace(/[)\\]/g, '\\$&');
}

/** Builds MarkdownV2 payloads: bold title, body, inline link. */
export class MessageFormatter {
  private maxLength: number;

  constructor(maxLength: number = MAX_MESSAGE_LENGTH) {
    this.maxLength = maxLength;
  }

  format(summary: Summary): string {
    const header = `*${escapeMarkdown(summary.video.title)}*`;
    const footer = `[Watch on YouTube](${escapeLinkUrl(summary.video.url)})`;
    return this.compose(header, summary.text, footer);
  }

  formatDigest(text: string, videoCount: number): string {
    const header = `*${escapeMarkdown(`Digest of ${videoCount} videos`)}*`;
    return this.compose(header, text);
  }

  private compose(header: string, text: string, footer?: string): string {
    const parts = footer ? [header, '', footer] : [header, ''];
    const frame = parts.join('\n\n').length;
    const budget = this.maxLength - frame;

    parts[1] = this.escapeWithin(text.trim(), budget);
    return parts.join('\n\n');
  }

  // Escapes `text`, shortening it so the escaped form fits in `budget`.
  private escapeWithin(text: string, budget: number): string {
    const escaped = escapeMarkdown(text);
    if (escaped.length <= budget) return escaped;

    let result = '';
    for (const char of text) {
      const piece = escapeMarkdown(char);
      if (result.length + piece.length > budget - ELLIPSIS.length) break;
      result += piece;
    }
    return result + ELLIPSIS;
  }
}
