import { describe, it, expect } from 'vitest';
import {
  MAX_MESSAGE_LENGTH,
  MessageFormatter,
  escapeMarkdown,
} from '../../../src/core/output/message.js';
import type { Summary } from '../../../src/types/index.js';

function makeSummary(title: string, text: string): Summary {
  return {
    video: {
      id: 'v1',
      title,
      channelId: 'C1',
      channelTitle: 'Channel',
      publishedAt: '2026-10-01T00:00:00Z',
      url: 'https://www.youtube.com/watch?v=v1',
    },
    text,
    generatedAt: '2026-10-02T00:00:00.000Z',
  };
}

const FOOTER = '[Watch on YouTube](https://www.youtube.com/watch?v=v1)';

describe('escapeMarkdown', () => {
  it('should escape every MarkdownV2 special character', () => {
    expect(escapeMarkdown('_*[]()~`>#+-=|{}.!\\')).toBe(
      '\\_\\*\\[\\]\\(\\)\\~\\`\\>\\#\\+\\-\\=\\|\\{\\}\\.\\!\\\\'
    );
  });

  it('should leave plain text alone', () => {
    expect(escapeMarkdown('Plain text 123')).toBe('Plain text 123');
  });
});

describe('MessageFormatter', () => {
  it('should bold the escaped title and append the video link', () => {
    const formatter = new MessageFormatter();

    const message = formatter.format(makeSummary('Hello, world! (part 1)', 'Key point: 3.5% growth.'));

    expect(message).toBe(
      `*Hello, world\\! \\(part 1\\)*\n\nKey point: 3\\.5% growth\\.\n\n${FOOTER}`
    );
  });

  it('should shorten the summary to fit the length limit', () => {
    const formatter = new MessageFormatter(80);

    const message = formatter.format(makeSummary('T', 'a'.repeat(50)));

    expect(message).toBe(`*T*\n\n${'a'.repeat(18)}…\n\n${FOOTER}`);
    expect(message).toHaveLength(80);
  });

  it('should not cut an escape sequence in half', () => {
    const formatter = new MessageFormatter(80);

    const message = formatter.format(makeSummary('T', '.'.repeat(50)));

    expect(message).toBe(`*T*\n\n${'\\.'.repeat(9)}…\n\n${FOOTER}`);
  });

  it('should keep long summaries under the Telegram limit by default', () => {
    const formatter = new MessageFormatter();

    const message = formatter.format(makeSummary('Long', 'word. '.repeat(1000)));

    expect(message.length).toBeLessThanOrEqual(MAX_MESSAGE_LENGTH);
    expect(message.endsWith(`…\n\n${FOOTER}`)).toBe(true);
  });

  it('should format a digest without a link', () => {
    const formatter = new MessageFormatter();

    expect(formatter.formatDigest('Themes - markets', 3)).toBe(
      '*Digest of 3 videos*\n\nThemes \\- markets'
    );
  });
});
