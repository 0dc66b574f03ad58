import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TelegramClient } from '../../../src/core/telegram/client.js';
import { DeliveryError } from '../../../src/core/errors.js';

const config = { botToken: 'test-token', chatId: '-100123' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('TelegramClient', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fetchMock.mockReset();
  });

  it('should post the message to the configured chat', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ok: true, result: { message_id: 77 } }));
    const client = new TelegramClient(config);

    const result = await client.deliver('*Title*');

    expect(result).toEqual({ ok: true, value: { messageId: 77 } });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toEqual({
      chat_id: '-100123',
      text: '*Title*',
      parse_mode: 'MarkdownV2',
    });
  });

  it('should honour a custom API base URL', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ok: true, result: { message_id: 1 } }));
    const client = new TelegramClient(config, { apiBaseUrl: 'http://localhost:8081/' });

    await client.deliver('hi');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:8081/bottest-token/sendMessage');
    expect(JSON.parse(init.body).parse_mode).toBe('MarkdownV2');
  });

  it('should return a DeliveryError with the Telegram error code', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse(
        { ok: false, error_code: 400, description: "Bad Request: can't parse entities" },
        400
      )
    );

    const result = await new TelegramClient(config).deliver('*broken');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DeliveryError);
    expect(result.error.status).toBe(400);
    expect(result.error.message).toBe(
      "Telegram API error (400): Bad Request: can't parse entities"
    );
  });

  it('should return a DeliveryError for a non-JSON response', async () => {
    fetchMock.mockResolvedValue(new Response('<html>bad gateway</html>', { status: 502 }));

    const result = await new TelegramClient(config).deliver('text');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.status).toBe(502);
    expect(result.error.message).toBe('Telegram API error (502): response is not JSON');
  });

  it('should reject a success response without a message id', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ok: true }));

    const result = await new TelegramClient(config).deliver('text');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Telegram API error (200): unexpected response');
  });

  it('should return a DeliveryError when the request itself fails', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const result = await new TelegramClient(config).deliver('text');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.status).toBeUndefined();
    expect(result.error.message).toBe('Telegram request failed: fetch failed');
  });
});
