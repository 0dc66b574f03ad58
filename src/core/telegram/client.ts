import { DeliveryError, describeError, toError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { ok, err } from '../../types/index.js';
import type { DeliveryReceipt, Result, TelegramConfig } from '../../types/index.js';

export interface Notifier {
  deliver(message: string): Promise<Result<DeliveryReceipt, DeliveryError>>;
}

export interface TelegramClientOptions {
  apiBaseUrl?: string;
  logger?: Logger;
}

interface TelegramResponse {
  ok: boolean;
  result?: { message_id: number };
  description?: string;
  error_code?: number;
}

function isTelegramResponse(value: unknown): value is TelegramResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'ok' in value &&
    typeof value.ok === 'boolean'
  );
}

/** Sends MarkdownV2 messages to the one chat it was built for. */
export class TelegramClient implements Notifier {
  private endpoint: string;
  private chatId: string;
  private logger: Logger;

  constructor(config: TelegramConfig, options: TelegramClientOptions = {}) {
    const baseUrl = (options.apiBaseUrl ?? 'https://api.telegram.org').replace(/\/$/, '');
    this.endpoint = `${baseUrl}/bot${config.botToken}/sendMessage`;
    this.chatId = config.chatId;
    this.logger = options.logger ?? silentLogger;
  }

  async deliver(message: string): Promise<Result<DeliveryReceipt, DeliveryError>> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({
          chat_id: this.chatId,
          text: message,
          parse_mode: 'MarkdownV2',
        }),
      });
    } catch (error) {
      const cause = toError(error);
      return err(new DeliveryError(`Telegram request failed: ${describeError(cause)}`, { cause }));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return err(
        new DeliveryError(`Telegram API error (${response.status}): response is not JSON`, {
          status: response.status,
          cause: toError(error),
        })
      );
    }

    const parsed = isTelegramResponse(body) ? body : null;
    const sent = parsed?.ok ? parsed.result : undefined;
    if (!sent) {
      const description = parsed?.description ?? 'unexpected response';
      const status = parsed?.error_code ?? response.status;
      return err(new DeliveryError(`Telegram API error (${status}): ${description}`, { status }));
    }

    this.logger.debug(`Message ${sent.message_id} sent to Telegram chat ${this.chatId}`);
    return ok({ messageId: sent.message_id });
  }
}
