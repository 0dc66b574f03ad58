import { GoogleGenAI } from '@google/genai';
import { SummarizeError, describeError, toError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { ok, err } from '../../types/index.js';
import type { GeminiCredentials, Result } from '../../types/index.js';
import { createSystemPrompt, createUserPrompt } from './prompts.js';

export interface Summarizer {
  summarize(
    text: string,
    maxWords: number,
    minWords: number,
    systemPrompt?: string
  ): Promise<Result<string, SummarizeError>>;
}

export interface GeminiClientOptions {
  locale?: string;
  logger?: Logger;
}

// Transcripts past this length are cut before they are sent to the model.
export const MAX_INPUT_CHARS = 127_000;

/**
 * Cuts `text` to at most `maxWords` whitespace-separated words, marking the
 * cut with an ellipsis. Text within the limit is returned trimmed.
 */
export function limitWords(text: string, maxWords: number): string {
  const trimmed = text.trim();
  const words = trimmed.split(/\s+/);
  if (words.length <= maxWords) return trimmed;
  return `${words.slice(0, maxWords).join(' ')}…`;
}

export class GeminiClient implements Summarizer {
  private client: GoogleGenAI;
  private modelName: string;
  private locale: string;
  private logger: Logger;

  constructor(credentials: GeminiCredentials, options: GeminiClientOptions = {}) {
    this.client =
      'apiKey' in credentials
        ? new GoogleGenAI({ apiKey: credentials.apiKey })
        : new GoogleGenAI({
            vertexai: true,
            project: credentials.projectId,
            location: credentials.location,
          });
    this.modelName = credentials.model || 'gemini-2.5-flash';
    this.locale = options.locale ?? 'en';
    this.logger = options.logger ?? silentLogger;
  }

  /** One request per call; failures come back as `SummarizeError`. */
  async summarize(
    text: string,
    maxWords: number,
    minWords: number,
    systemPrompt: string = createSystemPrompt()
  ): Promise<Result<string, SummarizeError>> {
    const input = text.length > MAX_INPUT_CHARS ? text.slice(0, MAX_INPUT_CHARS) : text;
    const userPrompt = createUserPrompt(input, { maxWords, minWords }, this.locale);

    try {
      const response = await this.client.models.generateContent({
        model: this.modelName,
        config: {
          systemInstruction: systemPrompt,
          temperature: 0,
        },
        contents: userPrompt,
      });

      const output = response.text?.trim();
      if (!output) {
        return err(new SummarizeError('No text content in Gemini response'));
      }

      const summary = limitWords(output, maxWords);
      this.logger.debug(`Generated summary (${summary.length} chars)`);
      return ok(summary);
    } catch (error) {
      const cause = toError(error);
      return err(new SummarizeError(`Gemini API error: ${describeError(cause)}`, { cause }));
    }
  }
}
