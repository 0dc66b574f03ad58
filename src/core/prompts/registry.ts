import { readFile } from 'fs/promises';
import { ConfigurationError, toErrorMessage } from '../errors.js';
import { createSystemPrompt } from '../gemini/prompts.js';

/**
 * Per-channel system prompts. Channel ids match case-insensitively; channels
 * without an entry get the default prompt.
 */
export class PromptRegistry {
  private prompts = new Map<string, string>();
  private fallback: string;

  constructor(fallback: string = createSystemPrompt()) {
    this.fallback = fallback;
  }

  static async fromFile(path: string): Promise<PromptRegistry> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`cannot read prompts file ${path}: ${toErrorMessage(error)}`);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`prompts file ${path} must contain a JSON object`);
    }

    const registry = new PromptRegistry();
    for (const [channelId, prompt] of Object.entries(parsed)) {
      if (typeof prompt !== 'string' || !prompt.trim()) {
        throw new ConfigurationError(`prompt for channel ${channelId} in ${path} must be a non-empty string`);
      }
      registry.register(channelId, prompt);
    }
    return registry;
  }

  register(channelId: string, prompt: string): void {
    this.prompts.set(channelId.toLowerCase(), prompt);
  }

  get(channelId: string): string {
    return this.prompts.get(channelId.toLowerCase()) ?? this.fallback;
  }

  get size(): number {
    return this.prompts.size;
  }
}
