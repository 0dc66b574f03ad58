export { GeminiClient, limitWords, type Summarizer } from './client.js';
export { createSystemPrompt, createDigestSystemPrompt, createUserPrompt } from './prompts.js';
