export { PromptRegistry } from './registry.js';
