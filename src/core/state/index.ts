export { StateManager, type StateStore, type ProcessedEntry } from './manager.js';
