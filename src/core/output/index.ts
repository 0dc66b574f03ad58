export { MessageFormatter, escapeMarkdown, MAX_MESSAGE_LENGTH } from './message.js';
