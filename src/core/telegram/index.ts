export { TelegramClient, type Notifier } from './client.js';
