export { AlertEngine } from './engine.js';
export type { AlertEngineOptions, HealthSource } from './engine.js';
export { ChannelSender, TelegramSender, createSender, formatTelegramText } from './sender.js';
export { AlertKind, AlertSeverity } from './types.js';
export type { Alert, AlertListener, AlertSender } from './types.js';
