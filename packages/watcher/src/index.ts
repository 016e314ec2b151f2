export { detectWatchCapability } from './capabilities.js';
export type { WatchCapability } from './capabilities.js';
export { fsNotificationSource } from './notifications.js';
export type { NotificationSource, Subscription } from './notifications.js';
export { WatchSession, startWatch, DEFAULT_DEBOUNCE_MS } from './watch.js';
export type { WatchOptions } from './watch.js';
