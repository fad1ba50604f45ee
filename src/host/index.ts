export { createProcessLifecycle } from './lifecycle';
export type { ProcessLifecycle, SignalSource } from './lifecycle';
export { loadSettingsFile } from './settings-file';
export { JsonFileBlockRepository } from './json-block-repository';
export { TimeoutNotificationScheduler } from './notifications';
export type { NotificationHandler } from './notifications';
