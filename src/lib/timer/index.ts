export { TimerEngine } from './engine';
export type { SessionMode, TimerEngineOptions } from './engine';
export { systemClock } from './types';
export type {
  Clock,
  CompletionEvent,
  ContinueRequest,
  ContinueTrigger,
  NotificationScheduler,
  RunSnapshot,
  SnapshotPublisher,
  StartRequest,
  TimerEvents,
  TimerStatus,
  TimerView,
} from './types';
