import type { CheckInState } from '@/lib/check-in';
import type { Segment, SegmentKind, WorkContext } from '@/lib/segments/types';

/** Possible engine statuses. */
export type TimerStatus = 'idle' | 'running' | 'paused' | 'paused-expiry' | 'completed';

/** Source of "now". Injected so tests control time. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/** Schedules the out-of-process "block is over" notification. */
export interface NotificationScheduler {
  scheduleCompletion(at: Date, blockIndex: number, isBreak: boolean): void | Promise<void>;
  cancel(blockIndex: number): void | Promise<void>;
}

/** Mirrors run snapshots to widgets and other read-only consumers. */
export interface SnapshotPublisher {
  publish(snapshot: RunSnapshot): void | Promise<void>;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/** Parameters for starting a session on a slot. */
export interface StartRequest {
  blockIndex: number;
  date: string;
  mode: SegmentKind;
  /** Work category. In break mode, the work context to restore afterwards. */
  category?: string | null;
  label?: string | null;
  /** Segments already recorded on this slot by earlier sessions. */
  existingSegments?: Segment[];
  /** Fill already shown for this slot. Derived from `existingSegments` when omitted. */
  existingVisualFill?: number;
  /**
   * Break reminder deadline to keep, null when it already fired. A fresh one
   * is scheduled when omitted.
   */
  breakNotifyAt?: Date | null;
  /** Begin frozen, as a session that was paused when it was saved. */
  paused?: boolean;
}

/** A continuation always targets the slot containing "now". */
export type ContinueRequest = Omit<StartRequest, 'blockIndex' | 'date' | 'breakNotifyAt' | 'paused'>;

/** Who asked for a continuation. */
export type ContinueTrigger = 'user' | 'auto';

// ---------------------------------------------------------------------------
// Outputs
// ---------------------------------------------------------------------------

/**
 * Periodic projection of the active session, enough to rebuild it after the
 * process is lost. Instants are ISO 8601 strings.
 */
export interface RunSnapshot {
  runId: string;
  blockIndex: number;
  date: string;
  startedAt: string;
  endAt: string;
  initialDurationSeconds: number;
  secondsUsed: number;
  /** Segments of the current run, including the in-progress tail. */
  segments: Segment[];
  /** Segments from earlier sessions and earlier runs of this session. */
  previousSegments: Segment[];
  currentSegmentStart: number;
  currentMode: SegmentKind;
  /** Category of the segment in progress; null on a break. */
  currentCategory: string | null;
  currentLabel: string | null;
  /** Work context restored when the break ends. */
  lastWorkCategory: string | null;
  lastWorkLabel: string | null;
  breakNotifyAt: string | null;
  visualFill: number;
  paused: boolean;
}

/** Result of a session ending: natural completion, manual stop, or paused expiry. */
export interface CompletionEvent {
  blockIndex: number;
  date: string;
  isBreak: boolean;
  secondsUsed: number;
  initialDurationSeconds: number;
  /** Every segment of the slot: earlier sessions first, then this one. */
  segments: Segment[];
  visualFill: number;
  /** True when the slot boundary was reached while running. */
  natural: boolean;
  completedAt: string;
  workContext: WorkContext;
}

/** Immutable view of the engine handed to observers. */
export interface TimerView {
  status: TimerStatus;
  blockIndex: number | null;
  date: string | null;
  mode: SegmentKind | null;
  timeLeft: number;
  initialDurationSeconds: number;
  secondsUsed: number;
  progressPercent: number;
  visualFill: number;
  scaleFactor: number;
  previousVisualProportion: number;
  previousSegments: Segment[];
  /** Current run's segments including the in-progress tail. */
  liveSegments: Segment[];
  currentSegmentStart: number;
  workContext: WorkContext | null;
  startedAt: string | null;
  endAt: string | null;
  breakNotificationVisible: boolean;
  checkIn: CheckInState;
  /** Set while completed or awaiting a paused-expiry decision. */
  outcome: CompletionEvent | null;
}

/** Events emitted by the engine. */
export interface TimerEvents {
  tick: (timeLeft: number, progressPercent: number) => void;
  segmentBoundary: (segment: Segment) => void;
  breakNotify: () => void;
  snapshot: (snapshot: RunSnapshot) => void;
  complete: (completion: CompletionEvent) => void;
  pausedExpiry: (completion: CompletionEvent) => void;
  checkInRequired: (consecutiveAutoContinuations: number) => void;
  stateChange: (view: TimerView) => void;
}
