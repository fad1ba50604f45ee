import { isCurrentSlot } from '@/lib/block-calendar';
import { silentLogger } from '@/lib/log';
import type { Logger } from '@/lib/log';
import { DEFAULT_ENGINE_SETTINGS } from '@/lib/settings';
import type { TimerEngine } from '@/lib/timer/engine';
import { systemClock } from '@/lib/timer/types';
import type { Clock, RunSnapshot } from '@/lib/timer/types';
import type { LifecycleSignal } from './types';

export interface RecoveryOptions {
  logger?: Logger;
  clock?: Clock;
  dayStartHour?: number;
}

/** Outcome of rebuilding a session from a persisted snapshot. */
export type SnapshotRecovery = 'resumed' | 'expired' | 'rejected';

/**
 * Bridges host lifecycle signals to the engine and rebuilds a session after
 * the process was lost entirely.
 */
export class RecoveryCoordinator {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly dayStartHour: number;

  constructor(
    private readonly engine: TimerEngine,
    options: RecoveryOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.dayStartHour = options.dayStartHour ?? DEFAULT_ENGINE_SETTINGS.dayStartHour;
  }

  /** Wire suspend and resume. Returns a function that detaches both. */
  attach(lifecycle: LifecycleSignal): () => void {
    const offSuspend = lifecycle.onSuspend(() => {
      this.logger.debug('Host suspending, saving run snapshot');
      this.engine.saveStateForBackground();
    });
    const offResume = lifecycle.onResume(() => {
      this.logger.debug('Host resumed, reconciling deadlines');
      this.engine.restoreFromBackground();
    });
    return () => {
      offSuspend();
      offResume();
    };
  }

  /**
   * Start a new session from the last snapshot of a lost process. Its
   * segments and fill become the new session's starting point. A paused
   * snapshot comes back paused, and a break keeps its reminder deadline.
   */
  resumeFromSnapshot(snapshot: RunSnapshot): SnapshotRecovery {
    const now = this.clock.now();
    if (!isCurrentSlot(snapshot.blockIndex, snapshot.date, now, this.dayStartHour)) {
      this.logger.info(`Snapshot for block ${snapshot.blockIndex} on ${snapshot.date} has expired`);
      return 'expired';
    }

    const started = this.engine.start({
      blockIndex: snapshot.blockIndex,
      date: snapshot.date,
      mode: snapshot.currentMode,
      category: snapshot.lastWorkCategory,
      label: snapshot.lastWorkLabel,
      existingSegments: [...snapshot.previousSegments, ...snapshot.segments],
      existingVisualFill: snapshot.visualFill,
      breakNotifyAt: snapshot.breakNotifyAt === null ? null : new Date(snapshot.breakNotifyAt),
      paused: snapshot.paused,
    });
    if (!started) {
      return 'rejected';
    }
    this.logger.info(
      `Resumed block ${snapshot.blockIndex} from snapshot ${snapshot.runId}${snapshot.paused ? ' (paused)' : ''}`,
    );
    return 'resumed';
  }
}
