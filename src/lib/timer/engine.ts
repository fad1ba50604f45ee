import { randomUUID } from 'node:crypto';
import EventEmitter from 'eventemitter3';
import { addSeconds } from 'date-fns';
import { isCurrentSlot, slotBounds, slotForInstant } from '@/lib/block-calendar';
import { CheckInCounter } from '@/lib/check-in';
import { checkInvariant } from '@/lib/invariants';
import type { InvariantPolicy } from '@/lib/invariants';
import { createLogger } from '@/lib/log';
import type { Logger } from '@/lib/log';
import { reconcileDeadlines } from '@/lib/recovery/reconcile';
import { SegmentLedger } from '@/lib/segments';
import type { Segment, SegmentKind } from '@/lib/segments';
import { DEFAULT_ENGINE_SETTINGS } from '@/lib/settings';
import type { EngineSettings } from '@/lib/settings';
import { COMPLETE_FILL, baselineProportion, beginFill, fillFor, resumeFill } from '@/lib/visual-fill';
import type { FillState } from '@/lib/visual-fill';
import { systemClock } from './types';
import type {
  Clock,
  CompletionEvent,
  ContinueRequest,
  ContinueTrigger,
  NotificationScheduler,
  RunSnapshot,
  SnapshotPublisher,
  StartRequest,
  TimerEvents,
  TimerView,
} from './types';

/** Mode of the active session. Only a break carries a reminder deadline. */
export type SessionMode = { kind: 'work' } | { kind: 'break'; breakNotifyAt: Date | null };

interface TimerSession {
  runId: string;
  blockIndex: number;
  date: string;
  mode: SessionMode;
  startedAt: Date;
  endAt: Date;
  initialDurationSeconds: number;
  /** Whole seconds this run had to go when it (re)started. */
  runInitialSeconds: number;
  /** Session seconds recorded by runs before the latest resume. */
  carriedSeconds: number;
  timeLeft: number;
  fill: FillState;
  previousSegments: Segment[];
  ledger: SegmentLedger;
}

type EngineState =
  | { status: 'idle' }
  | { status: 'running'; session: TimerSession }
  | { status: 'paused'; session: TimerSession; pausedSecondsUsed: number }
  | { status: 'paused-expiry'; outcome: CompletionEvent }
  | { status: 'completed'; outcome: CompletionEvent };

export interface TimerEngineOptions {
  settings?: Partial<EngineSettings>;
  clock?: Clock;
  notifications?: NotificationScheduler;
  publisher?: SnapshotPublisher;
  checkIn?: CheckInCounter;
  logger?: Logger;
  createRunId?: () => string;
}

const noopNotifications: NotificationScheduler = {
  scheduleCompletion: () => {},
  cancel: () => {},
};

const noopPublisher: SnapshotPublisher = {
  publish: () => {},
};

/**
 * Owns the single block timing session: splits its time into typed segments,
 * keeps the visual fill on course for the slot boundary and drives the tick
 * and snapshot cadence. Illegal calls are logged and ignored.
 */
export class TimerEngine {
  private state: EngineState = { status: 'idle' };
  private breakNotificationVisible = false;
  private tickHandle: ReturnType<typeof setInterval> | null = null;
  private snapshotHandle: ReturnType<typeof setInterval> | null = null;
  private expiryHandle: ReturnType<typeof setTimeout> | null = null;

  private readonly events = new EventEmitter();
  private readonly settings: EngineSettings;
  private readonly clock: Clock;
  private readonly notifications: NotificationScheduler;
  private readonly publisher: SnapshotPublisher;
  private readonly checkIn: CheckInCounter;
  private readonly logger: Logger;
  private readonly createRunId: () => string;
  private readonly invariants: InvariantPolicy;

  constructor(options: TimerEngineOptions = {}) {
    this.settings = { ...DEFAULT_ENGINE_SETTINGS, ...options.settings };
    this.clock = options.clock ?? systemClock;
    this.notifications = options.notifications ?? noopNotifications;
    this.publisher = options.publisher ?? noopPublisher;
    this.checkIn = options.checkIn ?? new CheckInCounter(this.settings.checkInThreshold);
    this.logger = options.logger ?? createLogger('timer', this.settings.logLevel);
    this.createRunId = options.createRunId ?? randomUUID;
    this.invariants = { strict: this.settings.strictInvariants, logger: this.logger };
  }

  // ---------------------------------------------------------------------------
  // Subscriptions
  // ---------------------------------------------------------------------------

  /** Listen for an engine event. Returns an unsubscribe function. */
  on<E extends keyof TimerEvents>(event: E, listener: TimerEvents[E]): () => void {
    this.events.on(event, listener);
    return () => {
      this.events.off(event, listener);
    };
  }

  /** Receive a fresh {@link TimerView} after every change. */
  subscribe(listener: (view: TimerView) => void): () => void {
    return this.on('stateChange', listener);
  }

  private emit<E extends keyof TimerEvents>(event: E, ...args: Parameters<TimerEvents[E]>): void {
    this.events.emit(event, ...args);
  }

  private emitState(): void {
    this.emit('stateChange', this.getState());
  }

  // ---------------------------------------------------------------------------
  // Session lifecycle
  // ---------------------------------------------------------------------------

  /** Start a session on the slot containing "now". Counts as an explicit user action. */
  start(request: StartRequest): boolean {
    const started = this.beginSession(request);
    if (started) {
      if (request.paused && this.state.status === 'running') {
        this.freeze(this.state.session, this.clock.now());
      }
      this.checkIn.recordExplicitAction();
      this.emitState();
    }
    return started;
  }

  /** Recompute the countdown. Fires the break reminder and natural completion when due. */
  tick(): void {
    if (this.state.status !== 'running') return;
    const session = this.state.session;
    const now = this.clock.now();

    session.timeLeft = this.timeLeftAt(session, now);
    this.checkAccounting(session);
    this.emit('tick', session.timeLeft, this.progressPercent(session));

    if (session.mode.kind === 'break' && session.mode.breakNotifyAt !== null && now >= session.mode.breakNotifyAt) {
      this.fireBreakNotification(session);
    }

    if (session.timeLeft <= 0) {
      this.complete();
      return;
    }
    this.emitState();
  }

  /**
   * Natural completion: the slot boundary was reached while running. Credits
   * the full session duration and forces the fill to exactly 1.
   */
  complete(): boolean {
    if (this.state.status !== 'running') {
      this.logger.warn(`complete ignored: engine is ${this.state.status}`);
      return false;
    }
    const session = this.state.session;
    if (this.timeLeftAt(session, this.clock.now()) > 0) {
      this.logger.warn(`complete ignored: block ${session.blockIndex} has not reached its boundary`);
      return false;
    }

    this.stopCadence();
    session.timeLeft = 0;
    const used = this.secondsUsed(session);
    this.emitBoundary(session.ledger.finalize(used));

    const outcome = this.buildOutcome(session, {
      secondsUsed: session.initialDurationSeconds,
      visualFill: COMPLETE_FILL,
      natural: true,
      completedAt: session.endAt,
    });
    this.breakNotificationVisible = false;
    this.state = { status: 'completed', outcome };

    this.logger.info(
      `Block ${outcome.blockIndex} complete (${outcome.isBreak ? 'break' : 'work'}), ` +
        `${outcome.segments.length} segments`,
    );
    this.emit('complete', outcome);
    this.emitState();
    return true;
  }

  /**
   * Manual stop from running or paused. Reports the actual partial usage and
   * fill when `markComplete` is set, then returns to idle.
   */
  stop(markComplete = false): boolean {
    if (this.state.status !== 'running' && this.state.status !== 'paused') {
      this.logger.warn(`stop ignored: engine is ${this.state.status}`);
      return false;
    }
    const session = this.state.session;
    const now = this.clock.now();
    let used: number;
    if (this.state.status === 'running') {
      session.timeLeft = this.timeLeftAt(session, now);
      used = this.secondsUsed(session);
    } else {
      used = this.state.pausedSecondsUsed;
    }

    this.stopCadence();
    this.clearExpiry();

    const visualFill = this.visualFillAt(session, used);
    this.emitBoundary(session.ledger.finalize(used));
    const outcome = this.buildOutcome(session, {
      secondsUsed: used,
      visualFill,
      natural: false,
      completedAt: now,
    });

    this.cancelNotification(session.blockIndex);
    this.breakNotificationVisible = false;
    this.state = { status: 'idle' };
    this.checkIn.recordExplicitAction();

    this.logger.info(`Timer stopped on block ${outcome.blockIndex} after ${used}s`);
    if (markComplete) {
      this.emit('complete', outcome);
    }
    this.emitState();
    return true;
  }

  /** Leave the completed or paused-expiry state. */
  dismiss(): boolean {
    if (this.state.status !== 'completed' && this.state.status !== 'paused-expiry') {
      this.logger.warn(`dismiss ignored: engine is ${this.state.status}`);
      return false;
    }
    this.state = { status: 'idle' };
    this.checkIn.recordExplicitAction();
    this.emitState();
    return true;
  }

  /**
   * Move on to the slot containing "now" after a session ended. Automatic
   * continuations are refused once the check-in threshold is reached.
   */
  continueToNextBlock(request: ContinueRequest, trigger: ContinueTrigger): boolean {
    const status = this.state.status;
    if (status !== 'completed' && status !== 'paused-expiry') {
      this.logger.warn(`continue ignored: engine is ${status}`);
      return false;
    }
    if (status === 'paused-expiry' && trigger === 'auto') {
      this.logger.warn('continue ignored: a paused block expired and needs a decision');
      return false;
    }

    if (trigger === 'auto') {
      if (!this.checkIn.tryAutoContinue()) {
        const count = this.checkIn.consecutiveAutoContinuations;
        this.logger.info(`Check-in required after ${count} automatic continuations`);
        this.emit('checkInRequired', count);
        this.emitState();
        return false;
      }
    } else {
      this.checkIn.recordExplicitAction();
    }

    const slot = slotForInstant(this.clock.now(), this.settings.dayStartHour);
    this.state = { status: 'idle' };
    const started = this.beginSession({ ...request, blockIndex: slot.index, date: slot.date });
    this.emitState();
    return started;
  }

  /** The user answered the check-in prompt. */
  acknowledgeCheckIn(): void {
    this.checkIn.recordExplicitAction();
    this.emitState();
  }

  // ---------------------------------------------------------------------------
  // Mode and context
  // ---------------------------------------------------------------------------

  /** Switch between work and break. The work context survives the break. */
  switchMode(newMode: SegmentKind): boolean {
    if (this.state.status !== 'running') {
      this.logger.warn(`switch to ${newMode} ignored: engine is ${this.state.status}`);
      return false;
    }
    const session = this.state.session;
    if (session.mode.kind === newMode) return false;

    const now = this.clock.now();
    session.timeLeft = this.timeLeftAt(session, now);
    const closed = session.ledger.splitAt(this.secondsUsed(session), newMode);

    session.mode =
      newMode === 'break'
        ? { kind: 'break', breakNotifyAt: addSeconds(now, this.breakNotifySeconds()) }
        : { kind: 'work' };
    this.breakNotificationVisible = false;
    this.checkIn.recordExplicitAction();

    this.emitBoundary(closed);
    this.scheduleNotification(session);
    this.saveSnapshot();
    this.logger.info(`Switched to ${newMode} on block ${session.blockIndex}`);
    this.emitState();
    return true;
  }

  /**
   * Change the work category or label. On work time this may open a new
   * segment; on a break it only changes what work resumes with.
   */
  updateCategory(category: string | null, label: string | null): boolean {
    if (this.state.status !== 'running' && this.state.status !== 'paused') {
      this.logger.warn(`category update ignored: engine is ${this.state.status}`);
      return false;
    }
    const session = this.state.session;
    let used: number;
    if (this.state.status === 'running') {
      session.timeLeft = this.timeLeftAt(session, this.clock.now());
      used = this.secondsUsed(session);
    } else {
      used = this.state.pausedSecondsUsed;
    }

    this.emitBoundary(session.ledger.relabel(used, { category, label }));
    this.emitState();
    return true;
  }

  // ---------------------------------------------------------------------------
  // Pause and resume
  // ---------------------------------------------------------------------------

  /** Freeze the session. The slot boundary keeps approaching while paused. */
  pause(): boolean {
    if (this.state.status !== 'running') {
      this.logger.warn(`pause ignored: engine is ${this.state.status}`);
      return false;
    }
    const session = this.state.session;
    const now = this.clock.now();
    session.timeLeft = this.timeLeftAt(session, now);
    if (session.timeLeft <= 0) {
      this.complete();
      return false;
    }

    this.freeze(session, now);
    this.checkIn.recordExplicitAction();
    this.emitState();
    return true;
  }

  private freeze(session: TimerSession, now: Date): void {
    const used = this.secondsUsed(session);
    this.emitBoundary(session.ledger.splitAt(used, session.ledger.currentKind));
    this.stopCadence();
    this.cancelNotification(session.blockIndex);

    this.clearExpiry();
    this.expiryHandle = setTimeout(
      () => this.handlePausedExpiry(),
      session.endAt.getTime() - now.getTime(),
    );

    this.state = { status: 'paused', session, pausedSecondsUsed: used };
    this.saveSnapshot();
    this.logger.info(`Paused block ${session.blockIndex} at ${used}s used`);
  }

  /**
   * Continue a paused session. If the slot ended meanwhile the session goes to
   * paused-expiry instead; paused wall-clock time is never credited.
   */
  resume(): boolean {
    if (this.state.status !== 'paused') {
      this.logger.warn(`resume ignored: engine is ${this.state.status}`);
      return false;
    }
    const { session, pausedSecondsUsed } = this.state;
    const now = this.clock.now();
    if (now >= session.endAt) {
      this.handlePausedExpiry();
      return false;
    }
    this.clearExpiry();

    const remainingReal = (session.endAt.getTime() - now.getTime()) / 1000;
    session.fill = resumeFill(session.fill, session.ledger.liveView(pausedSecondsUsed), remainingReal);
    session.previousSegments.push(...session.ledger.drain());
    session.carriedSeconds = pausedSecondsUsed;
    session.runInitialSeconds = Math.min(
      Math.ceil(remainingReal),
      session.initialDurationSeconds - pausedSecondsUsed,
    );
    session.timeLeft = session.runInitialSeconds;

    this.state = { status: 'running', session };
    this.checkIn.recordExplicitAction();
    this.startCadence();
    this.scheduleNotification(session);
    this.logger.info(`Resumed block ${session.blockIndex} with ${session.timeLeft}s left`);
    this.emitState();
    return true;
  }

  /** The slot boundary passed while paused. */
  private handlePausedExpiry(): void {
    if (this.state.status !== 'paused') return;
    this.clearExpiry();
    const { session, pausedSecondsUsed } = this.state;

    const visualFill = this.visualFillAt(session, pausedSecondsUsed);
    this.emitBoundary(session.ledger.finalize(pausedSecondsUsed));
    const outcome = this.buildOutcome(session, {
      secondsUsed: pausedSecondsUsed,
      visualFill,
      natural: false,
      completedAt: session.endAt,
    });
    this.breakNotificationVisible = false;
    this.state = { status: 'paused-expiry', outcome };

    this.logger.info(`Block ${outcome.blockIndex} ended while paused`);
    this.emit('pausedExpiry', outcome);
    this.emitState();
  }

  // ---------------------------------------------------------------------------
  // Break reminder
  // ---------------------------------------------------------------------------

  /** Hide the break reminder and show it again after `seconds`. */
  snoozeBreakNotification(seconds = 300): boolean {
    if (this.state.status !== 'running' && this.state.status !== 'paused') return false;
    const session = this.state.session;
    if (session.mode.kind !== 'break') return false;
    session.mode = { kind: 'break', breakNotifyAt: addSeconds(this.clock.now(), seconds) };
    this.breakNotificationVisible = false;
    this.emitState();
    return true;
  }

  /** Hide the break reminder. The timer keeps running. */
  dismissBreakNotification(): void {
    if (!this.breakNotificationVisible) return;
    this.breakNotificationVisible = false;
    this.emitState();
  }

  private fireBreakNotification(session: TimerSession): void {
    if (session.mode.kind !== 'break' || this.breakNotificationVisible) return;
    session.mode = { kind: 'break', breakNotifyAt: null };
    this.breakNotificationVisible = true;
    this.emit('breakNotify');
  }

  // ---------------------------------------------------------------------------
  // Background
  // ---------------------------------------------------------------------------

  /** Persist the session right away before the host goes to sleep. */
  saveStateForBackground(): void {
    if (this.state.status === 'running' || this.state.status === 'paused') {
      this.saveSnapshot();
    }
  }

  /**
   * Reconcile with the wall clock after an unobserved gap. A boundary that
   * passed while suspended completes the session with full credit.
   */
  restoreFromBackground(): void {
    if (this.state.status === 'paused') {
      if (this.clock.now() >= this.state.session.endAt) {
        this.handlePausedExpiry();
      }
      return;
    }
    if (this.state.status !== 'running') return;

    const session = this.state.session;
    const now = this.clock.now();
    const decision = reconcileDeadlines(
      {
        endAt: session.endAt,
        breakNotifyAt: session.mode.kind === 'break' ? session.mode.breakNotifyAt : null,
      },
      now,
    );

    if (decision.kind === 'expired' || decision.timeLeft <= 0) {
      this.logger.info(`Block ${session.blockIndex} ended while in the background`);
      this.complete();
      return;
    }

    session.timeLeft = decision.timeLeft;
    this.startCadence();
    if (decision.breakNotifyDue) {
      this.fireBreakNotification(session);
    }
    this.emit('tick', session.timeLeft, this.progressPercent(session));
    this.emitState();
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** A copy of the engine state; mutating it has no effect on the engine. */
  getState(): TimerView {
    const checkIn = this.checkIn.getState();
    const state = this.state;

    if (state.status === 'idle' || state.status === 'completed' || state.status === 'paused-expiry') {
      const outcome = state.status === 'idle' ? null : cloneOutcome(state.outcome);
      return {
        status: state.status,
        blockIndex: outcome?.blockIndex ?? null,
        date: outcome?.date ?? null,
        mode: outcome === null ? null : outcome.isBreak ? 'break' : 'work',
        timeLeft: 0,
        initialDurationSeconds: outcome?.initialDurationSeconds ?? 0,
        secondsUsed: outcome?.secondsUsed ?? 0,
        progressPercent: state.status === 'completed' ? 100 : 0,
        visualFill: outcome?.visualFill ?? 0,
        scaleFactor: 0,
        previousVisualProportion: 0,
        previousSegments: outcome?.segments ?? [],
        liveSegments: [],
        currentSegmentStart: 0,
        workContext: outcome?.workContext ?? null,
        startedAt: null,
        endAt: null,
        breakNotificationVisible: false,
        checkIn,
        outcome,
      };
    }

    const session = state.session;
    const used = state.status === 'paused' ? state.pausedSecondsUsed : this.secondsUsed(session);
    const live = session.ledger.liveView(used);
    return {
      status: state.status,
      blockIndex: session.blockIndex,
      date: session.date,
      mode: session.mode.kind,
      timeLeft: session.timeLeft,
      initialDurationSeconds: session.initialDurationSeconds,
      secondsUsed: used,
      progressPercent: percent(used, session.initialDurationSeconds),
      visualFill: fillFor(session.fill, live),
      scaleFactor: session.fill.scaleFactor,
      previousVisualProportion: session.fill.previousVisualProportion,
      previousSegments: session.previousSegments.map((s) => ({ ...s })),
      liveSegments: live,
      currentSegmentStart: session.ledger.currentSegmentStart,
      workContext: session.ledger.workContext,
      startedAt: session.startedAt.toISOString(),
      endAt: session.endAt.toISOString(),
      breakNotificationVisible: this.breakNotificationVisible,
      checkIn,
      outcome: null,
    };
  }

  /** Stop all timers and drop every listener. */
  destroy(): void {
    this.stopCadence();
    this.clearExpiry();
    this.events.removeAllListeners();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private beginSession(request: StartRequest): boolean {
    const { blockIndex, date, mode } = request;
    if (this.state.status === 'running' || this.state.status === 'paused') {
      this.logger.warn(`start ignored: block ${this.state.session.blockIndex} already has a session`);
      return false;
    }
    if (this.state.status === 'paused-expiry') {
      this.logger.warn(`start ignored: block ${this.state.outcome.blockIndex} expired while paused and needs a decision`);
      return false;
    }

    const now = this.clock.now();
    const dayStartHour = this.settings.dayStartHour;
    if (!isCurrentSlot(blockIndex, date, now, dayStartHour)) {
      const current = slotForInstant(now, dayStartHour);
      this.logger.warn(
        `start ignored: block ${blockIndex} on ${date} is not the current block (${current.index} on ${current.date})`,
      );
      return false;
    }

    const { end } = slotBounds(blockIndex, date, dayStartHour);
    const remainingReal = (end.getTime() - now.getTime()) / 1000;
    if (remainingReal <= 0) {
      this.logger.warn(`start ignored: block ${blockIndex} has already passed`);
      return false;
    }

    const existingSegments = (request.existingSegments ?? []).map((s) => ({ ...s }));
    const previous = request.existingVisualFill ?? baselineProportion(existingSegments);
    if (mode === 'work' && previous >= 1) {
      this.logger.warn(`start ignored: block ${blockIndex} is already full`);
      return false;
    }

    const initial = Math.ceil(remainingReal);
    const session: TimerSession = {
      runId: this.createRunId(),
      blockIndex,
      date,
      mode:
        mode === 'break'
          ? {
              kind: 'break',
              breakNotifyAt:
                request.breakNotifyAt === undefined ? addSeconds(now, this.breakNotifySeconds()) : request.breakNotifyAt,
            }
          : { kind: 'work' },
      startedAt: now,
      endAt: end,
      initialDurationSeconds: initial,
      runInitialSeconds: initial,
      carriedSeconds: 0,
      timeLeft: initial,
      fill: beginFill(previous, remainingReal),
      previousSegments: existingSegments,
      ledger: new SegmentLedger(
        mode,
        { category: request.category ?? null, label: request.label ?? null },
        this.invariants,
      ),
    };

    this.breakNotificationVisible = false;
    this.state = { status: 'running', session };
    this.startCadence();
    this.scheduleNotification(session);

    this.logger.info(
      `Timer started for block ${blockIndex} (${mode}): ${initial}s, ` +
        `${existingSegments.length} existing segments, fill ${(session.fill.previousVisualProportion * 100).toFixed(1)}%`,
    );
    return true;
  }

  private breakNotifySeconds(): number {
    return this.settings.breakNotifyMinutes * 60;
  }

  private timeLeftAt(session: TimerSession, now: Date): number {
    return Math.max(0, Math.trunc((session.endAt.getTime() - now.getTime()) / 1000));
  }

  private secondsUsed(session: TimerSession): number {
    return session.carriedSeconds + Math.max(0, session.runInitialSeconds - session.timeLeft);
  }

  private progressPercent(session: TimerSession): number {
    return percent(this.secondsUsed(session), session.initialDurationSeconds);
  }

  private visualFillAt(session: TimerSession, used: number): number {
    return fillFor(session.fill, session.ledger.liveView(used));
  }

  private checkAccounting(session: TimerSession): void {
    const used = this.secondsUsed(session);
    checkInvariant(
      used <= session.initialDurationSeconds,
      `block ${session.blockIndex}: ${used}s used exceeds session length ${session.initialDurationSeconds}s`,
      this.invariants,
    );
    const recorded = session.carriedSeconds + session.ledger.totalSeconds(used);
    checkInvariant(
      recorded === used,
      `block ${session.blockIndex}: segments add up to ${recorded}s but ${used}s were used`,
      this.invariants,
    );
  }

  private buildOutcome(
    session: TimerSession,
    result: { secondsUsed: number; visualFill: number; natural: boolean; completedAt: Date },
  ): CompletionEvent {
    return {
      blockIndex: session.blockIndex,
      date: session.date,
      isBreak: session.mode.kind === 'break',
      secondsUsed: result.secondsUsed,
      initialDurationSeconds: session.initialDurationSeconds,
      segments: [...session.previousSegments.map((s) => ({ ...s })), ...session.ledger.segments],
      visualFill: result.visualFill,
      natural: result.natural,
      completedAt: result.completedAt.toISOString(),
      workContext: session.ledger.workContext,
    };
  }

  private emitBoundary(segment: Segment | null): void {
    if (segment) {
      this.emit('segmentBoundary', segment);
    }
  }

  private saveSnapshot(): RunSnapshot | null {
    if (this.state.status !== 'running' && this.state.status !== 'paused') return null;
    const session = this.state.session;
    const paused = this.state.status === 'paused';
    const used = this.state.status === 'paused' ? this.state.pausedSecondsUsed : this.secondsUsed(session);
    const { ledger } = session;
    const segments = ledger.liveView(used);
    const context = ledger.workContext;
    const isWork = ledger.currentKind === 'work';

    const snapshot: RunSnapshot = {
      runId: session.runId,
      blockIndex: session.blockIndex,
      date: session.date,
      startedAt: session.startedAt.toISOString(),
      endAt: session.endAt.toISOString(),
      initialDurationSeconds: session.initialDurationSeconds,
      secondsUsed: used,
      segments,
      previousSegments: session.previousSegments.map((s) => ({ ...s })),
      currentSegmentStart: ledger.currentSegmentStart,
      currentMode: ledger.currentKind,
      currentCategory: isWork ? context.category : null,
      currentLabel: isWork ? context.label : null,
      lastWorkCategory: context.category,
      lastWorkLabel: context.label,
      breakNotifyAt:
        session.mode.kind === 'break' && session.mode.breakNotifyAt !== null
          ? session.mode.breakNotifyAt.toISOString()
          : null,
      visualFill: fillFor(session.fill, segments),
      paused,
    };

    this.emit('snapshot', snapshot);
    this.fireAndForget('snapshot publish', () => this.publisher.publish(snapshot));
    return snapshot;
  }

  private startCadence(): void {
    this.stopCadence();
    this.tickHandle = setInterval(() => this.tick(), this.settings.tickIntervalMs);
    this.snapshotHandle = setInterval(() => {
      this.saveSnapshot();
    }, this.settings.snapshotIntervalSeconds * 1000);
  }

  private stopCadence(): void {
    if (this.tickHandle !== null) {
      clearInterval(this.tickHandle);
      this.tickHandle = null;
    }
    if (this.snapshotHandle !== null) {
      clearInterval(this.snapshotHandle);
      this.snapshotHandle = null;
    }
  }

  private clearExpiry(): void {
    if (this.expiryHandle !== null) {
      clearTimeout(this.expiryHandle);
      this.expiryHandle = null;
    }
  }

  private scheduleNotification(session: TimerSession): void {
    const isBreak = session.mode.kind === 'break';
    this.fireAndForget('completion notification', () =>
      this.notifications.scheduleCompletion(session.endAt, session.blockIndex, isBreak),
    );
  }

  private cancelNotification(blockIndex: number): void {
    this.fireAndForget('notification cancel', () => this.notifications.cancel(blockIndex));
  }

  /** Collaborator calls are never awaited; their failures are logged, never rolled back. */
  private fireAndForget(what: string, call: () => void | Promise<void>): void {
    try {
      const result: unknown = call();
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          this.logger.error(`${what} failed:`, err);
        });
      }
    } catch (err) {
      this.logger.error(`${what} failed:`, err);
    }
  }
}

function percent(used: number, total: number): number {
  return total > 0 ? (used / total) * 100 : 0;
}

function cloneOutcome(outcome: CompletionEvent): CompletionEvent {
  return {
    ...outcome,
    segments: outcome.segments.map((s) => ({ ...s })),
    workContext: { ...outcome.workContext },
  };
}
