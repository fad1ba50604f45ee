import { checkInvariant } from '@/lib/invariants';
import type { InvariantPolicy } from '@/lib/invariants';
import type { Segment, SegmentKind, WorkContext } from './types';

/** Label-only edits shorter than this fold into the open segment instead of splitting it. */
export const MIN_SEGMENT_SECONDS = 10;

/** Sum of segment durations. */
export function sumSeconds(segments: readonly Segment[]): number {
  return segments.reduce((total, segment) => total + segment.seconds, 0);
}

/**
 * Append-only record of the segments of one session run, plus the open
 * segment that is still accumulating time. All `elapsed` arguments are
 * session seconds.
 */
export class SegmentLedger {
  private finalized: Segment[] = [];
  private openKind: SegmentKind;
  private openStart: number;
  private context: WorkContext;

  constructor(
    kind: SegmentKind,
    context: WorkContext,
    private readonly policy: InvariantPolicy,
    openStart = 0,
  ) {
    this.openKind = kind;
    this.context = { ...context };
    this.openStart = openStart;
  }

  get currentKind(): SegmentKind {
    return this.openKind;
  }

  get currentSegmentStart(): number {
    return this.openStart;
  }

  /** The work context applied to work segments (kept while on a break). */
  get workContext(): WorkContext {
    return { ...this.context };
  }

  /** Finalized segments, oldest first. */
  get segments(): Segment[] {
    return this.finalized.map((s) => ({ ...s }));
  }

  /** Add a finalized segment. */
  append(
    kind: SegmentKind,
    seconds: number,
    category: string | null,
    label: string | null,
    startOffset: number,
  ): Segment {
    checkInvariant(
      Number.isInteger(seconds) && seconds >= 0,
      `segment duration must be a non-negative integer, got ${seconds}`,
      this.policy,
    );
    const segment: Segment = { kind, seconds, category, label, startOffset };
    this.finalized.push(segment);
    return { ...segment };
  }

  /**
   * Close the open segment at `elapsed` (if it has any length) and open a new
   * one of `newKind`. Returns the closed segment, if one was recorded.
   */
  splitAt(elapsed: number, newKind: SegmentKind, context?: WorkContext): Segment | null {
    const closed = this.closeOpen(elapsed);
    this.openKind = newKind;
    this.openStart = elapsed;
    if (context) this.context = { ...context };
    return closed;
  }

  /**
   * Change the work context. On a work segment this records a boundary when
   * the category changed, or when only the label changed and the open segment
   * has run for at least {@link MIN_SEGMENT_SECONDS}. Otherwise the open
   * segment simply takes the new context.
   */
  relabel(elapsed: number, next: WorkContext): Segment | null {
    const categoryChanged = next.category !== this.context.category;
    const labelChanged = next.label !== this.context.label;
    if (!categoryChanged && !labelChanged) return null;

    let closed: Segment | null = null;
    if (this.openKind === 'work') {
      const duration = elapsed - this.openStart;
      const labelOnly = labelChanged && !categoryChanged;
      if (duration > 0 && (!labelOnly || duration >= MIN_SEGMENT_SECONDS)) {
        closed = this.closeOpen(elapsed);
        this.openStart = elapsed;
      }
    }

    this.context = { ...next };
    return closed;
  }

  /** Close the open segment for good; later views add no tail. */
  finalize(elapsed: number): Segment | null {
    const closed = this.closeOpen(elapsed);
    this.openStart = elapsed;
    return closed;
  }

  /** Finalized segments plus a synthesized tail for the open segment. Does not mutate. */
  liveView(elapsed: number): Segment[] {
    const view = this.segments;
    const duration = this.openDuration(elapsed);
    if (duration > 0) {
      view.push(this.openSegment(duration));
    }
    return view;
  }

  totalSeconds(elapsed: number): number {
    return sumSeconds(this.liveView(elapsed));
  }

  /** Hand over the finalized segments and start an empty record. The open segment stays open. */
  drain(): Segment[] {
    const drained = this.finalized;
    this.finalized = [];
    return drained;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private openDuration(elapsed: number): number {
    const duration = elapsed - this.openStart;
    checkInvariant(
      duration >= 0,
      `open segment would have negative duration (elapsed ${elapsed}, started ${this.openStart})`,
      this.policy,
    );
    return duration;
  }

  private openSegment(seconds: number): Segment {
    const isWork = this.openKind === 'work';
    return {
      kind: this.openKind,
      seconds,
      category: isWork ? this.context.category : null,
      label: isWork ? this.context.label : null,
      startOffset: this.openStart,
    };
  }

  private closeOpen(elapsed: number): Segment | null {
    const duration = this.openDuration(elapsed);
    if (duration <= 0) return null;
    const open = this.openSegment(duration);
    return this.append(open.kind, open.seconds, open.category, open.label, open.startOffset);
  }
}
