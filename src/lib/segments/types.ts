/** Whether a stretch of time counted as work or as a break. */
export type SegmentKind = 'work' | 'break';

/**
 * A contiguous, typed stretch of a session. `startOffset` is the number of
 * session seconds elapsed when the segment began. Break segments carry no
 * category or label.
 */
export interface Segment {
  kind: SegmentKind;
  seconds: number;
  category: string | null;
  label: string | null;
  startOffset: number;
}

/** Category and label stamped onto work segments. */
export interface WorkContext {
  category: string | null;
  label: string | null;
}
