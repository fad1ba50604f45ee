export type { Segment, SegmentKind, WorkContext } from './types';
export { SegmentLedger, MIN_SEGMENT_SECONDS, sumSeconds } from './ledger';
