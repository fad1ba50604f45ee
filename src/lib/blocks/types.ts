import type { Segment } from '@/lib/segments/types';
import type { RunSnapshot } from '@/lib/timer/types';

export type BlockStatus = 'idle' | 'planned' | 'done' | 'skipped';

/** Persisted record of one slot on one logical day. */
export interface Block {
  blockIndex: number;
  date: string;
  category: string | null;
  label: string | null;
  status: BlockStatus;
  /** Muted blocks are left alone by the auto-skip sweep. */
  isMuted: boolean;
  /** Work progress, 0–100. */
  progress: number;
  /** Break progress, 0–100. */
  breakProgress: number;
  usedSeconds: number;
  segments: Segment[];
  /** Latest snapshot of a session writing to this block, cleared on completion. */
  activeRunSnapshot: RunSnapshot | null;
}

/** Storage for blocks, one logical day at a time. */
export interface BlockRepository {
  /** Every stored block of a day. Missing days load as empty. */
  load(date: string): Promise<Block[]>;
  save(block: Block): Promise<void>;
}

export function createEmptyBlock(blockIndex: number, date: string): Block {
  return {
    blockIndex,
    date,
    category: null,
    label: null,
    status: 'idle',
    isMuted: false,
    progress: 0,
    breakProgress: 0,
    usedSeconds: 0,
    segments: [],
    activeRunSnapshot: null,
  };
}

/** Whether a block has seen any recorded time. */
export function hasUsage(block: Block): boolean {
  return block.segments.length > 0 || block.usedSeconds > 0 || block.activeRunSnapshot !== null;
}

// ---------------------------------------------------------------------------
// Guards for stored data
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isSegmentKind(value: unknown): value is Segment['kind'] {
  return value === 'work' || value === 'break';
}

function isBlockStatus(value: unknown): value is BlockStatus {
  return value === 'idle' || value === 'planned' || value === 'done' || value === 'skipped';
}

export function isSegment(value: unknown): value is Segment {
  return (
    isRecord(value) &&
    isSegmentKind(value.kind) &&
    typeof value.seconds === 'number' &&
    isNullableString(value.category) &&
    isNullableString(value.label) &&
    typeof value.startOffset === 'number'
  );
}

function isSegmentList(value: unknown): value is Segment[] {
  return Array.isArray(value) && value.every(isSegment);
}

export function isRunSnapshot(value: unknown): value is RunSnapshot {
  return (
    isRecord(value) &&
    typeof value.runId === 'string' &&
    typeof value.blockIndex === 'number' &&
    typeof value.date === 'string' &&
    typeof value.startedAt === 'string' &&
    typeof value.endAt === 'string' &&
    typeof value.initialDurationSeconds === 'number' &&
    typeof value.secondsUsed === 'number' &&
    isSegmentList(value.segments) &&
    isSegmentList(value.previousSegments) &&
    typeof value.currentSegmentStart === 'number' &&
    isSegmentKind(value.currentMode) &&
    isNullableString(value.currentCategory) &&
    isNullableString(value.currentLabel) &&
    isNullableString(value.lastWorkCategory) &&
    isNullableString(value.lastWorkLabel) &&
    isNullableString(value.breakNotifyAt) &&
    typeof value.visualFill === 'number' &&
    typeof value.paused === 'boolean'
  );
}

export function isBlock(value: unknown): value is Block {
  return (
    isRecord(value) &&
    typeof value.blockIndex === 'number' &&
    typeof value.date === 'string' &&
    isNullableString(value.category) &&
    isNullableString(value.label) &&
    isBlockStatus(value.status) &&
    typeof value.isMuted === 'boolean' &&
    typeof value.progress === 'number' &&
    typeof value.breakProgress === 'number' &&
    typeof value.usedSeconds === 'number' &&
    isSegmentList(value.segments) &&
    (value.activeRunSnapshot === null || isRunSnapshot(value.activeRunSnapshot))
  );
}
