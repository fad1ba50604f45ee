import { describe, it, expect, vi } from 'vitest';
import { InvariantError } from '@/lib/invariants';
import type { InvariantPolicy } from '@/lib/invariants';
import { silentLogger } from '@/lib/log';
import { MIN_SEGMENT_SECONDS, SegmentLedger, sumSeconds } from '../ledger';

const strict: InvariantPolicy = { strict: true, logger: silentLogger };

function workLedger(category: string | null = 'Writing', label: string | null = null): SegmentLedger {
  return new SegmentLedger('work', { category, label }, strict);
}

// ---------------------------------------------------------------------------
// Splitting
// ---------------------------------------------------------------------------

describe('splitAt', () => {
  it('closes the open segment and opens the new kind', () => {
    const ledger = workLedger();
    const closed = ledger.splitAt(600, 'break');

    expect(closed).toEqual({ kind: 'work', seconds: 600, category: 'Writing', label: null, startOffset: 0 });
    expect(ledger.currentKind).toBe('break');
    expect(ledger.currentSegmentStart).toBe(600);
  });

  it('records nothing for a zero-length segment', () => {
    const ledger = workLedger();
    expect(ledger.splitAt(0, 'break')).toBeNull();
    expect(ledger.segments).toEqual([]);
  });

  it('gives break segments no category or label', () => {
    const ledger = workLedger('Writing', 'Draft');
    ledger.splitAt(100, 'break');
    const closed = ledger.splitAt(160, 'work');

    expect(closed).toEqual({ kind: 'break', seconds: 60, category: null, label: null, startOffset: 100 });
  });

  it('restores the work context after a break', () => {
    const ledger = workLedger('Writing', 'Draft');
    ledger.splitAt(100, 'break');
    ledger.splitAt(160, 'work');

    expect(ledger.liveView(200).at(-1)).toEqual({
      kind: 'work',
      seconds: 40,
      category: 'Writing',
      label: 'Draft',
      startOffset: 160,
    });
  });

  it('throws when time runs backwards', () => {
    const ledger = workLedger();
    ledger.splitAt(100, 'break');
    expect(() => ledger.splitAt(50, 'work')).toThrow(InvariantError);
  });

  it('logs instead of throwing when not strict', () => {
    const logger = { ...silentLogger, error: vi.fn() };
    const ledger = new SegmentLedger('work', { category: null, label: null }, { strict: false, logger });
    ledger.splitAt(100, 'break');
    ledger.liveView(50);

    expect(logger.error).toHaveBeenCalledWith(
      'Invariant violated: open segment would have negative duration (elapsed 50, started 100)',
    );
  });
});

// ---------------------------------------------------------------------------
// Relabelling
// ---------------------------------------------------------------------------

describe('relabel', () => {
  it('splits on a category change however short', () => {
    const ledger = workLedger('Writing');
    const closed = ledger.relabel(3, { category: 'Email', label: null });

    expect(closed?.seconds).toBe(3);
    expect(closed?.category).toBe('Writing');
    expect(ledger.workContext).toEqual({ category: 'Email', label: null });
  });

  it(`folds a label-only change under ${MIN_SEGMENT_SECONDS} seconds into the open segment`, () => {
    const ledger = workLedger('Writing', 'Draft');
    expect(ledger.relabel(9, { category: 'Writing', label: 'Outline' })).toBeNull();
    expect(ledger.segments).toEqual([]);
    expect(ledger.liveView(9)).toEqual([
      { kind: 'work', seconds: 9, category: 'Writing', label: 'Outline', startOffset: 0 },
    ]);
  });

  it(`splits a label-only change at ${MIN_SEGMENT_SECONDS} seconds or more`, () => {
    const ledger = workLedger('Writing', 'Draft');
    const closed = ledger.relabel(10, { category: 'Writing', label: 'Outline' });

    expect(closed).toEqual({ kind: 'work', seconds: 10, category: 'Writing', label: 'Draft', startOffset: 0 });
    expect(ledger.currentSegmentStart).toBe(10);
  });

  it('does nothing when the context is unchanged', () => {
    const ledger = workLedger('Writing', 'Draft');
    expect(ledger.relabel(500, { category: 'Writing', label: 'Draft' })).toBeNull();
    expect(ledger.currentSegmentStart).toBe(0);
  });

  it('only updates the context to restore while on a break', () => {
    const ledger = workLedger('Writing');
    ledger.splitAt(100, 'break');
    expect(ledger.relabel(400, { category: 'Email', label: null })).toBeNull();

    ledger.splitAt(400, 'work');
    expect(ledger.liveView(450).at(-1)?.category).toBe('Email');
  });
});

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

describe('liveView', () => {
  it('adds the open tail without mutating', () => {
    const ledger = workLedger();
    ledger.splitAt(300, 'break');

    expect(ledger.liveView(420)).toHaveLength(2);
    expect(ledger.segments).toHaveLength(1);
    expect(ledger.totalSeconds(420)).toBe(420);
  });

  it('adds no tail after finalize', () => {
    const ledger = workLedger();
    ledger.finalize(1200);
    expect(ledger.liveView(1200)).toEqual([
      { kind: 'work', seconds: 1200, category: 'Writing', label: null, startOffset: 0 },
    ]);
  });
});

describe('drain', () => {
  it('hands over finalized segments and keeps the open one', () => {
    const ledger = workLedger();
    ledger.splitAt(300, 'work');
    const drained = ledger.drain();

    expect(sumSeconds(drained)).toBe(300);
    expect(ledger.segments).toEqual([]);
    expect(ledger.liveView(350)).toEqual([
      { kind: 'work', seconds: 50, category: 'Writing', label: null, startOffset: 300 },
    ]);
  });
});

describe('append', () => {
  it('rejects a fractional duration', () => {
    expect(() => workLedger().append('work', 1.5, null, null, 0)).toThrow(InvariantError);
  });
});
