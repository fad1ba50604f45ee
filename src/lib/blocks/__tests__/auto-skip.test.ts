import { describe, it, expect } from 'vitest';
import { planAutoSkip } from '../auto-skip';
import { createEmptyBlock } from '../types';
import type { Block } from '../types';

const DAY = '2026-01-15';

function block(blockIndex: number, overrides: Partial<Block> = {}): Block {
  return { ...createEmptyBlock(blockIndex, DAY), ...overrides };
}

describe('planAutoSkip', () => {
  it('marks unused past blocks skipped and used ones done', () => {
    const blocks = [
      block(24),
      block(25, { usedSeconds: 100 }),
      block(29, { status: 'planned', segments: [{ kind: 'work', seconds: 40, category: null, label: null, startOffset: 0 }] }),
    ];
    expect(planAutoSkip(blocks, 30, null, 8)).toEqual([
      { blockIndex: 24, status: 'skipped' },
      { blockIndex: 25, status: 'done' },
      { blockIndex: 29, status: 'done' },
    ]);
  });

  it('counts a pending run snapshot as usage', () => {
    const snapshotted = block(26, {
      activeRunSnapshot: {
        runId: 'run-1',
        blockIndex: 26,
        date: DAY,
        startedAt: new Date(2026, 0, 15, 8, 40).toISOString(),
        endAt: new Date(2026, 0, 15, 9, 0).toISOString(),
        initialDurationSeconds: 1200,
        secondsUsed: 0,
        segments: [],
        previousSegments: [],
        currentSegmentStart: 0,
        currentMode: 'work',
        currentCategory: null,
        currentLabel: null,
        lastWorkCategory: null,
        lastWorkLabel: null,
        breakNotifyAt: null,
        visualFill: 0,
        paused: true,
      },
    });
    expect(planAutoSkip([snapshotted], 30, null, 8)).toEqual([{ blockIndex: 26, status: 'done' }]);
  });

  it('leaves closed, muted, current and future blocks alone', () => {
    const blocks = [
      block(26, { isMuted: true }),
      block(27, { status: 'done' }),
      block(28, { status: 'skipped' }),
      block(30),
      block(31),
    ];
    expect(planAutoSkip(blocks, 30, null, 8)).toEqual([]);
  });

  it('never touches the block a session is writing to', () => {
    expect(planAutoSkip([block(28), block(29)], 30, 29, 8)).toEqual([{ blockIndex: 28, status: 'skipped' }]);
  });

  it('orders by the logical day, not by index', () => {
    // 02:00, in the night tail of the logical day
    const blocks = [block(2), block(40), block(71)];
    expect(planAutoSkip(blocks, 6, null, 8)).toEqual([
      { blockIndex: 40, status: 'skipped' },
      { blockIndex: 71, status: 'skipped' },
    ]);
  });
});
