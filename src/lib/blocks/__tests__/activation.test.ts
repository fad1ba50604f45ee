import { describe, it, expect } from 'vitest';
import { planActivation } from '../activation';
import { createEmptyBlock } from '../types';
import type { Block } from '../types';

const DAY = '2026-01-15';

function block(blockIndex: number, overrides: Partial<Block> = {}): Block {
  return { ...createEmptyBlock(blockIndex, DAY), ...overrides };
}

describe('planActivation', () => {
  it('unmutes a muted daytime block and nothing else', () => {
    const blocks = [block(29, { isMuted: true }), block(30, { isMuted: true, status: 'planned' })];
    expect(planActivation(blocks, 30, 8)).toEqual([{ blockIndex: 30, isMuted: false, status: 'planned' }]);
  });

  it('changes nothing for an unmuted daytime block', () => {
    expect(planActivation([block(30)], 30, 8)).toEqual([]);
  });

  it('changes nothing when the block is not stored', () => {
    expect(planActivation([block(3, { isMuted: true })], 6, 8)).toEqual([]);
  });

  it('settles the other muted night blocks when a night block starts', () => {
    const blocks = [
      block(3, { isMuted: true }),
      block(4, { isMuted: true, usedSeconds: 100 }),
      block(5, { isMuted: true, status: 'skipped' }),
      block(6, { isMuted: true }),
      block(7),
      block(9, { isMuted: true, status: 'planned' }),
      block(30, { isMuted: true }),
    ];
    expect(planActivation(blocks, 6, 8)).toEqual([
      { blockIndex: 3, isMuted: true, status: 'skipped' },
      { blockIndex: 4, isMuted: false, status: 'done' },
      { blockIndex: 6, isMuted: false, status: 'idle' },
      { blockIndex: 9, isMuted: false, status: 'planned' },
    ]);
  });

  it('treats slots before a later day start as night blocks', () => {
    const blocks = [block(25, { isMuted: true }), block(26), block(28, { isMuted: true })];
    expect(planActivation(blocks, 26, 10)).toEqual([
      { blockIndex: 25, isMuted: true, status: 'skipped' },
      { blockIndex: 28, isMuted: false, status: 'idle' },
    ]);
  });
});
