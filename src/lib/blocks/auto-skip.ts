import { displayNumber, isBeforeDayStart } from '@/lib/block-calendar';
import { hasUsage } from './types';
import type { Block, BlockStatus } from './types';

export interface AutoSkipChange {
  blockIndex: number;
  status: Extract<BlockStatus, 'done' | 'skipped'>;
}

/**
 * Decide which past blocks of the day to close out. Blocks that saw real use
 * become done, the rest skipped. Muted blocks, blocks already closed, the
 * night tail before the day start and the block a session is writing to are
 * never touched.
 */
export function planAutoSkip(
  blocks: readonly Block[],
  currentIndex: number,
  activeBlockIndex: number | null,
  dayStartHour: number,
): AutoSkipChange[] {
  const currentOrder = displayNumber(currentIndex, dayStartHour);
  const changes: AutoSkipChange[] = [];

  for (const block of blocks) {
    if (displayNumber(block.blockIndex, dayStartHour) >= currentOrder) continue;
    if (block.status === 'done' || block.status === 'skipped') continue;
    if (block.isMuted) continue;
    if (isBeforeDayStart(block.blockIndex, dayStartHour)) continue;
    if (block.blockIndex === activeBlockIndex) continue;

    changes.push({ blockIndex: block.blockIndex, status: hasUsage(block) ? 'done' : 'skipped' });
  }

  return changes.sort((a, b) => displayNumber(a.blockIndex, dayStartHour) - displayNumber(b.blockIndex, dayStartHour));
}
