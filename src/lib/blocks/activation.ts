import { isBeforeDayStart } from '@/lib/block-calendar';
import { hasUsage } from './types';
import type { Block, BlockStatus } from './types';

/** New mute flag and status for one stored block. */
export interface ActivationChange {
  blockIndex: number;
  isMuted: boolean;
  status: BlockStatus;
}

/**
 * Decide what changes when a session starts on a block. A muted block is
 * unmuted. Starting in the night tail before the day start also settles the
 * other muted night blocks: earlier ones close out (done with usage, skipped
 * without) and later ones are unmuted.
 */
export function planActivation(
  blocks: readonly Block[],
  blockIndex: number,
  dayStartHour: number,
): ActivationChange[] {
  const target = blocks.find((b) => b.blockIndex === blockIndex);
  if (!target) return [];

  const changes: ActivationChange[] = [];
  if (target.isMuted) {
    changes.push({ blockIndex, isMuted: false, status: target.status });
  }
  if (!isBeforeDayStart(blockIndex, dayStartHour)) return changes;

  for (const block of blocks) {
    if (block.blockIndex === blockIndex || !block.isMuted) continue;
    if (!isBeforeDayStart(block.blockIndex, dayStartHour)) continue;
    if (block.status === 'done' || block.status === 'skipped') continue;

    if (block.blockIndex > blockIndex) {
      changes.push({ blockIndex: block.blockIndex, isMuted: false, status: block.status });
    } else if (hasUsage(block)) {
      changes.push({ blockIndex: block.blockIndex, isMuted: false, status: 'done' });
    } else {
      changes.push({ blockIndex: block.blockIndex, isMuted: true, status: 'skipped' });
    }
  }

  return changes.sort((a, b) => a.blockIndex - b.blockIndex);
}
