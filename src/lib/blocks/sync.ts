import { SLOT_SECONDS, slotForInstant } from '@/lib/block-calendar';
import { silentLogger } from '@/lib/log';
import type { Logger } from '@/lib/log';
import type { Segment } from '@/lib/segments/types';
import { DEFAULT_ENGINE_SETTINGS } from '@/lib/settings';
import type { TimerEngine } from '@/lib/timer/engine';
import type { CompletionEvent, RunSnapshot } from '@/lib/timer/types';
import { planActivation } from './activation';
import { planAutoSkip } from './auto-skip';
import type { AutoSkipChange } from './auto-skip';
import { createEmptyBlock } from './types';
import type { Block, BlockRepository } from './types';

/** A session within this many seconds of its full length counts as done. */
const DONE_TOLERANCE_SECONDS = 5;
const DONE_PROGRESS_PERCENT = 95;

export interface BlockSyncOptions {
  logger?: Logger;
  dayStartHour?: number;
}

function progressOf(segments: readonly Segment[], kind: Segment['kind']): number {
  const seconds = segments.filter((s) => s.kind === kind).reduce((sum, s) => sum + s.seconds, 0);
  return Math.min(100, (seconds / SLOT_SECONDS) * 100);
}

function usedSecondsOf(segments: readonly Segment[]): number {
  return segments.reduce((sum, s) => sum + s.seconds, 0);
}

/**
 * Writes engine results into stored blocks. Writes run one at a time in event
 * order; a failed write is logged and the queue moves on.
 */
export class BlockSync {
  private readonly logger: Logger;
  private readonly dayStartHour: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly engine: TimerEngine,
    private readonly repository: BlockRepository,
    options: BlockSyncOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.dayStartHour = options.dayStartHour ?? DEFAULT_ENGINE_SETTINGS.dayStartHour;
  }

  /** Subscribe to the engine. Returns a function that unsubscribes. */
  attach(): () => void {
    const unsubscribers = [
      this.engine.on('complete', (completion) => this.enqueue('completion', () => this.recordCompletion(completion))),
      this.engine.on('pausedExpiry', (completion) =>
        this.enqueue('completion', () => this.recordCompletion(completion)),
      ),
      this.engine.on('snapshot', (snapshot) => this.enqueue('snapshot', () => this.recordSnapshot(snapshot))),
    ];
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  /** Resolves once every queued write has settled. */
  flush(): Promise<void> {
    return this.queue;
  }

  async recordCompletion(completion: CompletionEvent): Promise<Block> {
    const block = await this.loadBlock(completion.blockIndex, completion.date);
    const progress = progressOf(completion.segments, 'work');
    const done =
      completion.natural ||
      completion.initialDurationSeconds - completion.secondsUsed <= DONE_TOLERANCE_SECONDS ||
      progress >= DONE_PROGRESS_PERCENT;

    const updated: Block = {
      ...block,
      category: completion.workContext.category ?? block.category,
      label: completion.workContext.label ?? block.label,
      status: done ? 'done' : block.status,
      progress,
      breakProgress: progressOf(completion.segments, 'break'),
      usedSeconds: usedSecondsOf(completion.segments),
      segments: completion.segments.map((s) => ({ ...s })),
      activeRunSnapshot: null,
    };
    await this.repository.save(updated);
    this.logger.debug(`Block ${updated.blockIndex} saved as ${updated.status}`);
    return updated;
  }

  async recordSnapshot(snapshot: RunSnapshot): Promise<Block> {
    const block = await this.loadBlock(snapshot.blockIndex, snapshot.date);
    const segments = [...snapshot.previousSegments, ...snapshot.segments];
    const updated: Block = {
      ...block,
      progress: progressOf(segments, 'work'),
      breakProgress: progressOf(segments, 'break'),
      usedSeconds: usedSecondsOf(segments),
      segments,
      activeRunSnapshot: snapshot,
    };
    await this.repository.save(updated);
    return updated;
  }

  /**
   * Close out past blocks of the current logical day. The block the engine is
   * working on is left alone whatever its state. Runs in the write queue.
   */
  sweepPastBlocks(now: Date): Promise<AutoSkipChange[]> {
    return this.serialize(() => this.applyAutoSkip(now));
  }

  /**
   * Make a block ready for a session and return it as stored afterwards, or
   * an empty block if none is stored. Runs in the write queue.
   */
  activateBlock(blockIndex: number, date: string): Promise<Block> {
    return this.serialize(async () => {
      const blocks = await this.repository.load(date);
      const changes = planActivation(blocks, blockIndex, this.dayStartHour);
      const byIndex = new Map(blocks.map((b) => [b.blockIndex, b]));

      for (const change of changes) {
        const block = byIndex.get(change.blockIndex);
        if (block) {
          const updated = { ...block, isMuted: change.isMuted, status: change.status };
          await this.repository.save(updated);
          byIndex.set(updated.blockIndex, updated);
        }
      }
      if (changes.length > 0) {
        this.logger.info(`Activated block ${blockIndex} on ${date}, ${changes.length} blocks changed`);
      }
      return byIndex.get(blockIndex) ?? createEmptyBlock(blockIndex, date);
    });
  }

  private async applyAutoSkip(now: Date): Promise<AutoSkipChange[]> {
    const slot = slotForInstant(now, this.dayStartHour);
    const view = this.engine.getState();
    const activeBlockIndex = view.status !== 'idle' && view.date === slot.date ? view.blockIndex : null;

    const blocks = await this.repository.load(slot.date);
    const changes = planAutoSkip(blocks, slot.index, activeBlockIndex, this.dayStartHour);
    const byIndex = new Map(blocks.map((b) => [b.blockIndex, b]));

    for (const change of changes) {
      const block = byIndex.get(change.blockIndex);
      if (block) {
        await this.repository.save({ ...block, status: change.status });
      }
    }
    if (changes.length > 0) {
      this.logger.info(`Auto-skip closed ${changes.length} past blocks on ${slot.date}`);
    }
    return changes;
  }

  private async loadBlock(blockIndex: number, date: string): Promise<Block> {
    const blocks = await this.repository.load(date);
    return blocks.find((b) => b.blockIndex === blockIndex) ?? createEmptyBlock(blockIndex, date);
  }

  /** Queue a write whose result, or failure, goes back to the caller. */
  private serialize<T>(write: () => Promise<T>): Promise<T> {
    const result = this.queue.then(write);
    this.queue = result.then(
      () => {},
      () => {
        // reported to the caller through `result`
      },
    );
    return result;
  }

  private enqueue(what: string, write: () => Promise<unknown>): void {
    this.queue = this.queue.then(write).then(
      () => {},
      (err: unknown) => {
        this.logger.error(`Failed to save ${what}:`, err);
      },
    );
  }
}
