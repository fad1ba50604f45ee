import { isCurrentSlot, slotForInstant } from '@/lib/block-calendar';
import { silentLogger } from '@/lib/log';
import type { Logger } from '@/lib/log';
import type { SegmentKind } from '@/lib/segments/types';
import { DEFAULT_ENGINE_SETTINGS } from '@/lib/settings';
import type { TimerEngine } from '@/lib/timer/engine';
import { systemClock } from '@/lib/timer/types';
import type { Clock, CompletionEvent, ContinueTrigger } from '@/lib/timer/types';
import type { AutoSkipChange } from './auto-skip';
import type { BlockSync } from './sync';
import type { Block } from './types';

const SLOT_CHECK_INTERVAL_MS = 60_000;

export interface BlockSessionsOptions {
  logger?: Logger;
  clock?: Clock;
  dayStartHour?: number;
  /** How often to look for a new slot while the engine is quiet. */
  slotCheckIntervalMs?: number;
}

/**
 * Starts engine sessions on stored blocks and closes out the day as slots
 * pass. A session always begins on the block as stored: activated first,
 * with its recorded segments carried in.
 */
export class BlockSessions {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly dayStartHour: number;
  private readonly slotCheckIntervalMs: number;
  private lastSweptSlot: string | null = null;
  private work: Promise<void> = Promise.resolve();

  constructor(
    private readonly engine: TimerEngine,
    private readonly sync: BlockSync,
    options: BlockSessionsOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.dayStartHour = options.dayStartHour ?? DEFAULT_ENGINE_SETTINGS.dayStartHour;
    this.slotCheckIntervalMs = options.slotCheckIntervalMs ?? SLOT_CHECK_INTERVAL_MS;
  }

  /**
   * Continue automatically after a natural completion and sweep whenever the
   * slot changes. Returns a function that stops both.
   */
  attach(): () => void {
    const offComplete = this.engine.on('complete', (completion) => {
      if (!completion.natural) return;
      this.run('auto-continue', async () => {
        await this.continueAfter(completion, 'auto');
        await this.checkSlot();
      });
    });
    const offExpiry = this.engine.on('pausedExpiry', () => {
      this.run('sweep', () => this.checkSlot());
    });
    const timer = setInterval(() => {
      this.run('sweep', () => this.checkSlot());
    }, this.slotCheckIntervalMs);

    return () => {
      offComplete();
      offExpiry();
      clearInterval(timer);
    };
  }

  /** Resolves once the work started by engine events has settled. */
  flush(): Promise<void> {
    return this.work;
  }

  /** Start a session on the current slot's stored block. */
  async startCurrent(mode: SegmentKind = 'work'): Promise<boolean> {
    const block = await this.currentBlock();
    return this.engine.start({
      blockIndex: block.blockIndex,
      date: block.date,
      mode,
      category: block.category,
      label: block.label,
      existingSegments: block.segments,
    });
  }

  /**
   * Move on to the current slot after `completion`, keeping its work context.
   * A refused automatic continuation leaves the stored blocks untouched.
   */
  async continueAfter(completion: CompletionEvent, trigger: ContinueTrigger): Promise<boolean> {
    const { category, label } = completion.workContext;
    const { consecutiveAutoContinuations, threshold } = this.engine.getState().checkIn;
    if (trigger === 'auto' && consecutiveAutoContinuations >= threshold) {
      return this.engine.continueToNextBlock({ mode: 'work', category, label }, trigger);
    }

    const block = await this.currentBlock();
    return this.engine.continueToNextBlock(
      {
        mode: 'work',
        category: category ?? block.category,
        label: label ?? block.label,
        existingSegments: block.segments,
      },
      trigger,
    );
  }

  /** Sweep past blocks the first time a slot is seen. */
  async checkSlot(): Promise<AutoSkipChange[]> {
    const now = this.clock.now();
    const slot = slotForInstant(now, this.dayStartHour);
    const key = `${slot.date}#${slot.index}`;
    if (key === this.lastSweptSlot) return [];

    const changes = await this.sync.sweepPastBlocks(now);
    this.lastSweptSlot = key;
    return changes;
  }

  private async currentBlock(): Promise<Block> {
    const slot = slotForInstant(this.clock.now(), this.dayStartHour);
    const block = await this.sync.activateBlock(slot.index, slot.date);
    // the slot may have turned over while the store was busy
    return isCurrentSlot(slot.index, slot.date, this.clock.now(), this.dayStartHour) ? block : this.currentBlock();
  }

  private run(what: string, task: () => Promise<unknown>): void {
    this.work = this.work.then(task).then(
      () => {},
      (err: unknown) => {
        this.logger.error(`${what} failed:`, err);
      },
    );
  }
}
