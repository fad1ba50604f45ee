import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CheckInCounter } from '@/lib/check-in';
import { silentLogger } from '@/lib/log';
import type { Segment } from '@/lib/segments';
import { TimerEngine } from '@/lib/timer/engine';
import { BlockSessions } from '../sessions';
import { BlockSync } from '../sync';
import { createEmptyBlock } from '../types';
import { InMemoryBlockRepository } from './memory-repository';

const DAY = '2026-01-15';

const earlier: Segment = { kind: 'work', seconds: 120, category: 'Reading', label: null, startOffset: 0 };

function at(hours: number, minutes = 0, seconds = 0): Date {
  return new Date(2026, 0, 15, hours, minutes, seconds);
}

function setup(checkInThreshold = 3) {
  const engine = new TimerEngine({
    logger: silentLogger,
    createRunId: () => 'run-1',
    checkIn: new CheckInCounter(checkInThreshold),
  });
  const repository = new InMemoryBlockRepository();
  const logger = { ...silentLogger, error: vi.fn() };
  const sync = new BlockSync(engine, repository, { logger, dayStartHour: 8 });
  const sessions = new BlockSessions(engine, sync, { logger, dayStartHour: 8 });
  sync.attach();
  const detach = sessions.attach();
  return { engine, repository, sync, sessions, logger, detach };
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(at(9, 0));
});

afterEach(() => {
  vi.useRealTimers();
});

// ---------------------------------------------------------------------------
// Starting and continuing
// ---------------------------------------------------------------------------

describe('startCurrent', () => {
  it('starts on the stored block with its segments and unmutes it', async () => {
    const { engine, repository, sessions } = setup();
    await repository.save({ ...createEmptyBlock(27, DAY), isMuted: true, category: 'Reading', segments: [earlier] });

    expect(await sessions.startCurrent()).toBe(true);

    const view = engine.getState();
    expect(view.blockIndex).toBe(27);
    expect(view.previousSegments).toEqual([earlier]);
    expect(view.workContext).toEqual({ category: 'Reading', label: null });
    expect(view.previousVisualProportion).toBe(0.1);
    expect((await repository.find(DAY, 27))?.isMuted).toBe(false);
  });
});

describe('automatic continuation', () => {
  it('carries the stored segments of the next block into the new session', async () => {
    const { engine, repository, sync, sessions } = setup();
    await repository.save({ ...createEmptyBlock(28, DAY), isMuted: true, usedSeconds: 120, segments: [earlier] });
    engine.start({ blockIndex: 27, date: DAY, mode: 'work', category: 'Writing', label: 'Draft' });

    vi.advanceTimersByTime(1_200_000);
    await sessions.flush();

    const view = engine.getState();
    expect(view.status).toBe('running');
    expect(view.blockIndex).toBe(28);
    expect(view.previousSegments).toEqual([earlier]);
    expect(view.workContext).toEqual({ category: 'Writing', label: 'Draft' });

    vi.advanceTimersByTime(5000);
    await sync.flush();

    const stored = await repository.find(DAY, 28);
    expect(stored?.isMuted).toBe(false);
    expect(stored?.segments).toEqual([
      earlier,
      { kind: 'work', seconds: 5, category: 'Writing', label: 'Draft', startOffset: 0 },
    ]);
    expect(stored?.usedSeconds).toBe(125);
  });

  it('leaves the next block alone when a check-in is due', async () => {
    const { engine, repository, sessions } = setup(1);
    const onCheckIn = vi.fn();
    engine.on('checkInRequired', onCheckIn);
    await repository.save({ ...createEmptyBlock(29, DAY), isMuted: true });
    engine.start({ blockIndex: 27, date: DAY, mode: 'work' });

    vi.advanceTimersByTime(1_200_000);
    await sessions.flush();
    expect(engine.getState().blockIndex).toBe(28);

    vi.advanceTimersByTime(1_200_000);
    await sessions.flush();

    expect(onCheckIn).toHaveBeenCalledWith(1);
    expect(engine.getState().status).toBe('completed');
    expect((await repository.find(DAY, 29))?.isMuted).toBe(true);
  });

  it('logs a continuation that could not reach the store', async () => {
    const { engine, repository, sessions, logger } = setup();
    await repository.save({ ...createEmptyBlock(28, DAY), isMuted: true });
    engine.start({ blockIndex: 27, date: DAY, mode: 'work' });
    repository.failSaves = true;

    vi.advanceTimersByTime(1_200_000);
    await sessions.flush();

    expect(logger.error).toHaveBeenCalledWith('auto-continue failed:', expect.any(Error));
    expect(engine.getState().status).toBe('completed');
  });
});

// ---------------------------------------------------------------------------
// Sweeping as slots pass
// ---------------------------------------------------------------------------

describe('checkSlot', () => {
  it('sweeps once per slot', async () => {
    const { repository, sessions } = setup();
    await repository.save(createEmptyBlock(24, DAY));

    expect(await sessions.checkSlot()).toEqual([{ blockIndex: 24, status: 'skipped' }]);
    await repository.save(createEmptyBlock(25, DAY));
    expect(await sessions.checkSlot()).toEqual([]);
  });

  it('closes out a block that passed while nothing was running', async () => {
    const { repository, sessions } = setup();
    await repository.save(createEmptyBlock(27, DAY));

    vi.advanceTimersByTime(1_200_000);
    await sessions.flush();

    expect((await repository.find(DAY, 27))?.status).toBe('skipped');
  });

  it('stops watching once detached', async () => {
    const { repository, sessions, detach } = setup();
    await repository.save(createEmptyBlock(27, DAY));
    detach();

    vi.advanceTimersByTime(1_200_000);
    await sessions.flush();

    expect((await repository.find(DAY, 27))?.status).toBe('idle');
  });
});
