import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TimeoutNotificationScheduler } from '../notifications';

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date(2026, 0, 15, 9, 0, 0));
});

afterEach(() => {
  vi.useRealTimers();
});

describe('TimeoutNotificationScheduler', () => {
  it('fires at the scheduled instant', () => {
    const onFire = vi.fn();
    const scheduler = new TimeoutNotificationScheduler(onFire);
    scheduler.scheduleCompletion(new Date(2026, 0, 15, 9, 20, 0), 27, false);

    vi.advanceTimersByTime(1_199_999);
    expect(onFire).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledWith(27, false);
    expect(scheduler.pendingCount).toBe(0);
  });

  it('replaces an earlier notification for the same block', () => {
    const onFire = vi.fn();
    const scheduler = new TimeoutNotificationScheduler(onFire);
    scheduler.scheduleCompletion(new Date(2026, 0, 15, 9, 20, 0), 27, false);
    scheduler.scheduleCompletion(new Date(2026, 0, 15, 9, 20, 0), 27, true);

    vi.advanceTimersByTime(1_200_000);
    expect(onFire).toHaveBeenCalledTimes(1);
    expect(onFire).toHaveBeenCalledWith(27, true);
  });

  it('cancels', () => {
    const onFire = vi.fn();
    const scheduler = new TimeoutNotificationScheduler(onFire);
    scheduler.scheduleCompletion(new Date(2026, 0, 15, 9, 20, 0), 27, false);
    scheduler.scheduleCompletion(new Date(2026, 0, 15, 9, 40, 0), 28, false);
    scheduler.cancel(27);
    expect(scheduler.pendingCount).toBe(1);

    scheduler.cancelAll();
    vi.advanceTimersByTime(3_600_000);
    expect(onFire).not.toHaveBeenCalled();
  });
});
