import { systemClock } from '@/lib/timer/types';
import type { Clock, NotificationScheduler } from '@/lib/timer/types';

export type NotificationHandler = (blockIndex: number, isBreak: boolean) => void;

/** In-process stand-in for OS notifications: one pending timeout per block. */
export class TimeoutNotificationScheduler implements NotificationScheduler {
  private readonly pending = new Map<number, ReturnType<typeof setTimeout>>();

  constructor(
    private readonly onFire: NotificationHandler,
    private readonly clock: Clock = systemClock,
  ) {}

  scheduleCompletion(at: Date, blockIndex: number, isBreak: boolean): void {
    this.cancel(blockIndex);
    const delay = Math.max(0, at.getTime() - this.clock.now().getTime());
    const handle = setTimeout(() => {
      this.pending.delete(blockIndex);
      this.onFire(blockIndex, isBreak);
    }, delay);
    this.pending.set(blockIndex, handle);
  }

  cancel(blockIndex: number): void {
    const handle = this.pending.get(blockIndex);
    if (handle !== undefined) {
      clearTimeout(handle);
      this.pending.delete(blockIndex);
    }
  }

  cancelAll(): void {
    for (const handle of this.pending.values()) clearTimeout(handle);
    this.pending.clear();
  }

  get pendingCount(): number {
    return this.pending.size;
  }
}
