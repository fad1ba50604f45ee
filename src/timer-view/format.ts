import { displayNumber, formatSlotRange } from '@/lib/block-calendar';
import type { TimerView } from '@/lib/timer/types';

/** `MM:SS` countdown, never negative. */
export function formatTimeLeft(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(whole / 60);
  const rest = whole % 60;
  return `${minutes.toString().padStart(2, '0')}:${rest.toString().padStart(2, '0')}`;
}

/** One-line status, e.g. `Block 4 (09:00–09:20) work 12:30 left, 37%`. */
export function describeView(view: TimerView, dayStartHour: number): string {
  if (view.blockIndex === null) return 'Idle';

  const block = `Block ${displayNumber(view.blockIndex, dayStartHour)} (${formatSlotRange(view.blockIndex)})`;
  const fill = `${Math.round(view.visualFill * 100)}%`;
  switch (view.status) {
    case 'running':
      return `${block} ${view.mode ?? 'work'} ${formatTimeLeft(view.timeLeft)} left, ${fill}`;
    case 'paused':
      return `${block} paused, ${fill}`;
    case 'paused-expiry':
      return `${block} ended while paused, ${fill}`;
    case 'completed':
      return `${block} complete`;
    case 'idle':
      return 'Idle';
  }
}
