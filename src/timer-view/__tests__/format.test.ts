import { describe, it, expect } from 'vitest';
import type { TimerView } from '@/lib/timer/types';
import { describeView, formatTimeLeft } from '../format';

function view(overrides: Partial<TimerView>): TimerView {
  return {
    status: 'idle',
    blockIndex: null,
    date: null,
    mode: null,
    timeLeft: 0,
    initialDurationSeconds: 0,
    secondsUsed: 0,
    progressPercent: 0,
    visualFill: 0,
    scaleFactor: 0,
    previousVisualProportion: 0,
    previousSegments: [],
    liveSegments: [],
    currentSegmentStart: 0,
    workContext: null,
    startedAt: null,
    endAt: null,
    breakNotificationVisible: false,
    checkIn: { consecutiveAutoContinuations: 0, threshold: 3 },
    outcome: null,
    ...overrides,
  };
}

describe('formatTimeLeft', () => {
  it('pads minutes and seconds', () => {
    expect(formatTimeLeft(1200)).toBe('20:00');
    expect(formatTimeLeft(65)).toBe('01:05');
  });

  it('never goes negative', () => {
    expect(formatTimeLeft(-3)).toBe('00:00');
  });
});

describe('describeView', () => {
  it('describes a running block by its day-order number', () => {
    const line = describeView(
      view({ status: 'running', blockIndex: 27, mode: 'work', timeLeft: 750, visualFill: 0.375 }),
      8,
    );
    expect(line).toBe('Block 4 (09:00–09:20) work 12:30 left, 38%');
  });

  it('describes a paused expiry', () => {
    expect(describeView(view({ status: 'paused-expiry', blockIndex: 24, visualFill: 0.25 }), 8)).toBe(
      'Block 1 (08:00–08:20) ended while paused, 25%',
    );
  });

  it('describes idle', () => {
    expect(describeView(view({}), 8)).toBe('Idle');
  });
});
