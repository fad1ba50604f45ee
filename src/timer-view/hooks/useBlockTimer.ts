import { createContext, useContext, useState, useEffect, useMemo } from 'react';
import type { SegmentKind } from '@/lib/segments/types';
import type { TimerEngine } from '@/lib/timer/engine';
import type { ContinueRequest, ContinueTrigger, StartRequest, TimerView } from '@/lib/timer/types';

export interface BlockTimerActions {
  start: (request: StartRequest) => boolean;
  pause: () => boolean;
  resume: () => boolean;
  stop: (markComplete?: boolean) => boolean;
  dismiss: () => boolean;
  switchMode: (mode: SegmentKind) => boolean;
  updateCategory: (category: string | null, label: string | null) => boolean;
  continueToNextBlock: (request: ContinueRequest, trigger?: ContinueTrigger) => boolean;
  acknowledgeCheckIn: () => void;
  snoozeBreakNotification: (seconds?: number) => boolean;
  dismissBreakNotification: () => void;
}

export interface BlockTimerValue extends BlockTimerActions {
  view: TimerView;
}

export const TimerEngineContext = createContext<TimerEngine | null>(null);

export function useBlockTimer(): BlockTimerValue {
  const engine = useContext(TimerEngineContext);
  if (!engine) {
    throw new Error('useBlockTimer must be used within a TimerEngineContext provider');
  }

  const [view, setView] = useState<TimerView>(() => engine.getState());

  useEffect(() => {
    setView(engine.getState());
    return engine.subscribe(setView);
  }, [engine]);

  const actions = useMemo<BlockTimerActions>(
    () => ({
      start: (request) => engine.start(request),
      pause: () => engine.pause(),
      resume: () => engine.resume(),
      stop: (markComplete) => engine.stop(markComplete),
      dismiss: () => engine.dismiss(),
      switchMode: (mode) => engine.switchMode(mode),
      updateCategory: (category, label) => engine.updateCategory(category, label),
      // A tap in the UI is always a user continuation.
      continueToNextBlock: (request, trigger = 'user') => engine.continueToNextBlock(request, trigger),
      acknowledgeCheckIn: () => engine.acknowledgeCheckIn(),
      snoozeBreakNotification: (seconds) => engine.snoozeBreakNotification(seconds),
      dismissBreakNotification: () => engine.dismissBreakNotification(),
    }),
    [engine],
  );

  return { view, ...actions };
}
