import type { LifecycleSignal } from '@/lib/recovery/types';

/** The parts of `process` the lifecycle adapter needs. */
export interface SignalSource {
  readonly pid: number;
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
  kill(pid: number, signal: NodeJS.Signals): unknown;
}

export interface ProcessLifecycle extends LifecycleSignal {
  /** Remove the signal handlers. */
  dispose(): void;
}

/**
 * Job-control lifecycle for a terminal process: Ctrl-Z (`SIGTSTP`) suspends
 * after the suspend listeners ran, `SIGCONT` resumes.
 */
export function createProcessLifecycle(proc: SignalSource = process): ProcessLifecycle {
  const suspendListeners = new Set<() => void>();
  const resumeListeners = new Set<() => void>();

  const onStop = (): void => {
    for (const listener of suspendListeners) listener();
    // Handling SIGTSTP cancels the default stop; stop for real now.
    proc.kill(proc.pid, 'SIGSTOP');
  };
  const onContinue = (): void => {
    for (const listener of resumeListeners) listener();
  };

  proc.on('SIGTSTP', onStop);
  proc.on('SIGCONT', onContinue);

  return {
    onSuspend(listener) {
      suspendListeners.add(listener);
      return () => {
        suspendListeners.delete(listener);
      };
    },
    onResume(listener) {
      resumeListeners.add(listener);
      return () => {
        resumeListeners.delete(listener);
      };
    },
    dispose() {
      proc.off('SIGTSTP', onStop);
      proc.off('SIGCONT', onContinue);
      suspendListeners.clear();
      resumeListeners.clear();
    },
  };
}
