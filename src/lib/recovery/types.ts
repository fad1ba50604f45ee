/** Host signals for the process being put to sleep and woken up again. */
export interface LifecycleSignal {
  /** Returns an unsubscribe function. */
  onSuspend(listener: () => void): () => void;
  onResume(listener: () => void): () => void;
}
