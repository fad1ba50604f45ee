export { reconcileDeadlines } from './reconcile';
export type { Reconciliation, SessionDeadlines } from './reconcile';
export { RecoveryCoordinator } from './coordinator';
export type { RecoveryOptions, SnapshotRecovery } from './coordinator';
export type { LifecycleSignal } from './types';
