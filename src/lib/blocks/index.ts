export { createEmptyBlock, hasUsage, isBlock, isRunSnapshot, isSegment } from './types';
export type { Block, BlockRepository, BlockStatus } from './types';
export { planAutoSkip } from './auto-skip';
export type { AutoSkipChange } from './auto-skip';
export { BlockSync } from './sync';
export type { BlockSyncOptions } from './sync';
export { planActivation } from './activation';
export type { ActivationChange } from './activation';
export { BlockSessions } from './sessions';
export type { BlockSessionsOptions } from './sessions';
