/**
 * Gem market rules engine.
 *
 * Deterministic, immutable-state rules for a 2-4 player gem-collecting
 * card game, plus AI opponents and transcript replay.
 */
export * from './core-engine';
export * from './card-system';
export * from './rule-engine';
export * from './ai';
export * from './transcript';
