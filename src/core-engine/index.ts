/**
 * Core Engine Module
 *
 * Game-agnostic foundations: structured errors, seeded randomness,
 * scoped logging and a typed event emitter.
 */
export const ENGINE_VERSION = '0.1.0';

// Errors
export type {
  SetupErrorCode,
  SequenceErrorCode,
  RuleViolationCode,
  InvariantCode,
  GameErrorCode,
  GameErrorJSON,
} from './EngineErrors';
export {
  GameError,
  SetupError,
  SequenceError,
  RuleViolation,
  MalformedActionError,
  InvariantViolation,
  ReplayError,
  isRuleViolation,
  assertNever,
} from './EngineErrors';

// Seeded RNG
export type { RandomSource } from './SeededRng';
export { SeededRng, createRng, randomSeed } from './SeededRng';

// Logging
export type { LogLevel, LogSink, Logger, LoggerOptions } from './Logger';
export {
  LOG_LEVELS,
  LOG_LEVEL_ENV,
  createLogger,
  resolveLogLevel,
  silentLogger,
} from './Logger';

// Game event system
export type { EventListener } from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';
