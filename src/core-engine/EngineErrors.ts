/**
 * Structured error types for the rules engine.
 *
 * Every error raised by the engine carries a machine-readable `code`
 * and a JSON-safe `context`, so that decision makers (bots, learners,
 * a UI) can tell one rejection from another without parsing messages.
 *
 * Categories:
 * - `SetupError`           -- bad configuration or catalogue, raised
 *                             before any state exists.
 * - `SequenceError`        -- engine used out of order (step before
 *                             reset, step after game over).
 * - `RuleViolation`        -- an action that is illegal in the current
 *                             state. The state is left untouched.
 * - `MalformedActionError` -- an action value that is structurally
 *                             invalid regardless of state.
 * - `InvariantViolation`   -- a defect in the engine or its caller.
 *                             Never caught or retried.
 * - `ReplayError`          -- a recorded game no longer reproduces.
 */

// ── Error codes ─────────────────────────────────────────────

export type SetupErrorCode =
  | 'INVALID_PLAYER_COUNT'
  | 'INVALID_CONFIG'
  | 'INVALID_CATALOGUE';

export type SequenceErrorCode = 'NOT_INITIALIZED' | 'GAME_OVER';

export type RuleViolationCode =
  | 'INSUFFICIENT_BANK'
  | 'WILDCARD_NOT_ALLOWED'
  | 'RESERVE_LIMIT'
  | 'CARD_NOT_FOUND'
  | 'CANNOT_AFFORD'
  | 'TOKEN_LIMIT'
  | 'INVALID_RETURN'
  | 'EMPTY_DECK';

export type InvariantCode =
  | 'NEGATIVE_COUNT'
  | 'PLAYER_COUNT_MISMATCH'
  | 'RESERVED_OVERFLOW'
  | 'CARD_NOT_HELD'
  | 'UNREACHABLE';

export type GameErrorCode =
  | SetupErrorCode
  | SequenceErrorCode
  | RuleViolationCode
  | InvariantCode
  | 'MALFORMED_ACTION'
  | 'REPLAY_DIVERGED';

/** JSON representation of a GameError. */
export interface GameErrorJSON {
  type: string;
  code: GameErrorCode;
  message: string;
  context: Record<string, unknown>;
}

// ── Base class ──────────────────────────────────────────────

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    code: GameErrorCode,
    message: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): GameErrorJSON {
    return {
      type: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

// ── Specific errors ─────────────────────────────────────────

export class SetupError extends GameError {
  declare readonly code: SetupErrorCode;

  constructor(
    code: SetupErrorCode,
    message: string,
    context: Record<string, unknown> = {},
  ) {
    super(code, message, context);
    this.name = 'SetupError';
  }
}

export class SequenceError extends GameError {
  declare readonly code: SequenceErrorCode;

  constructor(
    code: SequenceErrorCode,
    message: string,
    context: Record<string, unknown> = {},
  ) {
    super(code, message, context);
    this.name = 'SequenceError';
  }
}

/**
 * An action that the current state does not allow.
 *
 * This is the error a decision maker is expected to learn from.
 */
export class RuleViolation extends GameError {
  declare readonly code: RuleViolationCode;

  constructor(
    code: RuleViolationCode,
    message: string,
    context: Record<string, unknown> = {},
  ) {
    super(code, message, context);
    this.name = 'RuleViolation';
  }
}

export class MalformedActionError extends GameError {
  declare readonly code: 'MALFORMED_ACTION';

  constructor(message: string, context: Record<string, unknown> = {}) {
    super('MALFORMED_ACTION', message, context);
    this.name = 'MalformedActionError';
  }
}

export class InvariantViolation extends GameError {
  declare readonly code: InvariantCode;

  constructor(
    code: InvariantCode,
    message: string,
    context: Record<string, unknown> = {},
  ) {
    super(code, message, context);
    this.name = 'InvariantViolation';
  }
}

export class ReplayError extends GameError {
  declare readonly code: 'REPLAY_DIVERGED';

  constructor(message: string, context: Record<string, unknown> = {}) {
    super('REPLAY_DIVERGED', message, context);
    this.name = 'ReplayError';
  }
}

/** Type guard used where a caller wants to treat rule rejections as values. */
export function isRuleViolation(error: unknown): error is RuleViolation {
  return error instanceof RuleViolation;
}

/** Exhaustiveness check for discriminated unions. */
export function assertNever(value: never, what = 'value'): never {
  throw new InvariantViolation(
    'UNREACHABLE',
    `Unexpected ${what}: ${JSON.stringify(value)}`,
  );
}
