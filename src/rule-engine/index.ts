/**
 * Rule Engine Module
 *
 * Immutable game state, the action catalogue, the pure rules and the
 * GameEngine controller that drives them.
 */
export const RULE_ENGINE_VERSION = '0.1.0';

// Configuration
export type { PlayerCount, GameConfig, GameConfigInput } from './GameConfig';
export {
  MIN_PLAYERS,
  MAX_PLAYERS,
  TOKENS_BY_PLAYER_COUNT,
  GOLD_TOKENS,
  VISIBLE_CARDS_PER_TIER,
  DEFAULT_WINNING_POINTS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MAX_RESERVED,
  createGameConfig,
  isPlayerCount,
  tokenSupplyFor,
  nobleCountFor,
} from './GameConfig';

// State
export type { PlayerFields } from './Player';
export { Player } from './Player';
export type { GameStateFields, VisibleCardLocation } from './GameState';
export { GameState, rankWinner } from './GameState';

// Actions
export type {
  Action,
  ActionType,
  TokenGainAction,
  TakeDifferentAction,
  TakeSameAction,
  ReserveVisibleAction,
  ReserveDeckAction,
  PurchaseVisibleAction,
  PurchaseReservedAction,
} from './Actions';
export {
  ACTION_TYPES,
  takeDifferent,
  takeSame,
  reserveVisible,
  reserveFromDeck,
  purchaseVisible,
  purchaseReserved,
  withReturns,
  carriesReturns,
  parseAction,
  describeAction,
  actionKey,
} from './Actions';

// Rules
export type { StepOutcome } from './GameRules';
export {
  TAKE_SAME_MIN_BANK,
  applyAction,
  executeAction,
  resolveNobleVisit,
  settleTokenLimit,
} from './GameRules';
export { listValidActions, canonicalReturns, combinations } from './ValidActions';

// Engine and events
export type {
  GameEventMap,
  GameEventName,
  GameStartedPayload,
  TurnCompletedPayload,
  NobleAttractedPayload,
  FinalRoundStartedPayload,
  GameEndedPayload,
  ActionRejectedPayload,
} from './GameEvents';
export type { GameEngineOptions, ResetOptions } from './GameEngine';
export { GameEngine, createInitialState } from './GameEngine';
