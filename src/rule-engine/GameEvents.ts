/**
 * GameEvents.ts
 *
 * Lifecycle events emitted by the GameEngine. Payloads are plain values
 * so listeners (transcript recorders, loggers, a UI) never need to
 * reach back into the engine.
 */

import type { GameErrorJSON } from '../core-engine/EngineErrors';
import type { Noble } from '../card-system/Noble';
import type { Action } from './Actions';
import type { GameState } from './GameState';

export interface GameStartedPayload {
  state: GameState;
  seed: number;
  /** 1 for the first game dealt from this seed, 2 for the next, ... */
  gameIndex: number;
}

export interface TurnCompletedPayload {
  /** Seat that acted. */
  playerIndex: number;
  action: Action;
  label: string;
  /** State before the action. */
  before: GameState;
  /** State after all phases, turn already advanced. */
  after: GameState;
}

export interface NobleAttractedPayload {
  playerIndex: number;
  noble: Noble;
}

export interface FinalRoundStartedPayload {
  /** Seat that reached the winning threshold. */
  playerIndex: number;
  points: number;
}

export interface GameEndedPayload {
  winner: number;
  scores: number[];
  state: GameState;
}

export interface ActionRejectedPayload {
  playerIndex: number;
  action: Action;
  error: GameErrorJSON;
}

export interface GameEventMap {
  'game-started': GameStartedPayload;
  'turn-completed': TurnCompletedPayload;
  'noble-attracted': NobleAttractedPayload;
  'final-round-started': FinalRoundStartedPayload;
  'game-ended': GameEndedPayload;
  'action-rejected': ActionRejectedPayload;
}

export type GameEventName = keyof GameEventMap;
