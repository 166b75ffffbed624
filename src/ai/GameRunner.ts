/**
 * GameRunner.ts
 *
 * Headless game loop: asks each seat's AiPlayer for an action and steps
 * the engine until the game ends, the step budget runs out or the seat
 * to move has no legal action.
 */

import { SetupError } from '../core-engine/EngineErrors';
import type { GameEngine } from '../rule-engine/GameEngine';
import type { AiPlayer } from './AiStrategy';

export interface PlayGameOptions {
  /** Upper bound on steps before giving up. Default 1000. */
  maxSteps?: number;
}

export interface GameResult {
  /** False when `maxSteps` ran out or the game stalled first. */
  completed: boolean;
  /**
   * True when the seat to move had no legal action. There is no pass,
   * so e.g. a bank of only gold with the seat holding three reserved
   * cards it cannot afford ends the run here.
   */
  stalled: boolean;
  winner: number | null;
  scores: number[];
  steps: number;
  /** Rounds played, as counted by the state. */
  rounds: number;
}

export const DEFAULT_MAX_STEPS = 1000;

/**
 * Play the engine's current game to the end. The engine must already be
 * reset, so that listeners attached beforehand see `game-started`.
 *
 * @throws SetupError when the seat count differs from the player count.
 */
export function playGame(
  engine: GameEngine,
  seats: readonly AiPlayer[],
  options: PlayGameOptions = {},
): GameResult {
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  let state = engine.state;

  if (seats.length !== state.numPlayers) {
    throw new SetupError(
      'INVALID_PLAYER_COUNT',
      `Expected ${state.numPlayers} seats, got ${seats.length}`,
      { expected: state.numPlayers, actual: seats.length },
    );
  }

  let steps = 0;
  let stalled = false;
  while (!state.gameOver && steps < maxSteps) {
    const validActions = engine.getValidActions();
    if (validActions.length === 0) {
      stalled = true;
      break;
    }
    const seat = seats[state.currentPlayerIndex];
    state = engine.step(seat.chooseAction(state, validActions));
    steps++;
  }

  return {
    completed: state.gameOver,
    stalled,
    winner: state.winner,
    scores: state.players.map(p => p.points),
    steps,
    rounds: state.turnNumber,
  };
}
