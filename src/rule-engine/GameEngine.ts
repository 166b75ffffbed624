/**
 * GameEngine.ts
 *
 * The stateful controller around the pure rules. Owns one seeded RNG,
 * one current GameState and a typed event emitter.
 *
 * Lifecycle: Uninitialized -> (reset) -> Active -> (step ...) -> GameOver.
 * Any operation before the first reset throws SequenceError
 * NOT_INITIALIZED; stepping after game over throws GAME_OVER.
 *
 * Usage:
 * ```ts
 * const engine = new GameEngine({ numPlayers: 2, seed: 42 });
 * engine.reset();
 * while (!engine.state.gameOver) {
 *   engine.step(chooseSomehow(engine.getValidActions()));
 * }
 * ```
 */

import { GameEventEmitter } from '../core-engine/GameEventEmitter';
import { RuleViolation, SequenceError } from '../core-engine/EngineErrors';
import { type LogLevel, type Logger, createLogger } from '../core-engine/Logger';
import { SeededRng, randomSeed } from '../core-engine/SeededRng';
import { type CatalogueProvider, getDefaultCatalogue } from '../card-system/Catalogue';
import { mapTiers } from '../card-system/DevelopmentCard';
import { type Action, describeAction } from './Actions';
import {
  type GameConfig,
  type GameConfigInput,
  VISIBLE_CARDS_PER_TIER,
  createGameConfig,
  nobleCountFor,
  tokenSupplyFor,
} from './GameConfig';
import type { GameEventMap } from './GameEvents';
import { type StepOutcome, applyAction } from './GameRules';
import { GameState } from './GameState';
import { Player } from './Player';
import { listValidActions } from './ValidActions';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface GameEngineOptions {
  /** 2-4, default 2. */
  numPlayers?: number;
  /** Seed for the engine-owned RNG. A random seed is drawn when omitted. */
  seed?: number;
  /** Overrides for the remaining config fields. */
  config?: Omit<GameConfigInput, 'playerCount'>;
  catalogue?: CatalogueProvider;
  logger?: Logger;
  /** Level for the default logger. Ignored when `logger` is given. */
  logLevel?: LogLevel;
}

export interface ResetOptions {
  numPlayers?: number;
  /** Re-seed the engine RNG before dealing. */
  seed?: number;
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Deal a fresh game: each tier shuffled into four face-up cards plus a
 * deck, then the nobles shuffled and cut to playerCount + 1.
 */
export function createInitialState(
  config: GameConfig,
  catalogue: CatalogueProvider,
  rng: SeededRng,
): GameState {
  const cards = catalogue.cardsByTier();
  const shuffled = mapTiers(tier => rng.shuffle(cards[tier]));
  const nobles = rng.shuffle(catalogue.nobles()).slice(0, nobleCountFor(config.playerCount));

  return new GameState({
    config,
    players: Array.from({ length: config.playerCount }, (_, i) => Player.create(i)),
    currentPlayerIndex: 0,
    bank: tokenSupplyFor(config.playerCount),
    decks: mapTiers(tier => shuffled[tier].slice(VISIBLE_CARDS_PER_TIER)),
    visible: mapTiers(tier => shuffled[tier].slice(0, VISIBLE_CARDS_PER_TIER)),
    nobles,
    turnNumber: 0,
    isFinalRound: false,
    firstPlayerToWin: null,
    gameOver: false,
    winner: null,
  });
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class GameEngine {
  readonly events = new GameEventEmitter<GameEventMap>();

  private config: GameConfig;
  private rng: SeededRng;
  private readonly catalogue: CatalogueProvider;
  private readonly logger: Logger;
  private current: GameState | null = null;
  /** Resets dealt from the current seed; 0 before the first. */
  private gamesFromSeed = 0;

  /**
   * @throws SetupError for a bad player count or config.
   */
  constructor(options: GameEngineOptions = {}) {
    this.config = createGameConfig({ ...options.config, playerCount: options.numPlayers ?? 2 });
    this.rng = new SeededRng(options.seed ?? randomSeed());
    this.catalogue = options.catalogue ?? getDefaultCatalogue();
    this.logger = options.logger ?? createLogger('GameEngine', { level: options.logLevel });
  }

  get seed(): number {
    return this.rng.seed;
  }

  /**
   * How many games the current seed has dealt. Replaying game `k` means
   * building an engine with the same seed and resetting `k` times.
   */
  get gameIndex(): number {
    return this.gamesFromSeed;
  }

  get isInitialized(): boolean {
    return this.current !== null;
  }

  /** @throws SequenceError NOT_INITIALIZED before the first reset. */
  get state(): GameState {
    if (!this.current) {
      throw new SequenceError('NOT_INITIALIZED', 'Game not started. Call reset() first.');
    }
    return this.current;
  }

  get gameConfig(): GameConfig {
    return this.config;
  }

  /**
   * Start a new game.
   *
   * @throws SetupError when `numPlayers` is out of range.
   */
  reset(options: ResetOptions = {}): GameState {
    if (options.numPlayers !== undefined) {
      this.config = createGameConfig({ ...this.config, playerCount: options.numPlayers });
    }
    if (options.seed !== undefined) {
      this.rng = new SeededRng(options.seed);
      this.gamesFromSeed = 0;
    }

    const state = createInitialState(this.config, this.catalogue, this.rng);
    this.current = state;
    this.gamesFromSeed++;

    this.logger.info(
      `New ${this.config.playerCount}-player game (seed ${this.rng.seed}, game ${this.gamesFromSeed})`,
    );
    this.notify('game-started', {
      state,
      seed: this.rng.seed,
      gameIndex: this.gamesFromSeed,
    });
    return state;
  }

  /**
   * Apply one action for the current player.
   *
   * @throws SequenceError before reset or after game over.
   * @throws RuleViolation when the action is illegal; the state is unchanged.
   */
  step(action: Action): GameState {
    const before = this.requireActive();
    const label = describeAction(action);

    let outcome: StepOutcome;
    try {
      outcome = applyAction(before, action);
    } catch (err) {
      if (err instanceof RuleViolation) {
        this.logger.debug(`Rejected seat ${before.currentPlayerIndex} "${label}": ${err.code}`);
        this.notify('action-rejected', {
          playerIndex: before.currentPlayerIndex,
          action,
          error: err.toJSON(),
        });
      }
      throw err;
    }

    const after = outcome.state;
    this.current = after;
    this.logger.debug(`Seat ${outcome.playerIndex}: ${label}`);

    if (outcome.noble) {
      this.logger.debug(`Noble ${outcome.noble.id} visits seat ${outcome.playerIndex}`);
      this.notify('noble-attracted', {
        playerIndex: outcome.playerIndex,
        noble: outcome.noble,
      });
    }
    if (outcome.finalRoundStarted) {
      const points = after.players[outcome.playerIndex].points;
      this.logger.info(`Seat ${outcome.playerIndex} reached ${points} points; final round`);
      this.notify('final-round-started', { playerIndex: outcome.playerIndex, points });
    }
    this.notify('turn-completed', {
      playerIndex: outcome.playerIndex,
      action,
      label,
      before,
      after,
    });
    if (after.gameOver && after.winner !== null) {
      const scores = after.players.map(p => p.points);
      this.logger.info(`Game over: seat ${after.winner} wins (${scores.join(' / ')})`);
      this.notify('game-ended', { winner: after.winner, scores, state: after });
    }

    return after;
  }

  /**
   * Dry-run an action. Returns the rule violation it would raise, or
   * null when it is legal. Emits nothing and changes nothing.
   *
   * @throws SequenceError before reset or after game over.
   */
  validate(action: Action): RuleViolation | null {
    const state = this.requireActive();
    try {
      applyAction(state, action);
      return null;
    } catch (err) {
      if (err instanceof RuleViolation) return err;
      throw err;
    }
  }

  /** Every legal action for the current player. Empty after game over. */
  getValidActions(): Action[] {
    return listValidActions(this.state);
  }

  /**
   * Replace the current state with a snapshot, e.g. to analyse a
   * position or resume a recorded game. The engine adopts its config.
   */
  restore(state: GameState): GameState {
    this.config = state.config;
    this.current = state;
    this.logger.debug(`Restored state at turn ${state.turnNumber}`);
    return state;
  }

  /**
   * Deliver an event. The state has already moved on when this runs, so
   * a listener that throws is logged and skipped rather than allowed to
   * fail the step or mask a rule violation.
   */
  private notify<K extends keyof GameEventMap>(event: K, payload: GameEventMap[K]): void {
    try {
      this.events.emit(event, payload);
    } catch (err) {
      this.logger.warn(`Listener for "${String(event)}" threw: ${String(err)}`);
    }
  }

  private requireActive(): GameState {
    const state = this.state;
    if (state.gameOver) {
      throw new SequenceError('GAME_OVER', 'Game is already over', { winner: state.winner });
    }
    return state;
  }
}
