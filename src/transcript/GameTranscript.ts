/**
 * Game transcript types, recorder and replay.
 *
 * Records a replay-ready JSON transcript capturing every step, the
 * resulting state and the final results, for debugging, regression
 * testing and offline analysis.
 *
 * The recorder hooks into the engine's events: create it before
 * `reset()`, let the game run, then call `finalize()`.
 */

import { z } from 'zod';
import { ReplayError, SequenceError } from '../core-engine/EngineErrors';
import { silentLogger } from '../core-engine/Logger';
import type { GemRecord } from '../card-system/GemCollection';
import { type Tier, mapTiers } from '../card-system/DevelopmentCard';
import type { CatalogueProvider } from '../card-system/Catalogue';
import { type Action, parseAction } from '../rule-engine/Actions';
import type { GameConfig } from '../rule-engine/GameConfig';
import { GameEngine } from '../rule-engine/GameEngine';
import type { GameState } from '../rule-engine/GameState';
import type { Player } from '../rule-engine/Player';

// ── Snapshot types ──────────────────────────────────────────

/** Plain-JSON view of a player. Cards and nobles appear by id. */
export interface PlayerSnapshot {
  id: number;
  tokens: GemRecord;
  bonuses: GemRecord;
  points: number;
  tokenCount: number;
  cards: string[];
  reserved: string[];
  nobles: string[];
}

/** Plain-JSON observation of a full game state. */
export interface StateSnapshot {
  currentPlayerIndex: number;
  turnNumber: number;
  bank: GemRecord;
  /** Face-up card ids per tier. */
  visible: Record<Tier, string[]>;
  /** Cards left in each tier's deck. Deck order stays hidden. */
  deckSizes: Record<Tier, number>;
  nobles: string[];
  players: PlayerSnapshot[];
  isFinalRound: boolean;
  firstPlayerToWin: number | null;
  gameOver: boolean;
  winner: number | null;
}

/** Record of a single step. */
export interface TurnRecord {
  /** Step index (0-based). */
  step: number;
  /** Round the step was played in. */
  turnNumber: number;
  /** Index of the player who acted. */
  playerIndex: number;
  action: Action;
  label: string;
  /** Noble that visited on this step, if any. */
  nobleId: string | null;
  /** State after the step. */
  after: StateSnapshot;
}

/** Metadata about the game. */
export interface GameMetadata {
  /** ISO 8601 timestamp of game start. */
  startedAt: string;
  /** ISO 8601 timestamp of game end (set on finalize). */
  endedAt: string;
  /** Engine seed the game was dealt from. */
  seed: number;
  /** Which reset of that seed dealt this game (1-based). */
  gameIndex: number;
  config: GameConfig;
  players: Array<{
    seat: number;
    strategy?: string;
  }>;
}

/** Final results after the game ends. */
export interface GameResults {
  scores: number[];
  winner: number | null;
  rounds: number;
  completed: boolean;
}

/** A complete game transcript. */
export interface GameTranscript {
  /** Format version for future compatibility. */
  version: 1;
  metadata: GameMetadata;
  /** State after the deal, before the first step. */
  initialState: StateSnapshot;
  turns: TurnRecord[];
  /** State at finalize time; replay checks against it. */
  finalState: StateSnapshot | null;
  /** Final results (set on finalize). */
  results: GameResults | null;
}

// ── Helpers ─────────────────────────────────────────────────

export function snapshotPlayer(player: Player): PlayerSnapshot {
  return {
    id: player.id,
    tokens: player.tokens.toRecord(),
    bonuses: player.bonuses.toRecord(),
    points: player.points,
    tokenCount: player.tokenCount,
    cards: player.cards.map(c => c.id),
    reserved: player.reserved.map(c => c.id),
    nobles: player.nobles.map(n => n.id),
  };
}

export function snapshotState(state: GameState): StateSnapshot {
  return {
    currentPlayerIndex: state.currentPlayerIndex,
    turnNumber: state.turnNumber,
    bank: state.bank.toRecord(),
    visible: mapTiers(tier => state.visible[tier].map(c => c.id)),
    deckSizes: mapTiers(tier => state.decks[tier].length),
    nobles: state.nobles.map(n => n.id),
    players: state.players.map(snapshotPlayer),
    isFinalRound: state.isFinalRound,
    firstPlayerToWin: state.firstPlayerToWin,
    gameOver: state.gameOver,
    winner: state.winner,
  };
}

// ── TranscriptRecorder ──────────────────────────────────────

/**
 * Records a game transcript from engine events.
 *
 * Usage:
 *   const recorder = new TranscriptRecorder(engine, ['Greedy', 'Random']);
 *   engine.reset();
 *   // ... game loop ...
 *   const transcript = recorder.finalize();
 */
export class TranscriptRecorder {
  private transcript: GameTranscript | null = null;
  private pendingNoble: string | null = null;
  private readonly unsubscribers: Array<() => void>;

  constructor(
    private readonly engine: GameEngine,
    private readonly playerStrategies?: Array<string | undefined>,
  ) {
    this.unsubscribers = [
      engine.events.on('game-started', ({ state, seed, gameIndex }) => {
        this.begin(state, seed, gameIndex);
      }),
      engine.events.on('noble-attracted', ({ noble }) => {
        this.pendingNoble = noble.id;
      }),
      engine.events.on('turn-completed', ({ playerIndex, action, label, before, after }) => {
        this.recordTurn(playerIndex, action, label, before, after);
      }),
    ];
  }

  /** True once a game has started under this recorder. */
  get isRecording(): boolean {
    return this.transcript !== null;
  }

  /**
   * Finalize the transcript, stamping the end time and results from
   * the engine's current state. Safe to call on an unfinished game.
   *
   * @throws SequenceError NOT_INITIALIZED when no game was started.
   */
  finalize(): GameTranscript {
    const transcript = this.getTranscript();
    const state = this.engine.state;

    transcript.metadata.endedAt = new Date().toISOString();
    transcript.finalState = snapshotState(state);
    transcript.results = {
      scores: state.players.map(p => p.points),
      winner: state.winner,
      rounds: state.turnNumber,
      completed: state.gameOver,
    };
    return transcript;
  }

  /** Get the transcript in its current state (may not be finalized). */
  getTranscript(): GameTranscript {
    if (!this.transcript) {
      throw new SequenceError('NOT_INITIALIZED', 'No game has started since the recorder was attached');
    }
    return this.transcript;
  }

  /** Stop listening to the engine. */
  detach(): void {
    for (const off of this.unsubscribers) off();
    this.unsubscribers.length = 0;
  }

  private begin(state: GameState, seed: number, gameIndex: number): void {
    this.pendingNoble = null;
    this.transcript = {
      version: 1,
      metadata: {
        startedAt: new Date().toISOString(),
        endedAt: '',
        seed,
        gameIndex,
        config: state.config,
        players: state.players.map((_, seat) => ({
          seat,
          strategy: this.playerStrategies?.[seat],
        })),
      },
      initialState: snapshotState(state),
      turns: [],
      finalState: null,
      results: null,
    };
  }

  private recordTurn(
    playerIndex: number,
    action: Action,
    label: string,
    before: GameState,
    after: GameState,
  ): void {
    if (!this.transcript) return;
    this.transcript.turns.push({
      step: this.transcript.turns.length,
      turnNumber: before.turnNumber,
      playerIndex,
      action,
      label,
      nobleId: this.pendingNoble,
      after: snapshotState(after),
    });
    this.pendingNoble = null;
  }
}

// ── Replay ──────────────────────────────────────────────────

const ReplaySchema = z.object({
  version: z.literal(1),
  metadata: z.object({
    seed: z.number().int(),
    gameIndex: z.number().int().min(1),
    config: z.object({
      playerCount: z.number().int(),
      winningPoints: z.number().int(),
      maxTokens: z.number().int(),
      maxReserved: z.number().int(),
    }),
  }),
  initialState: z.unknown(),
  turns: z.array(z.object({ action: z.unknown() })),
  finalState: z.unknown(),
});

export interface ReplayOptions {
  catalogue?: CatalogueProvider;
}

export interface ReplayResult {
  engine: GameEngine;
  state: GameState;
  steps: number;
}

function sameSnapshot(actual: StateSnapshot, recorded: unknown): boolean {
  return JSON.stringify(actual) === JSON.stringify(recorded);
}

/**
 * Rebuild a recorded game from its seed and re-apply every action.
 *
 * @throws MalformedActionError when the transcript is not well formed.
 * @throws ReplayError when the deal or the final state differs from the
 *   recording.
 */
export function replayTranscript(raw: unknown, options: ReplayOptions = {}): ReplayResult {
  const parsed = ReplaySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReplayError(
      `Not a version 1 transcript: ${parsed.error.issues.map(i => i.message).join('; ')}`,
    );
  }
  const { metadata, turns, initialState, finalState } = parsed.data;
  const { playerCount, ...limits } = metadata.config;

  const engine = new GameEngine({
    numPlayers: playerCount,
    seed: metadata.seed,
    config: limits,
    catalogue: options.catalogue,
    logger: silentLogger,
  });
  for (let i = 0; i < metadata.gameIndex; i++) engine.reset();

  if (!sameSnapshot(snapshotState(engine.state), initialState)) {
    throw new ReplayError('Initial deal differs from the recording', {
      seed: metadata.seed,
      gameIndex: metadata.gameIndex,
    });
  }

  let state = engine.state;
  for (const turn of turns) {
    state = engine.step(parseAction(turn.action));
  }

  if (finalState !== null && finalState !== undefined && !sameSnapshot(snapshotState(state), finalState)) {
    throw new ReplayError('Final state differs from the recording', {
      seed: metadata.seed,
      steps: turns.length,
    });
  }

  return { engine, state, steps: turns.length };
}
