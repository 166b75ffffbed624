/**
 * GameState.ts
 *
 * The immutable game aggregate. Every change produces a new state with
 * one or more fields replaced; earlier states stay valid, which is
 * what makes dry-run validation and replay cheap.
 */

import { InvariantViolation } from '../core-engine/EngineErrors';
import type { GemCollection } from '../card-system/GemCollection';
import {
  type DevelopmentCard,
  type Tier,
  type TierRecord,
  TIERS,
  mapTiers,
} from '../card-system/DevelopmentCard';
import type { Noble } from '../card-system/Noble';
import type { GameConfig } from './GameConfig';
import type { Player } from './Player';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GameStateFields {
  readonly config: GameConfig;
  readonly players: readonly Player[];
  readonly currentPlayerIndex: number;
  readonly bank: GemCollection;
  /** Per-tier draw piles. The top of a deck is its first element. */
  readonly decks: TierRecord<readonly DevelopmentCard[]>;
  /** Per-tier face-up rows, at most four cards each. */
  readonly visible: TierRecord<readonly DevelopmentCard[]>;
  readonly nobles: readonly Noble[];
  /** Completed rounds. Increments when play wraps back to seat 0. */
  readonly turnNumber: number;
  readonly isFinalRound: boolean;
  /** Seat that first reached the winning threshold, or null. */
  readonly firstPlayerToWin: number | null;
  readonly gameOver: boolean;
  readonly winner: number | null;
}

/** Where a face-up card sits. */
export interface VisibleCardLocation {
  card: DevelopmentCard;
  tier: Tier;
  index: number;
}

function freezeTiers(
  record: TierRecord<readonly DevelopmentCard[]>,
): TierRecord<readonly DevelopmentCard[]> {
  return Object.freeze({
    1: Object.freeze([...record[1]]),
    2: Object.freeze([...record[2]]),
    3: Object.freeze([...record[3]]),
  });
}

// ---------------------------------------------------------------------------
// GameState
// ---------------------------------------------------------------------------

export class GameState implements GameStateFields {
  readonly config: GameConfig;
  readonly players: readonly Player[];
  readonly currentPlayerIndex: number;
  readonly bank: GemCollection;
  readonly decks: TierRecord<readonly DevelopmentCard[]>;
  readonly visible: TierRecord<readonly DevelopmentCard[]>;
  readonly nobles: readonly Noble[];
  readonly turnNumber: number;
  readonly isFinalRound: boolean;
  readonly firstPlayerToWin: number | null;
  readonly gameOver: boolean;
  readonly winner: number | null;

  /**
   * @throws InvariantViolation PLAYER_COUNT_MISMATCH when the number of
   *   players differs from the configured count.
   */
  constructor(fields: GameStateFields) {
    if (fields.players.length !== fields.config.playerCount) {
      throw new InvariantViolation(
        'PLAYER_COUNT_MISMATCH',
        `Expected ${fields.config.playerCount} players, got ${fields.players.length}`,
        { expected: fields.config.playerCount, actual: fields.players.length },
      );
    }

    this.config = fields.config;
    this.players = Object.freeze([...fields.players]);
    this.currentPlayerIndex = fields.currentPlayerIndex;
    this.bank = fields.bank;
    this.decks = freezeTiers(fields.decks);
    this.visible = freezeTiers(fields.visible);
    this.nobles = Object.freeze([...fields.nobles]);
    this.turnNumber = fields.turnNumber;
    this.isFinalRound = fields.isFinalRound;
    this.firstPlayerToWin = fields.firstPlayerToWin;
    this.gameOver = fields.gameOver;
    this.winner = fields.winner;
    Object.freeze(this);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get numPlayers(): number {
    return this.players.length;
  }

  get currentPlayer(): Player {
    return this.players[this.currentPlayerIndex];
  }

  findVisibleCard(cardId: string): VisibleCardLocation | undefined {
    for (const tier of TIERS) {
      const index = this.visible[tier].findIndex(c => c.id === cardId);
      if (index !== -1) {
        return { card: this.visible[tier][index], tier, index };
      }
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Copy-with-change
  // ---------------------------------------------------------------------------

  with(changes: Partial<GameStateFields>): GameState {
    return new GameState({ ...this.fields(), ...changes });
  }

  withPlayer(index: number, player: Player): GameState {
    const players = this.players.map((p, i) => (i === index ? player : p));
    return this.with({ players });
  }

  withCurrentPlayer(player: Player): GameState {
    return this.withPlayer(this.currentPlayerIndex, player);
  }

  withBank(bank: GemCollection): GameState {
    return this.with({ bank });
  }

  withVisible(tier: Tier, cards: readonly DevelopmentCard[]): GameState {
    return this.with({ visible: mapTiers(t => (t === tier ? cards : this.visible[t])) });
  }

  withDeck(tier: Tier, cards: readonly DevelopmentCard[]): GameState {
    return this.with({ decks: mapTiers(t => (t === tier ? cards : this.decks[t])) });
  }

  withNobles(nobles: readonly Noble[]): GameState {
    return this.with({ nobles });
  }

  /**
   * Take the face-up card at `index` out of its row. The slot is refilled
   * in place from the top of the tier's deck; when the deck is empty the
   * row shrinks instead.
   */
  removeVisibleAt(tier: Tier, index: number): GameState {
    const row = [...this.visible[tier]];
    const deck = this.decks[tier];
    if (deck.length > 0) {
      row[index] = deck[0];
      return this.withVisible(tier, row).withDeck(tier, deck.slice(1));
    }
    row.splice(index, 1);
    return this.withVisible(tier, row);
  }

  /** Hand play to the next seat. */
  advanceTurn(): GameState {
    const next = (this.currentPlayerIndex + 1) % this.numPlayers;
    return this.with({
      currentPlayerIndex: next,
      turnNumber: next === 0 ? this.turnNumber + 1 : this.turnNumber,
    });
  }

  /**
   * Two-phase end check for the seat that just acted.
   *
   * Reaching the threshold starts the final round. The game ends when
   * advancing would return play to the seat that triggered it.
   */
  checkWinner(): GameState {
    let state: GameState = this;

    if (!state.isFinalRound && state.currentPlayer.points >= state.config.winningPoints) {
      state = state.with({
        isFinalRound: true,
        firstPlayerToWin: state.currentPlayerIndex,
      });
    }

    if (state.isFinalRound) {
      const next = (state.currentPlayerIndex + 1) % state.numPlayers;
      if (next === state.firstPlayerToWin) {
        state = state.with({ gameOver: true, winner: rankWinner(state.players) });
      }
    }

    return state;
  }

  private fields(): GameStateFields {
    return {
      config: this.config,
      players: this.players,
      currentPlayerIndex: this.currentPlayerIndex,
      bank: this.bank,
      decks: this.decks,
      visible: this.visible,
      nobles: this.nobles,
      turnNumber: this.turnNumber,
      isFinalRound: this.isFinalRound,
      firstPlayerToWin: this.firstPlayerToWin,
      gameOver: this.gameOver,
      winner: this.winner,
    };
  }
}

/**
 * Seat with the most points; ties go to fewer owned cards, then to the
 * lower seat.
 */
export function rankWinner(players: readonly Player[]): number {
  let best = 0;
  for (let i = 1; i < players.length; i++) {
    const p = players[i];
    const b = players[best];
    if (p.points > b.points || (p.points === b.points && p.cards.length < b.cards.length)) {
      best = i;
    }
  }
  return best;
}
