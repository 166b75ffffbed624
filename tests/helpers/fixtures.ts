/**
 * Builders for hand-made cards, nobles, players and states.
 */

import { GemCollection, type GemColor, type GemRecord, type TokenKind } from '../../src/card-system/GemCollection';
import type { DevelopmentCard, Tier } from '../../src/card-system/DevelopmentCard';
import type { Noble } from '../../src/card-system/Noble';
import { createGameConfig, tokenSupplyFor, type GameConfigInput } from '../../src/rule-engine/GameConfig';
import { GameState, type GameStateFields } from '../../src/rule-engine/GameState';
import { Player } from '../../src/rule-engine/Player';

export function gems(record: GemRecord = {}): GemCollection {
  return GemCollection.from(record);
}

export function makeCard(
  id: string,
  options: { tier?: Tier; bonus?: GemColor; points?: number; cost?: GemRecord } = {},
): DevelopmentCard {
  return {
    id,
    tier: options.tier ?? 1,
    bonus: options.bonus ?? 'diamond',
    points: options.points ?? 0,
    cost: gems(options.cost),
  };
}

/** `count` cards of one bonus colour, each free and worth `points`. */
export function freeCards(
  prefix: string,
  bonus: GemColor,
  count: number,
  points = 0,
): DevelopmentCard[] {
  return Array.from({ length: count }, (_, i) => makeCard(`${prefix}-${i}`, { bonus, points }));
}

export function makeNoble(id: string, requirements: GemRecord, points = 3): Noble {
  return { id, points, requirements: gems(requirements) };
}

export function makePlayer(
  id: number,
  fields: {
    tokens?: GemRecord;
    cards?: DevelopmentCard[];
    reserved?: DevelopmentCard[];
    nobles?: Noble[];
  } = {},
): Player {
  return new Player({
    id,
    tokens: gems(fields.tokens),
    cards: fields.cards ?? [],
    reserved: fields.reserved ?? [],
    nobles: fields.nobles ?? [],
  });
}

export interface StateOverrides extends Partial<Omit<GameStateFields, 'config' | 'bank' | 'visible' | 'decks'>> {
  config?: GameConfigInput;
  bank?: GemRecord;
  visible?: Partial<Record<Tier, DevelopmentCard[]>>;
  decks?: Partial<Record<Tier, DevelopmentCard[]>>;
}

/**
 * A state with empty rows and decks, a full starting bank and fresh
 * players, unless overridden.
 */
export function buildState(overrides: StateOverrides = {}): GameState {
  const config = createGameConfig({ playerCount: 2, ...overrides.config });
  return new GameState({
    config,
    players:
      overrides.players ??
      Array.from({ length: config.playerCount }, (_, i) => Player.create(i)),
    currentPlayerIndex: overrides.currentPlayerIndex ?? 0,
    bank: overrides.bank ? gems(overrides.bank) : tokenSupplyFor(config.playerCount),
    decks: {
      1: overrides.decks?.[1] ?? [],
      2: overrides.decks?.[2] ?? [],
      3: overrides.decks?.[3] ?? [],
    },
    visible: {
      1: overrides.visible?.[1] ?? [],
      2: overrides.visible?.[2] ?? [],
      3: overrides.visible?.[3] ?? [],
    },
    nobles: overrides.nobles ?? [],
    turnNumber: overrides.turnNumber ?? 0,
    isFinalRound: overrides.isFinalRound ?? false,
    firstPlayerToWin: overrides.firstPlayerToWin ?? null,
    gameOver: overrides.gameOver ?? false,
    winner: overrides.winner ?? null,
  });
}

/** Bank plus every player's holding of one kind. */
export function totalOf(state: GameState, kind: TokenKind): number {
  return state.bank.get(kind) + state.players.reduce((sum, p) => sum + p.tokens.get(kind), 0);
}

/** Every card id anywhere in the state. */
export function allCardIds(state: GameState): string[] {
  const ids: string[] = [];
  for (const tier of [1, 2, 3] as const) {
    ids.push(...state.decks[tier].map(c => c.id), ...state.visible[tier].map(c => c.id));
  }
  for (const p of state.players) {
    ids.push(...p.cards.map(c => c.id), ...p.reserved.map(c => c.id));
  }
  return ids;
}
