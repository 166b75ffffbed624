/**
 * GameConfig.ts
 *
 * Immutable game configuration plus the setup constants derived from
 * the player count.
 */

import { z } from 'zod';
import { SetupError } from '../core-engine/EngineErrors';
import { GEM_COLORS, GemCollection } from '../card-system/GemCollection';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export type PlayerCount = 2 | 3 | 4;

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 4;

/** Base-colour supply per player count. */
export const TOKENS_BY_PLAYER_COUNT: Readonly<Record<PlayerCount, number>> = {
  2: 4,
  3: 5,
  4: 7,
};

/** Gold supply, independent of player count. */
export const GOLD_TOKENS = 5;

/** Face-up cards per tier. */
export const VISIBLE_CARDS_PER_TIER = 4;

export const DEFAULT_WINNING_POINTS = 15;
export const DEFAULT_MAX_TOKENS = 10;
export const DEFAULT_MAX_RESERVED = 3;

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface GameConfig {
  readonly playerCount: PlayerCount;
  readonly winningPoints: number;
  readonly maxTokens: number;
  readonly maxReserved: number;
}

/** Loose input form: the player count is checked at run time. */
export interface GameConfigInput {
  playerCount?: number;
  winningPoints?: number;
  maxTokens?: number;
  maxReserved?: number;
}

const PlayerCountSchema = z.union([z.literal(2), z.literal(3), z.literal(4)]);

const GameConfigSchema = z
  .object({
    playerCount: z.number().default(2),
    winningPoints: z.number().int().positive().default(DEFAULT_WINNING_POINTS),
    maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
    maxReserved: z.number().int().positive().default(DEFAULT_MAX_RESERVED),
  })
  .strict();

export function isPlayerCount(value: number): value is PlayerCount {
  return PlayerCountSchema.safeParse(value).success;
}

/**
 * Validate a partial configuration and fill in defaults.
 *
 * @throws SetupError INVALID_PLAYER_COUNT when the player count is not 2-4,
 *   INVALID_CONFIG for any other bad field.
 */
export function createGameConfig(input: GameConfigInput = {}): GameConfig {
  const parsed = GameConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new SetupError(
      'INVALID_CONFIG',
      `Invalid game config: ${parsed.error.issues
        .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ')}`,
    );
  }

  const { playerCount, winningPoints, maxTokens, maxReserved } = parsed.data;
  if (!isPlayerCount(playerCount)) {
    throw new SetupError(
      'INVALID_PLAYER_COUNT',
      `Invalid player count: ${playerCount}. Must be ${MIN_PLAYERS}-${MAX_PLAYERS}.`,
      { playerCount },
    );
  }

  return Object.freeze({ playerCount, winningPoints, maxTokens, maxReserved });
}

/** Starting bank for the given player count. */
export function tokenSupplyFor(playerCount: PlayerCount): GemCollection {
  const perColor = TOKENS_BY_PLAYER_COUNT[playerCount];
  let bank = GemCollection.single('gold', GOLD_TOKENS);
  for (const c of GEM_COLORS) bank = bank.withCount(c, perColor);
  return bank;
}

/** Nobles revealed at setup. */
export function nobleCountFor(playerCount: PlayerCount): number {
  return playerCount + 1;
}
