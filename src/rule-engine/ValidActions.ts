/**
 * ValidActions.ts
 *
 * Enumerate every legal action for the current player. Used by decision
 * makers; the engine itself never consults this list when stepping.
 */

import {
  GEM_COLORS,
  GemCollection,
  type GemColor,
  type TokenKind,
  TOKEN_KINDS,
} from '../card-system/GemCollection';
import { TIERS } from '../card-system/DevelopmentCard';
import {
  type Action,
  purchaseReserved,
  purchaseVisible,
  reserveFromDeck,
  reserveVisible,
  takeDifferent,
  takeSame,
} from './Actions';
import { TAKE_SAME_MIN_BANK } from './GameRules';
import type { GameState } from './GameState';

/** All `size`-element combinations of `items`, in input order. */
export function combinations<T>(items: readonly T[], size: number): T[][] {
  if (size === 0) return [[]];
  const result: T[][] = [];
  for (let i = 0; i <= items.length - size; i++) {
    for (const rest of combinations(items.slice(i + 1), size - 1)) {
      result.push([items[i], ...rest]);
    }
  }
  return result;
}

/**
 * Canonical tokens to hand back when a gain leaves `tokens` over the cap:
 * repeatedly the most-held kind, ties going to the earlier kind in
 * TOKEN_KINDS order. Returns null when `count` tokens cannot be found.
 */
export function canonicalReturns(
  tokens: GemCollection,
  count: number,
  exclude?: TokenKind,
): TokenKind[] | null {
  const returns: TokenKind[] = [];
  let remaining = tokens;
  for (let n = 0; n < count; n++) {
    let best: TokenKind | null = null;
    for (const kind of TOKEN_KINDS) {
      if (kind === exclude) continue;
      const held = remaining.get(kind);
      if (held > 0 && (best === null || held > remaining.get(best))) best = kind;
    }
    if (best === null) return null;
    returns.push(best);
    remaining = remaining.removeGem(best);
  }
  return returns;
}

/**
 * Returns needed once `gained` lands in the current player's hand, or
 * null when the gain cannot be settled.
 */
function returnsAfterGain(
  state: GameState,
  gained: GemCollection,
  exclude?: TokenKind,
): TokenKind[] | null {
  const after = state.currentPlayer.tokens.add(gained);
  const over = after.total() - state.config.maxTokens;
  if (over <= 0) return [];
  return canonicalReturns(after, over, exclude);
}

function tokenActions(state: GameState): Action[] {
  const actions: Action[] = [];
  const room = state.config.maxTokens - state.currentPlayer.tokenCount;
  const available: GemColor[] = GEM_COLORS.filter(c => state.bank.get(c) > 0);

  const canTake = Math.min(3, room, available.length);
  if (canTake > 0) {
    for (const combo of combinations(available, canTake)) {
      actions.push(takeDifferent(combo));
    }
  } else {
    // At the cap: a single take paired with a return of some other kind.
    for (const color of available) {
      const returns = returnsAfterGain(state, GemCollection.single(color), color);
      if (returns) actions.push(takeDifferent([color], returns));
    }
  }

  if (room >= 2) {
    for (const color of GEM_COLORS) {
      if (state.bank.get(color) >= TAKE_SAME_MIN_BANK) {
        actions.push(takeSame(color));
      }
    }
  }

  return actions;
}

function reserveActions(state: GameState): Action[] {
  if (!state.currentPlayer.canReserve(state.config.maxReserved)) return [];

  const gold = state.bank.get('gold') > 0 ? GemCollection.single('gold') : GemCollection.empty();
  const returns = returnsAfterGain(state, gold);
  if (!returns) return [];

  const actions: Action[] = [];
  for (const tier of TIERS) {
    for (const card of state.visible[tier]) {
      actions.push(reserveVisible(card.id, returns));
    }
    if (state.decks[tier].length > 0) {
      actions.push(reserveFromDeck(tier, returns));
    }
  }
  return actions;
}

function purchaseActions(state: GameState): Action[] {
  const player = state.currentPlayer;
  const actions: Action[] = [];
  for (const tier of TIERS) {
    for (const card of state.visible[tier]) {
      if (player.canAfford(card.cost)) actions.push(purchaseVisible(card.id));
    }
  }
  for (const card of player.reserved) {
    if (player.canAfford(card.cost)) actions.push(purchaseReserved(card.id));
  }
  return actions;
}

/**
 * Every legal action for the current player, in a stable order: token
 * takes, reservations, then purchases. Empty once the game is over.
 */
export function listValidActions(state: GameState): Action[] {
  if (state.gameOver) return [];
  return [...tokenActions(state), ...reserveActions(state), ...purchaseActions(state)];
}
