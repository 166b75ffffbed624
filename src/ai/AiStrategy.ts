/**
 * AiStrategy.ts
 *
 * Decision makers for the gem market. Every strategy chooses from the
 * legal actions the engine enumerates, so it can never submit an
 * illegal move; strategies only decide, they never mutate state.
 */

import { InvariantViolation } from '../core-engine/EngineErrors';
import type { RandomSource } from '../core-engine/SeededRng';
import { GEM_COLORS, type GemColor } from '../card-system/GemCollection';
import { TIERS, type DevelopmentCard } from '../card-system/DevelopmentCard';
import type { Action } from '../rule-engine/Actions';
import type { GameState } from '../rule-engine/GameState';
import type { Player } from '../rule-engine/Player';

// ---------------------------------------------------------------------------
// Strategy interface
// ---------------------------------------------------------------------------

export interface DecisionMaker {
  readonly name: string;
  /**
   * Pick one of `validActions` for the current player of `state` and
   * return it as listed, returns included. `validActions` is never
   * empty; `playGame` stops before asking when it would be.
   */
  chooseAction(state: GameState, validActions: readonly Action[], rng: RandomSource): Action;
}

function pickRandom<T>(items: readonly T[], rng: RandomSource): T {
  if (items.length === 0) {
    throw new InvariantViolation('UNREACHABLE', 'No legal actions available');
  }
  return items[Math.floor(rng() * items.length)];
}

// ---------------------------------------------------------------------------
// Random strategy: any legal action
// ---------------------------------------------------------------------------

export const RandomStrategy: DecisionMaker = {
  name: 'Random',

  chooseAction(_state, validActions, rng) {
    return pickRandom(validActions, rng);
  },
};

// ---------------------------------------------------------------------------
// Purchase-first strategy: buy when possible, otherwise random
// ---------------------------------------------------------------------------

export const PurchaseFirstStrategy: DecisionMaker = {
  name: 'PurchaseFirst',

  chooseAction(_state, validActions, rng) {
    const purchases = validActions.filter(
      a => a.type === 'purchase-visible' || a.type === 'purchase-reserved',
    );
    return pickRandom(purchases.length > 0 ? purchases : validActions, rng);
  },
};

// ---------------------------------------------------------------------------
// Greedy strategy: prefers high-value purchases
// ---------------------------------------------------------------------------

export const GreedyStrategy: DecisionMaker = {
  name: 'Greedy',

  chooseAction(state, validActions, rng) {
    const player = state.currentPlayer;
    const candidates = availableCards(state, player);

    // Priority 1: purchase the highest-value affordable card
    let bestPurchase: Action | null = null;
    let bestPurchaseScore = -Infinity;
    for (const action of validActions) {
      if (action.type !== 'purchase-visible' && action.type !== 'purchase-reserved') continue;
      const card = candidates.find(c => c.id === action.cardId);
      if (!card) continue;
      const score = card.points * 10 + scoreNobleProgress(state, player, card.bonus) + card.tier;
      if (score > bestPurchaseScore) {
        bestPurchaseScore = score;
        bestPurchase = action;
      }
    }
    if (bestPurchase) return bestPurchase;

    // Priority 2: reserve a valuable face-up card when close to affording it
    if (player.reserved.length < 2) {
      let bestReserve: Action | null = null;
      let bestScore = -Infinity;
      for (const action of validActions) {
        if (action.type !== 'reserve-visible') continue;
        const found = state.findVisibleCard(action.cardId);
        if (!found || found.card.points < 2) continue;
        const score = found.card.points * 10 - shortfall(player, found.card);
        if (score > bestScore) {
          bestScore = score;
          bestReserve = action;
        }
      }
      if (bestReserve && bestScore > 5) {
        return bestReserve;
      }
    }

    // Priority 3: take tokens toward the most attractive card
    const tokenActions = validActions.filter(
      a => a.type === 'take-different' || a.type === 'take-same',
    );
    if (tokenActions.length > 0 && candidates.length > 0) {
      let target = candidates[0];
      let bestValue = -Infinity;
      for (const card of candidates) {
        const value = card.points * 10 - shortfall(player, card);
        if (value > bestValue) {
          bestValue = value;
          target = card;
        }
      }

      const need = (c: GemColor): number =>
        Math.max(0, target.cost.get(c) - player.bonuses.get(c)) - player.tokens.get(c);

      let bestAction = tokenActions[0];
      let bestActionScore = -Infinity;
      for (const action of tokenActions) {
        let score = 0;
        if (action.type === 'take-different') {
          for (const kind of action.colors) {
            if (kind === 'gold') continue;
            // still some value in diversifying
            score += need(kind) > 0 ? 2 : 0.5;
          }
        } else if (action.type === 'take-same' && action.color !== 'gold') {
          const n = need(action.color);
          score = n >= 2 ? 4 : n === 1 ? 2 : 1;
        }
        if (score > bestActionScore) {
          bestActionScore = score;
          bestAction = action;
        }
      }

      return bestAction;
    }

    // Fallback: random action
    return pickRandom(validActions, rng);
  },
};

// ---------------------------------------------------------------------------
// AI Player class
// ---------------------------------------------------------------------------

export class AiPlayer {
  constructor(
    private strategy: DecisionMaker = GreedyStrategy,
    private rng: RandomSource = Math.random,
  ) {}

  chooseAction(state: GameState, validActions: readonly Action[]): Action {
    return this.strategy.chooseAction(state, validActions, this.rng);
  }

  get strategyName(): string {
    return this.strategy.name;
  }
}

/** Look up a built-in strategy by (case-insensitive) name. */
export function strategyByName(name: string): DecisionMaker | undefined {
  return [RandomStrategy, PurchaseFirstStrategy, GreedyStrategy].find(
    s => s.name.toLowerCase() === name.toLowerCase(),
  );
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Face-up cards plus the player's own reserved cards. */
function availableCards(state: GameState, player: Player): DevelopmentCard[] {
  const cards: DevelopmentCard[] = [];
  for (const tier of TIERS) cards.push(...state.visible[tier]);
  cards.push(...player.reserved);
  return cards;
}

/** Tokens still missing for a card after bonuses, gold ignored. */
function shortfall(player: Player, card: DevelopmentCard): number {
  const bonuses = player.bonuses;
  let total = 0;
  for (const c of GEM_COLORS) {
    const cost = Math.max(0, card.cost.get(c) - bonuses.get(c));
    total += Math.max(0, cost - player.tokens.get(c));
  }
  return total;
}

/** Score how much a bonus color helps toward visiting a noble. */
function scoreNobleProgress(state: GameState, player: Player, bonusColor: GemColor): number {
  const bonuses = player.bonuses;
  let bestScore = 0;
  for (const noble of state.nobles) {
    const req = noble.requirements.get(bonusColor);
    if (req > 0 && bonuses.get(bonusColor) < req) {
      let totalProgress = 0;
      let totalReq = 0;
      for (const c of GEM_COLORS) {
        const r = noble.requirements.get(c);
        totalReq += r;
        totalProgress += Math.min(bonuses.get(c) + (c === bonusColor ? 1 : 0), r);
      }
      const progressRatio = totalReq > 0 ? totalProgress / totalReq : 0;
      bestScore = Math.max(bestScore, progressRatio * 3);
    }
  }
  return bestScore;
}
