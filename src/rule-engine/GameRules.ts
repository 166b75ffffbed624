/**
 * GameRules.ts
 *
 * Pure rules: action execution, token-limit settlement, noble visits
 * and the full step pipeline. Nothing here holds state; every function
 * takes a GameState and returns a new one, or throws a RuleViolation
 * and leaves its input untouched.
 */

import { RuleViolation, assertNever } from '../core-engine/EngineErrors';
import { GemCollection, isGemColor, type TokenKind } from '../card-system/GemCollection';
import type { DevelopmentCard } from '../card-system/DevelopmentCard';
import { type Noble, nobleQualifies } from '../card-system/Noble';
import type {
  Action,
  PurchaseReservedAction,
  PurchaseVisibleAction,
  ReserveDeckAction,
  ReserveVisibleAction,
  TakeDifferentAction,
  TakeSameAction,
} from './Actions';
import type { GameState } from './GameState';
import type { Player } from './Player';

/** Bank must hold at least this many of a colour to take two of it. */
export const TAKE_SAME_MIN_BANK = 4;

// ---------------------------------------------------------------------------
// Step result
// ---------------------------------------------------------------------------

export interface StepOutcome {
  /** State after all four phases, turn already advanced. */
  readonly state: GameState;
  /** Seat that acted. */
  readonly playerIndex: number;
  /** Noble that visited during this step, if any. */
  readonly noble: Noble | null;
  /** True when this step reached the threshold and opened the final round. */
  readonly finalRoundStarted: boolean;
}

// ---------------------------------------------------------------------------
// Token limit
// ---------------------------------------------------------------------------

interface Holdings {
  player: Player;
  bank: GemCollection;
}

/**
 * Bring a player back to the token cap by handing `returns` to the bank
 * one at a time. Stops as soon as the cap is met; does nothing when the
 * player is already within it.
 *
 * @throws RuleViolation INVALID_RETURN for a kind the player does not
 *   hold, TOKEN_LIMIT when the list runs out above the cap.
 */
export function settleTokenLimit(
  holdings: Holdings,
  returns: readonly TokenKind[],
  maxTokens: number,
): Holdings {
  let { player, bank } = holdings;
  if (player.tokenCount <= maxTokens) return holdings;

  for (const kind of returns) {
    if (player.tokenCount <= maxTokens) break;
    if (player.tokens.get(kind) <= 0) {
      throw new RuleViolation(
        'INVALID_RETURN',
        `Cannot return ${kind}: player ${player.id} holds none`,
        { kind, playerId: player.id },
      );
    }
    player = player.removeTokens(GemCollection.single(kind));
    bank = bank.addGem(kind);
  }

  if (player.tokenCount > maxTokens) {
    throw new RuleViolation(
      'TOKEN_LIMIT',
      `Player ${player.id} holds ${player.tokenCount} tokens, must return to ${maxTokens}`,
      { tokenCount: player.tokenCount, maxTokens, playerId: player.id },
    );
  }

  return { player, bank };
}

function commit(state: GameState, holdings: Holdings): GameState {
  return state.withCurrentPlayer(holdings.player).withBank(holdings.bank);
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

function executeTakeDifferent(state: GameState, action: TakeDifferentAction): GameState {
  let taken = GemCollection.empty();
  for (const kind of action.colors) {
    if (!isGemColor(kind)) {
      throw new RuleViolation('WILDCARD_NOT_ALLOWED', `Cannot take ${kind} tokens directly`, {
        kind,
      });
    }
    if (state.bank.get(kind) < 1) {
      throw new RuleViolation('INSUFFICIENT_BANK', `No ${kind} tokens available in the bank`, {
        kind,
        available: 0,
      });
    }
    taken = taken.addGem(kind);
  }

  return commit(
    state,
    settleTokenLimit(
      { player: state.currentPlayer.addTokens(taken), bank: state.bank.subtract(taken) },
      action.returns,
      state.config.maxTokens,
    ),
  );
}

function executeTakeSame(state: GameState, action: TakeSameAction): GameState {
  const kind = action.color;
  if (!isGemColor(kind)) {
    throw new RuleViolation('WILDCARD_NOT_ALLOWED', `Cannot take ${kind} tokens directly`, {
      kind,
    });
  }
  const available = state.bank.get(kind);
  if (available < TAKE_SAME_MIN_BANK) {
    throw new RuleViolation(
      'INSUFFICIENT_BANK',
      `Need at least ${TAKE_SAME_MIN_BANK} ${kind} tokens in the bank to take 2 (only ${available} available)`,
      { kind, available },
    );
  }

  const taken = GemCollection.single(kind, 2);
  return commit(
    state,
    settleTokenLimit(
      { player: state.currentPlayer.addTokens(taken), bank: state.bank.subtract(taken) },
      action.returns,
      state.config.maxTokens,
    ),
  );
}

function checkReserveLimit(state: GameState): void {
  const player = state.currentPlayer;
  if (!player.canReserve(state.config.maxReserved)) {
    throw new RuleViolation(
      'RESERVE_LIMIT',
      `Cannot reserve more than ${state.config.maxReserved} cards`,
      { playerId: player.id, reserved: player.reserved.length },
    );
  }
}

/** Reserved card goes to the current player, with a gold if the bank has one. */
function finishReserve(
  state: GameState,
  card: DevelopmentCard,
  returns: readonly TokenKind[],
): GameState {
  let player = state.currentPlayer.addReserved(card, state.config.maxReserved);
  let bank = state.bank;
  if (bank.get('gold') > 0) {
    player = player.addTokens(GemCollection.single('gold'));
    bank = bank.removeGem('gold');
  }
  return commit(state, settleTokenLimit({ player, bank }, returns, state.config.maxTokens));
}

function executeReserveVisible(state: GameState, action: ReserveVisibleAction): GameState {
  checkReserveLimit(state);
  const found = state.findVisibleCard(action.cardId);
  if (!found) {
    throw new RuleViolation('CARD_NOT_FOUND', `Card ${action.cardId} is not face up`, {
      cardId: action.cardId,
    });
  }
  return finishReserve(state.removeVisibleAt(found.tier, found.index), found.card, action.returns);
}

function executeReserveDeck(state: GameState, action: ReserveDeckAction): GameState {
  checkReserveLimit(state);
  const deck = state.decks[action.tier];
  if (deck.length === 0) {
    throw new RuleViolation('EMPTY_DECK', `Tier ${action.tier} deck is empty`, {
      tier: action.tier,
    });
  }
  return finishReserve(state.withDeck(action.tier, deck.slice(1)), deck[0], action.returns);
}

function pay(state: GameState, player: Player, cost: GemCollection, cardId: string): Holdings {
  if (!player.canAfford(cost)) {
    throw new RuleViolation('CANNOT_AFFORD', `Cannot afford card ${cardId}`, {
      cardId,
      goldShort: player.goldNeededFor(cost) - player.tokens.get('gold'),
    });
  }
  const payment = player.paymentFor(cost);
  return { player: player.removeTokens(payment), bank: state.bank.add(payment) };
}

function executePurchaseVisible(state: GameState, action: PurchaseVisibleAction): GameState {
  const found = state.findVisibleCard(action.cardId);
  if (!found) {
    throw new RuleViolation('CARD_NOT_FOUND', `Card ${action.cardId} is not face up`, {
      cardId: action.cardId,
    });
  }
  const { player, bank } = pay(state, state.currentPlayer, found.card.cost, found.card.id);
  return commit(state.removeVisibleAt(found.tier, found.index), {
    player: player.addCard(found.card),
    bank,
  });
}

function executePurchaseReserved(state: GameState, action: PurchaseReservedAction): GameState {
  const card = state.currentPlayer.findReserved(action.cardId);
  if (!card) {
    throw new RuleViolation('CARD_NOT_FOUND', `Card ${action.cardId} is not reserved`, {
      cardId: action.cardId,
    });
  }
  const { player, bank } = pay(state, state.currentPlayer, card.cost, card.id);
  return commit(state, {
    player: player.removeReserved(card.id).addCard(card),
    bank,
  });
}

/**
 * Phase 1: execute an action for the current player.
 *
 * @throws RuleViolation when the action is illegal in `state`.
 */
export function executeAction(state: GameState, action: Action): GameState {
  switch (action.type) {
    case 'take-different':
      return executeTakeDifferent(state, action);
    case 'take-same':
      return executeTakeSame(state, action);
    case 'reserve-visible':
      return executeReserveVisible(state, action);
    case 'reserve-deck':
      return executeReserveDeck(state, action);
    case 'purchase-visible':
      return executePurchaseVisible(state, action);
    case 'purchase-reserved':
      return executePurchaseReserved(state, action);
    default:
      return assertNever(action, 'action');
  }
}

// ---------------------------------------------------------------------------
// Noble visit
// ---------------------------------------------------------------------------

/**
 * Phase 2: the first noble in pool order whose requirements the current
 * player's bonuses meet moves to that player. At most one per step.
 */
export function resolveNobleVisit(state: GameState): { state: GameState; noble: Noble | null } {
  const player = state.currentPlayer;
  const bonuses = player.bonuses;
  const noble = state.nobles.find(n => nobleQualifies(n, bonuses));
  if (!noble) return { state, noble: null };

  return {
    state: state
      .withCurrentPlayer(player.addNoble(noble))
      .withNobles(state.nobles.filter(n => n.id !== noble.id)),
    noble,
  };
}

// ---------------------------------------------------------------------------
// Full step
// ---------------------------------------------------------------------------

/**
 * Run all four phases: execute, noble check, win check, advance turn.
 * Does not check sequencing (game over); that is the engine's job.
 */
export function applyAction(state: GameState, action: Action): StepOutcome {
  const playerIndex = state.currentPlayerIndex;
  const executed = executeAction(state, action);
  const visited = resolveNobleVisit(executed);
  const checked = visited.state.checkWinner();

  return {
    state: checked.advanceTurn(),
    playerIndex,
    noble: visited.noble,
    finalRoundStarted: checked.isFinalRound && !state.isFinalRound,
  };
}

