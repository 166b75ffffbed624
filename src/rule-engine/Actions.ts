/**
 * Actions.ts
 *
 * The closed catalogue of turn actions.
 *
 * Factories check structure only (arity, distinct colours, tier range,
 * card id present). Whether an action is legal in a given state is
 * decided by the rules, never here.
 */

import { z } from 'zod';
import { MalformedActionError, assertNever } from '../core-engine/EngineErrors';
import { type TokenKind, TOKEN_KINDS, gemAbbrev } from '../card-system/GemCollection';
import { type Tier, isTier } from '../card-system/DevelopmentCard';

// ---------------------------------------------------------------------------
// Action types
// ---------------------------------------------------------------------------

/**
 * Requested kinds are typed as TokenKind, not GemColor, so a request for
 * gold is representable and rejected by the rules with
 * WILDCARD_NOT_ALLOWED.
 */
export interface TakeDifferentAction {
  readonly type: 'take-different';
  readonly colors: readonly TokenKind[];
  /** Tokens handed back, one at a time, if the take goes over the cap. */
  readonly returns: readonly TokenKind[];
}

export interface TakeSameAction {
  readonly type: 'take-same';
  readonly color: TokenKind;
  readonly returns: readonly TokenKind[];
}

export interface ReserveVisibleAction {
  readonly type: 'reserve-visible';
  readonly cardId: string;
  readonly returns: readonly TokenKind[];
}

export interface ReserveDeckAction {
  readonly type: 'reserve-deck';
  readonly tier: Tier;
  readonly returns: readonly TokenKind[];
}

export interface PurchaseVisibleAction {
  readonly type: 'purchase-visible';
  readonly cardId: string;
}

export interface PurchaseReservedAction {
  readonly type: 'purchase-reserved';
  readonly cardId: string;
}

export type Action =
  | TakeDifferentAction
  | TakeSameAction
  | ReserveVisibleAction
  | ReserveDeckAction
  | PurchaseVisibleAction
  | PurchaseReservedAction;

export type ActionType = Action['type'];

export const ACTION_TYPES: readonly ActionType[] = [
  'take-different',
  'take-same',
  'reserve-visible',
  'reserve-deck',
  'purchase-visible',
  'purchase-reserved',
] as const;

/** Actions that may carry a `returns` list. */
export type TokenGainAction =
  | TakeDifferentAction
  | TakeSameAction
  | ReserveVisibleAction
  | ReserveDeckAction;

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function checkCardId(cardId: string): void {
  if (cardId.trim() === '') {
    throw new MalformedActionError('Card id must be a non-empty string', { cardId });
  }
}

function freezeReturns(returns: readonly TokenKind[]): readonly TokenKind[] {
  return Object.freeze([...returns]);
}

/** @throws MalformedActionError unless 1-3 distinct kinds are given. */
export function takeDifferent(
  colors: readonly TokenKind[],
  returns: readonly TokenKind[] = [],
): TakeDifferentAction {
  if (colors.length < 1 || colors.length > 3) {
    throw new MalformedActionError(
      `Must request 1-3 tokens of different colors, got ${colors.length}`,
      { colors: [...colors] },
    );
  }
  if (new Set(colors).size !== colors.length) {
    throw new MalformedActionError('Requested colors must be distinct', {
      colors: [...colors],
    });
  }
  const action: TakeDifferentAction = {
    type: 'take-different',
    colors: Object.freeze([...colors]),
    returns: freezeReturns(returns),
  };
  return Object.freeze(action);
}

export function takeSame(
  color: TokenKind,
  returns: readonly TokenKind[] = [],
): TakeSameAction {
  const action: TakeSameAction = { type: 'take-same', color, returns: freezeReturns(returns) };
  return Object.freeze(action);
}

/** @throws MalformedActionError on an empty card id. */
export function reserveVisible(
  cardId: string,
  returns: readonly TokenKind[] = [],
): ReserveVisibleAction {
  checkCardId(cardId);
  const action: ReserveVisibleAction = {
    type: 'reserve-visible',
    cardId,
    returns: freezeReturns(returns),
  };
  return Object.freeze(action);
}

/** @throws MalformedActionError when the tier is not 1, 2 or 3. */
export function reserveFromDeck(
  tier: number,
  returns: readonly TokenKind[] = [],
): ReserveDeckAction {
  if (!isTier(tier)) {
    throw new MalformedActionError(`Tier must be 1, 2 or 3, got ${tier}`, { tier });
  }
  const action: ReserveDeckAction = { type: 'reserve-deck', tier, returns: freezeReturns(returns) };
  return Object.freeze(action);
}

export function purchaseVisible(cardId: string): PurchaseVisibleAction {
  checkCardId(cardId);
  const action: PurchaseVisibleAction = { type: 'purchase-visible', cardId };
  return Object.freeze(action);
}

export function purchaseReserved(cardId: string): PurchaseReservedAction {
  checkCardId(cardId);
  const action: PurchaseReservedAction = { type: 'purchase-reserved', cardId };
  return Object.freeze(action);
}

/** Same action with a different `returns` list. */
export function withReturns<A extends TokenGainAction>(
  action: A,
  returns: readonly TokenKind[],
): A {
  const next: A = { ...action, returns: freezeReturns(returns) };
  return next;
}

export function carriesReturns(action: Action): action is TokenGainAction {
  return action.type !== 'purchase-visible' && action.type !== 'purchase-reserved';
}

// ---------------------------------------------------------------------------
// Parsing untrusted input
// ---------------------------------------------------------------------------

const TokenKindSchema = z.enum(['diamond', 'sapphire', 'emerald', 'ruby', 'onyx', 'gold']);
const ReturnsSchema = z.array(TokenKindSchema).default([]);

const ActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('take-different'), colors: z.array(TokenKindSchema), returns: ReturnsSchema }),
  z.object({ type: z.literal('take-same'), color: TokenKindSchema, returns: ReturnsSchema }),
  z.object({ type: z.literal('reserve-visible'), cardId: z.string(), returns: ReturnsSchema }),
  z.object({ type: z.literal('reserve-deck'), tier: z.number().int(), returns: ReturnsSchema }),
  z.object({ type: z.literal('purchase-visible'), cardId: z.string() }),
  z.object({ type: z.literal('purchase-reserved'), cardId: z.string() }),
]);

/**
 * Build an action from untrusted JSON, e.g. a transcript entry or a
 * decision maker on the other side of a wire.
 *
 * @throws MalformedActionError when the value is not a well-formed action.
 */
export function parseAction(raw: unknown): Action {
  const parsed = ActionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedActionError(
      `Malformed action: ${parsed.error.issues
        .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ')}`,
    );
  }

  const data = parsed.data;
  switch (data.type) {
    case 'take-different':
      return takeDifferent(data.colors, data.returns);
    case 'take-same':
      return takeSame(data.color, data.returns);
    case 'reserve-visible':
      return reserveVisible(data.cardId, data.returns);
    case 'reserve-deck':
      return reserveFromDeck(data.tier, data.returns);
    case 'purchase-visible':
      return purchaseVisible(data.cardId);
    case 'purchase-reserved':
      return purchaseReserved(data.cardId);
    default:
      return assertNever(data, 'action type');
  }
}

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

function returnsSuffix(returns: readonly TokenKind[]): string {
  if (returns.length === 0) return '';
  return ` (return ${returns.map(gemAbbrev).join(' ')})`;
}

/** Short human-readable label, e.g. "take W U G" or "buy t1-07". */
export function describeAction(action: Action): string {
  switch (action.type) {
    case 'take-different':
      return `take ${action.colors.map(gemAbbrev).join(' ')}${returnsSuffix(action.returns)}`;
    case 'take-same':
      return `take 2${gemAbbrev(action.color)}${returnsSuffix(action.returns)}`;
    case 'reserve-visible':
      return `reserve ${action.cardId}${returnsSuffix(action.returns)}`;
    case 'reserve-deck':
      return `reserve tier ${action.tier} deck${returnsSuffix(action.returns)}`;
    case 'purchase-visible':
      return `buy ${action.cardId}`;
    case 'purchase-reserved':
      return `buy reserved ${action.cardId}`;
    default:
      return assertNever(action, 'action');
  }
}

/**
 * Stable identity string. Two actions with the same key have the same
 * effect: colour order in a take does not matter, return order does.
 */
export function actionKey(action: Action): string {
  const ret = carriesReturns(action) && action.returns.length > 0
    ? `|${action.returns.join(',')}`
    : '';
  switch (action.type) {
    case 'take-different': {
      const colors = TOKEN_KINDS.filter(k => action.colors.includes(k));
      return `take-different:${colors.join(',')}${ret}`;
    }
    case 'take-same':
      return `take-same:${action.color}${ret}`;
    case 'reserve-visible':
      return `reserve-visible:${action.cardId}${ret}`;
    case 'reserve-deck':
      return `reserve-deck:${action.tier}${ret}`;
    case 'purchase-visible':
      return `purchase-visible:${action.cardId}`;
    case 'purchase-reserved':
      return `purchase-reserved:${action.cardId}`;
    default:
      return assertNever(action, 'action');
  }
}
