/**
 * Development cards.
 *
 * Cards are immutable values. They move between containers
 * (deck -> visible row -> reserved / owned) by copy of the reference;
 * nothing ever edits a card in place. Identity is the `id` alone.
 */

import { type GemColor, GemCollection, formatGems, gemAbbrev } from './GemCollection';

export type Tier = 1 | 2 | 3;

export const TIERS: readonly Tier[] = [1, 2, 3] as const;

/** A value per tier, e.g. one deck or visible row per tier. */
export type TierRecord<T> = Readonly<Record<Tier, T>>;

export interface DevelopmentCard {
  readonly id: string;
  readonly tier: Tier;
  /** Permanent bonus granted once purchased. Never gold. */
  readonly bonus: GemColor;
  /** Prestige points, 0-5. */
  readonly points: number;
  /** Purchase cost. Gold count is always 0. */
  readonly cost: GemCollection;
}

export function isTier(value: number): value is Tier {
  return value === 1 || value === 2 || value === 3;
}

export function sameCard(a: DevelopmentCard, b: DevelopmentCard): boolean {
  return a.id === b.id;
}

export function findCardById(
  cards: readonly DevelopmentCard[],
  id: string,
): DevelopmentCard | undefined {
  return cards.find(c => c.id === id);
}

export function mapTiers<T>(fn: (tier: Tier) => T): TierRecord<T> {
  return { 1: fn(1), 2: fn(2), 3: fn(3) };
}

/** Format a card as a display label, e.g. "T2 R [2pt] (1W 4U 2G)". */
export function cardLabel(card: DevelopmentCard): string {
  const pts = card.points > 0 ? ` [${card.points}pt]` : '';
  return `T${card.tier} ${gemAbbrev(card.bonus)}${pts} (${formatGems(card.cost)})`;
}
