/**
 * Noble tiles.
 *
 * A noble visits the first player whose card bonuses meet its
 * requirements and is removed from the pool at that moment.
 */

import { GEM_COLORS, GemCollection, formatGems } from './GemCollection';

/** Every noble is worth this many points. */
export const NOBLE_POINTS = 3;

export interface Noble {
  readonly id: string;
  readonly points: number;
  /** Bonus thresholds per base color. Gold is always 0. */
  readonly requirements: GemCollection;
}

export function sameNoble(a: Noble, b: Noble): boolean {
  return a.id === b.id;
}

/** True when the bonuses meet every base-color requirement. */
export function nobleQualifies(noble: Noble, bonuses: GemCollection): boolean {
  return GEM_COLORS.every(c => bonuses.get(c) >= noble.requirements.get(c));
}

export function nobleLabel(noble: Noble): string {
  return `Noble [${noble.points}pt] (${formatGems(noble.requirements)})`;
}
