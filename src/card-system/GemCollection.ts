/**
 * Gem kinds and the immutable token ledger.
 *
 * A GemCollection is used for token holdings (bank and players, which
 * may include gold), card costs, player bonuses and noble
 * requirements (which never include gold).
 */

import { InvariantViolation } from '../core-engine/EngineErrors';

// ---------------------------------------------------------------------------
// Gem kinds
// ---------------------------------------------------------------------------

/** The five base colors. */
export type GemColor = 'diamond' | 'sapphire' | 'emerald' | 'ruby' | 'onyx';

/** Base colors plus the gold wildcard. */
export type TokenKind = GemColor | 'gold';

export const GEM_COLORS: readonly GemColor[] = [
  'diamond',
  'sapphire',
  'emerald',
  'ruby',
  'onyx',
] as const;

export const TOKEN_KINDS: readonly TokenKind[] = [...GEM_COLORS, 'gold'] as const;

export function isGemColor(kind: string): kind is GemColor {
  return GEM_COLORS.some(c => c === kind);
}

export function isTokenKind(kind: string): kind is TokenKind {
  return TOKEN_KINDS.some(k => k === kind);
}

/** Sparse plain-object form. Missing keys imply 0. */
export type GemRecord = Partial<Record<TokenKind, number>>;

// ---------------------------------------------------------------------------
// GemCollection
// ---------------------------------------------------------------------------

export class GemCollection implements Iterable<[TokenKind, number]> {
  private readonly counts: Readonly<Record<TokenKind, number>>;

  /**
   * @throws InvariantViolation if any count is negative or not an integer.
   */
  private constructor(counts: Record<TokenKind, number>) {
    for (const kind of TOKEN_KINDS) {
      const n = counts[kind];
      if (!Number.isInteger(n) || n < 0) {
        throw new InvariantViolation(
          'NEGATIVE_COUNT',
          `Gem count for ${kind} must be a non-negative integer, got ${n}`,
          { kind, count: n },
        );
      }
    }
    this.counts = Object.freeze(counts);
  }

  static empty(): GemCollection {
    return EMPTY;
  }

  static from(record: GemRecord): GemCollection {
    return new GemCollection({
      diamond: record.diamond ?? 0,
      sapphire: record.sapphire ?? 0,
      emerald: record.emerald ?? 0,
      ruby: record.ruby ?? 0,
      onyx: record.onyx ?? 0,
      gold: record.gold ?? 0,
    });
  }

  /** A collection holding `count` of a single kind. */
  static single(kind: TokenKind, count = 1): GemCollection {
    return EMPTY.withCount(kind, count);
  }

  get(kind: TokenKind): number {
    return this.counts[kind];
  }

  total(): number {
    return this.totalWithoutGold() + this.counts.gold;
  }

  totalWithoutGold(): number {
    let sum = 0;
    for (const c of GEM_COLORS) sum += this.counts[c];
    return sum;
  }

  isEmpty(): boolean {
    return this.total() === 0;
  }

  add(other: GemCollection): GemCollection {
    return this.combine(other, (a, b) => a + b);
  }

  /**
   * Component-wise subtraction. The caller must check availability
   * first: a negative result is an invariant violation.
   */
  subtract(other: GemCollection): GemCollection {
    return this.combine(other, (a, b) => a - b);
  }

  /** True when every component is >= the other's. */
  atLeast(other: GemCollection): boolean {
    return TOKEN_KINDS.every(k => this.counts[k] >= other.counts[k]);
  }

  withCount(kind: TokenKind, count: number): GemCollection {
    return new GemCollection({ ...this.counts, [kind]: count });
  }

  addGem(kind: TokenKind, count = 1): GemCollection {
    return this.withCount(kind, this.counts[kind] + count);
  }

  removeGem(kind: TokenKind, count = 1): GemCollection {
    return this.withCount(kind, this.counts[kind] - count);
  }

  equals(other: GemCollection): boolean {
    return TOKEN_KINDS.every(k => this.counts[k] === other.counts[k]);
  }

  *entries(): IterableIterator<[TokenKind, number]> {
    for (const kind of TOKEN_KINDS) {
      yield [kind, this.counts[kind]];
    }
  }

  [Symbol.iterator](): IterableIterator<[TokenKind, number]> {
    return this.entries();
  }

  /** Sparse record with zero counts omitted (stable key order). */
  toRecord(): GemRecord {
    const result: GemRecord = {};
    for (const [kind, n] of this.entries()) {
      if (n > 0) result[kind] = n;
    }
    return result;
  }

  toJSON(): GemRecord {
    return this.toRecord();
  }

  private combine(
    other: GemCollection,
    op: (a: number, b: number) => number,
  ): GemCollection {
    return new GemCollection({
      diamond: op(this.counts.diamond, other.counts.diamond),
      sapphire: op(this.counts.sapphire, other.counts.sapphire),
      emerald: op(this.counts.emerald, other.counts.emerald),
      ruby: op(this.counts.ruby, other.counts.ruby),
      onyx: op(this.counts.onyx, other.counts.onyx),
      gold: op(this.counts.gold, other.counts.gold),
    });
  }
}

const EMPTY = GemCollection.from({});

// ---------------------------------------------------------------------------
// Label helpers
// ---------------------------------------------------------------------------

/** Short abbreviation for a gem kind. */
export function gemAbbrev(kind: TokenKind): string {
  switch (kind) {
    case 'diamond': return 'W';
    case 'sapphire': return 'U';
    case 'emerald': return 'G';
    case 'ruby': return 'R';
    case 'onyx': return 'K';
    case 'gold': return '$';
  }
}

/** Format a collection as a short string, e.g. "2W 3R 1$". */
export function formatGems(gems: GemCollection): string {
  const parts: string[] = [];
  for (const [kind, n] of gems) {
    if (n > 0) parts.push(`${n}${gemAbbrev(kind)}`);
  }
  return parts.join(' ') || 'none';
}
