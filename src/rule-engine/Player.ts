/**
 * Player.ts
 *
 * Immutable player record. Bonuses, points and token count are derived
 * from the held cards and tokens on every read, so they can never drift.
 */

import { InvariantViolation } from '../core-engine/EngineErrors';
import { GEM_COLORS, GemCollection } from '../card-system/GemCollection';
import type { DevelopmentCard } from '../card-system/DevelopmentCard';
import type { Noble } from '../card-system/Noble';
import { DEFAULT_MAX_RESERVED } from './GameConfig';

export interface PlayerFields {
  readonly id: number;
  readonly tokens: GemCollection;
  /** Owned cards in purchase order. */
  readonly cards: readonly DevelopmentCard[];
  readonly reserved: readonly DevelopmentCard[];
  readonly nobles: readonly Noble[];
}

export class Player implements PlayerFields {
  readonly id: number;
  readonly tokens: GemCollection;
  readonly cards: readonly DevelopmentCard[];
  readonly reserved: readonly DevelopmentCard[];
  readonly nobles: readonly Noble[];

  constructor(fields: PlayerFields) {
    this.id = fields.id;
    this.tokens = fields.tokens;
    this.cards = Object.freeze([...fields.cards]);
    this.reserved = Object.freeze([...fields.reserved]);
    this.nobles = Object.freeze([...fields.nobles]);
    Object.freeze(this);
  }

  /** A seat with nothing in hand. */
  static create(id: number): Player {
    return new Player({
      id,
      tokens: GemCollection.empty(),
      cards: [],
      reserved: [],
      nobles: [],
    });
  }

  // ---------------------------------------------------------------------------
  // Derived fields
  // ---------------------------------------------------------------------------

  /** One permanent discount per owned card, by bonus colour. */
  get bonuses(): GemCollection {
    let bonuses = GemCollection.empty();
    for (const card of this.cards) bonuses = bonuses.addGem(card.bonus);
    return bonuses;
  }

  get points(): number {
    let pts = 0;
    for (const card of this.cards) pts += card.points;
    for (const noble of this.nobles) pts += noble.points;
    return pts;
  }

  get tokenCount(): number {
    return this.tokens.total();
  }

  canReserve(limit = DEFAULT_MAX_RESERVED): boolean {
    return this.reserved.length < limit;
  }

  findReserved(cardId: string): DevelopmentCard | undefined {
    return this.reserved.find(c => c.id === cardId);
  }

  // ---------------------------------------------------------------------------
  // Payment
  // ---------------------------------------------------------------------------

  /**
   * Gold needed on top of coloured tokens to cover a cost after bonuses.
   */
  goldNeededFor(cost: GemCollection): number {
    const bonuses = this.bonuses;
    let gold = 0;
    for (const c of GEM_COLORS) {
      const shortfall = Math.max(0, cost.get(c) - bonuses.get(c));
      gold += Math.max(0, shortfall - this.tokens.get(c));
    }
    return gold;
  }

  canAfford(cost: GemCollection): boolean {
    return this.goldNeededFor(cost) <= this.tokens.get('gold');
  }

  /**
   * Tokens spent on a cost: coloured tokens first, gold for the rest.
   * The result is only meaningful when `canAfford(cost)` holds.
   */
  paymentFor(cost: GemCollection): GemCollection {
    const bonuses = this.bonuses;
    let payment = GemCollection.empty();
    let gold = 0;
    for (const c of GEM_COLORS) {
      const shortfall = Math.max(0, cost.get(c) - bonuses.get(c));
      const fromTokens = Math.min(shortfall, this.tokens.get(c));
      payment = payment.withCount(c, fromTokens);
      gold += shortfall - fromTokens;
    }
    return payment.withCount('gold', gold);
  }

  // ---------------------------------------------------------------------------
  // Copy-with-change
  // ---------------------------------------------------------------------------

  withTokens(tokens: GemCollection): Player {
    return new Player({ ...this.fields(), tokens });
  }

  addTokens(gems: GemCollection): Player {
    return this.withTokens(this.tokens.add(gems));
  }

  /** @throws InvariantViolation when a count would go negative. */
  removeTokens(gems: GemCollection): Player {
    return this.withTokens(this.tokens.subtract(gems));
  }

  addCard(card: DevelopmentCard): Player {
    return new Player({ ...this.fields(), cards: [...this.cards, card] });
  }

  /** @throws InvariantViolation RESERVED_OVERFLOW past the limit. */
  addReserved(card: DevelopmentCard, limit = DEFAULT_MAX_RESERVED): Player {
    if (!this.canReserve(limit)) {
      throw new InvariantViolation(
        'RESERVED_OVERFLOW',
        `Player ${this.id} already holds ${this.reserved.length} reserved cards`,
        { playerId: this.id, limit },
      );
    }
    return new Player({ ...this.fields(), reserved: [...this.reserved, card] });
  }

  /** @throws InvariantViolation CARD_NOT_HELD when the card is not reserved. */
  removeReserved(cardId: string): Player {
    if (!this.findReserved(cardId)) {
      throw new InvariantViolation(
        'CARD_NOT_HELD',
        `Player ${this.id} has no reserved card ${cardId}`,
        { playerId: this.id, cardId },
      );
    }
    return new Player({
      ...this.fields(),
      reserved: this.reserved.filter(c => c.id !== cardId),
    });
  }

  addNoble(noble: Noble): Player {
    return new Player({ ...this.fields(), nobles: [...this.nobles, noble] });
  }

  private fields(): PlayerFields {
    return {
      id: this.id,
      tokens: this.tokens,
      cards: this.cards,
      reserved: this.reserved,
      nobles: this.nobles,
    };
  }
}
