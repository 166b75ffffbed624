import { describe, it, expect } from 'vitest';
import {
  createCatalogue,
  getDefaultCatalogue,
  costSize,
  type RawCatalogue,
} from '../../src/card-system/Catalogue';
import { GEM_COLORS } from '../../src/card-system/GemCollection';
import { TIERS } from '../../src/card-system/DevelopmentCard';
import { SetupError } from '../../src/core-engine/EngineErrors';

function minimalCatalogue(): RawCatalogue {
  return {
    cards: [
      { id: 'a', tier: 1, bonus: 'ruby', points: 0, cost: { onyx: 2 } },
      { id: 'b', tier: 2, bonus: 'onyx', points: 2, cost: { ruby: 5 } },
      { id: 'c', tier: 3, bonus: 'diamond', points: 4, cost: { onyx: 7 } },
    ],
    nobles: [{ id: 'n', requirements: { ruby: 3, onyx: 3 } }],
  };
}

describe('Catalogue', () => {
  // -------------------------------------------------------------------------
  // Default catalogue
  // -------------------------------------------------------------------------
  describe('default catalogue', () => {
    const catalogue = getDefaultCatalogue();
    const byTier = catalogue.cardsByTier();

    it('has 40, 30 and 20 cards per tier', () => {
      expect(byTier[1]).toHaveLength(40);
      expect(byTier[2]).toHaveLength(30);
      expect(byTier[3]).toHaveLength(20);
    });

    it('has 10 nobles worth 3 points each', () => {
      expect(catalogue.nobles()).toHaveLength(10);
      expect(catalogue.nobles().every(n => n.points === 3)).toBe(true);
    });

    it('spreads bonuses evenly across colors in every tier', () => {
      for (const tier of TIERS) {
        const per = byTier[tier].length / GEM_COLORS.length;
        for (const color of GEM_COLORS) {
          expect(byTier[tier].filter(c => c.bonus === color)).toHaveLength(per);
        }
      }
    });

    it('uses unique ids', () => {
      const ids = [...TIERS.flatMap(t => byTier[t]), ...catalogue.nobles()].map(e => e.id);
      expect(new Set(ids).size).toBe(100);
    });

    it('never puts gold in a cost or requirement', () => {
      const cards = TIERS.flatMap(t => byTier[t]);
      expect(cards.every(c => c.cost.get('gold') === 0)).toBe(true);
      expect(catalogue.nobles().every(n => n.requirements.get('gold') === 0)).toBe(true);
    });

    it('parses entries in file order', () => {
      const first = byTier[1][0];
      expect(first.id).toBe('t1-01');
      expect(first.bonus).toBe('diamond');
      expect(first.cost.toRecord()).toEqual({ sapphire: 1, emerald: 1, ruby: 1, onyx: 1 });
      expect(catalogue.nobles()[0].requirements.toRecord()).toEqual({ diamond: 4, sapphire: 4 });
    });

    it('is parsed once and shared', () => {
      expect(getDefaultCatalogue()).toBe(catalogue);
    });
  });

  // -------------------------------------------------------------------------
  // createCatalogue
  // -------------------------------------------------------------------------
  describe('createCatalogue', () => {
    it('accepts a minimal document and defaults noble points', () => {
      const catalogue = createCatalogue(minimalCatalogue());
      expect(catalogue.cardsByTier()[2].map(c => c.id)).toEqual(['b']);
      expect(catalogue.nobles()[0].points).toBe(3);
    });

    it('returns frozen cards', () => {
      const card = createCatalogue(minimalCatalogue()).cardsByTier()[1][0];
      expect(Object.isFrozen(card)).toBe(true);
    });

    it('rejects duplicate ids', () => {
      const raw = minimalCatalogue();
      raw.nobles.push({ id: 'a', requirements: { ruby: 4 } });
      expect(() => createCatalogue(raw)).toThrow(/Duplicate catalogue id "a"/);
    });

    it('rejects a catalogue missing a tier', () => {
      const raw = minimalCatalogue();
      raw.cards = raw.cards.filter(c => c.tier !== 3);
      expect(() => createCatalogue(raw)).toThrow(/no tier 3 cards/);
    });

    it('rejects gold in a cost', () => {
      const raw = { ...minimalCatalogue(), cards: [{ id: 'x', tier: 1, bonus: 'ruby', points: 0, cost: { gold: 1 } }] };
      expect(() => createCatalogue(raw)).toThrow(SetupError);
    });

    it('rejects an unknown tier', () => {
      const raw = { ...minimalCatalogue(), cards: [{ id: 'x', tier: 4, bonus: 'ruby', points: 0, cost: {} }] };
      try {
        createCatalogue(raw);
        expect.unreachable('should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(SetupError);
        if (err instanceof SetupError) expect(err.code).toBe('INVALID_CATALOGUE');
      }
    });

    it('rejects a non-object document', () => {
      expect(() => createCatalogue('cards')).toThrow(/^Invalid catalogue: /);
    });
  });

  describe('costSize', () => {
    it('sums the base-color cost', () => {
      expect(costSize(getDefaultCatalogue().cardsByTier()[1][0])).toBe(4);
    });
  });
});
