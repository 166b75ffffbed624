/**
 * Card and noble catalogue.
 *
 * The engine never hardcodes card quantities: it asks a
 * CatalogueProvider for the cards of each tier and the noble pool.
 * The default provider reads `data/catalogue.json` (90 cards across
 * three tiers, 10 nobles) and validates it with zod at the parse
 * boundary: raw JSON enters, typed immutable values exit.
 */

import { z } from 'zod';
import { SetupError } from '../core-engine/EngineErrors';
import { GEM_COLORS, GemCollection } from './GemCollection';
import { type DevelopmentCard, type Tier, type TierRecord, TIERS, mapTiers } from './DevelopmentCard';
import { type Noble, NOBLE_POINTS } from './Noble';
import catalogueData from './data/catalogue.json';

// ---------------------------------------------------------------------------
// Provider interface
// ---------------------------------------------------------------------------

export interface CatalogueProvider {
  /** Every card, grouped by tier, in a stable order. */
  cardsByTier(): TierRecord<readonly DevelopmentCard[]>;
  /** Every noble, in a stable order. */
  nobles(): readonly Noble[];
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const GemColorSchema = z.enum(['diamond', 'sapphire', 'emerald', 'ruby', 'onyx']);

const CountSchema = z.number().int().min(0);

/** Base colors only: gold never appears in a cost or requirement. */
const ColorCountsSchema = z
  .object({
    diamond: CountSchema.optional(),
    sapphire: CountSchema.optional(),
    emerald: CountSchema.optional(),
    ruby: CountSchema.optional(),
    onyx: CountSchema.optional(),
  })
  .strict();

const CardSchema = z.object({
  id: z.string().min(1),
  tier: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  bonus: GemColorSchema,
  points: z.number().int().min(0).max(5),
  cost: ColorCountsSchema,
});

const NobleSchema = z.object({
  id: z.string().min(1),
  points: z.number().int().min(0).default(NOBLE_POINTS),
  requirements: ColorCountsSchema,
});

const CatalogueSchema = z
  .object({
    cards: z.array(CardSchema).min(1),
    nobles: z.array(NobleSchema).min(1),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    for (const entry of [...data.cards, ...data.nobles]) {
      if (seen.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate catalogue id "${entry.id}"`,
        });
      }
      seen.add(entry.id);
    }
    for (const tier of TIERS) {
      if (!data.cards.some(c => c.tier === tier)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Catalogue has no tier ${tier} cards`,
        });
      }
    }
  });

export type RawCatalogue = z.input<typeof CatalogueSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Collapse zod issues into one readable line per issue. */
function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * A provider backed by an in-memory catalogue document.
 *
 * @throws SetupError (INVALID_CATALOGUE) when the document fails validation.
 */
export function createCatalogue(raw: unknown): CatalogueProvider {
  const parsed = CatalogueSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SetupError(
      'INVALID_CATALOGUE',
      `Invalid catalogue: ${formatIssues(parsed.error)}`,
      { issues: parsed.error.issues.length },
    );
  }

  const cards: DevelopmentCard[] = parsed.data.cards.map(c =>
    Object.freeze({
      id: c.id,
      tier: c.tier,
      bonus: c.bonus,
      points: c.points,
      cost: GemCollection.from(c.cost),
    }),
  );
  const byTier = mapTiers((tier: Tier) =>
    Object.freeze(cards.filter(c => c.tier === tier)),
  );
  const nobles: readonly Noble[] = Object.freeze(
    parsed.data.nobles.map(n =>
      Object.freeze({
        id: n.id,
        points: n.points,
        requirements: GemCollection.from(n.requirements),
      }),
    ),
  );

  return {
    cardsByTier: () => byTier,
    nobles: () => nobles,
  };
}

let defaultCatalogue: CatalogueProvider | null = null;

/** The bundled catalogue, parsed once on first use. */
export function getDefaultCatalogue(): CatalogueProvider {
  if (!defaultCatalogue) {
    defaultCatalogue = createCatalogue(catalogueData);
  }
  return defaultCatalogue;
}

/** Total base-color cost of a card, handy for ordering by price. */
export function costSize(card: DevelopmentCard): number {
  let sum = 0;
  for (const c of GEM_COLORS) sum += card.cost.get(c);
  return sum;
}
