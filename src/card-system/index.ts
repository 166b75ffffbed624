/**
 * Card System Module
 *
 * Gem tokens, development cards, nobles and the catalogue they are
 * dealt from.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Gems and the token ledger
export type { GemColor, TokenKind, GemRecord } from './GemCollection';
export {
  GEM_COLORS,
  TOKEN_KINDS,
  GemCollection,
  isGemColor,
  isTokenKind,
  gemAbbrev,
  formatGems,
} from './GemCollection';

// Development cards
export type { Tier, TierRecord, DevelopmentCard } from './DevelopmentCard';
export { TIERS, isTier, sameCard, findCardById, mapTiers, cardLabel } from './DevelopmentCard';

// Nobles
export type { Noble } from './Noble';
export { NOBLE_POINTS, sameNoble, nobleQualifies, nobleLabel } from './Noble';

// Catalogue
export type { CatalogueProvider, RawCatalogue } from './Catalogue';
export { createCatalogue, getDefaultCatalogue, costSize } from './Catalogue';
