/**
 * AI Module
 *
 * Decision makers and a headless loop that plays them against each other.
 */
export const AI_VERSION = '0.1.0';

export type { DecisionMaker } from './AiStrategy';
export {
  RandomStrategy,
  PurchaseFirstStrategy,
  GreedyStrategy,
  AiPlayer,
  strategyByName,
} from './AiStrategy';
export type { PlayGameOptions, GameResult } from './GameRunner';
export { DEFAULT_MAX_STEPS, playGame } from './GameRunner';
