export {
  type Card,
  type Rank,
  type Wildcard,
  HAND_SIZE,
  MAX_SAME_RANK,
  MAX_WILDCARDS,
  RANK_ORDER,
  WILDCARD,
  cardsToString,
  compareRanks,
  isCard,
  isRank,
  rankStrength
} from "./cards.js";
export { type InvalidHandCode, HandInvariantError, InvalidHandError } from "./errors.js";
export { backfillWildcards, classifyHand, straightHigh } from "./evaluate.js";
export {
  type HandRank,
  type Outcome,
  HAND_A_WINS,
  HAND_B_WINS,
  HandCategory,
  TIE,
  categoryName,
  compareHandRank,
  outcomeFromComparison
} from "./handRank.js";
export { type Hand, type ParseResult, compareHands, handFromString, parseHand } from "./hand.js";
