import { compareRanks, type Rank } from "./cards.js";

export enum HandCategory {
  HighCard = 0,
  Pair = 1,
  TwoPair = 2,
  ThreeOfAKind = 3,
  Straight = 4,
  FullHouse = 5,
  FourOfAKind = 6
}

export type HandRank = Readonly<{
  category: HandCategory;
  /**
   * Tiebreakers, high-to-low. Never contains the wildcard.
   * Examples:
   * - Straight: [highCard] (a2345 = 5)
   * - FourOfAKind: [quadRank, kicker]
   * - Pair: [pairRank, highestKicker]
   */
  rankVector: readonly Rank[];
}>;

export const HAND_A_WINS = "0";
export const HAND_B_WINS = "1";
export const TIE = "01";

export type Outcome = typeof HAND_A_WINS | typeof HAND_B_WINS | typeof TIE;

export function categoryName(category: HandCategory): string {
  return HandCategory[category];
}

export function compareHandRank(a: HandRank, b: HandRank): -1 | 0 | 1 {
  if (a.category !== b.category) {
    return a.category < b.category ? -1 : 1;
  }

  // A vector that is a prefix of the other ties.
  const len = Math.min(a.rankVector.length, b.rankVector.length);
  for (let i = 0; i < len; i += 1) {
    const cmp = compareRanks(a.rankVector[i], b.rankVector[i]);
    if (cmp !== 0) return cmp;
  }

  return 0;
}

export function outcomeFromComparison(cmp: -1 | 0 | 1): Outcome {
  if (cmp === 1) return HAND_A_WINS;
  if (cmp === -1) return HAND_B_WINS;
  return TIE;
}
