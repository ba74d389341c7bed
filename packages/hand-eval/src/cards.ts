export const HAND_SIZE = 5;
export const MAX_SAME_RANK = 4;
export const MAX_WILDCARDS = 1;

export const WILDCARD = "*";

// Low to high. Index is rank strength.
export const RANK_ORDER = ["2", "3", "4", "5", "6", "7", "8", "9", "t", "j", "q", "k", "a"] as const;

export type Rank = (typeof RANK_ORDER)[number];
export type Wildcard = typeof WILDCARD;
export type Card = Rank | Wildcard;

const RANKS: ReadonlySet<string> = new Set(RANK_ORDER);

export function isRank(symbol: string): symbol is Rank {
  return RANKS.has(symbol);
}

export function isCard(symbol: string): symbol is Card {
  return symbol === WILDCARD || isRank(symbol);
}

export function rankStrength(rank: Rank): number {
  return RANK_ORDER.indexOf(rank);
}

export function compareRanks(a: Rank, b: Rank): -1 | 0 | 1 {
  const diff = rankStrength(a) - rankStrength(b);
  if (diff === 0) return 0;
  return diff < 0 ? -1 : 1;
}

export function cardsToString(cards: readonly Card[]): string {
  return cards.join("");
}
