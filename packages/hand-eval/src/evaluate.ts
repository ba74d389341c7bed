import { HAND_SIZE, MAX_SAME_RANK, RANK_ORDER, WILDCARD, isRank, rankStrength, type Card, type Rank } from "./cards.js";
import { HandInvariantError } from "./errors.js";
import { HandCategory, type HandRank } from "./handRank.js";

type RankGroup = { rank: Rank; count: number };

// Ace appears at both ends so a2345 and tjqka are both windows.
const STRAIGHT_SEQUENCE: readonly Rank[] = ["a", ...RANK_ORDER];

/**
 * High card of the best straight the cards can make, or null.
 * The wildcard fills whichever slot is missing; windows are scanned from the highest down.
 */
export function straightHigh(cards: readonly Card[]): Rank | null {
  if (new Set(cards).size < HAND_SIZE) return null;

  const ranks = cards.filter(isRank);
  for (let top = STRAIGHT_SEQUENCE.length; top >= HAND_SIZE; top -= 1) {
    const window = STRAIGHT_SEQUENCE.slice(top - HAND_SIZE, top);
    if (ranks.every((r) => window.includes(r))) {
      return window[window.length - 1];
    }
  }
  return null;
}

function byCountThenRank(a: RankGroup, b: RankGroup): number {
  return b.count !== a.count ? b.count - a.count : rankStrength(b.rank) - rankStrength(a.rank);
}

function groupRanks(cards: readonly Card[]): { groups: RankGroup[]; wildcards: number } {
  const counts = new Map<Rank, number>();
  let wildcards = 0;
  for (const c of cards) {
    if (c === WILDCARD) {
      wildcards += 1;
    } else {
      counts.set(c, (counts.get(c) ?? 0) + 1);
    }
  }

  const groups = Array.from(counts.entries())
    .map(([rank, count]) => ({ rank, count }))
    .sort(byCountThenRank);
  return { groups, wildcards };
}

/**
 * Spends wildcards on the sorted groups: first topping up existing groups toward four of a kind,
 * then as new groups of the highest ranks not yet held.
 */
export function backfillWildcards(groups: readonly RankGroup[], wildcards: number): RankGroup[] {
  let remaining = wildcards;

  const filled = groups.map((g) => {
    const extra = Math.min(remaining, MAX_SAME_RANK - g.count);
    remaining -= extra;
    return { rank: g.rank, count: g.count + extra };
  });

  const held = new Set(filled.map((g) => g.rank));
  for (const rank of [...RANK_ORDER].reverse()) {
    if (remaining <= 0) break;
    if (held.has(rank)) continue;
    const count = Math.min(remaining, MAX_SAME_RANK);
    filled.push({ rank, count });
    held.add(rank);
    remaining -= count;
  }

  return filled.sort(byCountThenRank);
}

/** Only the first unmatched card breaks ties; everything after it is dropped. */
function dropExtraSingles(groups: readonly RankGroup[]): RankGroup[] {
  const firstSingle = groups.findIndex((g) => g.count === 1);
  return firstSingle === -1 ? [...groups] : groups.slice(0, firstSingle + 1);
}

function categoryForSignature(signature: string): HandCategory | null {
  switch (signature) {
    case "4,1":
      return HandCategory.FourOfAKind;
    case "3,2":
      return HandCategory.FullHouse;
    case "3,1":
      return HandCategory.ThreeOfAKind;
    case "2,2,1":
      return HandCategory.TwoPair;
    case "2,1":
      return HandCategory.Pair;
    case "1":
      return HandCategory.HighCard;
    default:
      return null;
  }
}

export function classifyHand(cards: readonly Card[]): HandRank {
  if (cards.length !== HAND_SIZE) {
    throw new HandInvariantError(`classifyHand expected ${HAND_SIZE} cards, got ${cards.length}.`);
  }

  const high = straightHigh(cards);
  if (high !== null) {
    return { category: HandCategory.Straight, rankVector: [high] };
  }

  const { groups, wildcards } = groupRanks(cards);
  const ranked = dropExtraSingles(backfillWildcards(groups, wildcards));

  const signature = ranked.map((g) => g.count).join(",");
  const category = categoryForSignature(signature);
  if (category === null) {
    throw new HandInvariantError(`No hand category for count signature (${signature}).`, {
      cards: cards.join(""),
      ranks: ranked.map((g) => g.rank)
    });
  }

  return { category, rankVector: ranked.map((g) => g.rank) };
}
