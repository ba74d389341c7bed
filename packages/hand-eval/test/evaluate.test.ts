import { describe, expect, test } from "vitest";

import { HandCategory, backfillWildcards, classifyHand, handFromString, straightHigh, type Card } from "../src/index.js";

function cs(s: string): Card[] {
  return handFromString(s).cards.slice();
}

describe("classification known-answer", () => {
  test.each([
    ["2q222", HandCategory.FourOfAKind],
    ["2q2*2", HandCategory.FourOfAKind],
    ["a2aa2", HandCategory.FullHouse],
    ["a2a*2", HandCategory.FullHouse],
    ["a2345", HandCategory.Straight],
    ["a2*45", HandCategory.Straight],
    ["tjqka", HandCategory.Straight],
    ["6789t", HandCategory.Straight],
    ["kkak2", HandCategory.ThreeOfAKind],
    ["k*ak2", HandCategory.ThreeOfAKind],
    ["a2a32", HandCategory.TwoPair],
    ["53929", HandCategory.Pair],
    ["aa234", HandCategory.Pair],
    ["a*237", HandCategory.Pair],
    ["a9725", HandCategory.HighCard]
  ])("%s", (hand, category) => {
    expect(handFromString(hand).category).toBe(category);
  });
});

describe("rank vectors", () => {
  test.each([
    ["2q222", ["2", "q"]],
    ["2q2*2", ["2", "q"]],
    ["2*222", ["2", "a"]],
    ["aaaa*", ["a", "k"]],
    ["a2aa2", ["a", "2"]],
    ["a2a*2", ["a", "2"]],
    ["a2345", ["5"]],
    ["*2345", ["6"]],
    ["tjqka", ["a"]],
    ["tjqk*", ["a"]],
    ["*jqka", ["a"]],
    ["6789t", ["t"]],
    ["kkak2", ["k", "a"]],
    ["kka*2", ["k", "a"]],
    ["a2a32", ["a", "2", "3"]],
    ["53929", ["9", "5"]],
    ["a9725", ["a"]],
    ["*9725", ["9", "7"]],
    ["a*237", ["a", "7"]]
  ])("%s", (hand, rankVector) => {
    expect(handFromString(hand).rankVector).toEqual(rankVector);
  });
});

describe("straightHigh", () => {
  test("wildcard fills the highest open window", () => {
    expect(straightHigh(cs("*2345"))).toBe("6");
    expect(straightHigh(cs("a2*45"))).toBe("5");
    expect(straightHigh(cs("9tj*k"))).toBe("k");
  });

  test("duplicate ranks rule out a straight", () => {
    expect(straightHigh(cs("22345"))).toBeNull();
  });

  test("a gap the wildcard cannot close", () => {
    expect(straightHigh(cs("*2346"))).toBe("6");
    expect(straightHigh(cs("*2347"))).toBeNull();
  });

  test("ace does not wrap around", () => {
    expect(straightHigh(cs("qka23"))).toBeNull();
  });
});

describe("backfillWildcards", () => {
  test("tops up the leading group", () => {
    expect(
      backfillWildcards(
        [
          { rank: "k", count: 2 },
          { rank: "a", count: 1 },
          { rank: "2", count: 1 }
        ],
        1
      )
    ).toEqual([
      { rank: "k", count: 3 },
      { rank: "a", count: 1 },
      { rank: "2", count: 1 }
    ]);
  });

  test("spills into the highest unused rank when the group is full", () => {
    expect(backfillWildcards([{ rank: "a", count: 4 }], 1)).toEqual([
      { rank: "a", count: 4 },
      { rank: "k", count: 1 }
    ]);
  });

  test("no wildcards leaves groups unchanged", () => {
    const groups = [
      { rank: "9" as const, count: 2 },
      { rank: "5" as const, count: 1 }
    ];
    expect(backfillWildcards(groups, 0)).toEqual(groups);
  });
});

describe("classifyHand", () => {
  test("is deterministic", () => {
    const cards = cs("k*ak2");
    expect(classifyHand(cards)).toEqual(classifyHand(cards));
  });

  test("re-parsing resolved cards keeps the category", () => {
    const hand = handFromString("2q2*2");
    const resolved = handFromString("2q222");
    expect(resolved.category).toBe(hand.category);
    expect(resolved.rankVector).toEqual(hand.rankVector);
  });

  test("rejects a hand of the wrong size", () => {
    expect(() => classifyHand(["a", "k"])).toThrow("classifyHand expected 5 cards, got 2.");
  });

  test("every valid hand classifies", () => {
    const symbols: Card[] = ["2", "3", "4", "5", "6", "7", "8", "9", "t", "j", "q", "k", "a", "*"];
    let checked = 0;

    // Non-decreasing index tuples enumerate each multiset once.
    const idx = [0, 0, 0, 0, 0];
    const n = symbols.length;
    for (idx[0] = 0; idx[0] < n; idx[0] += 1)
      for (idx[1] = idx[0]; idx[1] < n; idx[1] += 1)
        for (idx[2] = idx[1]; idx[2] < n; idx[2] += 1)
          for (idx[3] = idx[2]; idx[3] < n; idx[3] += 1)
            for (idx[4] = idx[3]; idx[4] < n; idx[4] += 1) {
              const cards = idx.map((i) => symbols[i]);
              const wild = cards.filter((c) => c === "*").length;
              const maxSame = Math.max(...cards.filter((c) => c !== "*").map((c) => cards.filter((x) => x === c).length), 0);
              if (wild > 1 || maxSame > 4) continue;

              const rank = classifyHand(cards);
              expect(rank.rankVector).not.toContain("*");
              checked += 1;
            }

    expect(checked).toBeGreaterThan(0);
  });
});
