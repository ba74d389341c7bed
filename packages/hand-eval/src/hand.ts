import { HAND_SIZE, MAX_SAME_RANK, MAX_WILDCARDS, WILDCARD, isCard, type Card, type Rank } from "./cards.js";
import { InvalidHandError } from "./errors.js";
import { classifyHand } from "./evaluate.js";
import { compareHandRank, outcomeFromComparison, type HandCategory, type Outcome } from "./handRank.js";

export type Hand = Readonly<{
  /** Normalized (lowercase) symbols in input order. */
  cards: readonly Card[];
  category: HandCategory;
  rankVector: readonly Rank[];
}>;

export type ParseResult = { ok: true; hand: Hand } | { ok: false; error: InvalidHandError };

function invalid(error: InvalidHandError): ParseResult {
  return { ok: false, error };
}

export function parseHand(raw: string): ParseResult {
  const normalized = raw.toLowerCase();
  const symbols = Array.from(normalized);

  if (symbols.length !== HAND_SIZE) {
    return invalid(
      new InvalidHandError(
        "WRONG_LENGTH",
        `Incorrect number of cards in hand. Expected: ${HAND_SIZE}, hand: ${JSON.stringify(raw)}`,
        { input: raw, length: symbols.length }
      )
    );
  }

  const unknown = [...new Set(symbols.filter((s) => !isCard(s)))];
  if (unknown.length > 0) {
    return invalid(
      new InvalidHandError("INVALID_CARD", `Invalid card(s) in hand: ${unknown.join(", ")}`, {
        input: raw,
        invalid: unknown
      })
    );
  }
  const cards = symbols.filter(isCard);

  const counts = new Map<Card, number>();
  for (const c of cards) counts.set(c, (counts.get(c) ?? 0) + 1);

  for (const [card, count] of counts) {
    if (card !== WILDCARD && count > MAX_SAME_RANK) {
      return invalid(
        new InvalidHandError("TOO_MANY_OF_RANK", `Invalid number of ${card}s. Expected at most: ${MAX_SAME_RANK}`, {
          input: raw,
          rank: card,
          count
        })
      );
    }
  }

  const wildcards = counts.get(WILDCARD) ?? 0;
  if (wildcards > MAX_WILDCARDS) {
    return invalid(
      new InvalidHandError(
        "TOO_MANY_WILDCARDS",
        `Expected at most ${MAX_WILDCARDS} wild card. Received: ${wildcards}`,
        { input: raw, count: wildcards }
      )
    );
  }

  const { category, rankVector } = classifyHand(cards);
  return { ok: true, hand: { cards, category, rankVector } };
}

/** Like {@link parseHand}, but throws the {@link InvalidHandError}. */
export function handFromString(raw: string): Hand {
  const res = parseHand(raw);
  if (!res.ok) throw res.error;
  return res.hand;
}

export function compareHands(a: Hand, b: Hand): Outcome {
  return outcomeFromComparison(compareHandRank(a, b));
}
