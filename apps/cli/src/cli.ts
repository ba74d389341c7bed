import { z } from "zod";
import {
  cardsToString,
  categoryName,
  compareHands,
  parseHand,
  type Hand,
  type Outcome
} from "@wildhand/hand-eval";

import type { CliConfig, OutputFormat } from "./config.js";
import { createLogger, type CliIo, type Logger } from "./log.js";

const HandArgsSchema = z.tuple([z.string(), z.string()]);

const KNOWN_FLAGS = new Set(["--help", "-h", "--json"]);

export function usage(): string {
  return [
    "Usage:",
    "  wildhand [--json] HAND_A HAND_B",
    "",
    "Each hand is five of 2-9, t, j, q, k, a and at most one wildcard *.",
    "Prints: <category A>, <category B>, <outcome> where outcome is 0 (A wins), 1 (B wins) or 01 (tie)."
  ].join("\n");
}

function describeHand(hand: Hand) {
  return {
    cards: cardsToString(hand.cards),
    category: categoryName(hand.category),
    rankVector: [...hand.rankVector]
  };
}

function formatResult(format: OutputFormat, a: Hand, b: Hand, outcome: Outcome): string {
  if (format === "json") {
    return JSON.stringify({ handA: describeHand(a), handB: describeHand(b), outcome });
  }
  return `${categoryName(a.category)}, ${categoryName(b.category)}, ${outcome}`;
}

function readHand(raw: string, label: string, logger: Logger): Hand | null {
  const res = parseHand(raw);
  if (!res.ok) {
    logger.logError(`Invalid hand ${label}`, res.error);
    return null;
  }
  const { hand } = res;
  logger.debug(
    `hand ${label} ${cardsToString(hand.cards)}: ${categoryName(hand.category)} [${hand.rankVector.join(",")}]`
  );
  return hand;
}

export interface RunOptions {
  now?: () => Date;
}

/** Returns the process exit code. */
export function runCli(argv: readonly string[], io: CliIo, config: CliConfig, opts: RunOptions = {}): number {
  const flags = argv.filter((a) => a.startsWith("-"));
  const positional = argv.filter((a) => !a.startsWith("-"));

  if (flags.includes("--help") || flags.includes("-h")) {
    io.out(usage());
    return 0;
  }

  const unknown = flags.filter((f) => !KNOWN_FLAGS.has(f));
  if (unknown.length > 0) {
    io.err(`Unknown option: ${unknown.join(", ")}\n`);
    io.err(usage());
    return 2;
  }

  const args = HandArgsSchema.safeParse(positional);
  if (!args.success) {
    io.err(`Expected HAND_A and HAND_B, got ${positional.length} argument(s).\n`);
    io.err(usage());
    return 2;
  }

  const logger = createLogger(io, { verbose: config.verbose, now: opts.now });
  const [rawA, rawB] = args.data;

  const a = readHand(rawA, "A", logger);
  if (!a) return 1;
  const b = readHand(rawB, "B", logger);
  if (!b) return 1;

  const outcome = compareHands(a, b);
  const format: OutputFormat = flags.includes("--json") ? "json" : config.output;
  io.out(formatResult(format, a, b, outcome));
  return 0;
}
