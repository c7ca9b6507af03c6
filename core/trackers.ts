import { RoundInvariantError } from "./errors";
import { bestTotal, isBust } from "./hand";
import { combine, createRunningStats, push } from "./stats";
import type { DealerTotalKey, Outcome, OutcomeKind, RoundResult, Trackers } from "./types";

export const OUTCOME_KINDS: readonly OutcomeKind[] = [
  "win",
  "loss",
  "push",
  "blackjack_win",
  "blackjack_push",
  "surrender",
  "dealer_blackjack",
  "dealer_bust_win",
];

const DEALER_TOTAL_KEYS: readonly DealerTotalKey[] = ["17", "18", "19", "20", "21", "bust"];

export type OutcomeClass = "win" | "loss" | "push";

export function outcomeClass(kind: OutcomeKind): OutcomeClass {
  switch (kind) {
    case "win":
    case "blackjack_win":
    case "dealer_bust_win":
      return "win";
    case "push":
    case "blackjack_push":
      return "push";
    case "loss":
    case "surrender":
    case "dealer_blackjack":
      return "loss";
  }
}

function zeroOutcomes(): Record<OutcomeKind, number> {
  return {
    win: 0,
    loss: 0,
    push: 0,
    blackjack_win: 0,
    blackjack_push: 0,
    surrender: 0,
    dealer_blackjack: 0,
    dealer_bust_win: 0,
  };
}

function zeroDealerTotals(): Record<DealerTotalKey, number> {
  return { "17": 0, "18": 0, "19": 0, "20": 0, "21": 0, bust: 0 };
}

export function createTrackers(): Trackers {
  const playerTotals: Record<string, number> = {};
  for (let total = 4; total <= 21; total += 1) {
    playerTotals[String(total)] = 0;
  }
  return {
    rounds: 0,
    hands: 0,
    units: 0,
    roundNet: createRunningStats(),
    outcomes: zeroOutcomes(),
    counters: { playerBust: 0, dealerBust: 0, doubles: 0, splits: 0 },
    playerTotals,
    dealerTotals: zeroDealerTotals(),
  };
}

export function dealerTotalKey(total: number): DealerTotalKey {
  if (total > 21) return "bust";
  if (total < 17) {
    throw new RoundInvariantError(`Dealer finished on ${total}`);
  }
  return DEALER_TOTAL_KEYS[total - 17];
}

/** Busted hands are filtered out before this; the rest count when compared against a dealer who played out. */
function wasCompared(outcome: Outcome): boolean {
  switch (outcome.result) {
    case "win":
    case "push":
    case "dealer_bust_win":
      return true;
    case "loss":
      return true;
    default:
      return false;
  }
}

export function recordRound(trackers: Trackers, round: RoundResult): void {
  trackers.rounds += 1;
  trackers.units += round.net;
  push(trackers.roundNet, round.net);
  trackers.counters.splits += round.splits;

  for (const outcome of round.outcomes) {
    trackers.hands += 1;
    trackers.outcomes[outcome.result] += 1;
    if (outcome.hand.doubled) {
      trackers.counters.doubles += 1;
    }
    if (isBust(outcome.hand.cards)) {
      trackers.counters.playerBust += 1;
    } else if (round.dealerPlayed && wasCompared(outcome)) {
      const key = String(bestTotal(outcome.hand.cards));
      trackers.playerTotals[key] = (trackers.playerTotals[key] ?? 0) + 1;
    }
  }

  if (round.dealerPlayed) {
    const key = dealerTotalKey(bestTotal(round.dealerHand.cards));
    trackers.dealerTotals[key] += 1;
    if (key === "bust") {
      trackers.counters.dealerBust += 1;
    }
  }
}

function sumRecords<K extends string>(keys: Iterable<K>, a: Record<K, number>, b: Record<K, number>): Record<K, number> {
  const out: Partial<Record<K, number>> = {};
  for (const key of keys) {
    out[key] = (a[key] ?? 0) + (b[key] ?? 0);
  }
  return { ...a, ...b, ...out };
}

/** Sums two independent runs; order of the arguments does not matter. */
export function mergeTrackers(a: Trackers, b: Trackers): Trackers {
  const playerKeys = new Set([...Object.keys(a.playerTotals), ...Object.keys(b.playerTotals)]);
  return {
    rounds: a.rounds + b.rounds,
    hands: a.hands + b.hands,
    units: a.units + b.units,
    roundNet: combine(a.roundNet, b.roundNet),
    outcomes: sumRecords(OUTCOME_KINDS, a.outcomes, b.outcomes),
    counters: {
      playerBust: a.counters.playerBust + b.counters.playerBust,
      dealerBust: a.counters.dealerBust + b.counters.dealerBust,
      doubles: a.counters.doubles + b.counters.doubles,
      splits: a.counters.splits + b.counters.splits,
    },
    playerTotals: sumRecords(playerKeys, a.playerTotals, b.playerTotals),
    dealerTotals: sumRecords(DEALER_TOTAL_KEYS, a.dealerTotals, b.dealerTotals),
  };
}
