import { describe, expect, it } from "vitest";
import {
  DEFAULT_RULES,
  RoundInvariantError,
  combine,
  createRunningStats,
  createTrackers,
  dealerTotalKey,
  mergeTrackers,
  outcomeClass,
  playRound,
  push,
  recordRound,
  variance,
} from "../core";
import { StackedDeck } from "./helpers";

describe("trackers", () => {
  it("records a split round with a double", () => {
    const trackers = createTrackers();
    recordRound(trackers, playRound(new StackedDeck(["9", "6", "9", "10", "2", "8", "10", "10"]), DEFAULT_RULES));
    expect(trackers.rounds).toBe(1);
    expect(trackers.hands).toBe(2);
    expect(trackers.units).toBe(3);
    expect(trackers.counters).toEqual({ playerBust: 0, dealerBust: 1, doubles: 1, splits: 1 });
    expect(trackers.outcomes.dealer_bust_win).toBe(2);
    expect(trackers.playerTotals["21"]).toBe(1);
    expect(trackers.playerTotals["17"]).toBe(1);
    expect(trackers.dealerTotals.bust).toBe(1);
  });

  it("records a player bust without a dealer total", () => {
    const trackers = createTrackers();
    recordRound(trackers, playRound(new StackedDeck(["10", "7", "6", "10", "K"]), DEFAULT_RULES));
    expect(trackers.counters.playerBust).toBe(1);
    expect(trackers.outcomes.loss).toBe(1);
    expect(trackers.units).toBe(-1);
    expect(Object.values(trackers.dealerTotals).every((count) => count === 0)).toBe(true);
    expect(Object.values(trackers.playerTotals).every((count) => count === 0)).toBe(true);
  });

  it("counts a standing loss in the player totals", () => {
    const trackers = createTrackers();
    recordRound(trackers, playRound(new StackedDeck(["A", "5", "2", "10", "K", "4"]), DEFAULT_RULES));
    expect(trackers.outcomes.loss).toBe(1);
    expect(trackers.counters.playerBust).toBe(0);
    expect(trackers.playerTotals["13"]).toBe(1);
    expect(trackers.dealerTotals["19"]).toBe(1);
  });

  it("merges independent runs in either order", () => {
    const a = createTrackers();
    const b = createTrackers();
    recordRound(a, playRound(new StackedDeck(["A", "9", "K", "5"]), DEFAULT_RULES));
    recordRound(b, playRound(new StackedDeck(["10", "10", "6", "9"]), DEFAULT_RULES));
    recordRound(b, playRound(new StackedDeck(["6", "6", "5", "10", "10", "9"]), DEFAULT_RULES));

    const ab = mergeTrackers(a, b);
    const ba = mergeTrackers(b, a);
    expect(ab.rounds).toBe(3);
    expect(ab.units).toBe(3);
    expect(ab.outcomes).toEqual(ba.outcomes);
    expect(ab.outcomes).toMatchObject({ blackjack_win: 1, surrender: 1, dealer_bust_win: 1 });
    expect(ab.counters).toEqual(ba.counters);
    expect(ab.playerTotals).toEqual(ba.playerTotals);
    expect(ab.dealerTotals).toEqual(ba.dealerTotals);
    expect(ab.roundNet.count).toBe(3);
    expect(mergeTrackers(a, createTrackers()).outcomes).toEqual(a.outcomes);
  });

  it("maps dealer totals to distribution keys", () => {
    expect(dealerTotalKey(19)).toBe("19");
    expect(dealerTotalKey(26)).toBe("bust");
    expect(() => dealerTotalKey(16)).toThrow(RoundInvariantError);
  });

  it("groups result kinds into win, loss and push", () => {
    expect(outcomeClass("dealer_bust_win")).toBe("win");
    expect(outcomeClass("surrender")).toBe("loss");
    expect(outcomeClass("dealer_blackjack")).toBe("loss");
    expect(outcomeClass("blackjack_push")).toBe("push");
  });
});

describe("running stats", () => {
  it("combines partial runs into the statistics of the whole", () => {
    const left = createRunningStats();
    const right = createRunningStats();
    [1, 2, 3].forEach((v) => push(left, v));
    [4, 5].forEach((v) => push(right, v));
    const whole = combine(left, right);
    expect(whole.count).toBe(5);
    expect(whole.mean).toBeCloseTo(3);
    expect(variance(whole)).toBeCloseTo(2.5);
  });
});
