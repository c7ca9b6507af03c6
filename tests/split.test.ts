import { describe, expect, it } from "vitest";
import { DEFAULT_RULES, InfiniteDeck, bestTotal, createRng, playRound, resolveRules } from "../core";
import { StackedDeck } from "./helpers";

describe("splitting and resplitting", () => {
  it("resplits up to the limit and plays the hands left to right", () => {
    const deck = new StackedDeck(["8", "6", "8", "10", "8", "8", "8", "8", "10", "10", "K"]);
    const round = playRound(deck, DEFAULT_RULES);
    expect(round.splits).toBe(3);
    expect(round.outcomes).toHaveLength(4);
    expect(round.outcomes.map((o) => bestTotal(o.hand.cards))).toEqual([18, 18, 16, 16]);
    expect(round.outcomes.every((o) => o.result === "dealer_bust_win")).toBe(true);
    expect(round.net).toBe(4);
    expect(deck.exhausted()).toBe(true);
  });

  it("shares the resplit budget across the whole original hand", () => {
    const rules = resolveRules({ resplitLimit: 1 });
    const round = playRound(new StackedDeck(["8", "6", "8", "10", "8", "10", "K"]), rules);
    expect(round.splits).toBe(1);
    expect(round.outcomes.map((o) => o.hand.cards.map((c) => c.rank))).toEqual([
      ["8", "8"],
      ["8", "10"],
    ]);
    expect(round.net).toBe(2);
  });

  it("never splits with a limit of zero", () => {
    const rules = resolveRules({ resplitLimit: 0 });
    const round = playRound(new StackedDeck(["8", "6", "8", "10", "K"]), rules);
    expect(round.splits).toBe(0);
    expect(round.outcomes).toHaveLength(1);
    expect(round.outcomes[0].hand.isSplit).toBe(false);
    expect(round.outcomes[0].result).toBe("dealer_bust_win");
  });

  it("doubles after a split when DAS is on", () => {
    const round = playRound(new StackedDeck(["9", "6", "9", "10", "2", "8", "10", "10"]), DEFAULT_RULES);
    const [left, right] = round.outcomes;
    expect(left.hand.doubled).toBe(true);
    expect(left.payoff).toBe(2);
    expect(right.hand.doubled).toBe(false);
    expect(right.payoff).toBe(1);
    expect(round.net).toBe(3);
  });

  it("hits instead of doubling after a split when DAS is off", () => {
    const rules = resolveRules({ das: false });
    const round = playRound(new StackedDeck(["9", "6", "9", "10", "2", "8", "10", "10"]), rules);
    const [left, right] = round.outcomes;
    expect(left.hand.doubled).toBe(false);
    expect(left.hand.cards).toHaveLength(3);
    expect(bestTotal(left.hand.cards)).toBe(21);
    expect(bestTotal(right.hand.cards)).toBe(17);
    expect(round.net).toBe(2);
  });

  it("prices split aces making 21 as an ordinary win", () => {
    const round = playRound(new StackedDeck(["A", "6", "A", "10", "K", "9", "7"]), DEFAULT_RULES);
    expect(round.outcomes.map((o) => o.result)).toEqual(["dealer_bust_win", "dealer_bust_win"]);
    expect(round.outcomes[0].payoff).toBe(1);
    expect(round.outcomes.every((o) => o.hand.isSplit)).toBe(true);
  });

  it("returns one outcome per terminal hand across many random rounds", () => {
    const rules = resolveRules({ resplitLimit: 2 });
    const source = new InfiniteDeck(createRng(3));
    for (let i = 0; i < 2000; i += 1) {
      const round = playRound(source, rules);
      expect(round.splits).toBeLessThanOrEqual(2);
      expect(round.outcomes).toHaveLength(round.splits + 1);
      expect(new Set(round.outcomes.map((o) => o.hand)).size).toBe(round.outcomes.length);
      expect(round.outcomes.every((o) => o.hand.completed)).toBe(true);
      expect(round.events.filter((e) => e.type === "result")).toHaveLength(round.outcomes.length);
    }
  });
});
