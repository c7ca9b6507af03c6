import { describe, expect, it } from "vitest";
import { DrawSourceExhaustedError, InfiniteDeck, RANKS, createRng, mulberry32 } from "../core";
import { StackedDeck } from "./helpers";

describe("draw sources", () => {
  it("replays the same ranks from the same seed", () => {
    const a = new InfiniteDeck(createRng(42));
    const b = new InfiniteDeck(createRng(42));
    const ranksA = Array.from({ length: 50 }, () => a.draw().rank);
    const ranksB = Array.from({ length: 50 }, () => b.draw().rank);
    expect(ranksA).toEqual(ranksB);
    expect(a.cardsDrawn()).toBe(50);
  });

  it("always seeds the generator", () => {
    const seeded = createRng(42);
    const reference = mulberry32(42);
    expect([seeded(), seeded()]).toEqual([reference(), reference()]);
  });

  it("draws every rank roughly equally and never runs out", () => {
    const deck = new InfiniteDeck(createRng(8));
    const counts = new Map<string, number>();
    for (let i = 0; i < 13000; i += 1) {
      const { rank } = deck.draw();
      counts.set(rank, (counts.get(rank) ?? 0) + 1);
    }
    expect(counts.size).toBe(RANKS.length);
    for (const count of counts.values()) {
      expect(count).toBeGreaterThan(800);
      expect(count).toBeLessThan(1200);
    }
    expect(deck.exhausted()).toBe(false);
  });

  it("signals exhaustion distinctly on a finite source", () => {
    const deck = new StackedDeck(["A"]);
    deck.draw();
    expect(deck.exhausted()).toBe(true);
    expect(() => deck.draw()).toThrow(DrawSourceExhaustedError);
  });
});
