import type { Card, Rank } from "./types";
import { randomIndex, type RNG } from "./rng";

export const RANKS: readonly Rank[] = ["2", "3", "4", "5", "6", "7", "8", "9", "10", "J", "Q", "K", "A"];

/**
 * Anything that hands out one card per call. Finite sources report
 * `exhausted()` and throw DrawSourceExhaustedError when drawn past the end.
 */
export interface DrawSource {
  draw(): Card;
  exhausted?(): boolean;
}

/** Every rank equally likely on every draw, independent of earlier draws. */
export class InfiniteDeck implements DrawSource {
  private readonly rng: RNG;
  private drawn = 0;

  constructor(rng: RNG) {
    this.rng = rng;
  }

  draw(): Card {
    this.drawn += 1;
    return { rank: RANKS[randomIndex(this.rng, RANKS.length)] };
  }

  exhausted(): boolean {
    return false;
  }

  cardsDrawn(): number {
    return this.drawn;
  }
}
