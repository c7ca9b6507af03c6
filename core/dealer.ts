import type { DrawSource } from "./deck";
import { handValue } from "./hand";
import type { Card } from "./types";

export function dealerShouldHit(cards: readonly Card[], hitSoft17: boolean): boolean {
  const { total, soft } = handValue(cards);
  if (total < 17) return true;
  return total === 17 && soft && hitSoft17;
}

/**
 * Plays the dealer's hand to completion and returns the final cards.
 * The input array is left untouched.
 */
export function dealerPlay(cards: readonly Card[], hitSoft17: boolean, source: DrawSource): Card[] {
  const final = [...cards];
  while (dealerShouldHit(final, hitSoft17)) {
    final.push(source.draw());
  }
  return final;
}
