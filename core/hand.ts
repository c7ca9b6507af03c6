import type { Card, Hand, HandValue } from "./types";

export function createHand(cards: Card[] = [], isSplit = false): Hand {
  return {
    cards: [...cards],
    multiplier: 1,
    isSplit,
    doubled: false,
    surrendered: false,
    completed: false,
  };
}

export function addCard(hand: Hand, card: Card): void {
  hand.cards.push(card);
}

/** Aces count 11 here; handValue demotes them as needed. */
export function cardValue(card: Card): number {
  if (card.rank === "A") return 11;
  if (card.rank === "K" || card.rank === "Q" || card.rank === "J" || card.rank === "10") {
    return 10;
  }
  return Number(card.rank);
}

export function handValue(cards: readonly Card[]): HandValue {
  let total = 0;
  let acesAtEleven = 0;
  for (const card of cards) {
    total += cardValue(card);
    if (card.rank === "A") acesAtEleven += 1;
  }
  while (total > 21 && acesAtEleven > 0) {
    total -= 10;
    acesAtEleven -= 1;
  }
  return { total, soft: acesAtEleven > 0 };
}

export function bestTotal(cards: readonly Card[]): number {
  return handValue(cards).total;
}

export function isSoft(cards: readonly Card[]): boolean {
  return handValue(cards).soft;
}

export function isBust(cards: readonly Card[]): boolean {
  return handValue(cards).total > 21;
}

/** Natural only; callers must not apply it to hands that came from a split. */
export function isBlackjack(cards: readonly Card[]): boolean {
  return cards.length === 2 && bestTotal(cards) === 21 && cards.some((card) => card.rank === "A");
}

export function isTenValue(card: Card): boolean {
  return cardValue(card) === 10;
}

/** Two cards of equal value, so K-Q counts as a pair of tens. */
export function isPair(cards: readonly Card[]): boolean {
  return cards.length === 2 && cardValue(cards[0]) === cardValue(cards[1]);
}

export function formatCards(cards: readonly Card[]): string {
  return cards.map((card) => card.rank).join(" ");
}
