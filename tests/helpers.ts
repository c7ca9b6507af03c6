import { DrawSourceExhaustedError, type Card, type DrawSource, type Rank } from "../core";

export const card = (rank: Rank): Card => ({ rank });

export const cards = (...ranks: Rank[]): Card[] => ranks.map(card);

/** Deals the given ranks in order: player, dealer, player, dealer hole card, then every later draw. */
export class StackedDeck implements DrawSource {
  private index = 0;
  private readonly cards: Card[];

  constructor(ranks: Rank[]) {
    this.cards = cards(...ranks);
  }

  draw(): Card {
    if (this.index >= this.cards.length) {
      throw new DrawSourceExhaustedError();
    }
    return this.cards[this.index++];
  }

  exhausted(): boolean {
    return this.index >= this.cards.length;
  }

  drawn(): number {
    return this.index;
  }
}
