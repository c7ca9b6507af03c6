import { DEFAULT_RULES } from "./config";
import { dealerPlay } from "./dealer";
import type { DrawSource } from "./deck";
import { GameStateError, IllegalActionError, RoundInvariantError } from "./errors";
import { addCard, bestTotal, createHand, isBlackjack, isBust, isPair, isTenValue } from "./hand";
import { basicStrategyDecision } from "./strategy";
import type {
  Action,
  Actor,
  AllowedActions,
  Card,
  Hand,
  Outcome,
  OutcomeKind,
  PendingHand,
  RoundEvent,
  RoundResult,
  RuleSet,
} from "./types";

export interface PlayOptions {
  /** Makes the decisions instead of the basic-strategy advisor. */
  actor?: Actor;
  /** What to do when the actor picks an illegal move. Defaults to "throw". */
  onIllegalAction?: "throw" | "fallback";
}

interface Seat {
  hand: Hand;
  outcome?: Outcome;
}

export function isActionAllowed(action: Action, allowed: AllowedActions): boolean {
  switch (action) {
    case "H":
    case "S":
      return true;
    case "D":
      return allowed.canDouble;
    case "P":
      return allowed.canSplit;
    case "R":
      return allowed.canSurrender;
  }
}

export function legalActions(allowed: AllowedActions): Action[] {
  const actions: Action[] = ["H", "S", "D", "P", "R"];
  return actions.filter((action) => isActionAllowed(action, allowed));
}

function blackjackPayoff(rules: RuleSet): number {
  return rules.blackjack3to2 ? 1.5 : 1;
}

function compareWithDealer(hand: Hand, dealerCards: readonly Card[]): { result: OutcomeKind; payoff: number } {
  const dealerTotal = bestTotal(dealerCards);
  if (dealerTotal > 21) {
    return { result: "dealer_bust_win", payoff: hand.multiplier };
  }
  const playerTotal = bestTotal(hand.cards);
  if (playerTotal > dealerTotal) {
    return { result: "win", payoff: hand.multiplier };
  }
  if (playerTotal < dealerTotal) {
    return { result: "loss", payoff: -hand.multiplier };
  }
  return { result: "push", payoff: 0 };
}

/**
 * Plays one round from the initial deal to settlement. Split hands go on an
 * explicit work-list; the left hand of every split is played first, so the
 * returned outcomes are in table order, one per terminal hand.
 *
 * Hand indices in deal and action events are positions at the time of the
 * event; a later split can shift the hands to its right.
 */
export function playRound(
  source: DrawSource,
  rules: Readonly<RuleSet> = DEFAULT_RULES,
  options: PlayOptions = {}
): RoundResult {
  if (source.exhausted?.()) {
    throw new GameStateError("Cannot start a round on an exhausted draw source");
  }
  const events: RoundEvent[] = [];
  const seats: Seat[] = [];
  const player = createHand();
  const dealerHand = createHand();
  let splits = 0;
  let holeRevealed = false;

  const dealTo = (hand: Hand, target: "player" | "dealer", revealed: boolean, handIndex: number) => {
    const card = source.draw();
    addCard(hand, card);
    events.push({ type: "deal", target, card, handIndex, revealed });
    return card;
  };

  const revealHole = () => {
    if (holeRevealed) return;
    holeRevealed = true;
    events.push({ type: "dealerReveal", card: dealerHand.cards[1] });
  };

  const settle = (seat: Seat, result: OutcomeKind, payoff: number) => {
    if (seat.outcome) {
      throw new RoundInvariantError(`Hand ${seats.indexOf(seat)} settled twice (${seat.outcome.result}, then ${result})`);
    }
    seat.hand.completed = true;
    seat.outcome = { result, payoff, hand: seat.hand };
    events.push({ type: "result", handIndex: seats.indexOf(seat), result, payoff });
  };

  const finish = (hand: Hand): Seat => {
    hand.completed = true;
    const seat: Seat = { hand };
    seats.push(seat);
    return seat;
  };

  // initial deal
  dealTo(player, "player", true, 0);
  dealTo(dealerHand, "dealer", true, 0);
  dealTo(player, "player", true, 0);
  dealTo(dealerHand, "dealer", false, 0);

  const dealerUp = dealerHand.cards[0];
  const dealerBlackjack = isBlackjack(dealerHand.cards);
  const playerBlackjack = isBlackjack(player.cards);
  const upcardThreatens = dealerUp.rank === "A" || isTenValue(dealerUp);

  if (rules.peek && upcardThreatens && dealerBlackjack) {
    revealHole();
    const seat = finish(player);
    if (playerBlackjack) {
      settle(seat, "blackjack_push", 0);
    } else {
      settle(seat, "dealer_blackjack", -player.multiplier);
    }
    return collect(seats, dealerHand, dealerBlackjack, false, splits, events);
  }

  if (playerBlackjack) {
    revealHole();
    const seat = finish(player);
    if (dealerBlackjack) {
      settle(seat, "blackjack_push", 0);
    } else {
      settle(seat, "blackjack_win", blackjackPayoff(rules));
    }
    return collect(seats, dealerHand, dealerBlackjack, false, splits, events);
  }

  const decide = (hand: Hand, allowed: AllowedActions, handIndex: number): Action => {
    const snapshot = [...hand.cards];
    const recommend = () => basicStrategyDecision(snapshot, dealerUp, allowed, rules);
    if (!options.actor) {
      return recommend();
    }
    const choice = options.actor.decide({
      cards: snapshot,
      dealerUp,
      handIndex,
      allowed: { ...allowed },
      recommend,
    });
    if (isActionAllowed(choice, allowed)) {
      return choice;
    }
    if (options.onIllegalAction === "fallback") {
      return recommend();
    }
    throw new IllegalActionError(choice, allowed);
  };

  const pending: PendingHand[] = [{ hand: player, firstDecision: true }];
  while (pending.length > 0) {
    if (pending.length > rules.resplitLimit + 1) {
      throw new RoundInvariantError(`Work-list grew to ${pending.length} hands with a resplit limit of ${rules.resplitLimit}`);
    }
    const entry = pending.pop();
    if (!entry) break;
    const { hand } = entry;
    const handIndex = seats.length;
    let firstDecision = entry.firstDecision;

    while (!hand.completed) {
      const allowed: AllowedActions = {
        canDouble: hand.cards.length === 2 && (!hand.isSplit || rules.das),
        canSplit: isPair(hand.cards) && splits < rules.resplitLimit,
        canSurrender: firstDecision && !hand.isSplit && rules.lateSurrender,
      };
      const action = decide(hand, allowed, handIndex);
      events.push({ type: "action", handIndex, action });
      firstDecision = false;

      if (action === "S") {
        finish(hand);
        break;
      }
      if (action === "R") {
        hand.surrendered = true;
        settle(finish(hand), "surrender", -0.5 * hand.multiplier);
        break;
      }
      if (action === "H") {
        dealTo(hand, "player", true, handIndex);
        if (isBust(hand.cards)) {
          settle(finish(hand), "loss", -hand.multiplier);
        }
        continue;
      }
      if (action === "D") {
        hand.multiplier *= 2;
        hand.doubled = true;
        dealTo(hand, "player", true, handIndex);
        const seat = finish(hand);
        if (isBust(hand.cards)) {
          settle(seat, "loss", -hand.multiplier);
        }
        break;
      }
      // split: the pair becomes two hands, each topped up with a fresh card
      splits += 1;
      const [first, second] = hand.cards;
      const left = createHand([first], true);
      const right = createHand([second], true);
      dealTo(left, "player", true, handIndex);
      dealTo(right, "player", true, handIndex + 1);
      hand.completed = true;
      pending.push({ hand: right, firstDecision: false }, { hand: left, firstDecision: false });
    }
  }

  if (splits > rules.resplitLimit) {
    throw new RoundInvariantError(`Round split ${splits} times with a resplit limit of ${rules.resplitLimit}`);
  }

  revealHole();
  const waiting = seats.filter((seat) => !seat.outcome);
  let dealerPlayed = false;
  if (waiting.length > 0) {
    if (dealerBlackjack) {
      for (const seat of waiting) {
        settle(seat, "dealer_blackjack", -seat.hand.multiplier);
      }
    } else {
      const drawnBefore = dealerHand.cards.length;
      dealerHand.cards = dealerPlay(dealerHand.cards, rules.hitSoft17, source);
      for (const card of dealerHand.cards.slice(drawnBefore)) {
        events.push({ type: "deal", target: "dealer", card, handIndex: 0, revealed: true });
      }
      dealerHand.completed = true;
      dealerPlayed = true;
      for (const seat of waiting) {
        const { result, payoff } = compareWithDealer(seat.hand, dealerHand.cards);
        settle(seat, result, payoff);
      }
    }
  }

  if (seats.length !== splits + 1) {
    throw new RoundInvariantError(`Round ended with ${seats.length} hands after ${splits} splits`);
  }
  return collect(seats, dealerHand, dealerBlackjack, dealerPlayed, splits, events);
}

function collect(
  seats: Seat[],
  dealerHand: Hand,
  dealerBlackjack: boolean,
  dealerPlayed: boolean,
  splits: number,
  events: RoundEvent[]
): RoundResult {
  const outcomes: Outcome[] = seats.map((seat, index) => {
    if (!seat.outcome) {
      throw new RoundInvariantError(`Hand ${index} was never settled`);
    }
    return seat.outcome;
  });
  const net = outcomes.reduce((acc, outcome) => acc + outcome.payoff, 0);
  return { outcomes, dealerHand, dealerBlackjack, dealerPlayed, splits, net, events };
}
