import type { RunningStats } from "./stats";

export type Rank =
  | "A"
  | "2"
  | "3"
  | "4"
  | "5"
  | "6"
  | "7"
  | "8"
  | "9"
  | "10"
  | "J"
  | "Q"
  | "K";

export interface Card {
  rank: Rank;
}

export interface Hand {
  cards: Card[];
  multiplier: number;
  isSplit: boolean;
  doubled: boolean;
  surrendered: boolean;
  completed: boolean;
}

export interface HandValue {
  total: number;
  soft: boolean;
}

/** H = hit, S = stand, D = double, P = split, R = surrender */
export type Action = "H" | "S" | "D" | "P" | "R";

export interface AllowedActions {
  canDouble: boolean;
  canSplit: boolean;
  canSurrender: boolean;
}

export interface RuleSet {
  hitSoft17: boolean;
  lateSurrender: boolean;
  das: boolean;
  resplitLimit: number;
  peek: boolean;
  blackjack3to2: boolean;
}

export interface PendingHand {
  hand: Hand;
  firstDecision: boolean;
}

export type OutcomeKind =
  | "win"
  | "loss"
  | "push"
  | "blackjack_win"
  | "blackjack_push"
  | "surrender"
  | "dealer_blackjack"
  | "dealer_bust_win";

export interface Outcome {
  result: OutcomeKind;
  payoff: number;
  hand: Hand;
}

export type RoundEvent =
  | { type: "deal"; target: "player" | "dealer"; card: Card; handIndex: number; revealed: boolean }
  | { type: "action"; handIndex: number; action: Action }
  | { type: "result"; handIndex: number; result: OutcomeKind; payoff: number }
  | { type: "dealerReveal"; card: Card };

export interface RoundResult {
  outcomes: Outcome[];
  dealerHand: Hand;
  dealerBlackjack: boolean;
  dealerPlayed: boolean;
  splits: number;
  net: number;
  events: RoundEvent[];
}

export interface DecisionView {
  cards: readonly Card[];
  dealerUp: Card;
  handIndex: number;
  allowed: AllowedActions;
  /** Advisor recommendation for the same decision; does not touch round state. */
  recommend(): Action;
}

export interface Actor {
  decide(view: DecisionView): Action;
}

export interface Counters {
  playerBust: number;
  dealerBust: number;
  doubles: number;
  splits: number;
}

export type DealerTotalKey = "17" | "18" | "19" | "20" | "21" | "bust";

export interface Trackers {
  rounds: number;
  hands: number;
  units: number;
  roundNet: RunningStats;
  outcomes: Record<OutcomeKind, number>;
  counters: Counters;
  playerTotals: Record<string, number>;
  dealerTotals: Record<DealerTotalKey, number>;
}

export interface SimConfig {
  hands: number;
  hitSoft17?: boolean;
  seed?: number;
  rules?: Partial<RuleSet>;
}

export interface Summary {
  handsSimulated: number;
  rule: "H17" | "S17";
  winRate: number;
  lossRate: number;
  pushRate: number;
  evPerInitialBet: number;
  totalUnits: number;
  stdevPerRound: number;
  ci95: [number, number];
}

export interface SimulationResult {
  summary: Summary;
  trackers: Trackers;
}
