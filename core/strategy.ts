import { DEFAULT_RULES } from "./config";
import { cardValue, handValue, isPair } from "./hand";
import type { Action, AllowedActions, Card, RuleSet } from "./types";

/**
 * Table cells. Compound cells carry their own fallback:
 * Dh double else hit, Ds double else stand, Ph split with DAS else hit,
 * Rh / Rs / Rp surrender else hit / stand / split.
 */
export type Cell = "H" | "S" | "P" | "Dh" | "Ds" | "Ph" | "Rh" | "Rs" | "Rp";

type Row = readonly Cell[];
type Table = Readonly<Record<number, Row>>;

export interface StrategyTables {
  hard: Table;
  soft: Table;
  pairs: Table;
}

export type StrategyRules = Pick<RuleSet, "hitSoft17" | "das">;

const all = (cell: Cell): Row => Array.from({ length: 10 }, () => cell);

// Columns: dealer upcard 2, 3, 4, 5, 6, 7, 8, 9, 10, A
const hardS17: Table = {
  4: all("H"),
  5: all("H"),
  6: all("H"),
  7: all("H"),
  8: all("H"),
  9: ["H", "Dh", "Dh", "Dh", "Dh", "H", "H", "H", "H", "H"],
  10: ["Dh", "Dh", "Dh", "Dh", "Dh", "Dh", "Dh", "Dh", "H", "H"],
  11: ["Dh", "Dh", "Dh", "Dh", "Dh", "Dh", "Dh", "Dh", "Dh", "H"],
  12: ["H", "H", "S", "S", "S", "H", "H", "H", "H", "H"],
  13: ["S", "S", "S", "S", "S", "H", "H", "H", "H", "H"],
  14: ["S", "S", "S", "S", "S", "H", "H", "H", "H", "H"],
  15: ["S", "S", "S", "S", "S", "H", "H", "H", "Rh", "H"],
  16: ["S", "S", "S", "S", "S", "H", "H", "Rh", "Rh", "Rh"],
  17: all("S"),
  18: all("S"),
  19: all("S"),
  20: all("S"),
  21: all("S"),
};

const hardH17: Table = {
  ...hardS17,
  11: all("Dh"),
  15: ["S", "S", "S", "S", "S", "H", "H", "H", "Rh", "Rh"],
  17: ["S", "S", "S", "S", "S", "S", "S", "S", "S", "Rs"],
};

const softS17: Table = {
  12: all("H"),
  13: ["H", "H", "H", "Dh", "Dh", "H", "H", "H", "H", "H"],
  14: ["H", "H", "H", "Dh", "Dh", "H", "H", "H", "H", "H"],
  15: ["H", "H", "Dh", "Dh", "Dh", "H", "H", "H", "H", "H"],
  16: ["H", "H", "Dh", "Dh", "Dh", "H", "H", "H", "H", "H"],
  17: ["H", "Dh", "Dh", "Dh", "Dh", "H", "H", "H", "H", "H"],
  18: ["S", "Ds", "Ds", "Ds", "Ds", "S", "S", "H", "H", "H"],
  19: all("S"),
  20: all("S"),
  21: all("S"),
};

const softH17: Table = {
  ...softS17,
  18: ["Ds", "Ds", "Ds", "Ds", "Ds", "S", "S", "H", "H", "H"],
  19: ["S", "S", "S", "S", "Ds", "S", "S", "S", "S", "S"],
};

// Rows keyed by card value; fives are absent and play as hard 10.
const pairsS17: Table = {
  11: all("P"),
  10: all("S"),
  9: ["P", "P", "P", "P", "P", "S", "P", "P", "S", "S"],
  8: all("P"),
  7: ["P", "P", "P", "P", "P", "P", "H", "H", "H", "H"],
  6: ["Ph", "P", "P", "P", "P", "H", "H", "H", "H", "H"],
  4: ["H", "H", "H", "Ph", "Ph", "H", "H", "H", "H", "H"],
  3: ["Ph", "Ph", "P", "P", "P", "P", "H", "H", "H", "H"],
  2: ["Ph", "Ph", "P", "P", "P", "P", "H", "H", "H", "H"],
};

const pairsH17: Table = {
  ...pairsS17,
  8: ["P", "P", "P", "P", "P", "P", "P", "P", "P", "Rp"],
};

export const S17_TABLES: StrategyTables = { hard: hardS17, soft: softS17, pairs: pairsS17 };
export const H17_TABLES: StrategyTables = { hard: hardH17, soft: softH17, pairs: pairsH17 };

export function tablesFor(rules: StrategyRules): StrategyTables {
  return rules.hitSoft17 ? H17_TABLES : S17_TABLES;
}

/** Column index for a dealer upcard: 2 → 0 … 10 → 8, A → 9. */
export function dealerIndex(card: Card): number {
  return cardValue(card) - 2;
}

export function lookupCell(table: Table, row: number, dealerIdx: number): Cell | undefined {
  return table[row]?.[dealerIdx];
}

function resolveCell(cell: Cell, allowed: AllowedActions, rules: StrategyRules): Action | undefined {
  switch (cell) {
    case "H":
    case "S":
      return cell;
    case "P":
      return allowed.canSplit ? "P" : undefined;
    case "Ph":
      if (!allowed.canSplit) return undefined;
      return rules.das ? "P" : "H";
    case "Dh":
      return allowed.canDouble ? "D" : "H";
    case "Ds":
      return allowed.canDouble ? "D" : "S";
    case "Rh":
      return allowed.canSurrender ? "R" : "H";
    case "Rs":
      return allowed.canSurrender ? "R" : "S";
    case "Rp":
      if (allowed.canSurrender) return "R";
      return allowed.canSplit ? "P" : undefined;
  }
}

/**
 * Basic strategy for an infinite deck with late surrender. Pairs are
 * consulted only when a split is allowed; otherwise the hand plays as its
 * hard or soft total. Disallowed doubles and surrenders fall back to the
 * cell's hit or stand alternative.
 */
export function basicStrategyDecision(
  cards: readonly Card[],
  dealerUp: Card,
  allowed: AllowedActions,
  rules: StrategyRules = DEFAULT_RULES
): Action {
  const tables = tablesFor(rules);
  const dealerIdx = dealerIndex(dealerUp);

  if (allowed.canSplit && isPair(cards)) {
    const cell = lookupCell(tables.pairs, cardValue(cards[0]), dealerIdx);
    const action = cell ? resolveCell(cell, allowed, rules) : undefined;
    if (action) return action;
  }

  const { total, soft } = handValue(cards);
  const cell = lookupCell(soft ? tables.soft : tables.hard, total, dealerIdx);
  if (!cell) {
    return total >= 17 ? "S" : "H";
  }
  return resolveCell(cell, allowed, rules) ?? (total >= 17 ? "S" : "H");
}

const ACTION_NAMES: Record<Action, string> = {
  H: "Hit",
  S: "Stand",
  D: "Double",
  P: "Split",
  R: "Surrender",
};

export function describeAction(action: Action): string {
  return ACTION_NAMES[action];
}
