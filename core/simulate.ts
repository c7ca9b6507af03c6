import { resolveRules } from "./config";
import { InfiniteDeck } from "./deck";
import { playRound } from "./game";
import { createLogger, type Logger } from "./log";
import { createRng } from "./rng";
import { confidenceInterval, stdev } from "./stats";
import { createTrackers, outcomeClass, OUTCOME_KINDS, recordRound } from "./trackers";
import type { SimConfig, SimulationResult, Summary, Trackers } from "./types";

export const DEFAULT_SEED = 7;

const PROGRESS_EVERY = 100_000;

export function summarize(trackers: Trackers, rule: Summary["rule"]): Summary {
  let wins = 0;
  let losses = 0;
  let pushes = 0;
  for (const kind of OUTCOME_KINDS) {
    const count = trackers.outcomes[kind];
    const cls = outcomeClass(kind);
    if (cls === "win") wins += count;
    else if (cls === "loss") losses += count;
    else pushes += count;
  }
  const resolved = wins + losses + pushes;
  const evPerInitialBet = trackers.rounds > 0 ? trackers.units / trackers.rounds : 0;
  const stdevPerRound = stdev(trackers.roundNet);

  return {
    handsSimulated: trackers.rounds,
    rule,
    winRate: resolved > 0 ? wins / resolved : 0,
    lossRate: resolved > 0 ? losses / resolved : 0,
    pushRate: resolved > 0 ? pushes / resolved : 0,
    evPerInitialBet,
    totalUnits: trackers.units,
    stdevPerRound,
    ci95: confidenceInterval(evPerInitialBet, stdevPerRound, trackers.rounds),
  };
}

/**
 * Plays `cfg.hands` rounds with basic strategy on an infinite deck. The same
 * config always yields the same trackers and summary when a seed is given.
 */
export function simulate(cfg: SimConfig, logger: Logger = createLogger()): SimulationResult {
  if (!Number.isInteger(cfg.hands) || cfg.hands < 0) {
    throw new RangeError(`hands must be a non-negative integer, got ${cfg.hands}`);
  }
  const rules = resolveRules({ ...cfg.rules, hitSoft17: cfg.hitSoft17 ?? cfg.rules?.hitSoft17 ?? true });
  const seed = cfg.seed ?? DEFAULT_SEED;
  const source = new InfiniteDeck(createRng(seed));
  const trackers = createTrackers();
  const rule = rules.hitSoft17 ? "H17" : "S17";

  logger.info({ hands: cfg.hands, seed, rules }, "simulation started");
  for (let i = 0; i < cfg.hands; i += 1) {
    recordRound(trackers, playRound(source, rules));
    if ((i + 1) % PROGRESS_EVERY === 0) {
      logger.debug({ rounds: i + 1, units: trackers.units }, "simulation progress");
    }
  }

  const summary = summarize(trackers, rule);
  logger.info({ summary, cardsDrawn: source.cardsDrawn() }, "simulation finished");
  return { summary, trackers };
}
