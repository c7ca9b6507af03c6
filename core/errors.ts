import type { Action, AllowedActions } from "./types";

export class BlackjackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class RuleSetError extends BlackjackError {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

/** The requested move is not legal for the hand being played. */
export class IllegalActionError extends BlackjackError {
  constructor(readonly action: Action, readonly allowed: AllowedActions) {
    super(`Illegal action "${action}" (double=${allowed.canDouble}, split=${allowed.canSplit}, surrender=${allowed.canSurrender})`);
  }
}

/** The operation does not apply to the current state of the hand or round. */
export class GameStateError extends BlackjackError {}

/** The engine broke one of its own invariants; trackers for the run can no longer be trusted. */
export class RoundInvariantError extends BlackjackError {}

export class DrawSourceExhaustedError extends BlackjackError {
  constructor() {
    super("Draw source is exhausted");
  }
}
