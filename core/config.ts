import { z } from "zod";
import { RuleSetError } from "./errors";
import type { RuleSet } from "./types";

export const DEFAULT_RULES: Readonly<RuleSet> = Object.freeze({
  hitSoft17: true,
  lateSurrender: true,
  das: true,
  resplitLimit: 3,
  peek: true,
  blackjack3to2: true,
});

export const RuleSetSchema = z
  .object({
    hitSoft17: z.boolean().default(DEFAULT_RULES.hitSoft17),
    lateSurrender: z.boolean().default(DEFAULT_RULES.lateSurrender),
    das: z.boolean().default(DEFAULT_RULES.das),
    /** Maximum number of splits per original hand, shared by all its descendants. */
    resplitLimit: z.number().int().min(0).default(DEFAULT_RULES.resplitLimit),
    peek: z.boolean().default(DEFAULT_RULES.peek),
    blackjack3to2: z.boolean().default(DEFAULT_RULES.blackjack3to2),
  })
  .strict();

export function resolveRules(input: unknown = {}): Readonly<RuleSet> {
  const parsed = RuleSetSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new RuleSetError("Invalid rule set", issues);
  }
  return Object.freeze(parsed.data);
}
