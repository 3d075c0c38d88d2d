import * as z from "zod";

import { ValidationError } from "@/engine/errors";
import { TIEBREAK_CRITERIA, type TiebreakCriterion } from "@/models";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type EngineLogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_ROUND_COUNT = 3;

export const DEFAULT_TIEBREAK_ORDER: readonly TiebreakCriterion[] = [
  "median_buchholz",
  "buchholz",
  "sonneborn_berger",
  "cumulative",
  "wins",
  "rating",
];

/** Upper bound on search nodes per legality tier before the pairing engine gives that tier up. */
export const DEFAULT_PAIRING_SEARCH_LIMIT = 200_000;

export const engineConfigSchema = z.object({
  defaultRoundCount: z.number().int().positive(),
  defaultTiebreakOrder: z
    .array(z.enum(TIEBREAK_CRITERIA))
    .refine((order) => new Set(order).size === order.length, { message: "tiebreak criteria must be distinct" }),
  pairingSearchLimit: z.number().int().positive(),
  logLevel: z.enum(LOG_LEVELS),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

type Env = Record<string, string | undefined>;

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return Number(value);
}

function envLogLevel(env: Env): string {
  if (env.DEBUG?.includes("pairing")) {
    return "debug";
  }
  return env.SWISS_LOG_LEVEL ?? env.LOG_LEVEL ?? "info";
}

/**
 * Resolves engine options: explicit overrides win over environment variables,
 * which win over the built-in defaults.
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}, env: Env = process.env): EngineConfig {
  const candidate = {
    defaultRoundCount: overrides.defaultRoundCount ?? envNumber(env.SWISS_DEFAULT_ROUNDS) ?? DEFAULT_ROUND_COUNT,
    defaultTiebreakOrder: overrides.defaultTiebreakOrder ?? [...DEFAULT_TIEBREAK_ORDER],
    pairingSearchLimit:
      overrides.pairingSearchLimit ?? envNumber(env.SWISS_PAIRING_SEARCH_LIMIT) ?? DEFAULT_PAIRING_SEARCH_LIMIT,
    logLevel: overrides.logLevel ?? envLogLevel(env),
  };

  const parsed = engineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ValidationError("INVALID_ENGINE_CONFIG", `Invalid engine configuration (${detail})`);
  }
  return parsed.data;
}
