export * from "@/engine/commands";
export * from "@/engine/config";
export * from "@/engine/Engine";
export * from "@/engine/errors";
export { getStatus } from "@/engine/ledger";
export { createEngineLogger, LOGGER_PREFIX, type EngineLogger } from "@/engine/logger";
export { candidateOrder, generatePairings, seedOrder, type GeneratedPairings, type PairingOptions, type PairingTier } from "@/engine/pairing/swiss";
export { MAX_RATING, MIN_RATING } from "@/engine/registry";
export { POINTS } from "@/engine/rules/points";
export { isTiebreakCriterion } from "@/engine/rules/tiebreakers";
export * from "@/engine/selectors";
export * from "@/engine/serialization";
export { computeCrosstable, computeStandings, getPlayerHistory } from "@/engine/standings";
export * from "@/engine/types";
export * from "@/engine/validation";
