import { MAX_RATING, MIN_RATING } from "@/engine/registry";
import { isTiebreakCriterion } from "@/engine/rules/tiebreakers";
import { findPlayer, pairKey } from "@/engine/util";
import type { ID, Round, TournamentState } from "@/models";

export interface ValidationIssue {
  level: "error" | "warning" | "info";
  code: string;
  message: string;
  entity?: { kind: "round" | "player" | "config"; id: ID };
}

export interface ValidationResult {
  ok: boolean;
  issues: ValidationIssue[];
}

function validatePlayers(state: TournamentState): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const seenNames = new Set<string>();

  Object.entries(state.players).forEach(([key, player]) => {
    if (key !== player.id) {
      issues.push({
        level: "error",
        code: "PLAYER_KEY_MISMATCH",
        message: `Player stored under '${key}' has id '${player.id}'`,
        entity: { kind: "player", id: key },
      });
    }
    if (!player.name.trim()) {
      issues.push({
        level: "error",
        code: "EMPTY_PLAYER_NAME",
        message: `Player '${player.id}' has an empty name`,
        entity: { kind: "player", id: player.id },
      });
    }
    if (seenNames.has(player.name)) {
      issues.push({
        level: "error",
        code: "DUPLICATE_PLAYER_NAME",
        message: `Name '${player.name}' is used by more than one player`,
        entity: { kind: "player", id: player.id },
      });
    }
    seenNames.add(player.name);

    if (player.rating !== undefined && (!Number.isInteger(player.rating) || player.rating < MIN_RATING || player.rating > MAX_RATING)) {
      issues.push({
        level: "error",
        code: "INVALID_RATING",
        message: `Player '${player.id}' has an invalid rating ${player.rating}`,
        entity: { kind: "player", id: player.id },
      });
    }
  });

  return issues;
}

function validateConfig(state: TournamentState): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const { numRounds, tiebreakOrder } = state.config;

  if (!Number.isInteger(numRounds) || numRounds < 1) {
    issues.push({
      level: "error",
      code: "INVALID_ROUND_COUNT",
      message: `Round count must be a positive whole number (got ${numRounds})`,
      entity: { kind: "config", id: "numRounds" },
    });
  }
  if (state.rounds.length > numRounds) {
    issues.push({
      level: "error",
      code: "TOO_MANY_ROUNDS",
      message: `${state.rounds.length} rounds exist but only ${numRounds} are configured`,
      entity: { kind: "config", id: "numRounds" },
    });
  }

  const seen = new Set<string>();
  tiebreakOrder.forEach((criterion) => {
    if (!isTiebreakCriterion(criterion)) {
      issues.push({
        level: "error",
        code: "UNKNOWN_TIEBREAK",
        message: `Unknown tiebreak criterion '${String(criterion)}'`,
        entity: { kind: "config", id: "tiebreakOrder" },
      });
    }
    if (seen.has(criterion)) {
      issues.push({
        level: "error",
        code: "DUPLICATE_TIEBREAK",
        message: `Tiebreak criterion '${criterion}' is listed twice`,
        entity: { kind: "config", id: "tiebreakOrder" },
      });
    }
    seen.add(criterion);
  });

  return issues;
}

function validateRound(state: TournamentState, round: Round, position: number): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const entity = { kind: "round" as const, id: String(round.index) };
  const issue = (code: string, message: string, level: ValidationIssue["level"] = "error"): void => {
    issues.push({ level, code, message, entity });
  };

  if (round.index !== position + 1) {
    issue("ROUND_INDEX_MISMATCH", `Round at position ${position + 1} carries index ${round.index}`);
  }

  const seenPlayers = new Set<ID>();
  let byes = 0;
  round.pairings.forEach((pairing, idx) => {
    if (pairing.board !== idx + 1) {
      issue("BOARD_NUMBER_MISMATCH", `Pairing ${idx + 1} of round ${round.index} is numbered board ${pairing.board}`);
    }
    const ids = pairing.playerB === null ? [pairing.playerA] : [pairing.playerA, pairing.playerB];
    ids.forEach((id) => {
      if (!findPlayer(state, id)) {
        issue("UNKNOWN_PLAYER_REFERENCE", `Round ${round.index} references unknown player '${id}'`);
      }
      if (seenPlayers.has(id)) {
        issue("PLAYER_PAIRED_TWICE", `Player '${id}' appears more than once in round ${round.index}`);
      }
      seenPlayers.add(id);
    });

    if (pairing.playerB === null) {
      byes += 1;
      if (pairing.colorA !== null || pairing.colorB !== null) {
        issue("BYE_WITH_COLOR", `Bye on board ${pairing.board} of round ${round.index} carries a colour`);
      }
    } else if (pairing.colorA === null || pairing.colorB === null || pairing.colorA === pairing.colorB) {
      issue("INVALID_COLORS", `Board ${pairing.board} of round ${round.index} needs one white and one black player`);
    }
  });

  if (byes > 1) {
    issue("MULTIPLE_BYES", `Round ${round.index} has ${byes} byes`);
  }

  if (round.status === "recorded") {
    const results = round.results ?? [];
    if (results.length !== round.pairings.length) {
      issue("RESULT_COUNT_MISMATCH", `Round ${round.index} has ${round.pairings.length} pairings but ${results.length} results`);
    }
    round.pairings.forEach((pairing, idx) => {
      const outcome = results[idx];
      if (outcome === undefined) {
        return;
      }
      if ((pairing.playerB === null) !== (outcome === "bye")) {
        issue("BYE_RESULT_MISMATCH", `Board ${pairing.board} of round ${round.index} has result '${outcome}'`);
      }
    });
  } else if (round.results !== undefined) {
    issue("RESULTS_ON_PAIRED_ROUND", `Round ${round.index} holds results but is not recorded`);
  }

  if (round.forcedRepeat !== round.repeatedPairs.length > 0) {
    issue("FORCED_REPEAT_MISMATCH", `Round ${round.index} forced-repeat flag disagrees with its repeated pairs`);
  }

  return issues;
}

function validateHistory(state: TournamentState): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const met = new Set<string>();
  let unrecordedSeen = false;

  state.rounds.forEach((round) => {
    if (round.status === "recorded" && unrecordedSeen) {
      issues.push({
        level: "error",
        code: "RECORDED_AFTER_UNRECORDED",
        message: `Round ${round.index} is recorded but an earlier round is not`,
        entity: { kind: "round", id: String(round.index) },
      });
    }
    if (round.status !== "recorded") {
      unrecordedSeen = true;
    }

    const allowed = new Set(round.repeatedPairs.map(([a, b]) => pairKey(a, b)));
    const roundKeys: string[] = [];
    round.pairings.forEach((pairing) => {
      if (pairing.playerB === null) {
        return;
      }
      const key = pairKey(pairing.playerA, pairing.playerB);
      roundKeys.push(key);
      if (!met.has(key)) {
        return;
      }
      issues.push(
        allowed.has(key)
          ? {
              level: "warning",
              code: "PAIRING_EXHAUSTED",
              message: `Round ${round.index} repeats ${pairing.playerA} vs ${pairing.playerB} (forced)`,
              entity: { kind: "round", id: String(round.index) },
            }
          : {
              level: "error",
              code: "UNFLAGGED_REMATCH",
              message: `Round ${round.index} repeats ${pairing.playerA} vs ${pairing.playerB} without a forced-repeat flag`,
              entity: { kind: "round", id: String(round.index) },
            },
      );
    });
    roundKeys.forEach((key) => met.add(key));
  });

  return issues;
}

export function validateState(state: TournamentState): ValidationResult {
  const issues: ValidationIssue[] = [
    ...validatePlayers(state),
    ...validateConfig(state),
    ...state.rounds.flatMap((round, position) => validateRound(state, round, position)),
    ...validateHistory(state),
  ];

  return {
    ok: !issues.some((issue) => issue.level === "error"),
    issues,
  };
}
