import { SequenceError, ValidationError } from "@/engine/errors";
import { generatePairings, type GeneratedPairings, type PairingOptions } from "@/engine/pairing/swiss";
import type { ID, Pairing, PairingOutcome, Round, TournamentState, TournamentStatus } from "@/models";

const gameOutcomes: ReadonlySet<PairingOutcome> = new Set(["win", "loss", "draw"]);

/**
 * Builds a round in the paired state. Recording only adds `results` and flips the
 * status, so rebuilding through here is how undo gets back the exact pre-recording value.
 */
export function pairedRound(args: { index: number; pairings: Pairing[]; repeatedPairs: [ID, ID][] }): Round {
  return {
    index: args.index,
    pairings: args.pairings,
    forcedRepeat: args.repeatedPairs.length > 0,
    repeatedPairs: args.repeatedPairs,
    status: "paired",
  };
}

export function lastRound(state: TournamentState): Round | undefined {
  return state.rounds[state.rounds.length - 1];
}

export function getStatus(state: TournamentState): TournamentStatus {
  const latest = lastRound(state);
  if (!latest) {
    return "not_started";
  }
  if (latest.status === "paired") {
    return "awaiting_results";
  }
  return state.rounds.length >= state.config.numRounds ? "finished" : "ready_for_next_round";
}

export function pairNextRound(
  state: TournamentState,
  options: PairingOptions,
): { state: TournamentState; round: Round; generated: GeneratedPairings } {
  const status = getStatus(state);
  if (status === "awaiting_results") {
    throw new SequenceError("ROUND_NOT_RECORDED", `Round ${state.rounds.length} must be recorded before pairing the next one.`);
  }
  if (status === "finished" || state.rounds.length >= state.config.numRounds) {
    throw new SequenceError("ALL_ROUNDS_PAIRED", `All ${state.config.numRounds} rounds have already been paired.`);
  }

  const activeCount = Object.values(state.players).filter((player) => player.isActive).length;
  if (activeCount < 2) {
    throw new ValidationError("NOT_ENOUGH_PLAYERS", `At least two active players are needed to pair a round (have ${activeCount}).`);
  }

  const generated = generatePairings(state, options);
  const round = pairedRound({
    index: state.rounds.length + 1,
    pairings: generated.pairings,
    repeatedPairs: generated.repeatedPairs,
  });

  return { state: { ...state, rounds: [...state.rounds, round] }, round, generated };
}

function assertOutcomes(round: Round, outcomes: readonly PairingOutcome[]): void {
  if (outcomes.length !== round.pairings.length) {
    throw new ValidationError(
      "RESULT_COUNT_MISMATCH",
      `Round ${round.index} has ${round.pairings.length} pairing(s) but ${outcomes.length} result(s) were given.`,
    );
  }

  round.pairings.forEach((pairing, idx) => {
    const outcome = outcomes[idx];
    if (pairing.playerB === null) {
      if (outcome !== "bye") {
        throw new ValidationError("BYE_RESULT_FIXED", `Board ${pairing.board} is a bye; its result must be 'bye'.`);
      }
      return;
    }
    if (outcome === undefined || !gameOutcomes.has(outcome)) {
      throw new ValidationError(
        "INVALID_RESULT",
        `Board ${pairing.board} needs a win, loss or draw (got '${String(outcome)}').`,
      );
    }
  });
}

export function recordResults(state: TournamentState, roundIndex: number, outcomes: readonly PairingOutcome[]): { state: TournamentState; round: Round } {
  const expected = state.rounds.find((round) => round.status === "paired");
  if (!expected) {
    throw new SequenceError("NO_ROUND_TO_RECORD", "There is no paired round waiting for results.");
  }
  if (roundIndex !== expected.index) {
    throw new SequenceError(
      "ROUND_OUT_OF_ORDER",
      `Results must be recorded for round ${expected.index} next (got round ${roundIndex}).`,
    );
  }

  assertOutcomes(expected, outcomes);

  const recorded: Round = { ...expected, status: "recorded", results: [...outcomes] };
  return {
    state: {
      ...state,
      rounds: state.rounds.map((round) => (round.index === expected.index ? recorded : round)),
    },
    round: recorded,
  };
}

/**
 * Steps the ledger back to the version that existed before the latest recording:
 * that round returns to the paired state and a round paired on top of it goes away.
 */
export function undoLast(state: TournamentState): { state: TournamentState; round: Round; discarded?: Round } {
  const target = [...state.rounds].reverse().find((round) => round.status === "recorded");
  if (!target) {
    throw new SequenceError("NOTHING_TO_UNDO", "No recorded round to undo.");
  }

  const reverted = pairedRound(target);
  const discarded = state.rounds.find((round) => round.index > target.index);
  return {
    state: {
      ...state,
      rounds: [...state.rounds.slice(0, target.index - 1), reverted],
    },
    round: reverted,
    ...(discarded ? { discarded } : {}),
  };
}

export function discardPendingRound(state: TournamentState): { state: TournamentState; round: Round } {
  const latest = lastRound(state);
  if (!latest || latest.status !== "paired") {
    throw new SequenceError("NO_PENDING_ROUND", "Only a paired round without results can be discarded.");
  }
  return {
    state: { ...state, rounds: state.rounds.slice(0, -1) },
    round: latest,
  };
}
