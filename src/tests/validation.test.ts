import { describe, expect, it } from "vitest";

import { validateState } from "@/engine/validation";
import type { Round, TournamentState } from "@/models";
import { pairNext, record, tournamentWith } from "@/tests/fixtures";

function codes(state: TournamentState): string[] {
  return validateState(state).issues.map((issue) => issue.code);
}

function withRound(state: TournamentState, round: Round): TournamentState {
  return { ...state, rounds: [...state.rounds, round] };
}

describe("state validation", () => {
  it("accepts a tournament built through commands", () => {
    const state = record(pairNext(tournamentWith(5)), ["win", "draw", "bye"]);

    expect(validateState(state)).toEqual({ ok: true, issues: [] });
  });

  it("reports more than one bye and colours on a bye", () => {
    const state = withRound(tournamentWith(3), {
      index: 1,
      pairings: [
        { board: 1, playerA: "p1", playerB: null, colorA: "white", colorB: null },
        { board: 2, playerA: "p2", playerB: null, colorA: null, colorB: null },
      ],
      forcedRepeat: false,
      repeatedPairs: [],
      status: "paired",
    });

    expect(codes(state)).toEqual(["BYE_WITH_COLOR", "MULTIPLE_BYES"]);
  });

  it("reports a round that names an object member as a player", () => {
    const state = withRound(tournamentWith(1), {
      index: 1,
      pairings: [{ board: 1, playerA: "constructor", playerB: null, colorA: null, colorB: null }],
      forcedRepeat: false,
      repeatedPairs: [],
      status: "paired",
    });

    expect(codes(state)).toEqual(["UNKNOWN_PLAYER_REFERENCE"]);
  });

  it("reports an unflagged rematch", () => {
    let state = record(pairNext(tournamentWith(2, 2)), ["win"]);
    state = withRound(state, {
      index: 2,
      pairings: [{ board: 1, playerA: "p2", playerB: "p1", colorA: "white", colorB: "black" }],
      forcedRepeat: false,
      repeatedPairs: [],
      status: "paired",
    });

    expect(codes(state)).toEqual(["UNFLAGGED_REMATCH"]);
    expect(validateState(state).ok).toBe(false);
  });

  it("reports results that do not fit the round", () => {
    const state = withRound(tournamentWith(2), {
      index: 1,
      pairings: [{ board: 1, playerA: "p1", playerB: "p2", colorA: "white", colorB: "white" }],
      forcedRepeat: false,
      repeatedPairs: [],
      status: "recorded",
      results: ["bye"],
    });

    expect(codes(state)).toEqual(["INVALID_COLORS", "BYE_RESULT_MISMATCH"]);
  });

  it("reports unknown players and too many rounds", () => {
    const state = withRound(tournamentWith(2, 1), {
      index: 2,
      pairings: [{ board: 1, playerA: "p1", playerB: "ghost", colorA: "white", colorB: "black" }],
      forcedRepeat: false,
      repeatedPairs: [],
      status: "paired",
    });

    expect(codes(state)).toEqual(["ROUND_INDEX_MISMATCH", "UNKNOWN_PLAYER_REFERENCE"]);
    expect(codes({ ...state, rounds: [...state.rounds, ...state.rounds] })).toContain("TOO_MANY_ROUNDS");
  });
});
