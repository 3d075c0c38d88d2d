import { describe, expect, it } from "vitest";

import { DEFAULT_TIEBREAK_ORDER } from "@/engine/config";
import { computeCrosstable, computeStandings, getPlayerHistory } from "@/engine/standings";
import { ValidationError } from "@/engine/errors";
import type { TournamentState } from "@/models";
import { apply, engine, NOW, pairNext, record, tournamentWith } from "@/tests/fixtures";

/** p1 beats p3 and p2 beats p4, then p2-p1 is drawn and p3 beats p4. */
function twoRoundEvent(): TournamentState {
  let state = tournamentWith(4, 2);
  state = record(pairNext(state), ["win", "loss"]);
  state = record(pairNext(state), ["draw", "win"]);
  return apply(state, { type: "SET_TIEBREAK_ORDER", payload: { order: [...DEFAULT_TIEBREAK_ORDER] } });
}

describe("standings", () => {
  it("ranks the five player event by score, then rating", () => {
    const state = record(pairNext(tournamentWith(5)), ["win", "draw", "bye"]);
    const standings = computeStandings(state);

    expect(standings.map((row) => [row.rank, row.player.id, row.score])).toEqual([
      [1, "p1", 1],
      [2, "p5", 1],
      [3, "p2", 0.5],
      [4, "p4", 0.5],
      [5, "p3", 0],
    ]);
    expect(standings[1]).toMatchObject({ byes: 1, gamesPlayed: 0, wins: 0 });
  });

  it("returns the same standings on every call without touching the state", () => {
    const state = twoRoundEvent();
    const copy = structuredClone(state);

    expect(computeStandings(state)).toEqual(computeStandings(state));
    expect(state).toEqual(copy);
  });

  it("computes each configured tiebreak", () => {
    const standings = computeStandings(twoRoundEvent());

    expect(standings.map((row) => row.player.id)).toEqual(["p1", "p2", "p3", "p4"]);
    expect(standings.map((row) => row.tiebreaks.map((tiebreak) => tiebreak.value))).toEqual([
      [2.5, 2.5, 1.75, 2.5, 1, 2000],
      [1.5, 1.5, 0.75, 2.5, 1, 1900],
      [1.5, 1.5, 0, 1, 1, 1800],
      [2.5, 2.5, 0, 0, 0, 1700],
    ]);
    expect(standings[0]).toMatchObject({ score: 1.5, wins: 1, draws: 1, losses: 0, gamesPlayed: 2 });
  });

  it("supports cut, head-to-head and opponent cumulative criteria", () => {
    const state = apply(twoRoundEvent(), {
      type: "SET_TIEBREAK_ORDER",
      payload: { order: ["buchholz_cut1", "head_to_head", "cumulative_opponents"] },
    });
    const standings = computeStandings(state);

    expect(standings.map((row) => [row.player.id, row.tiebreaks.map((tiebreak) => tiebreak.value)])).toEqual([
      ["p1", [1.5, 0.5, 3.5]],
      ["p2", [1.5, 0.5, 2.5]],
      ["p3", [1.5, 0, 2.5]],
      ["p4", [1.5, 0, 3.5]],
    ]);
  });

  it("falls back to name order when every criterion ties", () => {
    let state = apply(twoRoundEvent(), { type: "SET_TIEBREAK_ORDER", payload: { order: ["cumulative"] } });
    const result = engine.applyCommand(state, { type: "UPDATE_PLAYER", payload: { playerId: "p1", changes: { name: "Zoe" } } }, NOW);
    state = result.state;

    expect(result.events).toEqual([
      { type: "PLAYER_UPDATED", playerId: "p1", at: NOW },
      { type: "STANDINGS_UPDATED", at: NOW },
    ]);
    expect(computeStandings(state).map((row) => row.player.id)).toEqual(["p2", "p1", "p3", "p4"]);
  });

  it("keeps a withdrawn player in the standings", () => {
    let state = record(pairNext(tournamentWith(5)), ["win", "draw", "bye"]);
    state = apply(state, { type: "SET_PLAYER_ACTIVE", payload: { playerId: "p1", active: false } });

    expect(computeStandings(state)[0]?.player).toMatchObject({ id: "p1", isActive: false });
  });

  it("builds the crosstable in standings order", () => {
    const crosstable = computeCrosstable(twoRoundEvent());

    expect(crosstable.playerIds).toEqual(["p1", "p2", "p3", "p4"]);
    expect(crosstable.rows[0]?.cells).toEqual([
      [],
      [{ round: 2, color: "black", outcome: "draw", points: 0.5 }],
      [{ round: 1, color: "white", outcome: "win", points: 1 }],
      [],
    ]);
  });

  it("records bye rounds in the crosstable", () => {
    const state = record(pairNext(tournamentWith(5)), ["win", "draw", "bye"]);
    const row = computeCrosstable(state).rows.find((entry) => entry.playerId === "p5");

    expect(row?.byeRounds).toEqual([1]);
  });

  it("lists a player's rounds from their own side of the board", () => {
    expect(getPlayerHistory(twoRoundEvent(), "p2")).toEqual([
      { round: 1, board: 2, opponentId: "p4", color: "black", outcome: "win", points: 1 },
      { round: 2, board: 1, opponentId: "p1", color: "white", outcome: "draw", points: 0.5 },
    ]);
    expect(() => getPlayerHistory(twoRoundEvent(), "ghost")).toThrow(ValidationError);
  });

  it("shows an unrecorded round without an outcome", () => {
    const state = pairNext(tournamentWith(5));

    expect(getPlayerHistory(state, "p5")).toEqual([
      { round: 1, board: 3, opponentId: null, color: null, outcome: null, points: null },
    ]);
  });
});
