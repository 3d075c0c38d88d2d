import { describe, expect, it } from "vitest";

import { discardPendingRound, recordResults, undoLast } from "@/engine/ledger";
import { SequenceError, ValidationError } from "@/engine/errors";
import { apply, engine, NOW, pairNext, record, tournamentWith } from "@/tests/fixtures";

describe("round ledger", () => {
  it("restores the exact paired round on undo and reproduces it on re-record", () => {
    const paired = pairNext(tournamentWith(5));
    const recorded = record(paired, ["win", "draw", "bye"]);

    const undone = apply(recorded, { type: "UNDO_LAST" });
    expect(undone.rounds).toEqual(paired.rounds);
    expect(engine.status(undone)).toBe("awaiting_results");

    const rerecorded = record(undone, ["win", "draw", "bye"]);
    expect(rerecorded.rounds).toEqual(recorded.rounds);
  });

  it("discards a round paired on top of the undone one", () => {
    let state = pairNext(tournamentWith(4));
    state = record(state, ["win", "loss"]);
    state = pairNext(state);

    const result = engine.applyCommand(state, { type: "UNDO_LAST" }, NOW);

    expect(result.state.rounds).toHaveLength(1);
    expect(result.state.rounds[0]?.status).toBe("paired");
    expect(result.events).toEqual([
      { type: "ROUND_DISCARDED", roundIndex: 2, at: NOW },
      { type: "RESULTS_UNDONE", roundIndex: 1, at: NOW },
      { type: "STANDINGS_UPDATED", at: NOW },
    ]);
  });

  it("walks back one recorded round per undo", () => {
    const firstPaired = pairNext(tournamentWith(4));
    const firstRecorded = record(firstPaired, ["win", "loss"]);
    const secondPaired = pairNext(firstRecorded);
    const secondRecorded = record(secondPaired, ["draw", "win"]);

    const once = apply(secondRecorded, { type: "UNDO_LAST" });
    expect(once.rounds).toEqual(secondPaired.rounds);
    expect(engine.status(once)).toBe("awaiting_results");

    const twice = engine.applyCommand(once, { type: "UNDO_LAST" }, NOW);
    expect(twice.state.rounds).toEqual(firstPaired.rounds);
    expect(twice.events.map((event) => event.type)).toEqual(["ROUND_DISCARDED", "RESULTS_UNDONE", "STANDINGS_UPDATED"]);

    expect(engine.applyCommand(twice.state, { type: "UNDO_LAST" }, NOW).error?.code).toBe("NOTHING_TO_UNDO");
  });

  it("fails to undo when nothing is recorded", () => {
    const state = pairNext(tournamentWith(4));

    expect(() => undoLast(state)).toThrow(SequenceError);
    expect(engine.applyCommand(state, { type: "UNDO_LAST" }, NOW).validation.issues[0]?.code).toBe("NOTHING_TO_UNDO");
  });

  it("discards only a pending round", () => {
    const paired = pairNext(tournamentWith(4));
    const discarded = discardPendingRound(paired);

    expect(discarded.round.index).toBe(1);
    expect(discarded.state.rounds).toEqual([]);

    const recorded = record(paired, ["draw", "draw"]);
    expect(() => discardPendingRound(recorded)).toThrow(SequenceError);
  });

  it("validates outcomes before recording", () => {
    const state = pairNext(tournamentWith(5));

    expect(() => recordResults(state, 1, ["win", "draw", "win"])).toThrow(ValidationError);
    expect(() => recordResults(state, 1, ["bye", "draw", "bye"])).toThrow(ValidationError);
    expect(() => recordResults(state, 2, ["win", "draw", "bye"])).toThrow(SequenceError);
    expect(() => recordResults(state, 1, ["win", "draw", "win"])).toThrow("Board 3 is a bye; its result must be 'bye'.");
  });

  it("reports the lifecycle status", () => {
    let state = tournamentWith(2, 2);
    expect(engine.status(state)).toBe("not_started");
    state = pairNext(state);
    expect(engine.status(state)).toBe("awaiting_results");
    state = record(state, ["win"]);
    expect(engine.status(state)).toBe("ready_for_next_round");
    state = record(pairNext(state), ["loss"]);
    expect(engine.status(state)).toBe("finished");
  });
});
