import { describe, expect, it } from "vitest";

import { SequenceError, ValidationError } from "@/engine/errors";
import { addPlayer, removePlayer, requirePlayer, setActive, updatePlayer } from "@/engine/registry";
import { engine, NOW, pairNext, tournamentWith } from "@/tests/fixtures";

const empty = () => engine.createEmpty(NOW, "Registry Cup");

describe("player registry", () => {
  it("assigns ids and trims names", () => {
    const first = addPlayer(empty(), { name: "  Ana  ", rating: 1500, club: " Rook Club " });
    const second = addPlayer(first.state, { name: "Ben" });

    expect(first.player).toEqual({ id: "player_1", name: "Ana", rating: 1500, club: "Rook Club", isActive: true });
    expect(second.player.id).toBe("player_2");
    expect(Object.keys(second.state.players)).toEqual(["player_1", "player_2"]);
  });

  it("rejects empty and duplicate names", () => {
    const { state } = addPlayer(empty(), { name: "Ana" });

    expect(() => addPlayer(state, { name: "   " })).toThrow(ValidationError);
    expect(() => addPlayer(state, { name: "Ana" })).toThrow("Another player named 'Ana' already exists.");
  });

  it("rejects ratings outside 0 to 4000 and fractional ratings", () => {
    expect(() => addPlayer(empty(), { name: "Ana", rating: 4001 })).toThrow(ValidationError);
    expect(() => addPlayer(empty(), { name: "Ana", rating: -1 })).toThrow(ValidationError);
    expect(() => addPlayer(empty(), { name: "Ana", rating: 1500.5 })).toThrow(ValidationError);
    expect(addPlayer(empty(), { name: "Ana", rating: 4000 }).player.rating).toBe(4000);
  });

  it("rejects an id that is already taken", () => {
    const { state } = addPlayer(empty(), { id: "p1", name: "Ana" });

    expect(() => addPlayer(state, { id: "p1", name: "Ben" })).toThrow(ValidationError);
  });

  it("treats ids named like object members as ordinary ids", () => {
    expect(() => requirePlayer(empty(), "constructor")).toThrow("Player 'constructor' does not exist.");

    const { state, player } = addPlayer(empty(), { id: "constructor", name: "Ana" });
    expect(player.id).toBe("constructor");
    expect(requirePlayer(state, "constructor").name).toBe("Ana");
    expect(Object.keys(removePlayer(state, "constructor").players)).toEqual([]);
  });

  it("updates details and clears cleared fields", () => {
    const { state } = addPlayer(empty(), { id: "p1", name: "Ana", rating: 1500, club: "Rook Club", email: "ana@example.test" });
    const updated = updatePlayer(state, "p1", { name: "Ana Maria", rating: undefined, club: "" });

    expect(updated.player).toEqual({ id: "p1", name: "Ana Maria", email: "ana@example.test", isActive: true });
    expect(state.players.p1?.name).toBe("Ana");
  });

  it("still allows edits after the tournament starts", () => {
    const started = pairNext(tournamentWith(4));

    expect(updatePlayer(started, "p2", { rating: 2100 }).player.rating).toBe(2100);
    expect(() => addPlayer(started, { name: "Late Entry" })).toThrow(SequenceError);
    expect(() => removePlayer(started, "p2")).toThrow(SequenceError);
  });

  it("removes players before the first round", () => {
    const state = removePlayer(tournamentWith(3), "p2");

    expect(Object.keys(state.players)).toEqual(["p1", "p3"]);
    expect(() => removePlayer(state, "p2")).toThrow(ValidationError);
  });

  it("toggles the active flag and leaves state alone when nothing changes", () => {
    const base = tournamentWith(2);
    const withdrawn = setActive(base, "p1", false);

    expect(withdrawn.players.p1?.isActive).toBe(false);
    expect(setActive(withdrawn, "p1", false)).toBe(withdrawn);
    expect(setActive(withdrawn, "p1", true).players.p1?.isActive).toBe(true);
  });
});
