import { createTournamentEngine, type Command } from "@/engine";
import type { NewPlayerInput, PairingOutcome, TournamentState } from "@/models";

export const NOW = "2026-02-20T12:00:00.000Z";

export const engine = createTournamentEngine({ logLevel: "error", defaultRoundCount: 3 });

export const ROSTER: NewPlayerInput[] = [
  { id: "p1", name: "Ana", rating: 2000 },
  { id: "p2", name: "Ben", rating: 1900 },
  { id: "p3", name: "Cara", rating: 1800 },
  { id: "p4", name: "Dev", rating: 1700 },
  { id: "p5", name: "Eli", rating: 1600 },
  { id: "p6", name: "Fay", rating: 1500 },
  { id: "p7", name: "Gus", rating: 1400 },
  { id: "p8", name: "Hal", rating: 1300 },
];

export function apply(state: TournamentState, command: Command): TournamentState {
  const result = engine.applyCommand(state, command, NOW, { id: "arbiter", name: "Arbiter" });
  if (result.error) {
    throw result.error;
  }
  return result.state;
}

export function tournamentWith(playerCount: number, numRounds = 3): TournamentState {
  let state = engine.createEmpty(NOW, "Spring Open", { numRounds, tiebreakOrder: ["rating"] });
  ROSTER.slice(0, playerCount).forEach((player) => {
    state = apply(state, { type: "ADD_PLAYER", payload: player });
  });
  return state;
}

export function pairNext(state: TournamentState): TournamentState {
  return apply(state, { type: "GENERATE_NEXT_ROUND" });
}

export function record(state: TournamentState, outcomes: PairingOutcome[]): TournamentState {
  return apply(state, { type: "RECORD_RESULTS", payload: { roundIndex: state.rounds.length, outcomes } });
}

/** Pairs the next round and records a white win on every board. */
export function playRound(state: TournamentState): TournamentState {
  const paired = pairNext(state);
  const round = paired.rounds[paired.rounds.length - 1];
  const outcomes = (round?.pairings ?? []).map((pairing): PairingOutcome => (pairing.playerB === null ? "bye" : "win"));
  return record(paired, outcomes);
}

export function boards(state: TournamentState, roundIndex: number): [string, string | null][] {
  const round = state.rounds[roundIndex - 1];
  return (round?.pairings ?? []).map((pairing): [string, string | null] => [pairing.playerA, pairing.playerB]);
}
