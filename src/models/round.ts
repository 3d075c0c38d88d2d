import type { ID } from "@/models/base";

export type Color = "white" | "black";

/** Result of a board from `playerA`'s point of view. */
export type PairingOutcome = "win" | "loss" | "draw" | "bye";

export interface Pairing {
  board: number;
  playerA: ID;
  playerB: ID | null;
  colorA: Color | null;
  colorB: Color | null;
}

export type RoundStatus = "paired" | "recorded";

export interface Round {
  index: number;
  pairings: Pairing[];
  forcedRepeat: boolean;
  repeatedPairs: [ID, ID][];
  status: RoundStatus;
  results?: PairingOutcome[];
}
