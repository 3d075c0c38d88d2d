import type { ID } from "@/models/base";
import type { Player } from "@/models/player";
import type { Color, PairingOutcome } from "@/models/round";
import type { TiebreakCriterion } from "@/models/tournament";

export interface TiebreakValue {
  criterion: TiebreakCriterion;
  value: number;
}

export interface StandingRow {
  rank: number;
  player: Player;
  score: number;
  tiebreaks: TiebreakValue[];
  wins: number;
  draws: number;
  losses: number;
  byes: number;
  gamesPlayed: number;
}

export type GameOutcome = Exclude<PairingOutcome, "bye">;

export interface CrosstableGame {
  round: number;
  color: Color;
  outcome: GameOutcome;
  points: number;
}

export interface CrosstableRow {
  playerId: ID;
  rank: number;
  score: number;
  /** Indexed like `Crosstable.playerIds`; the diagonal is always empty. */
  cells: CrosstableGame[][];
  byeRounds: number[];
}

export interface Crosstable {
  playerIds: ID[];
  rows: CrosstableRow[];
}

export interface PlayerRoundEntry {
  round: number;
  board: number;
  opponentId: ID | null;
  color: Color | null;
  outcome: PairingOutcome | null;
  points: number | null;
}
