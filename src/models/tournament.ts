import type { ID, ISODateTime } from "@/models/base";
import type { Player } from "@/models/player";
import type { Round } from "@/models/round";

export const TIEBREAK_CRITERIA = [
  "buchholz",
  "buchholz_cut1",
  "median_buchholz",
  "sonneborn_berger",
  "cumulative",
  "cumulative_opponents",
  "head_to_head",
  "wins",
  "rating",
] as const;

export type TiebreakCriterion = (typeof TIEBREAK_CRITERIA)[number];

export interface TournamentConfig {
  numRounds: number;
  tiebreakOrder: TiebreakCriterion[];
}

export type TournamentStatus = "not_started" | "awaiting_results" | "ready_for_next_round" | "finished";

export interface AuditEntry {
  id: ID;
  at: ISODateTime;
  actor?: { id?: string; name?: string };
  commandType: string;
  summary: string;
}

export interface TournamentState {
  name: string;
  version: number;
  createdAt: ISODateTime;
  updatedAt: ISODateTime;
  config: TournamentConfig;
  players: Record<ID, Player>;
  rounds: Round[];
  audit: AuditEntry[];
}
