import type { ID, NewPlayerInput, PairingOutcome, PlayerChanges, TiebreakCriterion } from "@/models";

export interface UpdatePlayerPayload {
  playerId: ID;
  changes: PlayerChanges;
}

export interface RecordResultsPayload {
  roundIndex: number;
  /** One outcome per board, in board order, from the white player's side. */
  outcomes: PairingOutcome[];
}

export type Command =
  | { type: "RENAME_TOURNAMENT"; payload: { name: string } }
  | { type: "ADD_PLAYER"; payload: NewPlayerInput }
  | { type: "UPDATE_PLAYER"; payload: UpdatePlayerPayload }
  | { type: "REMOVE_PLAYER"; payload: { playerId: ID } }
  | { type: "SET_PLAYER_ACTIVE"; payload: { playerId: ID; active: boolean } }
  | { type: "SET_ROUND_COUNT"; payload: { numRounds: number } }
  | { type: "SET_TIEBREAK_ORDER"; payload: { order: TiebreakCriterion[] } }
  | { type: "GENERATE_NEXT_ROUND" }
  | { type: "RECORD_RESULTS"; payload: RecordResultsPayload }
  | { type: "UNDO_LAST" }
  | { type: "DISCARD_PENDING_ROUND" };

export type CommandType = Command["type"];

/** Commands after which the standings table may read differently. */
export const standingsCommands: ReadonlySet<CommandType> = new Set<CommandType>([
  "UPDATE_PLAYER",
  "SET_TIEBREAK_ORDER",
  "RECORD_RESULTS",
  "UNDO_LAST",
]);
