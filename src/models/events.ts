import type { ID, ISODateTime } from "@/models/base";

export type DomainEvent =
  | { type: "PLAYER_ADDED"; playerId: ID; at: ISODateTime }
  | { type: "PLAYER_UPDATED"; playerId: ID; at: ISODateTime }
  | { type: "PLAYER_REMOVED"; playerId: ID; at: ISODateTime }
  | { type: "PLAYER_STATUS_CHANGED"; playerId: ID; active: boolean; at: ISODateTime }
  | { type: "CONFIG_UPDATED"; at: ISODateTime }
  | { type: "ROUND_PAIRED"; roundIndex: number; at: ISODateTime }
  | { type: "PAIRING_EXHAUSTED"; roundIndex: number; repeatedPairs: [ID, ID][]; at: ISODateTime }
  | { type: "RESULTS_RECORDED"; roundIndex: number; at: ISODateTime }
  | { type: "RESULTS_UNDONE"; roundIndex: number; at: ISODateTime }
  | { type: "ROUND_DISCARDED"; roundIndex: number; at: ISODateTime }
  | { type: "STANDINGS_UPDATED"; at: ISODateTime };
