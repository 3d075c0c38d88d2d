import type { Command } from "@/engine/commands";
import type { EngineConfig } from "@/engine/config";
import type { TournamentError } from "@/engine/errors";
import type { EngineSelectors } from "@/engine/selectors";
import type { TournamentRecord } from "@/engine/serialization";
import type { ValidationResult } from "@/engine/validation";
import type { DomainEvent, ISODateTime, TournamentConfig, TournamentState, TournamentStatus } from "@/models";

export interface Actor {
  id?: string;
  name?: string;
}

export interface ApplyResult {
  state: TournamentState;
  events: DomainEvent[];
  validation: ValidationResult;
  /** Set when the command was rejected; `state` is then the input state. */
  error?: TournamentError;
}

export interface TournamentEngine {
  readonly config: EngineConfig;
  selectors: EngineSelectors;
  createEmpty(now: ISODateTime, name: string, config?: Partial<TournamentConfig>): TournamentState;
  applyCommand(state: TournamentState, command: Command, now: ISODateTime, actor?: Actor): ApplyResult;
  validate(state: TournamentState): ValidationResult;
  status(state: TournamentState): TournamentStatus;
  toRecord(state: TournamentState): TournamentRecord;
  fromRecord(input: unknown, now: ISODateTime): TournamentState;
  toJSON(state: TournamentState): string;
  fromJSON(json: string, now: ISODateTime): TournamentState;
}
