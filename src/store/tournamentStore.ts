import { createStore, type StoreApi } from "zustand/vanilla";

import { renderHistoryLog } from "@/admin/audit";
import {
  createTournamentEngine,
  type Actor,
  type ApplyResult,
  type Command,
  type TournamentEngine,
  type TournamentRecord,
  type ValidationResult,
} from "@/engine";
import type {
  Crosstable,
  DomainEvent,
  ID,
  ISODateTime,
  NewPlayerInput,
  PairingOutcome,
  PlayerChanges,
  StandingRow,
  TiebreakCriterion,
  TournamentConfig,
  TournamentState,
  TournamentStatus,
} from "@/models";

export interface TournamentSessionState {
  tournament: TournamentState;
  status: TournamentStatus;
  lastEvents: DomainEvent[];
  validationIssues: string[];

  newTournament(name: string, config?: Partial<TournamentConfig>): void;
  dispatch(command: Command): ApplyResult;
  addPlayer(input: NewPlayerInput): ApplyResult;
  updatePlayer(playerId: ID, changes: PlayerChanges): ApplyResult;
  removePlayer(playerId: ID): ApplyResult;
  setActive(playerId: ID, active: boolean): ApplyResult;
  setRoundCount(numRounds: number): ApplyResult;
  setTiebreakOrder(order: TiebreakCriterion[]): ApplyResult;
  generateNextRound(): ApplyResult;
  recordResults(roundIndex: number, outcomes: PairingOutcome[]): ApplyResult;
  undoLast(): ApplyResult;
  discardPendingRound(): ApplyResult;
  standings(): StandingRow[];
  crosstable(): Crosstable;
  historyLog(): string[];
  exportRecord(): TournamentRecord;
  exportJSON(): string;
  /** Replaces the session tournament; a DecodeError leaves the current one in place. */
  importJSON(json: string): void;
}

export interface TournamentStoreOptions {
  engine?: TournamentEngine;
  clock?: () => ISODateTime;
  actor?: Actor;
  name?: string;
}

export type TournamentStore = StoreApi<TournamentSessionState>;

const nowISO = (): ISODateTime => new Date().toISOString();

function describeIssues(validation: ValidationResult): string[] {
  return validation.issues.map((issue) => `${issue.code}: ${issue.message}`);
}

export function createTournamentStore(options: TournamentStoreOptions = {}): TournamentStore {
  const engine = options.engine ?? createTournamentEngine();
  const clock = options.clock ?? nowISO;
  const initial = engine.createEmpty(clock(), options.name ?? "Tournament");

  return createStore<TournamentSessionState>()((set, get) => {
    const load = (tournament: TournamentState): void => {
      set({
        tournament,
        status: engine.status(tournament),
        lastEvents: [],
        validationIssues: describeIssues(engine.validate(tournament)),
      });
    };

    return {
      tournament: initial,
      status: engine.status(initial),
      lastEvents: [],
      validationIssues: [],

      newTournament(name, config) {
        load(engine.createEmpty(clock(), name, config));
      },

      dispatch(command) {
        const result = engine.applyCommand(get().tournament, command, clock(), options.actor);
        set({
          tournament: result.state,
          status: engine.status(result.state),
          lastEvents: result.events,
          validationIssues: describeIssues(result.validation),
        });
        return result;
      },

      addPlayer(input) {
        return get().dispatch({ type: "ADD_PLAYER", payload: input });
      },

      updatePlayer(playerId, changes) {
        return get().dispatch({ type: "UPDATE_PLAYER", payload: { playerId, changes } });
      },

      removePlayer(playerId) {
        return get().dispatch({ type: "REMOVE_PLAYER", payload: { playerId } });
      },

      setActive(playerId, active) {
        return get().dispatch({ type: "SET_PLAYER_ACTIVE", payload: { playerId, active } });
      },

      setRoundCount(numRounds) {
        return get().dispatch({ type: "SET_ROUND_COUNT", payload: { numRounds } });
      },

      setTiebreakOrder(order) {
        return get().dispatch({ type: "SET_TIEBREAK_ORDER", payload: { order } });
      },

      generateNextRound() {
        return get().dispatch({ type: "GENERATE_NEXT_ROUND" });
      },

      recordResults(roundIndex, outcomes) {
        return get().dispatch({ type: "RECORD_RESULTS", payload: { roundIndex, outcomes } });
      },

      undoLast() {
        return get().dispatch({ type: "UNDO_LAST" });
      },

      discardPendingRound() {
        return get().dispatch({ type: "DISCARD_PENDING_ROUND" });
      },

      standings() {
        return engine.selectors.getStandings(get().tournament);
      },

      crosstable() {
        return engine.selectors.getCrosstable(get().tournament);
      },

      historyLog() {
        return renderHistoryLog(get().tournament.audit);
      },

      exportRecord() {
        return engine.toRecord(get().tournament);
      },

      exportJSON() {
        return engine.toJSON(get().tournament);
      },

      importJSON(json) {
        load(engine.fromJSON(json, clock()));
      },
    };
  });
}
