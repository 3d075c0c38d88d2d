import type { Command } from "@/engine/commands";
import { standingsCommands } from "@/engine/commands";
import { resolveEngineConfig, type EngineConfig } from "@/engine/config";
import { isTournamentError, SequenceError, ValidationError, type TournamentError } from "@/engine/errors";
import { discardPendingRound, getStatus, pairNextRound, recordResults, undoLast } from "@/engine/ledger";
import { createEngineLogger, type EngineLogger } from "@/engine/logger";
import { addPlayer, hasStarted, removePlayer, requirePlayer, setActive, updatePlayer } from "@/engine/registry";
import { isTiebreakCriterion } from "@/engine/rules/tiebreakers";
import { selectors } from "@/engine/selectors";
import { fromJSON, fromRecord, toJSON, toRecord, type TournamentRecord } from "@/engine/serialization";
import type { Actor, ApplyResult, TournamentEngine } from "@/engine/types";
import { findPlayer, makeId } from "@/engine/util";
import { validateState, type ValidationResult } from "@/engine/validation";
import type { DomainEvent, ISODateTime, TiebreakCriterion, TournamentConfig, TournamentState, TournamentStatus } from "@/models";

function buildAuditSummary(command: Command, state: TournamentState): string {
  switch (command.type) {
    case "RENAME_TOURNAMENT":
      return `Renamed tournament to '${state.name}'`;
    case "ADD_PLAYER":
      return `Added player '${command.payload.name.trim()}'`;
    case "UPDATE_PLAYER":
      return `Updated player '${findPlayer(state, command.payload.playerId)?.name ?? command.payload.playerId}'`;
    case "REMOVE_PLAYER":
      return `Removed player '${command.payload.playerId}'`;
    case "SET_PLAYER_ACTIVE": {
      const name = findPlayer(state, command.payload.playerId)?.name ?? command.payload.playerId;
      return `${command.payload.active ? "Reactivated" : "Withdrew"} player '${name}'`;
    }
    case "SET_ROUND_COUNT":
      return `Set round count to ${command.payload.numRounds}`;
    case "SET_TIEBREAK_ORDER":
      return `Set tiebreak order to ${command.payload.order.join(", ") || "(none)"}`;
    case "GENERATE_NEXT_ROUND":
      return `Paired round ${state.rounds.length}`;
    case "RECORD_RESULTS":
      return `Recorded results for round ${command.payload.roundIndex}`;
    case "UNDO_LAST":
      return `Undid results of round ${state.rounds.length}`;
    case "DISCARD_PENDING_ROUND":
      return `Discarded pending round ${state.rounds.length + 1}`;
    default:
      return "Unknown command";
  }
}

function addAudit(state: TournamentState, command: Command, now: ISODateTime, actor?: Actor): TournamentState {
  return {
    ...state,
    audit: [
      ...state.audit,
      {
        id: makeId("audit", state.audit.map((entry) => entry.id)),
        at: now,
        ...(actor ? { actor: { ...actor } } : {}),
        commandType: command.type,
        summary: buildAuditSummary(command, state),
      },
    ],
  };
}

function incrementVersion(state: TournamentState, now: ISODateTime): TournamentState {
  return {
    ...state,
    version: state.version + 1,
    updatedAt: now,
  };
}

function getCommandValidationFailure(state: TournamentState, error: TournamentError): ApplyResult {
  const validation: ValidationResult = {
    ok: false,
    issues: [{ level: "error", code: error.code, message: error.message }],
  };
  return { state, events: [], validation, error };
}

function normalizeTournamentName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError("EMPTY_TOURNAMENT_NAME", "Tournament name cannot be empty.");
  }
  return trimmed;
}

function assertRoundCount(numRounds: number): void {
  if (!Number.isInteger(numRounds) || numRounds < 1) {
    throw new ValidationError("INVALID_ROUND_COUNT", `Round count must be a positive whole number (got ${numRounds}).`);
  }
}

function assertTiebreakOrder(order: readonly string[]): TiebreakCriterion[] {
  const seen = new Set<TiebreakCriterion>();
  order.forEach((criterion) => {
    if (!isTiebreakCriterion(criterion)) {
      throw new ValidationError("UNKNOWN_TIEBREAK", `Unknown tiebreak criterion '${criterion}'.`);
    }
    if (seen.has(criterion)) {
      throw new ValidationError("DUPLICATE_TIEBREAK", `Tiebreak criterion '${criterion}' is listed twice.`);
    }
    seen.add(criterion);
  });
  return [...seen];
}

export class SwissTournamentEngine implements TournamentEngine {
  selectors = selectors;

  constructor(
    readonly config: EngineConfig,
    private readonly logger: EngineLogger = createEngineLogger(config.logLevel),
  ) {}

  createEmpty(now: ISODateTime, name: string, config: Partial<TournamentConfig> = {}): TournamentState {
    const numRounds = config.numRounds ?? this.config.defaultRoundCount;
    assertRoundCount(numRounds);
    return {
      name: normalizeTournamentName(name),
      version: 0,
      createdAt: now,
      updatedAt: now,
      config: {
        numRounds,
        tiebreakOrder: assertTiebreakOrder(config.tiebreakOrder ?? this.config.defaultTiebreakOrder),
      },
      players: {},
      rounds: [],
      audit: [],
    };
  }

  validate(state: TournamentState): ValidationResult {
    return validateState(state);
  }

  status(state: TournamentState): TournamentStatus {
    return getStatus(state);
  }

  toRecord(state: TournamentState): TournamentRecord {
    return toRecord(state);
  }

  fromRecord(input: unknown, now: ISODateTime): TournamentState {
    return fromRecord(input, now);
  }

  toJSON(state: TournamentState): string {
    return toJSON(state);
  }

  fromJSON(json: string, now: ISODateTime): TournamentState {
    return fromJSON(json, now);
  }

  applyCommand(state: TournamentState, command: Command, now: ISODateTime, actor?: Actor): ApplyResult {
    let outcome: { state: TournamentState; events: DomainEvent[] };
    try {
      outcome = this.execute(state, command, now);
    } catch (error) {
      if (isTournamentError(error)) {
        this.logger.withMetadata({ command: command.type, code: error.code }).debug("command rejected");
        return getCommandValidationFailure(state, error);
      }
      throw error;
    }

    let nextState = outcome.state;
    const events = outcome.events;
    if (nextState !== state) {
      nextState = incrementVersion(nextState, now);
      nextState = addAudit(nextState, command, now, actor);
      if (standingsCommands.has(command.type)) {
        events.push({ type: "STANDINGS_UPDATED", at: now });
      }
    }

    return {
      state: nextState,
      events,
      validation: this.validate(nextState),
    };
  }

  private execute(state: TournamentState, command: Command, now: ISODateTime): { state: TournamentState; events: DomainEvent[] } {
    const events: DomainEvent[] = [];

    switch (command.type) {
      case "RENAME_TOURNAMENT": {
        const name = normalizeTournamentName(command.payload.name);
        if (name === state.name) {
          return { state, events };
        }
        events.push({ type: "CONFIG_UPDATED", at: now });
        return { state: { ...state, name }, events };
      }

      case "ADD_PLAYER": {
        const added = addPlayer(state, command.payload);
        events.push({ type: "PLAYER_ADDED", playerId: added.player.id, at: now });
        return { state: added.state, events };
      }

      case "UPDATE_PLAYER": {
        const updated = updatePlayer(state, command.payload.playerId, command.payload.changes);
        events.push({ type: "PLAYER_UPDATED", playerId: updated.player.id, at: now });
        return { state: updated.state, events };
      }

      case "REMOVE_PLAYER": {
        const nextState = removePlayer(state, command.payload.playerId);
        events.push({ type: "PLAYER_REMOVED", playerId: command.payload.playerId, at: now });
        return { state: nextState, events };
      }

      case "SET_PLAYER_ACTIVE": {
        const { playerId, active } = command.payload;
        requirePlayer(state, playerId);
        const nextState = setActive(state, playerId, active);
        if (nextState !== state) {
          events.push({ type: "PLAYER_STATUS_CHANGED", playerId, active, at: now });
        }
        return { state: nextState, events };
      }

      case "SET_ROUND_COUNT": {
        const { numRounds } = command.payload;
        if (hasStarted(state)) {
          throw new SequenceError("TOURNAMENT_STARTED", "The round count can only change before round 1 is paired.");
        }
        assertRoundCount(numRounds);
        if (numRounds === state.config.numRounds) {
          return { state, events };
        }
        events.push({ type: "CONFIG_UPDATED", at: now });
        return { state: { ...state, config: { ...state.config, numRounds } }, events };
      }

      case "SET_TIEBREAK_ORDER": {
        const tiebreakOrder = assertTiebreakOrder(command.payload.order);
        events.push({ type: "CONFIG_UPDATED", at: now });
        return { state: { ...state, config: { ...state.config, tiebreakOrder } }, events };
      }

      case "GENERATE_NEXT_ROUND": {
        const paired = pairNextRound(state, { searchLimit: this.config.pairingSearchLimit, logger: this.logger });
        events.push({ type: "ROUND_PAIRED", roundIndex: paired.round.index, at: now });
        if (paired.round.forcedRepeat) {
          events.push({
            type: "PAIRING_EXHAUSTED",
            roundIndex: paired.round.index,
            repeatedPairs: paired.round.repeatedPairs,
            at: now,
          });
        }
        return { state: paired.state, events };
      }

      case "RECORD_RESULTS": {
        const recorded = recordResults(state, command.payload.roundIndex, command.payload.outcomes);
        events.push({ type: "RESULTS_RECORDED", roundIndex: recorded.round.index, at: now });
        return { state: recorded.state, events };
      }

      case "UNDO_LAST": {
        const undone = undoLast(state);
        if (undone.discarded) {
          events.push({ type: "ROUND_DISCARDED", roundIndex: undone.discarded.index, at: now });
        }
        events.push({ type: "RESULTS_UNDONE", roundIndex: undone.round.index, at: now });
        return { state: undone.state, events };
      }

      case "DISCARD_PENDING_ROUND": {
        const discarded = discardPendingRound(state);
        events.push({ type: "ROUND_DISCARDED", roundIndex: discarded.round.index, at: now });
        return { state: discarded.state, events };
      }

      default:
        return { state, events };
    }
  }
}

export function createTournamentEngine(options: Partial<EngineConfig> = {}): TournamentEngine {
  return new SwissTournamentEngine(resolveEngineConfig(options));
}
