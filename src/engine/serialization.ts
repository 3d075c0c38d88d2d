import * as z from "zod";

import { DecodeError } from "@/engine/errors";
import { pairedRound } from "@/engine/ledger";
import { contactFields } from "@/engine/registry";
import { validateState } from "@/engine/validation";
import { TIEBREAK_CRITERIA, type ISODateTime, type Player, type PlayerContact, type Round, type TournamentState } from "@/models";

const colorSchema = z.enum(["white", "black"]);
const optionalText = z.string().nullable().optional();

const playerRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  rating: z.number().int().nullable().optional(),
  gender: optionalText,
  dob: optionalText,
  phone: optionalText,
  email: optionalText,
  club: optionalText,
  federation: optionalText,
  is_active: z.boolean(),
});

const pairingRecordSchema = z.object({
  board: z.number().int().positive(),
  player_a: z.string().min(1),
  player_b: z.string().min(1).nullable(),
  color_a: colorSchema.nullable(),
  color_b: colorSchema.nullable(),
});

const roundRecordSchema = z.object({
  index: z.number().int().positive(),
  pairings: z.array(pairingRecordSchema),
  forced_repeat: z.boolean().default(false),
  repeated_pairs: z.array(z.tuple([z.string(), z.string()])).default([]),
  results: z.array(z.enum(["win", "loss", "draw", "bye"])).optional(),
});

export const tournamentRecordSchema = z.object({
  name: z.string(),
  num_rounds: z.number().int().positive(),
  tiebreak_order: z.array(z.enum(TIEBREAK_CRITERIA)),
  players: z.record(playerRecordSchema),
  rounds: z.array(roundRecordSchema),
});

export type TournamentRecord = z.input<typeof tournamentRecordSchema>;
export type PlayerRecord = z.infer<typeof playerRecordSchema>;
export type RoundRecord = z.input<typeof roundRecordSchema>;

function playerToRecord(player: Player): PlayerRecord {
  return {
    id: player.id,
    name: player.name,
    rating: player.rating ?? null,
    gender: player.gender ?? null,
    dob: player.dob ?? null,
    phone: player.phone ?? null,
    email: player.email ?? null,
    club: player.club ?? null,
    federation: player.federation ?? null,
    is_active: player.isActive,
  };
}

function roundToRecord(round: Round): RoundRecord {
  return {
    index: round.index,
    pairings: round.pairings.map((pairing) => ({
      board: pairing.board,
      player_a: pairing.playerA,
      player_b: pairing.playerB,
      color_a: pairing.colorA,
      color_b: pairing.colorB,
    })),
    forced_repeat: round.forcedRepeat,
    repeated_pairs: round.repeatedPairs.map(([a, b]): [string, string] => [a, b]),
    ...(round.status === "recorded" && round.results ? { results: [...round.results] } : {}),
  };
}

export function toRecord(state: TournamentState): TournamentRecord {
  return {
    name: state.name,
    num_rounds: state.config.numRounds,
    tiebreak_order: [...state.config.tiebreakOrder],
    players: Object.fromEntries(Object.values(state.players).map((player) => [player.id, playerToRecord(player)])),
    rounds: state.rounds.map(roundToRecord),
  };
}

function playerFromRecord(record: PlayerRecord): Player {
  const contact: PlayerContact = {};
  contactFields.forEach((field) => {
    const value = record[field];
    if (value) {
      contact[field] = value;
    }
  });
  return {
    id: record.id,
    name: record.name,
    ...(record.rating !== null && record.rating !== undefined ? { rating: record.rating } : {}),
    ...contact,
    isActive: record.is_active,
  };
}

function rawPlayerKeys(input: unknown): string[] {
  if (typeof input !== "object" || input === null || !("players" in input)) {
    return [];
  }
  const { players } = input;
  return typeof players === "object" && players !== null ? Object.keys(players) : [];
}

/**
 * Decodes a persisted record. Shape problems and integrity problems both raise
 * DecodeError; no partial tournament is ever returned.
 */
export function fromRecord(input: unknown, now: ISODateTime): TournamentState {
  const parsed = tournamentRecordSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new DecodeError("MALFORMED_RECORD", "Tournament record has an invalid shape.", details);
  }
  const record = parsed.data;

  const dropped = rawPlayerKeys(input).filter((key) => !Object.hasOwn(record.players, key));
  if (dropped.length) {
    throw new DecodeError(
      "MALFORMED_RECORD",
      "Tournament record has an invalid shape.",
      dropped.map((key) => `players.${key}: reserved key`),
    );
  }

  const players: Record<string, Player> = Object.fromEntries(
    Object.entries(record.players).map(([key, player]) => [key, playerFromRecord(player)]),
  );

  const rounds = record.rounds.map((roundRecord): Round => {
    const round = pairedRound({
      index: roundRecord.index,
      pairings: roundRecord.pairings.map((pairing) => ({
        board: pairing.board,
        playerA: pairing.player_a,
        playerB: pairing.player_b,
        colorA: pairing.color_a,
        colorB: pairing.color_b,
      })),
      repeatedPairs: roundRecord.repeated_pairs,
    });
    if (roundRecord.forced_repeat !== round.forcedRepeat) {
      throw new DecodeError(
        "FORCED_REPEAT_MISMATCH",
        `Round ${roundRecord.index} forced_repeat does not match its repeated_pairs.`,
      );
    }
    return roundRecord.results ? { ...round, status: "recorded", results: roundRecord.results } : round;
  });

  const state: TournamentState = {
    name: record.name,
    version: 0,
    createdAt: now,
    updatedAt: now,
    config: { numRounds: record.num_rounds, tiebreakOrder: record.tiebreak_order },
    players,
    rounds,
    audit: [],
  };

  const validation = validateState(state);
  if (!validation.ok) {
    throw new DecodeError(
      "INCONSISTENT_RECORD",
      "Tournament record failed integrity checks.",
      validation.issues.filter((issue) => issue.level === "error").map((issue) => `${issue.code}: ${issue.message}`),
    );
  }
  return state;
}

export function toJSON(state: TournamentState): string {
  return JSON.stringify(toRecord(state), null, 2);
}

export function fromJSON(json: string, now: ISODateTime): TournamentState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new DecodeError("INVALID_JSON", "Tournament file is not valid JSON.", [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return fromRecord(parsed, now);
}
