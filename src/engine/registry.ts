import { SequenceError, ValidationError } from "@/engine/errors";
import { findPlayer, makeId } from "@/engine/util";
import type { ID, NewPlayerInput, Player, PlayerChanges, PlayerContact, TournamentState } from "@/models";

export const MIN_RATING = 0;
export const MAX_RATING = 4000;

export const contactFields = ["gender", "dob", "phone", "email", "club", "federation"] as const satisfies readonly (keyof PlayerContact)[];

function normalizeName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError("EMPTY_PLAYER_NAME", "Player name cannot be empty.");
  }
  return trimmed;
}

function assertRating(rating: number | undefined): void {
  if (rating === undefined) {
    return;
  }
  if (!Number.isInteger(rating) || rating < MIN_RATING || rating > MAX_RATING) {
    throw new ValidationError(
      "INVALID_RATING",
      `Rating must be a whole number between ${MIN_RATING} and ${MAX_RATING} (got ${rating}).`,
    );
  }
}

function assertUniqueName(state: TournamentState, name: string, exceptId?: ID): void {
  const clash = Object.values(state.players).find((player) => player.name === name && player.id !== exceptId);
  if (clash) {
    throw new ValidationError("DUPLICATE_PLAYER_NAME", `Another player named '${name}' already exists.`);
  }
}

function pickContact(source: PlayerContact): PlayerContact {
  const contact: PlayerContact = {};
  contactFields.forEach((field) => {
    const value = source[field]?.trim();
    if (value) {
      contact[field] = value;
    }
  });
  return contact;
}

export function requirePlayer(state: TournamentState, playerId: ID): Player {
  const player = findPlayer(state, playerId);
  if (!player) {
    throw new ValidationError("PLAYER_NOT_FOUND", `Player '${playerId}' does not exist.`);
  }
  return player;
}

export function hasStarted(state: TournamentState): boolean {
  return state.rounds.length > 0;
}

export function addPlayer(state: TournamentState, input: NewPlayerInput): { state: TournamentState; player: Player } {
  if (hasStarted(state)) {
    throw new SequenceError("TOURNAMENT_STARTED", "Cannot add players after the tournament has started.");
  }
  const name = normalizeName(input.name);
  assertUniqueName(state, name);
  assertRating(input.rating);

  const requestedId = input.id?.trim();
  if (requestedId !== undefined && (!requestedId || findPlayer(state, requestedId))) {
    throw new ValidationError("INVALID_PLAYER_ID", `Player id '${input.id ?? ""}' is empty or already in use.`);
  }
  const id = requestedId ?? makeId("player", Object.keys(state.players));

  const player: Player = {
    id,
    name,
    ...(input.rating !== undefined ? { rating: input.rating } : {}),
    ...pickContact(input),
    isActive: input.isActive ?? true,
  };

  return {
    state: { ...state, players: { ...state.players, [id]: player } },
    player,
  };
}

/**
 * Edits name, rating and contact details. Allowed at any point; a rating change only
 * moves the player in future seed orders. Passing an empty string clears a contact field.
 */
export function updatePlayer(state: TournamentState, playerId: ID, changes: PlayerChanges): { state: TournamentState; player: Player } {
  const current = requirePlayer(state, playerId);
  const next: Player = { ...current };

  if (changes.name !== undefined) {
    const name = normalizeName(changes.name);
    assertUniqueName(state, name, playerId);
    next.name = name;
  }

  if ("rating" in changes) {
    assertRating(changes.rating);
    if (changes.rating === undefined) {
      delete next.rating;
    } else {
      next.rating = changes.rating;
    }
  }

  contactFields.forEach((field) => {
    if (!(field in changes)) {
      return;
    }
    const value = changes[field]?.trim();
    if (value) {
      next[field] = value;
    } else {
      delete next[field];
    }
  });

  return {
    state: { ...state, players: { ...state.players, [playerId]: next } },
    player: next,
  };
}

export function removePlayer(state: TournamentState, playerId: ID): TournamentState {
  requirePlayer(state, playerId);
  if (hasStarted(state)) {
    throw new SequenceError(
      "TOURNAMENT_STARTED",
      "Players cannot be removed once pairings exist; withdraw them instead.",
    );
  }
  const players = { ...state.players };
  delete players[playerId];
  return { ...state, players };
}

export function setActive(state: TournamentState, playerId: ID, active: boolean): TournamentState {
  const player = requirePlayer(state, playerId);
  if (player.isActive === active) {
    return state;
  }
  return {
    ...state,
    players: { ...state.players, [playerId]: { ...player, isActive: active } },
  };
}
