import type { ID, Player, TournamentState } from "@/models";

/** Code-point comparison; unlike localeCompare it gives the same order on every host. */
export function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function ratingOf(player: Player): number {
  return player.rating ?? 0;
}

export function comparePlayersByRating(a: Player, b: Player): number {
  if (ratingOf(b) !== ratingOf(a)) {
    return ratingOf(b) - ratingOf(a);
  }
  if (a.name !== b.name) {
    return compareText(a.name, b.name);
  }
  return compareText(a.id, b.id);
}

export function makeId(prefix: string, taken: Iterable<ID>): ID {
  const used = new Set(taken);
  let serial = used.size + 1;
  while (used.has(`${prefix}_${serial}`)) {
    serial += 1;
  }
  return `${prefix}_${serial}`;
}

/** Own-key lookup, so ids such as "constructor" never resolve to prototype members. */
export function findPlayer(state: TournamentState, playerId: ID): Player | undefined {
  return Object.hasOwn(state.players, playerId) ? state.players[playerId] : undefined;
}

export function listPlayers(state: TournamentState): Player[] {
  return Object.values(state.players);
}

export function pairKey(a: ID, b: ID): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export function orderedPair(a: ID, b: ID): [ID, ID] {
  return a < b ? [a, b] : [b, a];
}
