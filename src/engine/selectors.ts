import { getStatus, lastRound } from "@/engine/ledger";
import { computeCrosstable, computeStandings, getPlayerHistory } from "@/engine/standings";
import { compareText, findPlayer, listPlayers } from "@/engine/util";
import type {
  Crosstable,
  ID,
  Player,
  PlayerRoundEntry,
  Round,
  StandingRow,
  TournamentState,
  TournamentStatus,
} from "@/models";

export interface EngineSelectors {
  getPlayer(state: TournamentState, playerId: ID): Player | undefined;
  listPlayers(state: TournamentState): Player[];
  getActivePlayers(state: TournamentState): Player[];
  searchPlayers(state: TournamentState, query: string): Player[];
  getRound(state: TournamentState, roundIndex: number): Round | undefined;
  getCurrentRound(state: TournamentState): Round | undefined;
  getByePlayer(state: TournamentState, roundIndex: number): Player | undefined;
  getStatus(state: TournamentState): TournamentStatus;
  getStandings(state: TournamentState): StandingRow[];
  getCrosstable(state: TournamentState): Crosstable;
  getPlayerHistory(state: TournamentState, playerId: ID): PlayerRoundEntry[];
}

function byName(a: Player, b: Player): number {
  return compareText(a.name, b.name) || compareText(a.id, b.id);
}

export const selectors: EngineSelectors = {
  getPlayer(state, playerId) {
    return findPlayer(state, playerId);
  },

  listPlayers(state) {
    return listPlayers(state).sort(byName);
  },

  getActivePlayers(state) {
    return listPlayers(state)
      .filter((player) => player.isActive)
      .sort(byName);
  },

  searchPlayers(state, query) {
    const normalized = query.trim().toLowerCase();
    const players = listPlayers(state).sort(byName);
    if (!normalized) {
      return players;
    }
    return players.filter((player) =>
      [player.name, player.id, player.club, player.federation].some((field) => field?.toLowerCase().includes(normalized)),
    );
  },

  getRound(state, roundIndex) {
    return state.rounds.find((round) => round.index === roundIndex);
  },

  getCurrentRound(state) {
    return lastRound(state);
  },

  getByePlayer(state, roundIndex) {
    const bye = state.rounds
      .find((round) => round.index === roundIndex)
      ?.pairings.find((pairing) => pairing.playerB === null);
    return bye ? findPlayer(state, bye.playerA) : undefined;
  },

  getStatus(state) {
    return getStatus(state);
  },

  getStandings(state) {
    return computeStandings(state);
  },

  getCrosstable(state) {
    return computeCrosstable(state);
  },

  getPlayerHistory(state, playerId) {
    return getPlayerHistory(state, playerId);
  },
};
