import { compareText } from "@/engine/util";
import { TIEBREAK_CRITERIA, type ID, type Player, type TiebreakCriterion } from "@/models";

export interface GameRecord {
  round: number;
  opponentId: ID;
  points: number;
}

/** Everything the criteria need about one player, taken from recorded rounds only. */
export interface TiebreakerRow {
  player: Player;
  points: number;
  games: GameRecord[];
  wins: number;
  /** Running score after each recorded round, byes included. */
  progressive: number[];
}

export interface TiebreakContext {
  rowsById: Map<ID, TiebreakerRow>;
}

type CriterionFn = (row: TiebreakerRow, context: TiebreakContext) => number;

function opponentScores(row: TiebreakerRow, context: TiebreakContext): number[] {
  return row.games.map((game) => context.rowsById.get(game.opponentId)?.points ?? 0);
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function cumulative(row: TiebreakerRow): number {
  return sum(row.progressive);
}

const criteria: Record<TiebreakCriterion, CriterionFn> = {
  buchholz: (row, context) => sum(opponentScores(row, context)),

  buchholz_cut1: (row, context) => {
    const scores = opponentScores(row, context);
    return scores.length === 0 ? 0 : sum(scores) - Math.min(...scores);
  },

  median_buchholz: (row, context) => {
    const scores = opponentScores(row, context);
    if (scores.length < 3) {
      return sum(scores);
    }
    return sum(scores) - Math.min(...scores) - Math.max(...scores);
  },

  sonneborn_berger: (row, context) =>
    sum(row.games.map((game) => game.points * (context.rowsById.get(game.opponentId)?.points ?? 0))),

  cumulative: (row) => cumulative(row),

  cumulative_opponents: (row, context) =>
    sum(
      row.games.map((game) => {
        const opponent = context.rowsById.get(game.opponentId);
        return opponent ? cumulative(opponent) : 0;
      }),
    ),

  head_to_head: (row, context) =>
    sum(
      row.games
        .filter((game) => context.rowsById.get(game.opponentId)?.points === row.points)
        .map((game) => game.points),
    ),

  wins: (row) => row.wins,

  rating: (row) => row.player.rating ?? 0,
};

export function isTiebreakCriterion(value: string): value is TiebreakCriterion {
  return TIEBREAK_CRITERIA.some((criterion) => criterion === value);
}

export function evaluateTiebreak(criterion: TiebreakCriterion, row: TiebreakerRow, context: TiebreakContext): number {
  return criteria[criterion](row, context);
}

export interface RankedRow {
  player: Player;
  points: number;
  values: number[];
}

/** Score, then each configured value, all descending; then name and id for a total order. */
export function sortWithTiebreakers<T extends RankedRow>(rows: T[]): T[] {
  return [...rows].sort((a, b) => {
    if (a.points !== b.points) {
      return b.points - a.points;
    }
    for (let idx = 0; idx < a.values.length; idx += 1) {
      const left = a.values[idx] ?? 0;
      const right = b.values[idx] ?? 0;
      if (left !== right) {
        return right - left;
      }
    }
    if (a.player.name !== b.player.name) {
      return compareText(a.player.name, b.player.name);
    }
    return compareText(a.player.id, b.player.id);
  });
}
