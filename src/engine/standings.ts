import { reverseOutcome } from "@/engine/pairing/history";
import { POINTS } from "@/engine/rules/points";
import { evaluateTiebreak, sortWithTiebreakers, type TiebreakerRow } from "@/engine/rules/tiebreakers";
import { requirePlayer } from "@/engine/registry";
import type {
  Crosstable,
  CrosstableGame,
  CrosstableRow,
  GameOutcome,
  ID,
  PlayerRoundEntry,
  StandingRow,
  TournamentState,
} from "@/models";

interface Tally extends TiebreakerRow {
  draws: number;
  losses: number;
  byes: number;
}

function tallyRecordedRounds(state: TournamentState): Map<ID, Tally> {
  const tallies = new Map<ID, Tally>();
  Object.values(state.players).forEach((player) => {
    tallies.set(player.id, { player, points: 0, games: [], wins: 0, draws: 0, losses: 0, byes: 0, progressive: [] });
  });

  const addGame = (playerId: ID, opponentId: ID, outcome: GameOutcome, round: number): void => {
    const tally = tallies.get(playerId);
    if (!tally) {
      return;
    }
    const points = POINTS[outcome];
    tally.points += points;
    tally.games.push({ round, opponentId, points });
    if (outcome === "win") {
      tally.wins += 1;
    } else if (outcome === "draw") {
      tally.draws += 1;
    } else {
      tally.losses += 1;
    }
  };

  state.rounds
    .filter((round) => round.status === "recorded")
    .forEach((round) => {
      round.pairings.forEach((pairing, idx) => {
        const outcome = round.results?.[idx];
        if (!outcome) {
          return;
        }
        if (pairing.playerB === null || outcome === "bye") {
          const tally = tallies.get(pairing.playerA);
          if (tally) {
            tally.points += POINTS.bye;
            tally.byes += 1;
          }
          return;
        }
        addGame(pairing.playerA, pairing.playerB, outcome, round.index);
        addGame(pairing.playerB, pairing.playerA, reverseOutcome(outcome), round.index);
      });
      tallies.forEach((tally) => {
        tally.progressive.push(tally.points);
      });
    });

  return tallies;
}

/** Full recomputation from the ledger; nothing is cached between calls. */
export function computeStandings(state: TournamentState): StandingRow[] {
  const tallies = tallyRecordedRounds(state);
  const context = { rowsById: new Map<ID, TiebreakerRow>(tallies) };
  const order = state.config.tiebreakOrder;

  const ranked = sortWithTiebreakers(
    [...tallies.values()].map((tally) => ({
      tally,
      player: tally.player,
      points: tally.points,
      values: order.map((criterion) => evaluateTiebreak(criterion, tally, context)),
    })),
  );

  return ranked.map((row, idx) => ({
    rank: idx + 1,
    player: row.player,
    score: row.points,
    tiebreaks: order.map((criterion, criterionIdx) => ({ criterion, value: row.values[criterionIdx] ?? 0 })),
    wins: row.tally.wins,
    draws: row.tally.draws,
    losses: row.tally.losses,
    byes: row.tally.byes,
    gamesPlayed: row.tally.games.length,
  }));
}

export function computeCrosstable(state: TournamentState): Crosstable {
  const standings = computeStandings(state);
  const playerIds = standings.map((row) => row.player.id);
  const column = new Map(playerIds.map((id, idx) => [id, idx]));

  const rows = standings.map(
    (row): CrosstableRow => ({
      playerId: row.player.id,
      rank: row.rank,
      score: row.score,
      cells: playerIds.map((): CrosstableGame[] => []),
      byeRounds: [],
    }),
  );
  const rowById = new Map(rows.map((row) => [row.playerId, row]));

  state.rounds
    .filter((round) => round.status === "recorded")
    .forEach((round) => {
      round.pairings.forEach((pairing, idx) => {
        const outcome = round.results?.[idx];
        if (!outcome) {
          return;
        }
        if (pairing.playerB === null || outcome === "bye") {
          rowById.get(pairing.playerA)?.byeRounds.push(round.index);
          return;
        }
        const sides: [ID, ID, GameOutcome, CrosstableGame["color"]][] = [
          [pairing.playerA, pairing.playerB, outcome, pairing.colorA ?? "white"],
          [pairing.playerB, pairing.playerA, reverseOutcome(outcome), pairing.colorB ?? "black"],
        ];
        sides.forEach(([self, opponent, result, color]) => {
          const target = column.get(opponent);
          const cell = target === undefined ? undefined : rowById.get(self)?.cells[target];
          cell?.push({ round: round.index, color, outcome: result, points: POINTS[result] });
        });
      });
    });

  return { playerIds, rows };
}

export function getPlayerHistory(state: TournamentState, playerId: ID): PlayerRoundEntry[] {
  requirePlayer(state, playerId);
  const entries: PlayerRoundEntry[] = [];

  state.rounds.forEach((round) => {
    round.pairings.forEach((pairing, idx) => {
      const isA = pairing.playerA === playerId;
      if (!isA && pairing.playerB !== playerId) {
        return;
      }
      const raw = round.status === "recorded" ? round.results?.[idx] : undefined;
      const outcome = raw === undefined || raw === "bye" || isA ? raw : reverseOutcome(raw);
      entries.push({
        round: round.index,
        board: pairing.board,
        opponentId: isA ? pairing.playerB : pairing.playerA,
        color: isA ? pairing.colorA : pairing.colorB,
        outcome: outcome ?? null,
        points: outcome === undefined ? null : POINTS[outcome],
      });
    });
  });

  return entries;
}
