import { POINTS } from "@/engine/rules/points";
import type { Color, ID, TournamentState } from "@/models";

export interface PairingHistory {
  playerId: ID;
  score: number;
  /** Colours of games actually played, oldest first. */
  colors: Color[];
  opponents: Set<ID>;
  byes: number;
}

/**
 * Opponents, colours and byes come from every paired round; scores only from
 * recorded ones.
 */
export function computePairingHistory(state: TournamentState): Map<ID, PairingHistory> {
  const history = new Map<ID, PairingHistory>();
  Object.keys(state.players).forEach((playerId) => {
    history.set(playerId, { playerId, score: 0, colors: [], opponents: new Set(), byes: 0 });
  });

  state.rounds.forEach((round) => {
    round.pairings.forEach((pairing, idx) => {
      const a = history.get(pairing.playerA);
      const b = pairing.playerB === null ? undefined : history.get(pairing.playerB);
      const outcome = round.status === "recorded" ? round.results?.[idx] : undefined;

      if (pairing.playerB === null) {
        if (a) {
          a.byes += 1;
          a.score += outcome ? POINTS.bye : 0;
        }
        return;
      }

      if (a) {
        a.opponents.add(pairing.playerB);
        if (pairing.colorA) {
          a.colors.push(pairing.colorA);
        }
      }
      if (b) {
        b.opponents.add(pairing.playerA);
        if (pairing.colorB) {
          b.colors.push(pairing.colorB);
        }
      }
      if (outcome && outcome !== "bye") {
        if (a) {
          a.score += POINTS[outcome];
        }
        if (b) {
          b.score += POINTS[reverseOutcome(outcome)];
        }
      }
    });
  });

  return history;
}

export function reverseOutcome(outcome: "win" | "loss" | "draw"): "win" | "loss" | "draw" {
  if (outcome === "win") {
    return "loss";
  }
  if (outcome === "loss") {
    return "win";
  }
  return "draw";
}
