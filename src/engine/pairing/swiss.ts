import type { EngineLogger } from "@/engine/logger";
import { allocateColors, colorProfile, colorsCompatible, type ColorProfile } from "@/engine/pairing/colors";
import { computePairingHistory, type PairingHistory } from "@/engine/pairing/history";
import { comparePlayersByRating, orderedPair } from "@/engine/util";
import type { ID, Pairing, Player, TournamentState } from "@/models";

export interface SeedEntry {
  player: Player;
  history: PairingHistory;
  profile: ColorProfile;
  seed: number;
}

/**
 * strict: no rematch and no third colour in a row.
 * no_rematch: colours may repeat a third time.
 * forced: rematches allowed, as few as possible.
 */
export type PairingTier = "strict" | "no_rematch" | "forced";

type SearchTier = Exclude<PairingTier, "forced">;

export interface PairingOptions {
  searchLimit: number;
  logger?: EngineLogger;
}

export interface GeneratedPairings {
  pairings: Pairing[];
  byePlayerId: ID | null;
  tier: PairingTier;
  repeatedPairs: [ID, ID][];
}

type Game = [SeedEntry, SeedEntry];

class SearchBudget {
  private steps = 0;

  constructor(private readonly limit: number) {}

  spend(): boolean {
    this.steps += 1;
    return this.steps <= this.limit;
  }

  get exhausted(): boolean {
    return this.steps > this.limit;
  }
}

export function seedOrder(state: TournamentState, history = computePairingHistory(state)): SeedEntry[] {
  const active = Object.values(state.players).filter((player) => player.isActive);
  const entries = active.map((player) => {
    const playerHistory = history.get(player.id) ?? {
      playerId: player.id,
      score: 0,
      colors: [],
      opponents: new Set<ID>(),
      byes: 0,
    };
    return { player, history: playerHistory, profile: colorProfile(playerHistory.colors), seed: 0 };
  });

  entries.sort((a, b) => {
    if (a.history.score !== b.history.score) {
      return b.history.score - a.history.score;
    }
    return comparePlayersByRating(a.player, b.player);
  });
  entries.forEach((entry, idx) => {
    entry.seed = idx;
  });
  return entries;
}

function isRematch(a: SeedEntry, b: SeedEntry): boolean {
  return a.history.opponents.has(b.player.id);
}

function allowed(a: SeedEntry, b: SeedEntry, tier: SearchTier): boolean {
  if (isRematch(a, b)) {
    return false;
  }
  return tier === "no_rematch" || colorsCompatible(a.profile, b.profile);
}

/**
 * Opponent order for `remaining[0]`: fold partner inside its score group, the rest of
 * the bottom half, the top half upwards, then lower groups.
 */
export function candidateOrder(scores: readonly number[]): number[] {
  const top = scores[0];
  let groupSize = 1;
  while (groupSize < scores.length && scores[groupSize] === top) {
    groupSize += 1;
  }

  const order: number[] = [];
  const fold = Math.floor(groupSize / 2);
  if (groupSize > 1) {
    for (let idx = fold; idx < groupSize; idx += 1) {
      order.push(idx);
    }
    for (let idx = fold - 1; idx >= 1; idx -= 1) {
      order.push(idx);
    }
  }
  for (let idx = groupSize; idx < scores.length; idx += 1) {
    order.push(idx);
  }
  return order;
}

function search(remaining: SeedEntry[], tier: SearchTier, budget: SearchBudget): Game[] | null {
  const top = remaining[0];
  if (!top) {
    return [];
  }
  if (!budget.spend()) {
    return null;
  }

  for (const idx of candidateOrder(remaining.map((entry) => entry.history.score))) {
    const opponent = remaining[idx];
    if (!opponent || !allowed(top, opponent, tier)) {
      continue;
    }
    const rest = remaining.filter((_, i) => i !== 0 && i !== idx);
    const tail = search(rest, tier, budget);
    if (tail) {
      return [[top, opponent], ...tail];
    }
    if (budget.exhausted) {
      return null;
    }
  }
  return null;
}

/**
 * Forced tier: every pairing is legal, so search for the one with the fewest rematches.
 * Ties go to the first pairing in search order. Once the budget is spent the best
 * pairing found so far is kept.
 */
function searchFewestRepeats(entries: SeedEntry[], budget: SearchBudget): Game[] {
  const best: { games: Game[]; repeats: number } = { games: [], repeats: Number.POSITIVE_INFINITY };
  const current: Game[] = [];

  const visit = (remaining: SeedEntry[], repeats: number): void => {
    if (repeats >= best.repeats) {
      return;
    }
    const top = remaining[0];
    if (!top) {
      best.games = [...current];
      best.repeats = repeats;
      return;
    }
    if (!budget.spend() && best.repeats !== Number.POSITIVE_INFINITY) {
      return;
    }

    const order = candidateOrder(remaining.map((entry) => entry.history.score));
    const repeatsWith = (idx: number): boolean => {
      const other = remaining[idx];
      return other !== undefined && isRematch(top, other);
    };
    for (const idx of [...order.filter((idx) => !repeatsWith(idx)), ...order.filter(repeatsWith)]) {
      const opponent = remaining[idx];
      if (!opponent) {
        continue;
      }
      current.push([top, opponent]);
      visit(
        remaining.filter((_, i) => i !== 0 && i !== idx),
        repeats + (isRematch(top, opponent) ? 1 : 0),
      );
      current.pop();
      if (budget.exhausted && best.repeats !== Number.POSITIVE_INFINITY) {
        return;
      }
    }
  };

  visit(entries, 0);
  return best.games;
}

function everyoneHasPartner(entries: SeedEntry[], tier: SearchTier): boolean {
  return entries.every((entry) => entries.some((other) => other !== entry && allowed(entry, other, tier)));
}

function pairAll(entries: SeedEntry[], tier: PairingTier, limit: number): Game[] | null {
  if (tier === "forced") {
    return searchFewestRepeats(entries, new SearchBudget(limit));
  }
  if (!everyoneHasPartner(entries, tier)) {
    return null;
  }
  return search(entries, tier, new SearchBudget(limit));
}

/** Bye order: players without a bye from the bottom up; everyone from the bottom up if all have had one. */
function byeCandidates(entries: SeedEntry[]): SeedEntry[] {
  const bottomUp = [...entries].reverse();
  const eligible = bottomUp.filter((entry) => entry.history.byes === 0);
  return eligible.length > 0 ? eligible : bottomUp;
}

function compareGames(a: Game, b: Game): number {
  const maxA = Math.max(a[0].history.score, a[1].history.score);
  const maxB = Math.max(b[0].history.score, b[1].history.score);
  if (maxA !== maxB) {
    return maxB - maxA;
  }
  const sumA = a[0].history.score + a[1].history.score;
  const sumB = b[0].history.score + b[1].history.score;
  if (sumA !== sumB) {
    return sumB - sumA;
  }
  return Math.min(a[0].seed, a[1].seed) - Math.min(b[0].seed, b[1].seed);
}

function toPairings(games: Game[], bye: SeedEntry | null): Pairing[] {
  const ordered = games
    .map(([x, y]): Game => (x.seed < y.seed ? [x, y] : [y, x]))
    .sort(compareGames);

  const pairings = ordered.map(([higher, lower], idx): Pairing => {
    const [higherColor] = allocateColors(higher.profile, lower.profile, idx);
    const [white, black] = higherColor === "white" ? [higher, lower] : [lower, higher];
    return {
      board: idx + 1,
      playerA: white.player.id,
      playerB: black.player.id,
      colorA: "white",
      colorB: "black",
    };
  });

  if (bye) {
    pairings.push({
      board: pairings.length + 1,
      playerA: bye.player.id,
      playerB: null,
      colorA: null,
      colorB: null,
    });
  }
  return pairings;
}

export function generatePairings(state: TournamentState, options: PairingOptions): GeneratedPairings {
  const { logger } = options;
  const entries = seedOrder(state);
  const roundIndex = state.rounds.length + 1;

  logger
    ?.withMetadata({
      roundIndex,
      playerCount: entries.length,
      scoreGroups: new Set(entries.map((entry) => entry.history.score)).size,
    })
    .debug("pairing round");

  const attempts: { bye: SeedEntry | null; tier: PairingTier }[] = [];
  if (entries.length % 2 === 0) {
    attempts.push({ bye: null, tier: "strict" }, { bye: null, tier: "no_rematch" }, { bye: null, tier: "forced" });
  } else {
    const [first, ...others] = byeCandidates(entries);
    const defaultBye = first ?? null;
    attempts.push({ bye: defaultBye, tier: "strict" }, { bye: defaultBye, tier: "no_rematch" });
    others.forEach((candidate) => {
      attempts.push({ bye: candidate, tier: "strict" }, { bye: candidate, tier: "no_rematch" });
    });
    attempts.push({ bye: defaultBye, tier: "forced" });
  }

  for (const attempt of attempts) {
    const pool = attempt.bye ? entries.filter((entry) => entry !== attempt.bye) : entries;
    const games = pairAll(pool, attempt.tier, options.searchLimit);
    if (!games) {
      logger?.withMetadata({ roundIndex, tier: attempt.tier, bye: attempt.bye?.player.id ?? null }).debug("pairing attempt failed");
      continue;
    }

    const repeatedPairs = games
      .filter(([a, b]) => isRematch(a, b))
      .map(([a, b]) => orderedPair(a.player.id, b.player.id));

    if (repeatedPairs.length > 0) {
      logger?.withMetadata({ roundIndex, repeatedPairs }).warn("no legal pairing without rematches, repeating pairs");
    }
    logger
      ?.withMetadata({ roundIndex, tier: attempt.tier, bye: attempt.bye?.player.id ?? null, games: games.length })
      .debug("round paired");

    return {
      pairings: toPairings(games, attempt.bye),
      byePlayerId: attempt.bye?.player.id ?? null,
      tier: attempt.tier,
      repeatedPairs,
    };
  }

  // The forced tier accepts any partner, so the last attempt always succeeds.
  throw new Error(`Pairing search failed for round ${roundIndex}`);
}
