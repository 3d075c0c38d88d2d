import type { Color } from "@/models";

export interface ColorProfile {
  /** whites minus blacks */
  balance: number;
  last?: Color;
  /** Set when the last two games had the same colour. */
  must?: Color;
}

export function opposite(color: Color): Color {
  return color === "white" ? "black" : "white";
}

export function colorProfile(colors: readonly Color[]): ColorProfile {
  const balance = colors.reduce((sum, color) => sum + (color === "white" ? 1 : -1), 0);
  const last = colors[colors.length - 1];
  const previous = colors[colors.length - 2];
  const must = last !== undefined && last === previous ? opposite(last) : undefined;
  return { balance, last, must };
}

export function preferredColor(profile: ColorProfile): Color | undefined {
  if (profile.must) {
    return profile.must;
  }
  if (profile.balance < 0) {
    return "white";
  }
  if (profile.balance > 0) {
    return "black";
  }
  return profile.last ? opposite(profile.last) : undefined;
}

/** False when both players would need the same colour to avoid a third in a row. */
export function colorsCompatible(a: ColorProfile, b: ColorProfile): boolean {
  return !(a.must && b.must && a.must === b.must);
}

/**
 * Colours for a pair where `higher` is the better seeded player. `boardIndex` is
 * zero based and only matters when neither player has played yet.
 */
export function allocateColors(higher: ColorProfile, lower: ColorProfile, boardIndex: number): [Color, Color] {
  const give = (higherColor: Color): [Color, Color] => [higherColor, opposite(higherColor)];

  if (higher.must && lower.must && higher.must === lower.must) {
    return give(Math.abs(lower.balance) > Math.abs(higher.balance) ? opposite(higher.must) : higher.must);
  }
  if (higher.must) {
    return give(higher.must);
  }
  if (lower.must) {
    return give(opposite(lower.must));
  }

  const prefHigher = preferredColor(higher);
  const prefLower = preferredColor(lower);

  if (prefHigher && prefLower && prefHigher === prefLower) {
    return give(Math.abs(lower.balance) > Math.abs(higher.balance) ? opposite(prefHigher) : prefHigher);
  }
  if (prefHigher) {
    return give(prefHigher);
  }
  if (prefLower) {
    return give(opposite(prefLower));
  }
  return give(boardIndex % 2 === 0 ? "white" : "black");
}
