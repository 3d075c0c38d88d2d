import type { PairingOutcome } from "@/models";

export const POINTS: Readonly<Record<PairingOutcome, number>> = {
  win: 1,
  draw: 0.5,
  loss: 0,
  bye: 1,
};
