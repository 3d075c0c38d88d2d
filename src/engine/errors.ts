export type TournamentErrorKind = "validation" | "sequence" | "decode";

export abstract class TournamentError extends Error {
  abstract readonly kind: TournamentErrorKind;

  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad input: names, ratings, outcomes, unknown ids. */
export class ValidationError extends TournamentError {
  readonly kind = "validation";
}

/** A lifecycle step was requested out of order. */
export class SequenceError extends TournamentError {
  readonly kind = "sequence";
}

export class DecodeError extends TournamentError {
  readonly kind = "decode";

  constructor(
    code: string,
    message: string,
    readonly details: string[] = [],
  ) {
    super(code, message);
  }
}

export function isTournamentError(error: unknown): error is TournamentError {
  return error instanceof TournamentError;
}
