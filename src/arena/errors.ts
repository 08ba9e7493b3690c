/**
 * Arena Errors
 *
 * Every rejected operation throws an ArenaError carrying a machine-readable code.
 */

export type ArenaErrorCode =
  | "InvalidStage"
  | "NotOwner"
  | "InvariantViolation"
  | "RandomNotReady"
  | "EpochNotFinished"
  | "CollaboratorFailure"
  | "NotFound"
  | "CollectionNotEligible";

export type ArenaErrorKind =
  | "StageViolation"
  | "OwnershipViolation"
  | "InvariantViolation"
  | "NotReady"
  | "ExternalCollaboratorFailure";

const KIND_BY_CODE: Record<ArenaErrorCode, ArenaErrorKind> = {
  InvalidStage: "StageViolation",
  NotOwner: "OwnershipViolation",
  InvariantViolation: "InvariantViolation",
  RandomNotReady: "NotReady",
  EpochNotFinished: "NotReady",
  CollaboratorFailure: "ExternalCollaboratorFailure",
  NotFound: "InvariantViolation",
  CollectionNotEligible: "InvariantViolation",
};

export class ArenaError extends Error {
  readonly code: ArenaErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ArenaErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ArenaError";
    this.code = code;
    this.details = details;
  }

  get kind(): ArenaErrorKind {
    return errorKind(this.code);
  }
}

/**
 * Map an error code to its failure category
 */
export function errorKind(code: ArenaErrorCode): ArenaErrorKind {
  return KIND_BY_CODE[code];
}

export function isArenaError(err: unknown): err is ArenaError {
  return err instanceof ArenaError;
}

export function invariant(condition: boolean, message: string, details?: Record<string, unknown>): asserts condition {
  if (!condition) {
    throw new ArenaError("InvariantViolation", message, details);
  }
}
