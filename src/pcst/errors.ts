export enum ErrorCode {
  CONFIG_ERROR = "CONFIG_ERROR",
  MALFORMED_INPUT = "MALFORMED_INPUT",
  UNKNOWN_IDENTIFIER = "UNKNOWN_IDENTIFIER",
  SOLVER_FAILURE = "SOLVER_FAILURE",
  COLLABORATOR_FAILURE = "COLLABORATOR_FAILURE",
}

export type QueryRole = "edges" | "prizes";

export type IdentifierRole = "root" | "node";

export class ConfigError extends Error {
  readonly code = ErrorCode.CONFIG_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Null required field, zero edge rows, wrong row arity or an out-of-range
 * value. Always raised before the solver runs.
 */
export class MalformedInputError extends Error {
  readonly code = ErrorCode.MALFORMED_INPUT;
  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export class UnknownIdentifierError extends Error {
  readonly code = ErrorCode.UNKNOWN_IDENTIFIER;
  readonly role: IdentifierRole;
  readonly id: string;

  constructor(role: IdentifierRole, id: string) {
    super(`Unknown ${role} identifier "${id}": it does not appear in any edge row`);
    this.name = "UnknownIdentifierError";
    this.role = role;
    this.id = id;
  }
}

/**
 * The solver reported failure. `diagnostic` is its text, unmodified.
 */
export class SolverFailureError extends Error {
  readonly code = ErrorCode.SOLVER_FAILURE;
  readonly diagnostic: string;

  constructor(diagnostic: string) {
    super(`PCST solver failed: ${diagnostic}`);
    this.name = "SolverFailureError";
    this.diagnostic = diagnostic;
  }
}

export class CollaboratorFailureError extends Error {
  readonly code = ErrorCode.COLLABORATOR_FAILURE;
  readonly role: QueryRole;

  constructor(role: QueryRole, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`The ${role} query failed: ${detail}`, { cause });
    this.name = "CollaboratorFailureError";
    this.role = role;
  }
}

export type PcstError =
  | ConfigError
  | MalformedInputError
  | UnknownIdentifierError
  | SolverFailureError
  | CollaboratorFailureError;

export function isPcstError(error: unknown): error is PcstError {
  return (
    error instanceof ConfigError ||
    error instanceof MalformedInputError ||
    error instanceof UnknownIdentifierError ||
    error instanceof SolverFailureError ||
    error instanceof CollaboratorFailureError
  );
}

export interface ErrorDetail {
  message: string;
  code?: ErrorCode;
  role?: string;
  id?: string;
  diagnostic?: string;
}

export function errorToResponse(error: unknown): { error: ErrorDetail } {
  if (!(error instanceof Error)) {
    return { error: { message: String(error) } };
  }

  const detail: ErrorDetail = { message: error.message };
  if (!isPcstError(error)) {
    return { error: detail };
  }

  detail.code = error.code;
  if (error instanceof UnknownIdentifierError) {
    detail.role = error.role;
    detail.id = error.id;
  } else if (error instanceof CollaboratorFailureError) {
    detail.role = error.role;
  } else if (error instanceof SolverFailureError) {
    detail.diagnostic = error.diagnostic;
  }
  return { error: detail };
}
