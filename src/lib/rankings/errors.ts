/**
 * Trait Rankings - Errors
 *
 * Every fatal condition of a run is a RankingError with a stable code.
 * A missing trait column and a skipped mapping save are not errors.
 */

export type RankingErrorCode =
  | "CONFIGURATION_ERROR"
  | "SOURCE_READ_ERROR"
  | "DESTINATION_WRITE_ERROR";

export interface RankingErrorContext {
  breed?: string;
  trait?: string;
  path?: string;
  cause?: unknown;
}

export class RankingError extends Error {
  code: RankingErrorCode;
  breed?: string;
  trait?: string;
  path?: string;

  constructor(code: RankingErrorCode, message: string, context: RankingErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.code = code;
    this.name = "RankingError";
    this.breed = context.breed;
    this.trait = context.trait;
    this.path = context.path;
  }
}

/** Bad run configuration or unreadable header; raised before any ranking happens. */
export class ConfigurationError extends RankingError {
  constructor(message: string, context: RankingErrorContext = {}) {
    super("CONFIGURATION_ERROR", message, context);
    this.name = "ConfigurationError";
  }
}

export class SourceReadError extends RankingError {
  constructor(message: string, context: RankingErrorContext = {}) {
    super("SOURCE_READ_ERROR", message, context);
    this.name = "SourceReadError";
  }
}

export class DestinationWriteError extends RankingError {
  constructor(message: string, context: RankingErrorContext = {}) {
    super("DESTINATION_WRITE_ERROR", message, context);
    this.name = "DestinationWriteError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
