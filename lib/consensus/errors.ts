/**
 * Error types for the consensus pipeline.
 *
 * Only conditions that stop a session (or a single call) are errors.
 * Missing ratings, unparseable scores and COMPLEX results are values.
 */

import type { AnalystFailure } from "./types";

export const ErrorCodes = {
  ALL_ANALYSTS_FAILED: "all_analysts_failed",
  ANALYSIS_PARSE_FAILED: "analysis_parse_failed",
  CALL_TIMEOUT: "call_timeout",
  INVALID_CONFIG: "invalid_config",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ConsensusError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "ConsensusError";
    this.code = code;
  }
}

export class AllAnalystsFailedError extends ConsensusError {
  readonly failures: AnalystFailure[];

  constructor(ticker: string, failures: AnalystFailure[]) {
    super(
      ErrorCodes.ALL_ANALYSTS_FAILED,
      `All ${failures.length} analyst calls failed for ${ticker}.`
    );
    this.name = "AllAnalystsFailedError";
    this.failures = failures;
  }
}

export class AnalysisParseError extends ConsensusError {
  readonly analyst: string;

  constructor(analyst: string, detail: string) {
    super(
      ErrorCodes.ANALYSIS_PARSE_FAILED,
      `${analyst} returned invalid data: ${detail}`
    );
    this.name = "AnalysisParseError";
    this.analyst = analyst;
  }
}

export class CallTimeoutError extends ConsensusError {
  constructor(name: string, timeoutMs: number) {
    super(ErrorCodes.CALL_TIMEOUT, `${name} timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
  }
}

export class ConfigError extends ConsensusError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_CONFIG, message);
    this.name = "ConfigError";
  }
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
