/**
 * Error classification at the executor boundary.
 *
 * Adapters that know what went wrong throw (or return) an `ExecutorError`
 * with an explicit fatal flag. Anything else is matched against message
 * patterns; unrecognised errors are treated as transient and left to the
 * retry ceiling.
 */

import type { ExecutorResult } from "../core/types";

export type FailureCategory =
  | "rate_limit"
  | "timeout"
  | "unavailable"
  | "auth"
  | "invalid_input"
  | "unknown";

export interface ClassifiedFailure {
  category: FailureCategory;
  fatal: boolean;
  message: string;
}

export class ExecutorError extends Error {
  constructor(
    message: string,
    readonly fatal: boolean,
    readonly category: FailureCategory = fatal ? "invalid_input" : "unknown",
  ) {
    super(message);
    this.name = "ExecutorError";
  }
}

const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /quota/i,
];

const UNAVAILABLE_PATTERNS = [
  /status\s*(?:code\s*)?50[234]/i,
  /overloaded/i,
  /unavailable/i,
  /ECONNREFUSED/,
  /ENOTFOUND/,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/,
  /ECONNRESET/,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthori[sz]ed/i,
  /forbidden/i,
  /status\s*(?:code\s*)?40[13]/i,
];

const INVALID_INPUT_PATTERNS = [
  /status\s*(?:code\s*)?(?:400|422)/i,
  /bad\s*request/i,
  /malformed\s*request/i,
  /invalid\s*(?:input|query|argument)/i,
];

const matchesAny = (patterns: RegExp[], text: string): boolean =>
  patterns.some((pattern) => pattern.test(text));

const describe = (error: unknown): string => {
  if (error instanceof Error) {
    return error.name && error.name !== "Error"
      ? `${error.name}: ${error.message}`
      : error.message;
  }
  return String(error);
};

export const classifyError = (error: unknown): ClassifiedFailure => {
  if (error instanceof ExecutorError) {
    return {
      category: error.category,
      fatal: error.fatal,
      message: error.message,
    };
  }

  const message = describe(error);

  // Auth and input problems win over transport noise in the same message.
  if (matchesAny(AUTH_PATTERNS, message)) {
    return { category: "auth", fatal: true, message };
  }
  if (matchesAny(INVALID_INPUT_PATTERNS, message)) {
    return { category: "invalid_input", fatal: true, message };
  }
  if (matchesAny(RATE_LIMIT_PATTERNS, message)) {
    return { category: "rate_limit", fatal: false, message };
  }
  if (matchesAny(TIMEOUT_PATTERNS, message)) {
    return { category: "timeout", fatal: false, message };
  }
  if (matchesAny(UNAVAILABLE_PATTERNS, message)) {
    return { category: "unavailable", fatal: false, message };
  }

  return { category: "unknown", fatal: false, message };
};

export const failureResult = (error: unknown): ExecutorResult => {
  const classified = classifyError(error);
  const reason = `${classified.category}: ${classified.message}`;
  return classified.fatal
    ? { kind: "fatal_failure", reason }
    : { kind: "transient_failure", reason };
};
