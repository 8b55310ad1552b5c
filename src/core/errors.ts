/**
 * Error taxonomy
 *
 * PolicyViolation: a denial in exception form, for callers that halt on it.
 * QueueError: failures of the durable job store.
 * ConfigError / RequestParseError: bad input at the configuration and
 * request boundaries.
 *
 * Execution failures are not thrown: they travel inside ExecutionResult.error.
 */

import type { DenyDecision, DenyReason } from './types.js';

export class PolicyViolation extends Error {
  readonly reason: DenyReason;
  readonly stepIndex?: number;

  constructor(decision: DenyDecision) {
    super(`${decision.reason}: ${decision.detail}`);
    this.name = 'PolicyViolation';
    this.reason = decision.reason;
    this.stepIndex = decision.stepIndex;
  }
}

export type QueueErrorCode = 'ClaimConflict' | 'JobNotFound' | 'InvalidTransition' | 'StoreUnavailable';

export class QueueError extends Error {
  readonly code: QueueErrorCode;

  constructor(code: QueueErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueueError';
    this.code = code;
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(source: string, problems: string[]) {
    super(`Invalid configuration in ${source}:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class RequestParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestParseError';
  }
}

/** The errno code of a failed fs/child_process call, if it has one. */
export function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}
