/**
 * ConfirmationGate: the human in the loop
 *
 * One function: (request: ActionRequest) => Promise<ConfirmationResult>
 *
 * Sits between an allow decision and execution when require_confirmation
 * is on. The yes/no answer comes from an injected Confirm capability, so
 * interactive callers pass a terminal prompt and automated callers pass
 * denyAll. Anything other than an explicit `true` is a refusal.
 */

import type { ActionRequest, SafetyConfig } from './types.js';

export type Confirm = (request: ActionRequest) => Promise<boolean | undefined>;

export interface ConfirmationResult {
  approved: boolean;
  reason: string;
}

export type ConfirmationGate = (request: ActionRequest) => Promise<ConfirmationResult>;

export interface ConfirmationGateOptions {
  config: SafetyConfig;
  confirm: Confirm;
  /** Explicit bypass (the CLI's --yes). */
  preAuthorized?: boolean;
}

/** Non-interactive capability: never approves. */
export const denyAll: Confirm = async () => false;

export function createConfirmationGate(options: ConfirmationGateOptions): ConfirmationGate {
  const { config, confirm, preAuthorized = false } = options;

  return async (request: ActionRequest): Promise<ConfirmationResult> => {
    if (!config.requireConfirmation) {
      return { approved: true, reason: 'Confirmation not required' };
    }
    if (preAuthorized) {
      return { approved: true, reason: 'Pre-authorized' };
    }

    let answer: unknown;
    try {
      answer = await confirm(request);
    } catch (err) {
      return { approved: false, reason: `Confirmation failed: ${(err as Error).message}` };
    }

    if (answer === true) {
      return { approved: true, reason: 'Approved by human' };
    }
    if (answer === false) {
      return { approved: false, reason: 'Declined by human' };
    }
    return { approved: false, reason: 'No confirmation answer (default deny)' };
  };
}
