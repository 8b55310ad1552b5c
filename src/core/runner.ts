/**
 * ActionRunner: the full pipeline for one request
 *
 * One function: (request: ActionRequest) => Promise<ActionOutcome>
 *
 * For each request:
 *   1. Evaluate policy; a deny is logged as "blocked" and returned
 *   2. Log "attempted"
 *   3. Dry run? log "skipped" and stop
 *   4. Ask the confirmation gate; a refusal is logged as "skipped"
 *   5. Hand the request to the guarded executor, which logs the outcome
 *
 * CLI commands, plan files and queue workers all go through here, so no
 * caller can reach the executor without an allow decision.
 */

import type { AuditRecorder } from './audit.js';
import { formatArgv } from './command-line.js';
import { GuardedExecutor } from './executor.js';
import { createConfirmationGate, denyAll, type Confirm } from './gate.js';
import { evaluate } from './policy.js';
import type { ActionRequest, DenyDecision, ExecutionResult, SafetyConfig } from './types.js';

export type ActionOutcome =
  | { status: 'blocked'; decision: DenyDecision }
  | { status: 'skipped'; reason: 'dry_run' | 'confirmation_declined'; detail: string }
  | { status: 'succeeded' | 'failed'; result: ExecutionResult };

export type ActionRunner = (request: ActionRequest) => Promise<ActionOutcome>;

export interface RunnerOptions {
  config: SafetyConfig;
  audit: AuditRecorder;
  /** Defaults to denyAll: without a way to ask, confirmation fails closed. */
  confirm?: Confirm;
  preAuthorized?: boolean;
  dryRun?: boolean;
  /** Base for relative paths; defaults to the process working directory. */
  cwd?: string;
  quiet?: boolean;
  executor?: GuardedExecutor;
}

export function createActionRunner(options: RunnerOptions): ActionRunner {
  const { config, audit, dryRun = false, quiet = false } = options;
  const cwd = options.cwd ?? process.cwd();
  const executor = options.executor ?? new GuardedExecutor({ audit, cwd });
  const gate = createConfirmationGate({
    config,
    confirm: options.confirm ?? denyAll,
    preAuthorized: options.preAuthorized,
  });
  const log = (message: string): void => {
    if (!quiet) console.error(`  [gate] ${message}`);
  };

  return async (request: ActionRequest): Promise<ActionOutcome> => {
    const decision = evaluate(request, config, { cwd });

    if (decision.decision === 'deny') {
      log(`${summarize(request)} -> blocked (${decision.reason})`);
      audit.record({ request, status: 'blocked', reason: `${decision.reason}: ${decision.detail}` });
      return { status: 'blocked', decision };
    }

    log(`${summarize(request)} -> allowed`);
    audit.record({ request, status: 'attempted' });

    if (dryRun) {
      audit.record({ request, status: 'skipped', reason: 'dry_run' });
      return { status: 'skipped', reason: 'dry_run', detail: 'Dry run: nothing was executed' };
    }

    const confirmation = await gate(request);
    if (!confirmation.approved) {
      log(`${summarize(request)} -> skipped (${confirmation.reason})`);
      audit.record({ request, status: 'skipped', reason: `confirmation_declined: ${confirmation.reason}` });
      return { status: 'skipped', reason: 'confirmation_declined', detail: confirmation.reason };
    }

    const result = await executor.execute(request, decision, config);
    log(`${summarize(request)} -> ${result.ok ? 'succeeded' : `failed (${result.error?.kind ?? 'unknown'})`}`);
    return { status: result.ok ? 'succeeded' : 'failed', result };
  };
}

function summarize(request: ActionRequest): string {
  switch (request.kind) {
    case 'command':
      return formatArgv(request.argv).substring(0, 60);
    case 'read_file':
    case 'write_file':
      return `${request.kind} ${request.path}`.substring(0, 60);
    case 'plan':
      return `plan (${request.steps.length} steps)`;
  }
}
