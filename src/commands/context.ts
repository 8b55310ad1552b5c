/**
 * Shared plumbing for the guardrun commands: resolving the config from the
 * global options, building the runner, and turning outcomes into JSON on
 * stdout plus an exit code.
 */

import fs from 'node:fs';
import path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { createTerminalConfirm } from '../channels/terminal.js';
import { DEFAULT_CONFIG_FILE, resolveConfig } from '../config/config.js';
import { FileAuditLog } from '../core/audit.js';
import { ConfigError, QueueError, RequestParseError } from '../core/errors.js';
import type { Confirm } from '../core/gate.js';
import { createActionRunner, type ActionOutcome, type ActionRunner } from '../core/runner.js';
import type { ActionRequest, SafetyConfig } from '../core/types.js';

export type GlobalOptions = {
  config?: string;
  dryRun?: boolean;
  yes?: boolean;
  cwd?: string;
  quiet?: boolean;
};

export interface CliContext {
  config: SafetyConfig;
  audit: FileAuditLog;
  cwd: string;
  globals: GlobalOptions;
}

/**
 * Resolve the config for this invocation. Without --config, a
 * .guardrun.config.yml in the working directory is picked up if present.
 */
export function loadContext(globals: GlobalOptions): CliContext {
  const cwd = path.resolve(globals.cwd ?? process.cwd());
  const implicit = path.join(cwd, DEFAULT_CONFIG_FILE);
  const file = globals.config ?? (fs.existsSync(implicit) ? implicit : undefined);
  const config = resolveConfig({ file, cwd });
  return { config, audit: new FileAuditLog(config.auditFile), cwd, globals };
}

export function buildRunner(ctx: CliContext, confirm: Confirm = createTerminalConfirm()): ActionRunner {
  return createActionRunner({
    config: ctx.config,
    audit: ctx.audit,
    confirm,
    preAuthorized: Boolean(ctx.globals.yes),
    dryRun: Boolean(ctx.globals.dryRun),
    cwd: ctx.cwd,
    quiet: Boolean(ctx.globals.quiet),
  });
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function outcomeToJson(outcome: ActionOutcome): Record<string, unknown> {
  switch (outcome.status) {
    case 'blocked':
      return {
        status: 'blocked',
        reason: outcome.decision.reason,
        detail: outcome.decision.detail,
        ...(outcome.decision.stepIndex !== undefined ? { step: outcome.decision.stepIndex } : {}),
      };
    case 'skipped':
      return { status: 'skipped', reason: outcome.reason, detail: outcome.detail };
    case 'succeeded':
    case 'failed':
      return { status: outcome.status, result: outcome.result };
  }
}

/** Print an outcome; blocked and failed exit non-zero. */
export function reportOutcome(outcome: ActionOutcome): void {
  printJson(outcomeToJson(outcome));
  process.exitCode = outcome.status === 'succeeded' || outcome.status === 'skipped' ? 0 : 1;
}

/**
 * A request that could not be parsed is still a refused action: it is
 * audited as blocked under the closest request shape available.
 */
export function reportMalformed(ctx: CliContext, standIn: ActionRequest, err: RequestParseError): void {
  ctx.audit.record({ request: standIn, status: 'blocked', reason: `MalformedRequest: ${err.message}` });
  reportOutcome({
    status: 'blocked',
    decision: { decision: 'deny', reason: 'MalformedRequest', detail: err.message },
  });
}

export function handleError(err: unknown): void {
  if (err instanceof ConfigError) {
    console.error('  ❌ Configuration errors:');
    for (const problem of err.problems) {
      console.error(`    - ${problem}`);
    }
  } else if (err instanceof QueueError) {
    console.error(`  ❌ ${err.code}: ${err.message}`);
  } else {
    console.error(`  ❌ ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exitCode = 1;
}

/**
 * Wrap a command action so any error ends up as a ❌ line and exit code 1.
 */
export function action<A extends unknown[]>(fn: (...args: A) => Promise<void> | void): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (err) {
      handleError(err);
    }
  };
}

export function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}
