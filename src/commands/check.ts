/**
 * guardrun check: evaluate an action against the policy without running it
 *
 *   guardrun check ls -la
 *   guardrun check --read notes.txt
 *   guardrun check --write out/report.md
 *
 * Nothing is executed and nothing is audited.
 */

import { PolicyViolation, RequestParseError } from '../core/errors.js';
import { evaluate } from '../core/policy.js';
import { commandRequest, readFileRequest, writeFileRequest } from '../core/requests.js';
import type { ActionRequest, PolicyDecision } from '../core/types.js';
import { loadContext, printJson, type GlobalOptions } from './context.js';

export interface CheckOptions {
  read?: string;
  write?: string;
}

export async function checkCommand(command: string[], options: CheckOptions, globals: GlobalOptions): Promise<void> {
  const ctx = loadContext(globals);

  let decision: PolicyDecision;
  try {
    decision = evaluate(buildRequest(command, options), ctx.config, { cwd: ctx.cwd });
  } catch (err) {
    if (!(err instanceof RequestParseError)) throw err;
    decision = { decision: 'deny', reason: 'MalformedRequest', detail: err.message };
  }

  printJson(decision);
  if (decision.decision === 'deny' && !globals.quiet) {
    console.error(`  ⛔ ${new PolicyViolation(decision).message}`);
  }
  process.exitCode = decision.decision === 'allow' ? 0 : 1;
}

function buildRequest(command: string[], options: CheckOptions): ActionRequest {
  const chosen = [command.length > 0, options.read !== undefined, options.write !== undefined].filter(Boolean);
  if (chosen.length !== 1) {
    throw new Error('Give exactly one of: a command, --read <path>, --write <path>');
  }
  if (options.read !== undefined) return readFileRequest(options.read);
  // Content is irrelevant to the decision.
  if (options.write !== undefined) return writeFileRequest(options.write, '');
  return commandRequest(command.length === 1 ? command[0] : command);
}
