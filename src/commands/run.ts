/**
 * guardrun run: run one command under the policy
 *
 *   guardrun run -- git status
 *   guardrun run "ls -la src"
 *
 * A single argument is split into words without a shell; several arguments
 * are taken as the argv as given.
 */

import { RequestParseError } from '../core/errors.js';
import { commandRequest } from '../core/requests.js';
import type { CommandRequest } from '../core/types.js';
import { buildRunner, loadContext, reportMalformed, reportOutcome, type GlobalOptions } from './context.js';

export async function runCommand(command: string[], globals: GlobalOptions): Promise<void> {
  const ctx = loadContext(globals);

  let request: CommandRequest;
  try {
    request = commandRequest(command.length === 1 ? command[0] : command);
  } catch (err) {
    if (!(err instanceof RequestParseError)) throw err;
    reportMalformed(ctx, { kind: 'command', argv: command }, err);
    return;
  }

  reportOutcome(await buildRunner(ctx)(request));
}
