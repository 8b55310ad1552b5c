/**
 * guardrun run-plan <file>
 *
 * The plan file is YAML or JSON: a list of steps, or { steps: [...] }.
 *
 *   - command: git status
 *   - read_file: README.md
 *   - write_file: { path: out/notes.md, content: "hello" }
 *
 * Every step is checked before any runs; execution stops at the first failure.
 */

import path from 'node:path';
import { RequestParseError } from '../core/errors.js';
import { loadPlanFile } from '../core/requests.js';
import type { PlanRequest } from '../core/types.js';
import { buildRunner, loadContext, reportMalformed, reportOutcome, type GlobalOptions } from './context.js';

export async function runPlanCommand(file: string, globals: GlobalOptions): Promise<void> {
  const ctx = loadContext(globals);

  let plan: PlanRequest;
  try {
    plan = loadPlanFile(path.resolve(ctx.cwd, file));
  } catch (err) {
    if (!(err instanceof RequestParseError)) throw err;
    reportMalformed(ctx, { kind: 'plan', steps: [] }, err);
    return;
  }

  reportOutcome(await buildRunner(ctx)(plan));
}
