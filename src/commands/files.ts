/**
 * guardrun read / guardrun write
 */

import fs from 'node:fs';
import path from 'node:path';
import { readFileRequest, writeFileRequest } from '../core/requests.js';
import { buildRunner, loadContext, reportOutcome, type GlobalOptions } from './context.js';

export interface WriteOptions {
  content?: string;
  from?: string;
}

export async function readCommand(target: string, globals: GlobalOptions): Promise<void> {
  const ctx = loadContext(globals);
  reportOutcome(await buildRunner(ctx)(readFileRequest(target)));
}

export async function writeCommand(target: string, options: WriteOptions, globals: GlobalOptions): Promise<void> {
  if ((options.content === undefined) === (options.from === undefined)) {
    throw new Error('Give exactly one of --content <text> or --from <file>');
  }
  const ctx = loadContext(globals);
  const content = options.content ?? fs.readFileSync(path.resolve(ctx.cwd, options.from ?? ''), 'utf-8');
  reportOutcome(await buildRunner(ctx)(writeFileRequest(target, content)));
}
