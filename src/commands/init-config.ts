/**
 * guardrun init-config: write a config file with every setting at its default
 */

import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_CONFIG_FILE, writeDefaultConfig } from '../config/config.js';
import { printJson, type GlobalOptions } from './context.js';

export interface InitConfigOptions {
  path?: string;
  force?: boolean;
}

export async function initConfigCommand(options: InitConfigOptions, globals: GlobalOptions): Promise<void> {
  const cwd = path.resolve(globals.cwd ?? process.cwd());
  const target = path.resolve(cwd, options.path ?? DEFAULT_CONFIG_FILE);

  if (fs.existsSync(target) && !options.force) {
    throw new Error(`Config already exists: ${target} (use --force to overwrite)`);
  }

  writeDefaultConfig(target);
  if (!globals.quiet) console.error(`  ✅ Config written to ${target}`);
  printJson({ written: target });
}
