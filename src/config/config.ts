/**
 * Configuration: defaults < file < overrides
 *
 * Config files are YAML (JSON works too, being valid YAML) with snake_case
 * keys:
 *
 *   allowed_commands: [ls, cat, git]
 *   denied_commands: [rm, sudo]
 *   allowed_roots: [., ../shared]
 *   require_confirmation: true
 *   command_timeout_seconds: 10
 *   max_output_bytes: 12000
 *   network_access: false
 *   allowed_env: { PATH: /usr/bin:/bin }
 *   max_job_attempts: 3
 *   queue_path: .guardrun.jobs.sqlite
 *   audit_file: .guardrun.audit.jsonl
 *
 * Relative paths in a file are anchored at the file's own directory.
 * Relative paths in defaults and overrides are anchored at the process
 * working directory. The resolved config is frozen.
 */

import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse, stringify as yamlStringify } from 'yaml';
import { ConfigError } from '../core/errors.js';
import { expandHome } from '../core/paths.js';
import { isRecord } from '../core/requests.js';
import type { SafetyConfig } from '../core/types.js';

export const DEFAULT_CONFIG_FILE = '.guardrun.config.yml';

export const DEFAULT_ALLOWED_COMMANDS = ['ls', 'pwd', 'find', 'cat', 'echo', 'git'];
export const DEFAULT_DENIED_COMMANDS = [
  'curl',
  'wget',
  'ssh',
  'nc',
  'sudo',
  'rm',
  'rmdir',
  'bash',
  'sh',
  'python',
  'node',
  'deno',
];

/** Settings before path resolution and freezing. */
export interface ConfigValues {
  allowedCommands: string[];
  deniedCommands: string[];
  allowedRoots: string[];
  requireConfirmation: boolean;
  commandTimeoutSeconds: number;
  maxOutputBytes: number;
  networkAccess: boolean;
  allowedEnv: Record<string, string>;
  maxJobAttempts: number;
  queuePath: string;
  auditFile: string;
}

export type ConfigOverrides = Partial<ConfigValues>;

export function defaultConfigValues(): ConfigValues {
  return {
    allowedCommands: [...DEFAULT_ALLOWED_COMMANDS],
    deniedCommands: [...DEFAULT_DENIED_COMMANDS],
    allowedRoots: ['.'],
    requireConfirmation: true,
    commandTimeoutSeconds: 10,
    maxOutputBytes: 12_000,
    networkAccess: false,
    allowedEnv: { PATH: '/usr/bin:/bin:/usr/sbin:/sbin' },
    maxJobAttempts: 3,
    queuePath: '.guardrun.jobs.sqlite',
    auditFile: '.guardrun.audit.jsonl',
  };
}

const FILE_KEYS: Record<string, keyof ConfigValues> = {
  allowed_commands: 'allowedCommands',
  denied_commands: 'deniedCommands',
  allowed_roots: 'allowedRoots',
  require_confirmation: 'requireConfirmation',
  command_timeout_seconds: 'commandTimeoutSeconds',
  max_output_bytes: 'maxOutputBytes',
  network_access: 'networkAccess',
  allowed_env: 'allowedEnv',
  max_job_attempts: 'maxJobAttempts',
  queue_path: 'queuePath',
  audit_file: 'auditFile',
};

export interface ResolveOptions {
  file?: string;
  overrides?: ConfigOverrides;
  /** Anchor for relative default/override paths. */
  cwd?: string;
}

export function resolveConfig(options: ResolveOptions = {}): SafetyConfig {
  const cwd = options.cwd ?? process.cwd();
  const values = defaultConfigValues();
  const anchors: Partial<Record<'allowedRoots' | 'queuePath' | 'auditFile', string>> = {};

  if (options.file) {
    const filePath = path.resolve(cwd, options.file);
    const fromFile = loadConfigFile(filePath);
    Object.assign(values, fromFile);
    const fileDir = path.dirname(filePath);
    if (fromFile.allowedRoots) anchors.allowedRoots = fileDir;
    if (fromFile.queuePath) anchors.queuePath = fileDir;
    if (fromFile.auditFile) anchors.auditFile = fileDir;
  }

  if (options.overrides) {
    for (const [key, value] of Object.entries(options.overrides)) {
      if (value === undefined) continue;
      Object.assign(values, { [key]: value });
      if (key === 'allowedRoots' || key === 'queuePath' || key === 'auditFile') {
        anchors[key] = cwd;
      }
    }
  }

  const problems = validateValues(values);
  if (problems.length > 0) {
    throw new ConfigError(options.file ?? 'overrides', problems);
  }

  const anchor = (key: 'allowedRoots' | 'queuePath' | 'auditFile'): string => anchors[key] ?? cwd;
  const resolvePath = (p: string, base: string): string =>
    p === ':memory:' ? p : path.resolve(base, expandHome(p));

  const config: SafetyConfig = {
    allowedCommands: new Set(values.allowedCommands.map(normalizeCommand)),
    deniedCommands: new Set(values.deniedCommands.map(normalizeCommand)),
    allowedRoots: Object.freeze(values.allowedRoots.map((root) => resolvePath(root, anchor('allowedRoots')))),
    requireConfirmation: values.requireConfirmation,
    commandTimeoutSeconds: values.commandTimeoutSeconds,
    maxOutputBytes: values.maxOutputBytes,
    networkAccess: values.networkAccess,
    allowedEnv: Object.freeze({ ...values.allowedEnv }),
    maxJobAttempts: values.maxJobAttempts,
    queuePath: resolvePath(values.queuePath, anchor('queuePath')),
    auditFile: resolvePath(values.auditFile, anchor('auditFile')),
  };
  return Object.freeze(config);
}

/**
 * Read and validate a config file, returning only the keys it sets.
 */
export function loadConfigFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(filePath, [`Config file not found: ${filePath}`]);
  }
  let raw: unknown;
  try {
    raw = yamlParse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(filePath, [`Cannot parse: ${(err as Error).message}`]);
  }
  if (raw === null || raw === undefined) return {};

  const { values, problems } = parseConfigObject(raw);
  if (problems.length > 0) {
    throw new ConfigError(filePath, problems);
  }
  return values;
}

/**
 * Problems with a config file, without loading it. Empty means valid.
 */
export function validateConfigFile(filePath: string): string[] {
  try {
    loadConfigFile(filePath);
    return [];
  } catch (err) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
}

/**
 * Validate a raw (snake_case) config object and convert it.
 * Problems are collected rather than thrown one at a time.
 */
export function parseConfigObject(raw: unknown): { values: ConfigOverrides; problems: string[] } {
  const problems: string[] = [];
  const values: ConfigOverrides = {};

  if (!isRecord(raw)) {
    return { values, problems: ['Config must be a mapping of settings'] };
  }

  for (const [key, value] of Object.entries(raw)) {
    const field = FILE_KEYS[key];
    if (!field) {
      problems.push(`Unknown setting "${key}"`);
      continue;
    }
    if (value === null || value === undefined) continue;

    switch (field) {
      case 'allowedCommands':
      case 'deniedCommands':
      case 'allowedRoots': {
        const list = coerceStringList(value);
        if (list === null) problems.push(`"${key}" must be a list of strings`);
        else values[field] = list;
        break;
      }
      case 'requireConfirmation':
      case 'networkAccess': {
        const flag = coerceBool(value);
        if (flag === null) problems.push(`"${key}" must be true or false`);
        else values[field] = flag;
        break;
      }
      case 'commandTimeoutSeconds':
      case 'maxOutputBytes':
      case 'maxJobAttempts': {
        const num = coerceNumber(value);
        if (num === null) problems.push(`"${key}" must be a number`);
        else values[field] = num;
        break;
      }
      case 'allowedEnv': {
        if (!isRecord(value)) {
          problems.push(`"${key}" must be a mapping of variable names to values`);
          break;
        }
        values.allowedEnv = Object.fromEntries(Object.entries(value).map(([k, v]) => [k, String(v)]));
        break;
      }
      case 'queuePath':
      case 'auditFile': {
        if (typeof value !== 'string' || value.trim() === '') problems.push(`"${key}" must be a non-empty string`);
        else values[field] = value.trim();
        break;
      }
    }
  }

  return { values, problems };
}

function validateValues(values: ConfigValues): string[] {
  const problems: string[] = [];
  if (!(values.commandTimeoutSeconds > 0)) {
    problems.push('command_timeout_seconds must be a positive number');
  }
  if (!Number.isInteger(values.maxOutputBytes) || values.maxOutputBytes <= 0) {
    problems.push('max_output_bytes must be a positive integer');
  }
  if (!Number.isInteger(values.maxJobAttempts) || values.maxJobAttempts < 1) {
    problems.push('max_job_attempts must be an integer of at least 1');
  }
  if (values.allowedRoots.length === 0) {
    problems.push('allowed_roots must name at least one directory');
  }
  return problems;
}

function normalizeCommand(name: string): string {
  return name.trim().toLowerCase();
}

function coerceStringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  return value.map((item) => String(item).trim()).filter((item) => item.length > 0);
}

function coerceBool(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }
  return null;
}

function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^\d+(\.\d+)?$/.test(value.trim())) return Number(value.trim());
  return null;
}

/**
 * The config file `init-config` writes: every setting at its default.
 */
export function renderDefaultConfig(): string {
  const defaults = defaultConfigValues();
  const raw: Record<string, unknown> = {};
  for (const [fileKey, field] of Object.entries(FILE_KEYS)) {
    raw[fileKey] = defaults[field];
  }
  return yamlStringify(raw);
}

export function writeDefaultConfig(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, renderDefaultConfig(), 'utf-8');
}
