/**
 * Policy Engine
 *
 * One function: evaluate(request, config) => PolicyDecision
 *
 * Commands are checked in a fixed order and the first failing check wins:
 *   1. shell operators anywhere in the text or any token
 *   2. malformed argv (empty, null bytes)
 *   3. denylist (always beats the allowlist)
 *   4. network executables while network access is off
 *   5. allowlist
 *   6. working directory and path-like arguments inside allowed roots
 *
 * File paths are canonicalised and must sit at or below a canonical
 * allowed root. Plans are approved only when every step is.
 *
 * Nothing here writes anywhere or keeps state; the only I/O is reading
 * the filesystem to resolve symlinks.
 */

import path from 'node:path';
import { canonicalize, canonicalizeRoots, findContainingRoot } from './paths.js';
import type {
  ActionRequest,
  CommandRequest,
  DenyDecision,
  DenyReason,
  PolicyDecision,
  SafetyConfig,
} from './types.js';

export const SHELL_OPERATORS = ['&&', '||', '|', ';', '`', '$(', '\n', '\r'] as const;

export const NETWORK_EXECUTABLES: ReadonlySet<string> = new Set([
  'curl',
  'wget',
  'nc',
  'ssh',
  'ncat',
  'netcat',
  'ftp',
  'scp',
  'sftp',
]);

export interface EvaluateOptions {
  /** Base for relative paths; defaults to the process working directory. */
  cwd?: string;
}

const ALLOW: PolicyDecision = Object.freeze({ decision: 'allow' });

export function evaluate(
  request: ActionRequest,
  config: SafetyConfig,
  options: EvaluateOptions = {},
): PolicyDecision {
  const cwd = options.cwd ?? process.cwd();
  const roots = canonicalizeRoots(config.allowedRoots);

  switch (request.kind) {
    case 'command':
      return evaluateCommand(request, config, roots, cwd);
    case 'read_file':
    case 'write_file':
      return evaluatePath(request.path, roots, cwd);
    case 'plan':
      return evaluatePlan(request.steps, config, options);
    default:
      return assertNever(request);
  }
}

export function executableName(argv0: string): string {
  return path.basename(argv0).toLowerCase();
}

export function findShellOperator(text: string): string | null {
  for (const operator of SHELL_OPERATORS) {
    if (text.includes(operator)) return operator;
  }
  return null;
}

function evaluateCommand(
  request: CommandRequest,
  config: SafetyConfig,
  roots: string[],
  cwd: string,
): PolicyDecision {
  const { argv } = request;
  if (argv.length === 0) {
    return deny('MalformedRequest', 'Empty command');
  }
  for (const token of argv) {
    if (typeof token !== 'string') {
      return deny('MalformedRequest', 'Command arguments must be strings');
    }
  }

  const texts = request.source !== undefined ? [request.source, ...argv] : argv;
  for (const text of texts) {
    const operator = findShellOperator(text);
    if (operator) {
      return deny('ShellOperatorPresent', `Shell operator ${JSON.stringify(operator)} is not allowed`);
    }
  }

  if (argv.some((token) => token.includes('\0'))) {
    return deny('MalformedRequest', 'Command contains a null byte');
  }
  if (argv[0].trim() === '') {
    return deny('MalformedRequest', 'Empty executable name');
  }

  const executable = executableName(argv[0]);
  if (config.deniedCommands.has(executable)) {
    return deny('Denylisted', `Executable is denied: ${executable}`);
  }
  if (NETWORK_EXECUTABLES.has(executable) && !config.networkAccess) {
    return deny('NetworkAccessDisabled', `Network executable blocked by policy: ${executable}`);
  }
  if (!config.allowedCommands.has(executable)) {
    return deny(
      'NotAllowlisted',
      `Executable is not allowlisted: ${executable}. Enable by adding to allowed_commands.`,
    );
  }

  const workingDir = request.cwd ?? cwd;
  const workingDecision = evaluatePath(workingDir, roots, cwd);
  if (workingDecision.decision === 'deny') {
    return { ...workingDecision, detail: `Working directory: ${workingDecision.detail}` };
  }

  const resolvedWorkingDir = canonicalize(workingDir, cwd);
  for (const argument of argv.slice(1)) {
    if (!looksLikePath(argument)) continue;
    const argDecision = evaluatePath(argument, roots, resolvedWorkingDir);
    if (argDecision.decision === 'deny') {
      return { ...argDecision, detail: `Argument ${JSON.stringify(argument)}: ${argDecision.detail}` };
    }
  }

  return ALLOW;
}

function looksLikePath(argument: string): boolean {
  if (argument.startsWith('-')) return false;
  return argument.includes('/') || argument.startsWith('~') || argument === '..';
}

function evaluatePath(candidate: string, roots: string[], cwd: string): PolicyDecision {
  if (typeof candidate !== 'string' || candidate.trim() === '') {
    return deny('MalformedRequest', 'Empty path');
  }
  if (candidate.includes('\0')) {
    return deny('MalformedRequest', 'Path contains a null byte');
  }

  let target: string;
  try {
    target = canonicalize(candidate, cwd);
  } catch (err) {
    return deny('MalformedRequest', `Path cannot be resolved: ${(err as Error).message}`);
  }

  if (findContainingRoot(target, roots) === null) {
    return deny('PathOutsideRoots', `Path is outside allowed roots: ${target}`);
  }
  return ALLOW;
}

function evaluatePlan(
  steps: readonly ActionRequest[],
  config: SafetyConfig,
  options: EvaluateOptions,
): PolicyDecision {
  if (steps.length === 0) {
    return deny('MalformedRequest', 'Plan has no steps');
  }

  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];
    if (step.kind === 'plan') {
      return { ...deny('MalformedRequest', 'Plans cannot be nested'), stepIndex: i + 1 };
    }
    const decision = evaluate(step, config, options);
    if (decision.decision === 'deny') {
      return { ...decision, detail: `Step ${i + 1}: ${decision.detail}`, stepIndex: i + 1 };
    }
  }

  return ALLOW;
}

function deny(reason: DenyReason, detail: string): DenyDecision {
  return { decision: 'deny', reason, detail };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled action request: ${JSON.stringify(value)}`);
}
