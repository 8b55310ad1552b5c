/**
 * Guarded Executor
 *
 * Performs an action the policy engine has already approved:
 *   - commands are spawned straight from their argv (never through a shell)
 *     with only the configured environment, a hard wall-clock timeout that
 *     kills the whole process group, and head-truncated output
 *   - reads return at most max_output_bytes of the file
 *   - writes re-resolve the target right before opening it and refuse to
 *     follow a symlink, so a swap after approval cannot redirect the write
 *   - plans run step by step and stop at the first failure
 *
 * Failures come back inside the result; nothing here throws for them.
 * One audit event is written per executed action once it finishes.
 */

import { spawn, type ChildProcessByStdio } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';
import type { AuditRecorder } from './audit.js';
import { errnoCode } from './errors.js';
import { canonicalize, canonicalizeRoots, deepestExistingAncestor, findContainingRoot } from './paths.js';
import { TRUNCATION_MARKER } from './types.js';
import type {
  ActionRequest,
  CommandRequest,
  ExecutionErrorKind,
  ExecutionResult,
  PlanRequest,
  PolicyDecision,
  ReadFileRequest,
  SafetyConfig,
  StepRequest,
  WriteFileRequest,
} from './types.js';

const O_NOFOLLOW = fs.constants.O_NOFOLLOW ?? 0;

export interface ExecutorOptions {
  audit: AuditRecorder;
  /** Base for relative paths and the default working directory. */
  cwd?: string;
}

export class GuardedExecutor {
  private audit: AuditRecorder;
  private cwd: string;

  constructor(options: ExecutorOptions) {
    this.audit = options.audit;
    this.cwd = options.cwd ?? process.cwd();
  }

  async execute(
    request: ActionRequest,
    decision: PolicyDecision,
    config: SafetyConfig,
  ): Promise<ExecutionResult> {
    if (decision.decision !== 'allow') {
      throw new Error(`Guarded executor invoked without an allow decision (${decision.reason})`);
    }

    if (request.kind === 'plan') {
      return this.runPlan(request, config);
    }
    return this.runStep(request, config);
  }

  private async runStep(request: StepRequest, config: SafetyConfig): Promise<ExecutionResult> {
    let result: ExecutionResult;
    switch (request.kind) {
      case 'command':
        result = await runCommand(request, config, this.cwd);
        break;
      case 'read_file':
        result = await readFile(request, config, this.cwd);
        break;
      case 'write_file':
        result = await writeFile(request, config, this.cwd);
        break;
      default:
        return assertNever(request);
    }
    this.recordOutcome(request, result);
    return result;
  }

  private async runPlan(plan: PlanRequest, config: SafetyConfig): Promise<ExecutionResult> {
    const started = Date.now();
    const steps: ExecutionResult[] = [];
    let failedAt: number | null = null;

    for (let i = 0; i < plan.steps.length; i++) {
      const step = plan.steps[i];
      if (failedAt !== null) {
        this.audit.record({ request: step, status: 'skipped', reason: `Plan stopped after step ${failedAt} failed` });
        continue;
      }
      if (step.kind === 'plan') {
        throw new Error('Nested plan reached the guarded executor');
      }
      const result = await this.runStep(step, config);
      steps.push(result);
      if (!result.ok) {
        failedAt = i + 1;
      }
    }

    const result: ExecutionResult = {
      kind: 'plan',
      ok: failedAt === null,
      durationMs: Date.now() - started,
      truncated: steps.some((step) => step.truncated),
      steps,
      ...(failedAt !== null
        ? { error: { kind: errorKindOf(steps[steps.length - 1]), message: `Step ${failedAt} failed` } }
        : {}),
    };
    this.recordOutcome(plan, result);
    return result;
  }

  private recordOutcome(request: ActionRequest, result: ExecutionResult): void {
    this.audit.record({
      request,
      status: result.ok ? 'succeeded' : 'failed',
      ...(result.error ? { reason: `${result.error.kind}: ${result.error.message}` } : {}),
    });
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

/**
 * Collects a stream up to a byte ceiling and remembers whether anything
 * was dropped.
 */
class BoundedBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private limit: number;
  truncated = false;

  constructor(limit: number) {
    this.limit = limit;
  }

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      if (chunk.length > 0) this.truncated = true;
      return;
    }
    if (chunk.length > room) {
      this.chunks.push(chunk.subarray(0, room));
      this.size += room;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString('utf-8');
    return this.truncated ? text + TRUNCATION_MARKER : text;
  }
}

interface ProcessOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  spawnError?: Error;
}

function runCommand(request: CommandRequest, config: SafetyConfig, baseCwd: string): Promise<ExecutionResult> {
  const started = Date.now();
  const [cmd, ...args] = request.argv;
  const cwd = canonicalize(request.cwd ?? '.', baseCwd);
  const stdout = new BoundedBuffer(config.maxOutputBytes);
  const stderr = new BoundedBuffer(config.maxOutputBytes);
  const timeoutMs = Math.max(1, Math.round(config.commandTimeoutSeconds * 1000));

  return new Promise<ProcessOutcome>((resolve) => {
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const settle = (outcome: ProcessOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(cmd, args, {
        cwd,
        env: { ...config.allowedEnv },
        shell: false,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (err) {
      settle({ exitCode: null, signal: null, timedOut, spawnError: err instanceof Error ? err : new Error(String(err)) });
      return;
    }

    const spawned = child;
    timer = setTimeout(() => {
      timedOut = true;
      killProcessGroup(spawned.pid, () => spawned.kill('SIGKILL'));
    }, timeoutMs);

    spawned.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    spawned.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    spawned.on('error', (err: NodeJS.ErrnoException) => {
      settle({ exitCode: null, signal: null, timedOut, spawnError: err });
    });
    spawned.on('close', (code, signal) => {
      settle({ exitCode: code, signal, timedOut });
    });
  }).then((outcome): ExecutionResult => {
    const base = {
      kind: 'command' as const,
      durationMs: Date.now() - started,
      exitCode: outcome.exitCode,
      signal: outcome.signal,
      stdout: stdout.toString(),
      stderr: stderr.toString(),
      truncated: stdout.truncated || stderr.truncated,
    };

    if (outcome.spawnError) {
      const missing = errnoCode(outcome.spawnError) === 'ENOENT';
      return {
        ...base,
        ok: false,
        error: {
          kind: 'OSSpawnFailure',
          message: missing ? `Command not found: ${cmd}` : `Failed to start ${cmd}: ${outcome.spawnError.message}`,
        },
      };
    }
    if (outcome.timedOut) {
      return {
        ...base,
        ok: false,
        error: { kind: 'Timeout', message: `Command timed out after ${config.commandTimeoutSeconds}s` },
      };
    }
    if (outcome.exitCode !== 0) {
      const how = outcome.signal ? `signal ${outcome.signal}` : `exit code ${outcome.exitCode}`;
      return { ...base, ok: false, error: { kind: 'NonZeroExit', message: `Command exited with ${how}` } };
    }
    return { ...base, ok: true };
  });
}

function killProcessGroup(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    if (errnoCode(err) === 'ESRCH') return;
    fallback();
  }
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

function resolveApprovedPath(requested: string, config: SafetyConfig, baseCwd: string): string {
  const target = canonicalize(requested, baseCwd);
  if (findContainingRoot(target, canonicalizeRoots(config.allowedRoots)) === null) {
    throw new Error(`Path left the allowed roots after approval: ${target}`);
  }
  return target;
}

async function readFile(request: ReadFileRequest, config: SafetyConfig, baseCwd: string): Promise<ExecutionResult> {
  const started = Date.now();
  try {
    const target = resolveApprovedPath(request.path, config, baseCwd);
    const handle = await fs.promises.open(target, fs.constants.O_RDONLY | O_NOFOLLOW);
    try {
      const { size } = await handle.stat();
      const length = Math.min(size, config.maxOutputBytes);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      const truncated = size > config.maxOutputBytes;
      const text = buffer.subarray(0, bytesRead).toString('utf-8');
      return {
        kind: 'read_file',
        ok: true,
        path: target,
        bytes: size,
        content: truncated ? text + TRUNCATION_MARKER : text,
        truncated,
        durationMs: Date.now() - started,
      };
    } finally {
      await handle.close();
    }
  } catch (err) {
    return ioFailure('read_file', err, started);
  }
}

async function writeFile(request: WriteFileRequest, config: SafetyConfig, baseCwd: string): Promise<ExecutionResult> {
  const started = Date.now();
  try {
    const target = resolveApprovedPath(request.path, config, baseCwd);
    const roots = canonicalizeRoots(config.allowedRoots);
    const parent = path.dirname(target);

    // Only create directories underneath an allowed root.
    const existing = fs.realpathSync.native(deepestExistingAncestor(parent));
    if (findContainingRoot(existing, roots) === null) {
      throw new Error(`Refusing to create directories outside the allowed roots: ${parent}`);
    }
    await fs.promises.mkdir(parent, { recursive: true });

    const realParent = fs.realpathSync.native(parent);
    const finalTarget = path.join(realParent, path.basename(target));
    if (findContainingRoot(finalTarget, roots) === null) {
      throw new Error(`Write target left the allowed roots: ${finalTarget}`);
    }

    const handle = await fs.promises.open(
      finalTarget,
      fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_TRUNC | O_NOFOLLOW,
      0o644,
    );
    try {
      await handle.writeFile(request.content, 'utf-8');
    } finally {
      await handle.close();
    }

    return {
      kind: 'write_file',
      ok: true,
      path: finalTarget,
      bytes: Buffer.byteLength(request.content, 'utf-8'),
      truncated: false,
      durationMs: Date.now() - started,
    };
  } catch (err) {
    return ioFailure('write_file', err, started);
  }
}

function ioFailure(kind: 'read_file' | 'write_file', err: unknown, started: number): ExecutionResult {
  const detail = err instanceof Error ? err.message : String(err);
  const message = errnoCode(err) === 'ELOOP' ? `Refusing to follow a symlink: ${detail}` : detail;
  return {
    kind,
    ok: false,
    truncated: false,
    durationMs: Date.now() - started,
    error: { kind: 'IOFailure', message },
  };
}

function errorKindOf(result: ExecutionResult | undefined): ExecutionErrorKind {
  return result?.error?.kind ?? 'IOFailure';
}

function assertNever(value: never): never {
  throw new Error(`Unhandled action request: ${JSON.stringify(value)}`);
}
