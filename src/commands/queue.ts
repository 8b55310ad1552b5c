/**
 * guardrun queue: durable jobs
 *
 * Commands:
 *   guardrun queue enqueue <kind> [args...]   Persist a job for later
 *   guardrun queue work [--max-jobs N]        Drain queued jobs
 *   guardrun queue list [--status S]          Newest first
 *   guardrun queue show <id>
 *   guardrun queue requeue <id>               Put a stranded running job back
 *
 * Workers never prompt: without --yes, a config that requires
 * confirmation blocks every job. With --dry-run, work claims nothing and
 * reports what each queued job would do.
 */

import fs from 'node:fs';
import path from 'node:path';
import { denyAll } from '../core/gate.js';
import { isActionKind, loadPlanFile, parseJobPayload, toJobPayload } from '../core/requests.js';
import { JobQueue, isJobStatus } from '../queue/store.js';
import { runWorker } from '../queue/worker.js';
import { buildRunner, loadContext, printJson, type CliContext, type GlobalOptions } from './context.js';

export interface EnqueueOptions {
  content?: string;
  from?: string;
  workdir?: string;
  maxAttempts?: number;
}

export interface WorkOptions {
  maxJobs?: number;
}

export interface ListJobsOptions {
  status?: string;
  limit?: number;
}

function openQueue(ctx: CliContext): JobQueue {
  return new JobQueue(ctx.config.queuePath, { maxAttempts: ctx.config.maxJobAttempts });
}

function withQueue<T>(ctx: CliContext, fn: (queue: JobQueue) => T): T {
  const queue = openQueue(ctx);
  try {
    return fn(queue);
  } finally {
    queue.close();
  }
}

export async function enqueueCommand(
  kind: string,
  args: string[],
  options: EnqueueOptions,
  globals: GlobalOptions,
): Promise<void> {
  if (!isActionKind(kind)) {
    throw new Error(`Unknown job kind "${kind}" (expected command, read_file, write_file or plan)`);
  }
  const ctx = loadContext(globals);

  let payload: Record<string, unknown>;
  switch (kind) {
    case 'command':
      if (args.length === 0) throw new Error('Usage: guardrun queue enqueue command <command...>');
      payload = {
        command: args.length === 1 ? args[0] : args,
        ...(options.workdir !== undefined ? { cwd: options.workdir } : {}),
      };
      break;
    case 'read_file':
      payload = { path: requireOne(args, 'read_file <path>') };
      break;
    case 'write_file': {
      const target = requireOne(args, 'write_file <path> (--content <text> | --from <file>)');
      if ((options.content === undefined) === (options.from === undefined)) {
        throw new Error('Give exactly one of --content <text> or --from <file>');
      }
      const content = options.content ?? fs.readFileSync(path.resolve(ctx.cwd, options.from ?? ''), 'utf-8');
      payload = { path: target, content };
      break;
    }
    case 'plan':
      payload = toJobPayload(loadPlanFile(path.resolve(ctx.cwd, requireOne(args, 'plan <file>'))));
      break;
  }

  // Reject what a worker could never parse.
  parseJobPayload(kind, payload);

  const job = withQueue(ctx, (queue) => queue.enqueue(kind, payload, { maxAttempts: options.maxAttempts }));
  if (!globals.quiet) console.error(`  ✅ Queued job ${job.id} (${job.kind})`);
  printJson(job);
}

export async function workCommand(options: WorkOptions, globals: GlobalOptions): Promise<void> {
  const ctx = loadContext(globals);
  const queue = openQueue(ctx);
  try {
    const summary = await runWorker({
      queue,
      runner: buildRunner(ctx, denyAll),
      audit: ctx.audit,
      maxJobs: options.maxJobs,
      dryRun: Boolean(globals.dryRun),
      quiet: globals.quiet,
    });
    printJson(summary);
  } finally {
    queue.close();
  }
}

export async function listJobsCommand(options: ListJobsOptions, globals: GlobalOptions): Promise<void> {
  const { status } = options;
  if (status !== undefined && !isJobStatus(status)) {
    throw new Error(`Unknown status "${status}" (expected queued, running, done, failed or blocked)`);
  }
  const ctx = loadContext(globals);
  printJson(withQueue(ctx, (queue) => queue.list({ status, limit: options.limit })));
}

export async function showJobCommand(id: string, globals: GlobalOptions): Promise<void> {
  const jobId = parseJobId(id);
  const ctx = loadContext(globals);
  const job = withQueue(ctx, (queue) => queue.get(jobId));
  if (!job) throw new Error(`Job ${jobId} not found`);
  printJson(job);
}

export async function requeueCommand(id: string, globals: GlobalOptions): Promise<void> {
  const jobId = parseJobId(id);
  const ctx = loadContext(globals);
  const job = withQueue(ctx, (queue) => queue.requeue(jobId));
  if (!globals.quiet) console.error(`  ✅ Job ${job.id} is queued again`);
  printJson(job);
}

function requireOne(args: string[], usage: string): string {
  if (args.length !== 1) throw new Error(`Usage: guardrun queue enqueue ${usage}`);
  return args[0];
}

function parseJobId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id < 1) throw new Error(`Invalid job id: ${value}`);
  return id;
}
