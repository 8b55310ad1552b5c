/**
 * Queue Worker
 *
 * Claims jobs one at a time and pushes each through the same runner the
 * CLI uses, so queued work gets the same policy, confirmation and audit
 * treatment as direct work.
 *
 *   blocked / declined -> block (not retried)
 *   failed             -> fail  (retried until max attempts)
 *   succeeded          -> complete
 *   dry run            -> back to queued, attempts untouched
 *
 * A dry-run worker claims nothing: it evaluates queued jobs oldest first and
 * reports what would happen.
 */

import type { AuditRecorder } from '../core/audit.js';
import { RequestParseError } from '../core/errors.js';
import { parseJobPayload, standInRequest } from '../core/requests.js';
import type { ActionOutcome, ActionRunner } from '../core/runner.js';
import type { ActionRequest } from '../core/types.js';
import type { Job, JobQueue } from './store.js';

export interface WorkerDeps {
  queue: JobQueue;
  runner: ActionRunner;
  /** Receives the refusal of a payload that never became a request. */
  audit: AuditRecorder;
  quiet?: boolean;
}

export interface WorkerOptions extends WorkerDeps {
  /** Stop after this many jobs; unlimited when omitted. */
  maxJobs?: number;
  /** Preview queued jobs without claiming them. Pair with a dry-run runner. */
  dryRun?: boolean;
}

export interface JobReport {
  id: number;
  kind: Job['kind'];
  status: Job['status'];
  attempts: number;
  detail?: string;
}

export interface WorkerSummary {
  processed: number;
  done: number;
  requeued: number;
  failed: number;
  blocked: number;
  jobs: JobReport[];
}

type Parsed = { ok: true; request: ActionRequest } | { ok: false; reason: string };

function parseOrAudit(job: Job, deps: WorkerDeps): Parsed {
  try {
    return { ok: true, request: parseJobPayload(job.kind, job.payload) };
  } catch (err) {
    if (!(err instanceof RequestParseError)) throw err;
    const reason = `MalformedRequest: ${err.message}`;
    deps.audit.record({ request: standInRequest(job.kind, job.payload), status: 'blocked', reason });
    return { ok: false, reason };
  }
}

/**
 * Run one claimed job to its next state.
 */
export async function processJob(job: Job, deps: WorkerDeps): Promise<Job> {
  const { queue, runner } = deps;
  const log = (message: string): void => {
    if (!deps.quiet) console.error(`  [worker] job ${job.id}: ${message}`);
  };

  let parsed: Parsed;
  try {
    parsed = parseOrAudit(job, deps);
  } catch (err) {
    return failRunning(job, deps, err, log);
  }
  if (!parsed.ok) {
    log(`malformed payload (${parsed.reason})`);
    return queue.block(job.id, parsed.reason);
  }

  let outcome: ActionOutcome;
  try {
    outcome = await runner(parsed.request);
  } catch (err) {
    return failRunning(job, deps, err, log);
  }

  switch (outcome.status) {
    case 'blocked':
      log(`blocked (${outcome.decision.reason})`);
      return queue.block(job.id, `${outcome.decision.reason}: ${outcome.decision.detail}`);
    case 'skipped':
      if (outcome.reason === 'dry_run') {
        log('dry run, returned to the queue');
        return queue.requeue(job.id);
      }
      log(`skipped (${outcome.reason})`);
      return queue.block(job.id, `${outcome.reason}: ${outcome.detail}`);
    case 'failed': {
      const message = outcome.result.error
        ? `${outcome.result.error.kind}: ${outcome.result.error.message}`
        : 'Execution failed';
      const updated = queue.fail(job.id, message, outcome.result);
      log(`failed, attempt ${updated.attempts}/${updated.maxAttempts} -> ${updated.status}`);
      return updated;
    }
    case 'succeeded':
      log('done');
      return queue.complete(job.id, outcome.result);
  }
}

// The runner itself threw (an audit append that hit EACCES or ENOSPC):
// the job counts an attempt rather than staying "running".
function failRunning(job: Job, deps: WorkerDeps, err: unknown, log: (message: string) => void): Job {
  const message = `IOFailure: ${err instanceof Error ? err.message : String(err)}`;
  const updated = deps.queue.fail(job.id, message);
  log(`runner error (${message}) -> ${updated.status}`);
  return updated;
}

/**
 * Evaluate a queued job without claiming it. Nothing in the queue changes.
 */
export async function previewJob(job: Job, deps: WorkerDeps): Promise<JobReport> {
  const report = { id: job.id, kind: job.kind, status: job.status, attempts: job.attempts };
  const parsed = parseOrAudit(job, deps);
  if (!parsed.ok) return { ...report, detail: `would block: ${parsed.reason}` };

  const outcome = await deps.runner(parsed.request);
  switch (outcome.status) {
    case 'blocked':
      return { ...report, detail: `would block: ${outcome.decision.reason}: ${outcome.decision.detail}` };
    case 'skipped':
      return { ...report, detail: outcome.reason === 'dry_run' ? 'would run' : `would block: ${outcome.reason}` };
    case 'failed':
    case 'succeeded':
      // A runner that is not in dry-run mode executed the job anyway.
      return { ...report, detail: `executed: ${outcome.status}` };
  }
}

/**
 * Drain the queue: claim, process, repeat until nothing is queued or
 * maxJobs is reached. A job that fails and is requeued can be claimed
 * again within the same run; one put back by a dry run ends the run.
 */
export async function runWorker(options: WorkerOptions): Promise<WorkerSummary> {
  const summary: WorkerSummary = { processed: 0, done: 0, requeued: 0, failed: 0, blocked: 0, jobs: [] };
  const limit = options.maxJobs ?? Infinity;

  if (options.dryRun) {
    const queued = options.queue.list({
      status: 'queued',
      order: 'oldest',
      limit: Number.isFinite(limit) ? limit : -1,
    });
    for (const job of queued) {
      summary.jobs.push(await previewJob(job, options));
      summary.processed++;
    }
    return summary;
  }

  while (summary.processed < limit) {
    const job = options.queue.claimNext();
    if (!job) break;

    const updated = await processJob(job, options);
    summary.processed++;
    switch (updated.status) {
      case 'done':
        summary.done++;
        break;
      case 'queued':
        summary.requeued++;
        break;
      case 'failed':
        summary.failed++;
        break;
      case 'blocked':
        summary.blocked++;
        break;
      case 'running':
        break;
    }
    summary.jobs.push({
      id: updated.id,
      kind: updated.kind,
      status: updated.status,
      attempts: updated.attempts,
      ...(updated.error ? { detail: updated.error } : {}),
    });
    if (updated.status === 'queued' && updated.attempts === job.attempts) break;
  }

  return summary;
}
