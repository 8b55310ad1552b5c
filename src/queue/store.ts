/**
 * Durable Job Queue
 *
 * SQLite-backed job storage using better-sqlite3.
 * Every transition is a single UPDATE guarded by the job's current status,
 * so a claim is a compare-and-set: two claimers can never both win the
 * same job, and the loser simply sees no job.
 *
 * Lifecycle: queued -> running -> done | queued (retry) | failed | blocked
 *
 * A job left in "running" by a worker that died stays there until an
 * operator calls requeue(); nothing recovers it automatically.
 */

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { QueueError } from '../core/errors.js';
import { isActionKind } from '../core/requests.js';
import type { ActionKind, ExecutionResult } from '../core/types.js';

export type JobStatus = 'queued' | 'running' | 'done' | 'failed' | 'blocked';

export const JOB_STATUSES: readonly JobStatus[] = ['queued', 'running', 'done', 'failed', 'blocked'];

export interface Job {
  id: number;
  kind: ActionKind;
  payload: Record<string, unknown>;
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  createdAt: string;
  updatedAt: string;
  claimedAt: string | null;
  result: ExecutionResult | null;
  error: string | null;
}

interface JobRow {
  id: number;
  kind: string;
  payload: string;
  status: string;
  attempts: number;
  max_attempts: number;
  created_at: string;
  updated_at: string;
  claimed_at: string | null;
  result_json: string | null;
  error: string | null;
}

export interface JobQueueOptions {
  maxAttempts?: number;
  busyTimeoutMs?: number;
}

export interface ListOptions {
  status?: JobStatus;
  limit?: number;
  /** Default newest; oldest is claim order. */
  order?: 'newest' | 'oldest';
}

export function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

export class JobQueue {
  private db: Database.Database;
  private defaultMaxAttempts: number;

  constructor(dbPath: string = ':memory:', options: JobQueueOptions = {}) {
    this.defaultMaxAttempts = options.maxAttempts ?? 3;
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = guard(() => new Database(dbPath, { timeout: options.busyTimeoutMs ?? 5000 }));
    guard(() => {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = FULL');
      this.initialize();
    });
  }

  /**
   * Create the database schema if it doesn't exist.
   */
  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        kind TEXT NOT NULL,
        payload TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'queued',
        attempts INTEGER NOT NULL DEFAULT 0,
        max_attempts INTEGER NOT NULL DEFAULT 3,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        claimed_at TEXT,
        result_json TEXT,
        error TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status, id);
      CREATE INDEX IF NOT EXISTS idx_jobs_updated ON jobs(updated_at);
    `);
  }

  /**
   * Persist a new job in "queued" with zero attempts.
   */
  enqueue(kind: ActionKind, payload: Record<string, unknown>, options: { maxAttempts?: number } = {}): Job {
    const maxAttempts = options.maxAttempts ?? this.defaultMaxAttempts;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    const now = new Date().toISOString();

    const row = guard(() =>
      this.db.prepare<[string, string, number, string, string], JobRow>(`
        INSERT INTO jobs (kind, payload, status, attempts, max_attempts, created_at, updated_at)
        VALUES (?, ?, 'queued', 0, ?, ?, ?)
        RETURNING *
      `).get(kind, JSON.stringify(payload), maxAttempts, now, now),
    );
    if (!row) throw new QueueError('StoreUnavailable', 'Insert returned no row');
    return fromRow(row);
  }

  /**
   * Atomically claim the oldest queued job. Returns null when nothing is queued
   * or another worker got there first.
   */
  claimNext(): Job | null {
    const now = new Date().toISOString();
    const row = guard(() =>
      this.db.prepare<[string, string], JobRow>(`
        UPDATE jobs
        SET status = 'running', claimed_at = ?, updated_at = ?
        WHERE id = (SELECT id FROM jobs WHERE status = 'queued' ORDER BY id ASC LIMIT 1)
          AND status = 'queued'
        RETURNING *
      `).get(now, now),
    );
    return row ? fromRow(row) : null;
  }

  /**
   * Claim a specific job. Returns null when it is not queued (already claimed,
   * finished, or missing).
   */
  claim(id: number): Job | null {
    const now = new Date().toISOString();
    const row = guard(() =>
      this.db.prepare<[string, string, number], JobRow>(`
        UPDATE jobs
        SET status = 'running', claimed_at = ?, updated_at = ?
        WHERE id = ? AND status = 'queued'
        RETURNING *
      `).get(now, now, id),
    );
    return row ? fromRow(row) : null;
  }

  /**
   * running -> done
   */
  complete(id: number, result: ExecutionResult): Job {
    return this.transition(id, `
      UPDATE jobs
      SET status = 'done', updated_at = @now, result_json = @result, error = NULL
      WHERE id = @id AND status = 'running'
      RETURNING *
    `, { result: JSON.stringify(result) });
  }

  /**
   * running -> queued (attempts left) or failed (attempts exhausted).
   * The attempt count goes up by one either way.
   */
  fail(id: number, error: string, result?: ExecutionResult): Job {
    return this.transition(id, `
      UPDATE jobs
      SET attempts = attempts + 1,
          status = CASE WHEN attempts + 1 < max_attempts THEN 'queued' ELSE 'failed' END,
          updated_at = @now,
          error = @error,
          result_json = @result
      WHERE id = @id AND status = 'running'
      RETURNING *
    `, { error, result: result ? JSON.stringify(result) : null });
  }

  /**
   * running -> blocked. A policy denial is not retried.
   */
  block(id: number, reason: string): Job {
    return this.transition(id, `
      UPDATE jobs
      SET status = 'blocked', updated_at = @now, error = @error
      WHERE id = @id AND status = 'running'
      RETURNING *
    `, { error: reason });
  }

  /**
   * Operator intervention for a job stranded in "running": put it back in
   * the queue without counting an attempt.
   */
  requeue(id: number): Job {
    return this.transition(id, `
      UPDATE jobs
      SET status = 'queued', updated_at = @now, claimed_at = NULL
      WHERE id = @id AND status = 'running'
      RETURNING *
    `, {});
  }

  get(id: number): Job | null {
    const row = guard(() => this.db.prepare<[number], JobRow>('SELECT * FROM jobs WHERE id = ?').get(id));
    return row ? fromRow(row) : null;
  }

  /**
   * Jobs newest first, optionally filtered by status.
   */
  list(options: ListOptions = {}): Job[] {
    const limit = options.limit ?? 50;
    const direction = options.order === 'oldest' ? 'ASC' : 'DESC';
    const rows = guard(() =>
      options.status
        ? this.db
            .prepare<[string, number], JobRow>(`SELECT * FROM jobs WHERE status = ? ORDER BY id ${direction} LIMIT ?`)
            .all(options.status, limit)
        : this.db.prepare<[number], JobRow>(`SELECT * FROM jobs ORDER BY id ${direction} LIMIT ?`).all(limit),
    );
    return rows.map(fromRow);
  }

  counts(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = { queued: 0, running: 0, done: 0, failed: 0, blocked: 0 };
    const rows = guard(() =>
      this.db
        .prepare<[], { status: string; count: number }>('SELECT status, COUNT(*) AS count FROM jobs GROUP BY status')
        .all(),
    );
    for (const row of rows) {
      if (isJobStatus(row.status)) counts[row.status] = row.count;
    }
    return counts;
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  private transition(id: number, sql: string, params: Record<string, string | null>): Job {
    const row = guard(() =>
      this.db.prepare<[Record<string, string | number | null>], JobRow>(sql).get({
        ...params,
        id,
        now: new Date().toISOString(),
      }),
    );
    if (row) return fromRow(row);

    const current = this.get(id);
    if (!current) {
      throw new QueueError('JobNotFound', `Job ${id} not found`);
    }
    throw new QueueError('InvalidTransition', `Job ${id} is ${current.status}, not running`);
  }
}

function fromRow(row: JobRow): Job {
  if (!isActionKind(row.kind)) {
    throw new QueueError('StoreUnavailable', `Job ${row.id} has unknown kind "${row.kind}"`);
  }
  if (!isJobStatus(row.status)) {
    throw new QueueError('StoreUnavailable', `Job ${row.id} has unknown status "${row.status}"`);
  }
  const payload: unknown = JSON.parse(row.payload);
  const result: unknown = row.result_json ? JSON.parse(row.result_json) : null;
  return {
    id: row.id,
    kind: row.kind,
    payload: typeof payload === 'object' && payload !== null && !Array.isArray(payload) ? { ...payload } : {},
    status: row.status,
    attempts: row.attempts,
    maxAttempts: row.max_attempts,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    claimedAt: row.claimed_at,
    result: isExecutionResult(result) ? result : null,
    error: row.error,
  };
}

function isExecutionResult(value: unknown): value is ExecutionResult {
  return typeof value === 'object' && value !== null && 'kind' in value && 'ok' in value;
}

/**
 * Translate SQLite contention into StoreUnavailable; everything else passes through.
 */
const BUSY_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_CANTOPEN'];

function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof QueueError) throw err;
    if (err instanceof Error && 'code' in err && BUSY_CODES.includes(String(err.code))) {
      throw new QueueError('StoreUnavailable', `Job store unavailable: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
