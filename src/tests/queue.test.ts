import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { fork } from 'node:child_process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { QueueError } from '../core/errors.js';
import type { ExecutionResult } from '../core/types.js';
import { JobQueue } from '../queue/store.js';
import { makeSandbox, type Sandbox } from './fixtures.js';

const RESULT: ExecutionResult = {
  kind: 'command',
  ok: true,
  durationMs: 3,
  truncated: false,
  exitCode: 0,
  stdout: 'hello\n',
  stderr: '',
};

function queueErrorCode(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof QueueError) return err.code;
    throw err;
  }
  assert.fail('expected a QueueError');
}

describe('JobQueue', () => {
  let queue: JobQueue;

  beforeEach(() => {
    queue = new JobQueue(':memory:');
  });

  afterEach(() => {
    queue.close();
  });

  it('enqueues jobs as queued with zero attempts', () => {
    const job = queue.enqueue('command', { command: 'ls' });
    assert.strictEqual(job.id, 1);
    assert.strictEqual(job.kind, 'command');
    assert.deepStrictEqual(job.payload, { command: 'ls' });
    assert.strictEqual(job.status, 'queued');
    assert.strictEqual(job.attempts, 0);
    assert.strictEqual(job.maxAttempts, 3);
    assert.strictEqual(job.claimedAt, null);
    assert.strictEqual(job.result, null);
  });

  it('lists newest first, with status and limit filters', () => {
    queue.enqueue('command', { command: 'ls' });
    queue.enqueue('read_file', { path: 'a.txt' });
    queue.enqueue('command', { command: 'pwd' });
    queue.claim(2);

    assert.deepStrictEqual(queue.list().map((job) => job.id), [3, 2, 1]);
    assert.deepStrictEqual(queue.list({ status: 'queued' }).map((job) => job.id), [3, 1]);
    assert.deepStrictEqual(queue.list({ limit: 1 }).map((job) => job.id), [3]);
    assert.deepStrictEqual(queue.list({ status: 'queued', order: 'oldest' }).map((job) => job.id), [1, 3]);
    assert.deepStrictEqual(queue.counts(), { queued: 2, running: 1, done: 0, failed: 0, blocked: 0 });
  });

  it('claims the oldest queued job first', () => {
    queue.enqueue('command', { command: 'ls' });
    queue.enqueue('command', { command: 'pwd' });

    const first = queue.claimNext();
    assert.strictEqual(first?.id, 1);
    assert.strictEqual(first?.status, 'running');
    assert.notStrictEqual(first?.claimedAt, null);
    assert.strictEqual(queue.claimNext()?.id, 2);
    assert.strictEqual(queue.claimNext(), null);
  });

  it('returns null when a specific claim loses', () => {
    const job = queue.enqueue('command', { command: 'ls' });
    assert.strictEqual(queue.claim(job.id)?.status, 'running');
    assert.strictEqual(queue.claim(job.id), null);
    assert.strictEqual(queue.claim(999), null);
  });

  it('completes a running job with its result', () => {
    const job = queue.enqueue('command', { command: 'echo hello' });
    queue.claimNext();
    const done = queue.complete(job.id, RESULT);
    assert.strictEqual(done.status, 'done');
    assert.deepStrictEqual(done.result, RESULT);
    assert.strictEqual(done.error, null);
  });

  it('retries a failing job until max attempts, then fails it', () => {
    const job = queue.enqueue('command', { command: 'false' });

    queue.claimNext();
    let updated = queue.fail(job.id, 'NonZeroExit: exit code 1');
    assert.deepStrictEqual([updated.status, updated.attempts], ['queued', 1]);

    queue.claimNext();
    updated = queue.fail(job.id, 'NonZeroExit: exit code 1');
    assert.deepStrictEqual([updated.status, updated.attempts], ['queued', 2]);

    queue.claimNext();
    updated = queue.fail(job.id, 'NonZeroExit: exit code 1');
    assert.deepStrictEqual([updated.status, updated.attempts], ['failed', 3]);
    assert.strictEqual(updated.error, 'NonZeroExit: exit code 1');

    assert.strictEqual(queue.claimNext(), null);
  });

  it('honours a per-job attempt limit', () => {
    const job = queue.enqueue('command', { command: 'false' }, { maxAttempts: 1 });
    queue.claimNext();
    assert.strictEqual(queue.fail(job.id, 'boom').status, 'failed');
    assert.throws(() => queue.enqueue('command', { command: 'ls' }, { maxAttempts: 0 }), RangeError);
  });

  it('blocks a running job without retrying it', () => {
    const job = queue.enqueue('command', { command: 'rm -rf /' });
    queue.claimNext();
    const blocked = queue.block(job.id, 'Denylisted: Executable is denied: rm');
    assert.strictEqual(blocked.status, 'blocked');
    assert.strictEqual(blocked.attempts, 0);
    assert.strictEqual(blocked.error, 'Denylisted: Executable is denied: rm');
    assert.strictEqual(queue.claimNext(), null);
  });

  it('refuses transitions from the wrong state', () => {
    const job = queue.enqueue('command', { command: 'ls' });
    assert.strictEqual(queueErrorCode(() => queue.complete(job.id, RESULT)), 'InvalidTransition');
    assert.strictEqual(queueErrorCode(() => queue.fail(job.id, 'x')), 'InvalidTransition');
    assert.strictEqual(queueErrorCode(() => queue.block(999, 'x')), 'JobNotFound');
  });

  it('requeues a stranded running job without counting an attempt', () => {
    const job = queue.enqueue('command', { command: 'ls' });
    queue.claimNext();
    const requeued = queue.requeue(job.id);
    assert.strictEqual(requeued.status, 'queued');
    assert.strictEqual(requeued.attempts, 0);
    assert.strictEqual(requeued.claimedAt, null);
    assert.strictEqual(queueErrorCode(() => queue.requeue(job.id)), 'InvalidTransition');
  });
});

const CLAIM_PROCESS = fileURLToPath(new URL('./claim-process.ts', import.meta.url));

interface Claimer {
  ready: Promise<void>;
  claimed: Promise<number | null>;
  go(): void;
}

function startClaimer(dbPath: string): Claimer {
  const child = fork(CLAIM_PROCESS, [dbPath], {
    execArgv: ['--import', 'tsx'],
    stdio: ['ignore', 'ignore', 'inherit', 'ipc'],
  });
  let onReady: () => void = () => {};
  let onClaimed: (id: number | null) => void = () => {};
  let onFailure: (err: Error) => void = () => {};
  const failed = new Promise<never>((_resolve, reject) => (onFailure = reject));
  // A normal exit after the claim rejects this too, with nobody waiting.
  failed.catch(() => {});
  const ready = Promise.race([new Promise<void>((resolve) => (onReady = resolve)), failed]);
  const claimed = Promise.race([new Promise<number | null>((resolve) => (onClaimed = resolve)), failed]);
  child.once('error', onFailure);
  child.once('exit', (code) => onFailure(new Error(`claim process exited with code ${code}`)));

  child.on('message', (message: unknown) => {
    if (message === 'ready') {
      onReady();
    } else if (typeof message === 'object' && message !== null && 'claimed' in message) {
      const id = message.claimed;
      onClaimed(typeof id === 'number' ? id : null);
    }
  });

  return { ready, claimed, go: () => child.send('go') };
}

describe('JobQueue on disk', () => {
  let sandbox: Sandbox;
  let dbPath: string;

  beforeEach(() => {
    sandbox = makeSandbox('guardrun-queue-');
    dbPath = path.join(sandbox.base, 'state', 'jobs.sqlite');
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  it('survives a reopen', () => {
    const first = new JobQueue(dbPath);
    const job = first.enqueue('write_file', { path: 'a.txt', content: 'hello' });
    first.close();

    const second = new JobQueue(dbPath);
    try {
      assert.deepStrictEqual(second.get(job.id), job);
    } finally {
      second.close();
    }
  });

  it('hands each job to exactly one of two connections', () => {
    const a = new JobQueue(dbPath);
    const b = new JobQueue(dbPath);
    try {
      for (let i = 0; i < 5; i++) a.enqueue('command', { command: `echo ${i}` });

      const claimed: number[] = [];
      for (;;) {
        const fromA = a.claimNext();
        const fromB = b.claimNext();
        if (fromA) claimed.push(fromA.id);
        if (fromB) claimed.push(fromB.id);
        if (!fromA && !fromB) break;
      }
      assert.deepStrictEqual(claimed.sort((x, y) => x - y), [1, 2, 3, 4, 5]);

      const extra = a.enqueue('command', { command: 'ls' });
      assert.strictEqual(b.claim(extra.id)?.id, extra.id);
      assert.strictEqual(a.claim(extra.id), null);
      assert.strictEqual(a.claimNext(), null);
    } finally {
      a.close();
      b.close();
    }
  });

  it('gives one job to exactly one of several processes claiming at once', { timeout: 60_000 }, async () => {
    const setup = new JobQueue(dbPath);
    const job = setup.enqueue('command', { command: 'echo once' });
    setup.close();

    const claimers = Array.from({ length: 6 }, () => startClaimer(dbPath));
    await Promise.all(claimers.map((claimer) => claimer.ready));
    for (const claimer of claimers) claimer.go();
    const results = await Promise.all(claimers.map((claimer) => claimer.claimed));

    assert.deepStrictEqual(results.filter((id) => id !== null), [job.id]);
    assert.strictEqual(results.filter((id) => id === null).length, 5);

    const check = new JobQueue(dbPath);
    try {
      assert.strictEqual(check.get(job.id)?.status, 'running');
    } finally {
      check.close();
    }
  });
});
