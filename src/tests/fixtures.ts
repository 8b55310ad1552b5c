import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { resolveConfig, type ConfigOverrides } from '../config/config.js';
import { redactPayload, type AuditEntry, type AuditRecorder } from '../core/audit.js';
import type { AuditEvent, SafetyConfig } from '../core/types.js';

export interface Sandbox {
  /** Scratch directory holding everything below. */
  base: string;
  /** The only allowed root. */
  root: string;
  /** A sibling of root that policy must keep out. */
  outside: string;
  cleanup(): void;
}

export function makeSandbox(prefix = 'guardrun-test-'): Sandbox {
  const base = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
  const root = path.join(base, 'workspace');
  const outside = path.join(base, 'outside');
  fs.mkdirSync(root);
  fs.mkdirSync(outside);
  return {
    base,
    root,
    outside,
    cleanup: () => fs.rmSync(base, { recursive: true, force: true }),
  };
}

export const TEST_ALLOWED_COMMANDS = ['ls', 'cat', 'echo', 'git', 'sleep', 'false', 'env', 'scp', 'pwd'];

export function makeConfig(sandbox: Sandbox, overrides: ConfigOverrides = {}): SafetyConfig {
  return resolveConfig({
    cwd: sandbox.root,
    overrides: {
      allowedCommands: TEST_ALLOWED_COMMANDS,
      allowedRoots: [sandbox.root],
      requireConfirmation: false,
      allowedEnv: { PATH: process.env.PATH ?? '/usr/bin:/bin' },
      auditFile: path.join(sandbox.base, 'audit.jsonl'),
      queuePath: ':memory:',
      ...overrides,
    },
  });
}

/** In-memory recorder with the same event shape as FileAuditLog. */
export class MemoryAudit implements AuditRecorder {
  events: AuditEvent[] = [];

  record(entry: AuditEntry): AuditEvent {
    const event: AuditEvent = {
      id: `evt-${this.events.length + 1}`,
      timestamp: new Date().toISOString(),
      action: entry.request.kind,
      payload: redactPayload(entry.request),
      status: entry.status,
      ...(entry.reason !== undefined ? { reason: entry.reason } : {}),
    };
    this.events.push(event);
    return event;
  }

  statuses(): string[] {
    return this.events.map((event) => event.status);
  }
}
