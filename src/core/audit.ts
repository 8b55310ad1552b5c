/**
 * AuditLog: append-only JSONL
 *
 * Every decision and every outcome is logged as a single JSON line.
 * Payloads are redacted before they reach the file: file contents are
 * reduced to a size and a short preview, secret-looking assignments are
 * masked, and long strings are cut.
 */

import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { TRUNCATION_MARKER } from './types.js';
import type { ActionRequest, AuditEvent, AuditStatus } from './types.js';

export interface AuditEntry {
  request: ActionRequest;
  status: AuditStatus;
  reason?: string;
}

export interface AuditRecorder {
  record(entry: AuditEntry): AuditEvent;
}

const MAX_STRING_LENGTH = 500;
const PREVIEW_LENGTH = 80;
const SECRET_ASSIGNMENT = /^(-{0,2}[A-Za-z0-9_.-]*(?:pass|secret|token|key)[A-Za-z0-9_.-]*=)(.+)$/i;

export class FileAuditLog implements AuditRecorder {
  private logPath: string;

  constructor(logPath: string) {
    this.logPath = logPath;
  }

  get path(): string {
    return this.logPath;
  }

  record(entry: AuditEntry): AuditEvent {
    const event: AuditEvent = {
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      action: entry.request.kind,
      payload: redactPayload(entry.request),
      status: entry.status,
      ...(entry.reason !== undefined ? { reason: clip(entry.reason) } : {}),
    };
    fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    fs.appendFileSync(this.logPath, JSON.stringify(event) + '\n', 'utf-8');
    return event;
  }
}

export function redactPayload(request: ActionRequest): Record<string, unknown> {
  switch (request.kind) {
    case 'command':
      return {
        argv: request.argv.map((token) => clip(maskSecret(token))),
        ...(request.cwd !== undefined ? { cwd: clip(request.cwd) } : {}),
      };
    case 'read_file':
      return { path: clip(request.path) };
    case 'write_file':
      return {
        path: clip(request.path),
        content: {
          bytes: Buffer.byteLength(request.content, 'utf-8'),
          preview: request.content.slice(0, PREVIEW_LENGTH).split('\n').map(maskSecret).join('\n'),
        },
      };
    case 'plan':
      return {
        step_count: request.steps.length,
        steps: request.steps.map((step) => ({ action: step.kind, ...redactPayload(step) })),
      };
  }
}

export function maskSecret(value: string): string {
  const match = SECRET_ASSIGNMENT.exec(value);
  return match ? `${match[1]}***` : value;
}

function clip(value: string): string {
  return value.length > MAX_STRING_LENGTH ? value.slice(0, MAX_STRING_LENGTH) + TRUNCATION_MARKER : value;
}

export const AUDIT_STATUSES: readonly AuditStatus[] = ['attempted', 'blocked', 'skipped', 'succeeded', 'failed'];

export function isAuditStatus(value: unknown): value is AuditStatus {
  return AUDIT_STATUSES.some((status) => status === value);
}

export interface ReadAuditOptions {
  /** Keep only the last N events. */
  limit?: number;
  status?: AuditStatus;
}

/**
 * Read events back from an audit log, oldest first. Malformed lines are skipped.
 */
export function readAuditEvents(logPath: string, options: ReadAuditOptions = {}): AuditEvent[] {
  if (!fs.existsSync(logPath)) return [];

  const content = fs.readFileSync(logPath, 'utf-8').trim();
  if (!content) return [];

  const events: AuditEvent[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      // Skip malformed lines
      continue;
    }
    if (!isAuditEvent(parsed)) continue;
    if (options.status && parsed.status !== options.status) continue;
    events.push(parsed);
  }

  return options.limit !== undefined ? events.slice(-options.limit) : events;
}

function isAuditEvent(value: unknown): value is AuditEvent {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'timestamp' in value && typeof value.timestamp === 'string' &&
    'action' in value && typeof value.action === 'string' &&
    'status' in value && isAuditStatus(value.status) &&
    'payload' in value && typeof value.payload === 'object'
  );
}
