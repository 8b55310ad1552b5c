/**
 * guardrun audit tail: the most recent audit events, oldest first
 */

import { isAuditStatus, readAuditEvents } from '../core/audit.js';
import { loadContext, printJson, type GlobalOptions } from './context.js';

export interface AuditTailOptions {
  limit?: number;
  status?: string;
}

export async function auditTailCommand(options: AuditTailOptions, globals: GlobalOptions): Promise<void> {
  const { status } = options;
  if (status !== undefined && !isAuditStatus(status)) {
    throw new Error(`Unknown status "${status}" (expected attempted, blocked, skipped, succeeded or failed)`);
  }
  const ctx = loadContext(globals);
  printJson(readAuditEvents(ctx.config.auditFile, { limit: options.limit ?? 20, status }));
}
