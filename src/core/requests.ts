/**
 * Action request construction and parsing
 *
 * Builds frozen ActionRequest values from the external shapes callers hand
 * us: CLI arguments, model tool calls, plan files and job payloads.
 *
 * Tool calls:
 *   run_command { command: string }
 *   read_file   { path: string }
 *   write_file  { path: string, content: string }
 *   run_plan    { steps: [ {command} | {read_file} | {write_file: {path, content}} ] }
 *
 * Job payloads use the same argument objects keyed by job kind
 * (command, read_file, write_file, plan).
 */

import fs from 'node:fs';
import { parse as yamlParse } from 'yaml';
import { tokenize } from './command-line.js';
import { RequestParseError } from './errors.js';
import type {
  ActionKind,
  ActionRequest,
  CommandRequest,
  PlanRequest,
  ReadFileRequest,
  StepRequest,
  WriteFileRequest,
} from './types.js';

export const ACTION_KINDS: readonly ActionKind[] = ['command', 'read_file', 'write_file', 'plan'];

export function commandRequest(command: string | readonly string[], cwd?: string): CommandRequest {
  const request: CommandRequest =
    typeof command === 'string'
      ? { kind: 'command', argv: Object.freeze(tokenize(command)), source: command }
      : { kind: 'command', argv: Object.freeze([...command]) };
  return Object.freeze(cwd !== undefined ? { ...request, cwd } : request);
}

export function readFileRequest(path: string): ReadFileRequest {
  const request: ReadFileRequest = { kind: 'read_file', path };
  return Object.freeze(request);
}

export function writeFileRequest(path: string, content: string): WriteFileRequest {
  const request: WriteFileRequest = { kind: 'write_file', path, content };
  return Object.freeze(request);
}

export function planRequest(steps: readonly StepRequest[]): PlanRequest {
  const request: PlanRequest = { kind: 'plan', steps: Object.freeze([...steps]) };
  return Object.freeze(request);
}

export function isActionKind(value: unknown): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

/**
 * Translate a tool call (name + JSON arguments) into an ActionRequest.
 */
export function parseToolCall(name: string, args: unknown): ActionRequest {
  const trimmed = name.trim();
  const record = asRecord(args, `Tool arguments must be an object: ${trimmed}`);

  switch (trimmed) {
    case 'run_command':
      return parseJobPayload('command', record);
    case 'read_file':
      return parseJobPayload('read_file', record);
    case 'write_file':
      return parseJobPayload('write_file', record);
    case 'run_plan':
      return parseJobPayload('plan', record);
    default:
      throw new RequestParseError(`Unknown tool: ${trimmed}`);
  }
}

/**
 * Rebuild an ActionRequest from a persisted job payload.
 */
export function parseJobPayload(kind: ActionKind, payload: unknown): ActionRequest {
  const record = asRecord(payload, `${kind} payload must be an object`);

  switch (kind) {
    case 'command': {
      const command = record.command;
      const cwd = optionalString(record.cwd, 'command "cwd" must be a string');
      if (typeof command === 'string') {
        if (command.trim() === '') throw new RequestParseError('command requires a non-empty "command"');
        return commandRequest(command, cwd);
      }
      if (Array.isArray(command) && command.length > 0 && command.every((t) => typeof t === 'string')) {
        return commandRequest(command.map(String), cwd);
      }
      throw new RequestParseError('command requires "command" as a string or a list of strings');
    }
    case 'read_file': {
      const path = record.path;
      if (typeof path !== 'string' || path === '') {
        throw new RequestParseError('read_file requires "path"');
      }
      return readFileRequest(path);
    }
    case 'write_file': {
      const { path, content } = record;
      if (typeof path !== 'string' || path === '' || content === undefined || content === null) {
        throw new RequestParseError('write_file requires "path" and "content"');
      }
      return writeFileRequest(path, typeof content === 'string' ? content : String(content));
    }
    case 'plan': {
      const steps = record.steps;
      if (!Array.isArray(steps)) {
        throw new RequestParseError('plan requires "steps" as a list');
      }
      return planRequest(steps.map((step, index) => parsePlanStep(step, index + 1)));
    }
    default:
      throw new RequestParseError(`Unknown job kind: ${String(kind)}`);
  }
}

/**
 * Parse one plan step: { command }, { read_file }, or { write_file: { path, content } }.
 */
export function parsePlanStep(step: unknown, index: number): StepRequest {
  const record = asRecord(step, `Step ${index} is not an object`);

  if ('command' in record) {
    const request = parseJobPayload('command', record);
    if (request.kind !== 'command') throw new RequestParseError(`Step ${index} is not a command`);
    return request;
  }
  if ('read_file' in record) {
    const target = record.read_file;
    if (typeof target === 'string' && target !== '') return readFileRequest(target);
    const request = parseJobPayload('read_file', target);
    if (request.kind !== 'read_file') throw new RequestParseError(`Step ${index} is not a read`);
    return request;
  }
  if ('write_file' in record) {
    const payload = record.write_file;
    if (!isRecord(payload) || !('path' in payload) || !('content' in payload)) {
      throw new RequestParseError(`Step ${index}: write_file step needs {path, content}`);
    }
    const request = parseJobPayload('write_file', payload);
    if (request.kind !== 'write_file') throw new RequestParseError(`Step ${index} is not a write`);
    return request;
  }

  throw new RequestParseError(`Step ${index} is missing command/read_file/write_file`);
}

/**
 * Load a plan file: either a list of steps or an object with a "steps" list.
 * JSON and YAML are both accepted.
 */
export function loadPlanFile(filePath: string): PlanRequest {
  const content = fs.readFileSync(filePath, 'utf-8');
  let data: unknown;
  try {
    data = yamlParse(content);
  } catch (err) {
    throw new RequestParseError(`Cannot parse plan: ${(err as Error).message}`);
  }

  if (Array.isArray(data)) {
    return planRequest(data.map((step, index) => parsePlanStep(step, index + 1)));
  }
  if (isRecord(data) && Array.isArray(data.steps)) {
    return planRequest(data.steps.map((step, index) => parsePlanStep(step, index + 1)));
  }
  throw new RequestParseError("Plan must be a list or an object containing a 'steps' list");
}

/**
 * Serialise an ActionRequest into the job payload for its kind.
 */
export function toJobPayload(request: ActionRequest): Record<string, unknown> {
  switch (request.kind) {
    case 'command':
      return {
        command: request.source ?? [...request.argv],
        ...(request.cwd !== undefined ? { cwd: request.cwd } : {}),
      };
    case 'read_file':
      return { path: request.path };
    case 'write_file':
      return { path: request.path, content: request.content };
    case 'plan':
      return {
        steps: request.steps.map((step) => {
          switch (step.kind) {
            case 'command':
              return toJobPayload(step);
            case 'read_file':
              return { read_file: step.path };
            case 'write_file':
              return { write_file: { path: step.path, content: step.content } };
            case 'plan':
              throw new RequestParseError('Plans cannot be nested');
          }
        }),
      };
  }
}

/**
 * Closest request shape for a payload that failed to parse, so the refusal
 * can still be audited under its kind.
 */
export function standInRequest(kind: ActionKind, payload: unknown): ActionRequest {
  const raw = isRecord(payload) ? payload : {};
  const path = typeof raw.path === 'string' ? raw.path : '';
  switch (kind) {
    case 'command':
      return { kind: 'command', argv: [] };
    case 'read_file':
      return { kind: 'read_file', path };
    case 'write_file':
      return { kind: 'write_file', path, content: '' };
    case 'plan':
      return { kind: 'plan', steps: [] };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown, message: string): Record<string, unknown> {
  if (!isRecord(value)) throw new RequestParseError(message);
  return value;
}

function optionalString(value: unknown, message: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new RequestParseError(message);
  return value;
}
