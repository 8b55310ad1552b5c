/**
 * Core Types: ActionRequest, SafetyConfig, PolicyDecision, ExecutionResult
 *
 * An ActionRequest describes what a caller wants done.
 * A PolicyDecision is the policy engine's verdict: allow or deny.
 * An ExecutionResult is what the guarded executor reports back.
 * An AuditEvent is one line of the append-only audit log.
 */

export type ActionKind = 'command' | 'read_file' | 'write_file' | 'plan';

export interface CommandRequest {
  readonly kind: 'command';
  readonly argv: readonly string[];
  /** Working directory for the process; defaults to the runner's cwd. */
  readonly cwd?: string;
  /** Original command text when the argv was tokenized from a string. */
  readonly source?: string;
}

export interface ReadFileRequest {
  readonly kind: 'read_file';
  readonly path: string;
}

export interface WriteFileRequest {
  readonly kind: 'write_file';
  readonly path: string;
  readonly content: string;
}

export type StepRequest = CommandRequest | ReadFileRequest | WriteFileRequest;

export interface PlanRequest {
  readonly kind: 'plan';
  readonly steps: readonly ActionRequest[];
}

export type ActionRequest = StepRequest | PlanRequest;

export interface SafetyConfig {
  readonly allowedCommands: ReadonlySet<string>;
  readonly deniedCommands: ReadonlySet<string>;
  /** Absolute paths, in configured order. */
  readonly allowedRoots: readonly string[];
  readonly requireConfirmation: boolean;
  readonly commandTimeoutSeconds: number;
  readonly maxOutputBytes: number;
  readonly networkAccess: boolean;
  /** The only environment a spawned process receives. */
  readonly allowedEnv: Readonly<Record<string, string>>;
  readonly maxJobAttempts: number;
  readonly queuePath: string;
  readonly auditFile: string;
}

export type DenyReason =
  | 'NotAllowlisted'
  | 'Denylisted'
  | 'ShellOperatorPresent'
  | 'PathOutsideRoots'
  | 'MalformedRequest'
  | 'NetworkAccessDisabled';

export interface AllowDecision {
  decision: 'allow';
}

export interface DenyDecision {
  decision: 'deny';
  reason: DenyReason;
  detail: string;
  /** 1-based index of the plan step that caused the denial. */
  stepIndex?: number;
}

export type PolicyDecision = AllowDecision | DenyDecision;

export type ExecutionErrorKind = 'Timeout' | 'NonZeroExit' | 'OSSpawnFailure' | 'IOFailure';

export interface ExecutionResult {
  kind: ActionKind;
  ok: boolean;
  durationMs: number;
  truncated: boolean;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  stdout?: string;
  stderr?: string;
  content?: string;
  /** Bytes read (file size) or written (UTF-8 length). */
  bytes?: number;
  path?: string;
  error?: {
    kind: ExecutionErrorKind;
    message: string;
  };
  steps?: ExecutionResult[];
}

export type AuditStatus = 'attempted' | 'blocked' | 'skipped' | 'succeeded' | 'failed';

export interface AuditEvent {
  id: string;
  timestamp: string;
  action: ActionKind;
  payload: Record<string, unknown>;
  status: AuditStatus;
  reason?: string;
}

export const TRUNCATION_MARKER = '\n...[truncated]';
