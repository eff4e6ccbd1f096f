/**
 * Error taxonomy shared by the git wrapper, the effect engine and the CLI.
 * Every error carries a stable `code` so reports and JSON output can match on it.
 */

export type ErrorCode =
  | "GIT_OPERATION"
  | "EFFECT_CRITICAL"
  | "EFFECT_RECOVERABLE"
  | "EFFECT_WARNING"
  | "HOOK_EXIT"
  | "HOOK_TIMEOUT"
  | "LOCK_ACQUISITION"
  | "CONFIG"
  | "NOT_FOUND";

export class WtxError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** git itself failed; no effect phase runs after this. */
export class GitOperationError extends WtxError {
  readonly args: string[];
  readonly stderr: string;

  constructor(args: string[], stderr: string, options?: {cause?: unknown}) {
    const detail = stderr.trim() || "unknown error";
    super("GIT_OPERATION", `git ${args.join(" ")} failed: ${detail}`, options);
    this.args = args;
    this.stderr = stderr;
  }
}

export class EffectCriticalError extends WtxError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("EFFECT_CRITICAL", message, options);
  }
}

/**
 * Raised inside an effect when its primary strategy failed but a fallback may
 * still succeed. It never leaves the effect that raised it.
 */
export class EffectRecoverableError extends WtxError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("EFFECT_RECOVERABLE", message, options);
  }
}

export class EffectWarning extends WtxError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("EFFECT_WARNING", message, options);
  }
}

export class HookExitError extends WtxError {
  readonly exitCode: number | undefined;
  readonly stderr: string;

  constructor(command: string, exitCode: number | undefined, stderr: string) {
    const status = exitCode === undefined ? "was terminated" : `exited with code ${exitCode}`;
    super("HOOK_EXIT", `Hook \`${command}\` ${status}`);
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class TimeoutError extends WtxError {
  readonly timeoutSeconds: number;

  constructor(command: string, timeoutSeconds: number) {
    super("HOOK_TIMEOUT", `Hook \`${command}\` timed out after ${timeoutSeconds}s`);
    this.timeoutSeconds = timeoutSeconds;
  }
}

export class LockAcquisitionError extends WtxError {
  readonly lockPath: string;
  readonly holderPid: number | undefined;

  constructor(lockPath: string, holderPid: number | undefined, message?: string) {
    super(
      "LOCK_ACQUISITION",
      message ??
        `Another wtx process${holderPid === undefined ? "" : ` (PID ${holderPid})`} holds the repository lock at ${lockPath}`
    );
    this.lockPath = lockPath;
    this.holderPid = holderPid;
  }
}

export class ConfigError extends WtxError {
  readonly path: string | undefined;

  constructor(message: string, path?: string, options?: {cause?: unknown}) {
    super("CONFIG", path ? `${message} (${path})` : message, options);
    this.path = path;
  }
}

export class NotFoundError extends WtxError {
  constructor(resource: string, name: string) {
    super("NOT_FOUND", `${resource} not found: ${name}`);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
