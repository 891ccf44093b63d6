import type { SearchState } from "./types.js";

export type NbpilotErrorCode =
  | "LOCK_TIMEOUT"
  | "LOCK_REENTRANT"
  | "PROFILE_BOOTSTRAP_FAILED"
  | "PROBE_NOT_FOUND"
  | "PRECONDITION_VIOLATION"
  | "INVALID_CONFIG"
  | "SIGN_IN_REQUIRED";

export class NbpilotError extends Error {
  readonly code: NbpilotErrorCode;
  /** Fatal errors end the session; the rest are local to one workflow. */
  readonly fatal: boolean;

  constructor(code: NbpilotErrorCode, message: string, options: { fatal?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.fatal = options.fatal ?? false;
  }
}

export class LockTimeoutError extends NbpilotError {
  constructor(
    readonly lockPath: string,
    readonly timeoutMs: number,
    readonly holderPid?: number
  ) {
    const holder = typeof holderPid === "number" ? ` (held by pid ${holderPid})` : "";
    super(
      "LOCK_TIMEOUT",
      `Another session holds ${lockPath}${holder}; gave up after ${timeoutMs}ms`,
      { fatal: true }
    );
  }
}

export class LockReentrancyError extends NbpilotError {
  constructor(readonly lockPath: string) {
    super("LOCK_REENTRANT", `Lock ${lockPath} is already held by this lock manager`, { fatal: true });
  }
}

export class ProfileBootstrapError extends NbpilotError {
  constructor(
    readonly profilePath: string,
    readonly templatePath: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      "PROFILE_BOOTSTRAP_FAILED",
      `Could not bootstrap profile ${profilePath} from ${templatePath}: ${detail}`,
      { fatal: true, cause }
    );
  }
}

export class ProbeNotFoundError extends NbpilotError {
  constructor(
    readonly chainName: string,
    readonly probeLabels: string[]
  ) {
    const tried = probeLabels.map((label) => `- ${label}`).join("\n");
    super("PROBE_NOT_FOUND", [`No visible element for probe chain '${chainName}'. Tried:`, tried].join("\n"));
  }
}

export class PreconditionViolationError extends NbpilotError {
  constructor(
    readonly operation: string,
    readonly state: SearchState,
    hint?: string
  ) {
    super(
      "PRECONDITION_VIOLATION",
      `Cannot ${operation} while search state is ${state}${hint ? `; ${hint}` : ""}`
    );
  }
}

export class ConfigError extends NbpilotError {
  constructor(message: string, cause?: unknown) {
    super("INVALID_CONFIG", message, { fatal: true, cause });
  }
}

export class SignInRequiredError extends NbpilotError {
  constructor(readonly url: string) {
    super("SIGN_IN_REQUIRED", `Still on the sign-in page (${url}); run 'nbpilot login' and sign in first`, {
      fatal: true
    });
  }
}

export function isNbpilotError(error: unknown): error is NbpilotError {
  return error instanceof NbpilotError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
