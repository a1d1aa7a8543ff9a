export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The `code` of a Node system error, undici error or abort, if it carries one. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A broken internal invariant. Never counted as an item failure. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export class TaskFaultError extends Error {
  constructor(label: string, cause: unknown) {
    super(`download task for ${label} faulted: ${errorMessage(cause)}`, { cause });
    this.name = "TaskFaultError";
  }
}

export class RunAbortedError extends Error {
  constructor(reason?: unknown) {
    super(reason === undefined ? "download run aborted" : `download run aborted: ${errorMessage(reason)}`);
    this.name = "RunAbortedError";
  }
}
