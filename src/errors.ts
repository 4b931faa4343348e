export type BridgeErrorCode =
  | "invalid_path"
  | "not_found"
  | "forbidden"
  | "lock_timeout"
  | "integration_failed"
  | "publish_failed"
  | "bootstrap_failed"
  | "io_failed";

/**
 * Base class for every failure the bridge reports to a caller. `status` is the
 * HTTP status the facade answers with.
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: BridgeErrorCode,
    public readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BridgeError";
  }
}

export class InvalidPathError extends BridgeError {
  constructor(
    message: string,
    public readonly rawPath: string,
  ) {
    super(message, "invalid_path", 400);
    this.name = "InvalidPathError";
  }
}

export class NotFoundError extends BridgeError {
  constructor(message: string) {
    super(message, "not_found", 404);
    this.name = "NotFoundError";
  }
}

export class ForbiddenError extends BridgeError {
  constructor(message: string) {
    super(message, "forbidden", 403);
    this.name = "ForbiddenError";
  }
}

export class LockTimeoutError extends BridgeError {
  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `Could not acquire repository lock within ${timeoutMs}ms`,
      "lock_timeout",
      500,
    );
    this.name = "LockTimeoutError";
  }
}

export class IntegrationError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "integration_failed", 500, options);
    this.name = "IntegrationError";
  }
}

export class PublishError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "publish_failed", 500, options);
    this.name = "PublishError";
  }
}

export class BootstrapError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "bootstrap_failed", 500, options);
    this.name = "BootstrapError";
  }
}

export class IoError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "io_failed", 500, options);
    this.name = "IoError";
  }
}

/** A git invocation that exited non-zero or was killed by its timeout. */
export class GitCommandError extends Error {
  constructor(
    public readonly args: string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly timedOut: boolean,
  ) {
    const detail = timedOut
      ? "timed out"
      : `exited with ${exitCode ?? "unknown status"}`;
    const tail = stderr.trim() ? `: ${stderr.trim()}` : "";
    super(`git ${args.join(" ")} ${detail}${tail}`);
    this.name = "GitCommandError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
