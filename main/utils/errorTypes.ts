export class LeaderError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class FileSystemError extends LeaderError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

export class ConfigError extends LeaderError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * The config file is not valid JSON or does not have the shape of an action
 * tree. `nodePath` names the offending node, e.g. `root.actions[2].actions[0]`.
 */
export class ConfigDecodeError extends ConfigError {
  constructor(
    message: string,
    public readonly nodePath: string,
    cause?: Error
  ) {
    super(message, { nodePath }, cause);
  }
}

export class ConfigWriteError extends FileSystemError {
  constructor(filePath: string, cause?: Error) {
    super("Failed to write config file", { filePath }, cause);
  }
}

export class ProcessError extends LeaderError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

export function isLeaderError(error: unknown): error is LeaderError {
  return error instanceof LeaderError;
}

function errnoCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object" || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

export function isPermissionError(error: unknown): boolean {
  const code = errnoCode(error);
  return code === "EACCES" || code === "EPERM";
}

export function isNotFoundError(error: unknown): boolean {
  return errnoCode(error) === "ENOENT";
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function getUserMessage(error: unknown): string {
  if (isLeaderError(error)) {
    return error.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Handles circular references safely to prevent infinite recursion
 */
export function getErrorDetails(
  error: unknown,
  seen = new WeakSet<Error>()
): Record<string, unknown> {
  const details: Record<string, unknown> = {
    message: getUserMessage(error),
  };

  if (error instanceof Error) {
    details.name = error.name;
    details.stack = error.stack;
  }

  if (isLeaderError(error)) {
    details.context = error.context;
    if (error.cause && !seen.has(error.cause)) {
      seen.add(error.cause);
      details.cause = getErrorDetails(error.cause, seen);
    }
  }

  if (error && typeof error === "object") {
    const code = errnoCode(error);
    if (code) details.code = code;
    if ("errno" in error && typeof error.errno === "number") details.errno = error.errno;
    if ("syscall" in error && typeof error.syscall === "string") details.syscall = error.syscall;
    if ("path" in error && typeof error.path === "string") details.path = error.path;
  }

  return details;
}
