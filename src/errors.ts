export type SandboxErrorKind =
  | "InvalidPath"
  | "PathEscapesRoot"
  | "IoError"
  | "NotADirectory"
  | "InvalidArgument";

export class SandboxError extends Error {
  readonly kind: SandboxErrorKind;
  readonly path?: string;

  constructor(
    message: string,
    options: { kind: SandboxErrorKind; path?: string; cause?: Error },
  ) {
    super(message, { cause: options.cause });
    this.name = "SandboxError";
    this.kind = options.kind;
    this.path = options.path;
  }
}

export class InvalidPathError extends SandboxError {
  constructor(message: string, options: { path: string }) {
    super(message, { kind: "InvalidPath", path: options.path });
    this.name = "InvalidPathError";
  }
}

export class PathEscapesRootError extends SandboxError {
  constructor(message: string, options: { path: string }) {
    super(message, { kind: "PathEscapesRoot", path: options.path });
    this.name = "PathEscapesRootError";
  }
}

export class SandboxIoError extends SandboxError {
  /** Platform error code such as `ENOENT`, when the failure carried one. */
  readonly code?: string;

  constructor(
    message: string,
    options: { path?: string; code?: string; cause?: Error },
  ) {
    super(message, { kind: "IoError", path: options.path, cause: options.cause });
    this.name = "SandboxIoError";
    this.code = options.code;
  }
}

export class NotADirectoryError extends SandboxError {
  constructor(message: string, options: { path: string }) {
    super(message, { kind: "NotADirectory", path: options.path });
    this.name = "NotADirectoryError";
  }
}

export class InvalidArgumentError extends SandboxError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, { kind: "InvalidArgument", cause: options?.cause });
    this.name = "InvalidArgumentError";
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Wraps a thrown platform error as a `SandboxIoError` whose message is
 * `"<context>: <platform message>"`.
 */
export function toIoError(
  context: string,
  err: unknown,
  path?: string,
): SandboxIoError {
  const cause = err instanceof Error ? err : new Error(String(err));
  return new SandboxIoError(`${context}: ${cause.message}`, {
    path,
    code: errnoCode(err),
    cause,
  });
}
