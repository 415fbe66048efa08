export type ExtractionErrorKind = "path_not_found" | "probe_invocation_failed";

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;

  constructor(kind: ExtractionErrorKind, message: string) {
    super(message);
    this.name = "ExtractionError";
    this.kind = kind;
  }
}

export class PathNotFoundError extends ExtractionError {
  readonly path: string;

  constructor(path: string) {
    super("path_not_found", "File does not exist");
    this.name = "PathNotFoundError";
    this.path = path;
  }
}

export class ProbeInvocationError extends ExtractionError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("probe_invocation_failed", `Failed to run ${command}: ${reason}`);
    this.name = "ProbeInvocationError";
    this.command = command;
  }
}
