export type RunnerErrorCode =
  | "admission"
  | "not_found"
  | "conflict"
  | "launch"
  | "parse"
  | "connector_not_found"
  | "connector_unavailable"
  | "config";

export class RunnerError extends Error {
  readonly code: RunnerErrorCode;

  constructor(code: RunnerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The concurrency ceiling is reached. Retry later. */
export class AdmissionError extends RunnerError {
  constructor(readonly active: number, readonly limit: number) {
    super("admission", `too many concurrent jobs (${active}/${limit})`);
  }
}

export class NotFoundError extends RunnerError {
  constructor(readonly id: string) {
    super("not_found", `job not found: ${id}`);
  }
}

export class ConflictError extends RunnerError {
  constructor(message: string) {
    super("conflict", message);
  }
}

export class LaunchError extends RunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("launch", message, options);
  }
}

export class ParseError extends RunnerError {
  constructor(readonly line: string, options?: { cause?: unknown }) {
    super("parse", `failed to parse line: ${errorMessage(options?.cause)}`, options);
  }
}

export class ConnectorNotFoundError extends RunnerError {
  constructor(readonly connector: string) {
    super("connector_not_found", `connector '${connector}' not found`);
  }
}

export class ConnectorUnavailableError extends RunnerError {
  constructor(readonly connector: string) {
    super("connector_unavailable", `connector '${connector}' is unavailable`);
  }
}

export class ConfigError extends RunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
