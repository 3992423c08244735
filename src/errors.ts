/**
 * Errors raised while syncing. Anything thrown outside a single repository's
 * pipeline aborts the run; the CLI prints `message` followed by `hint`.
 */
export class SyncError extends Error {
  readonly hint?: string;

  constructor(message: string, options?: { hint?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.hint = options?.hint;
  }
}

export class ConfigError extends SyncError {}

export class MissingDependencyError extends SyncError {}

export class AuthenticationError extends SyncError {}

export class SourceUnavailableError extends SyncError {}

export class NamespaceError extends SyncError {}

export class DestinationUnavailableError extends SyncError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; hint?: string; cause?: unknown }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class CreationError extends SyncError {}

export class MirrorError extends SyncError {}

/**
 * Whether the error ends the run. Creation and mirror failures belong to a
 * single repository and are recorded as its outcome instead.
 */
export function isFatal(error: unknown): error is SyncError {
  return error instanceof SyncError && !(error instanceof CreationError || error instanceof MirrorError);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP status carried by an Octokit `RequestError` or a `DestinationUnavailableError`.
 */
export function statusOf(error: unknown): number | undefined {
  if (error instanceof DestinationUnavailableError) {
    return error.status;
  }
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}
