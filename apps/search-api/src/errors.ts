import type { SourceDiagnostic } from "@dealfinder/shared";

export interface ValidationIssue {
  path: Array<string | number>;
  message: string;
}

/**
 * Request rejected before any retrieval work.
 */
export class SearchValidationError extends Error {
  readonly code = "invalid_request";

  constructor(readonly issues: ValidationIssue[]) {
    super(
      `Invalid search request: ${issues
        .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
        .join("; ")}`
    );
    this.name = "SearchValidationError";
  }
}

/**
 * Every selected store failed, timed out, or none serves the region.
 */
export class NoSourcesAvailableError extends Error {
  readonly code = "no_sources_available";

  constructor(
    readonly region: string,
    readonly diagnostics: SourceDiagnostic[]
  ) {
    super(NoSourcesAvailableError.describe(region, diagnostics));
    this.name = "NoSourcesAvailableError";
  }

  private static describe(region: string, diagnostics: SourceDiagnostic[]): string {
    if (diagnostics.length === 0) {
      return `No sources available for region "${region}"`;
    }
    const detail = diagnostics
      .map((d) => `${d.source}: ${d.status}${d.errorKind ? ` (${d.errorKind})` : ""}`)
      .join(", ");
    return `No sources available: all ${diagnostics.length} sources failed for region "${region}" [${detail}]`;
  }
}

export type AdapterErrorKind =
  | "network"
  | "timeout"
  | "rate_limited"
  | "blocked"
  | "http"
  | "parse"
  | "aborted";

const RETRYABLE_KINDS: ReadonlySet<AdapterErrorKind> = new Set(["network", "rate_limited", "http"]);

/**
 * Uniform failure signal for a store adapter call.
 */
export class AdapterError extends Error {
  readonly retryable: boolean;

  constructor(
    readonly source: string,
    readonly kind: AdapterErrorKind,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown; retryable?: boolean }
  ) {
    super(`[${source}] ${message}`, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AdapterError";
    this.retryable =
      options?.retryable ?? (RETRYABLE_KINDS.has(kind) && (status === undefined || status === 429 || status >= 500));
  }

  static from(source: string, error: unknown): AdapterError {
    if (error instanceof AdapterError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new AdapterError(source, "parse", message, undefined, { cause: error, retryable: false });
  }
}

/**
 * Natural-language interpretation failed; always recovered inside the interpreter.
 */
export class InterpretationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "InterpretationError";
  }
}
