export type FetchErrorKind = "timeout" | "exhausted" | "circuit_open" | "invalid_response";

export class FetchError extends Error {
  name = "FetchError";

  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    readonly source?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NormalizeError extends Error {
  name = "NormalizeError";
  readonly kind = "missing_required_field";

  constructor(readonly field: string, readonly source: string) {
    super(`Record from ${source} is missing required field "${field}"`);
  }
}

export type StoreErrorKind = "unavailable" | "conflict";

export class StoreError extends Error {
  name = "StoreError";

  constructor(
    readonly kind: StoreErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ScheduleError extends Error {
  name = "ScheduleError";
  readonly kind = "recompute_failed";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
