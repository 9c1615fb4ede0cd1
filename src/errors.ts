// Typed failures surfaced by the fetcher and the normalizer.

export class TransportFailure extends Error {
  readonly kind = "transport" as const;

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportFailure";
  }
}

export class DecodeFailure extends Error {
  readonly kind = "decode" as const;

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DecodeFailure";
  }
}

export class MissingRequiredFieldError extends Error {
  readonly kind = "missing-field" as const;

  constructor(readonly field: string) {
    super(`Required field missing: ${field}`);
    this.name = "MissingRequiredFieldError";
  }
}

export type FetchFailure =
  | TransportFailure
  | DecodeFailure
  | MissingRequiredFieldError;

export type FetchResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FetchFailure };

export const ok = <T>(value: T): FetchResult<T> => ({ ok: true, value });

export const fail = <T = never>(error: FetchFailure): FetchResult<T> => ({
  ok: false,
  error,
});

export function isFetchFailure(e: unknown): e is FetchFailure {
  return (
    e instanceof TransportFailure ||
    e instanceof DecodeFailure ||
    e instanceof MissingRequiredFieldError
  );
}
