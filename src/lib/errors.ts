import type { Dataset } from "../types";

export type LoadErrorKind = "schema" | "parse" | "network" | "unsupported";

export abstract class LoadError extends Error {
  abstract readonly kind: LoadErrorKind;
}

/** A required sheet or column is absent. `missing` lists every absent piece. */
export class SchemaError extends LoadError {
  readonly kind = "schema";
  readonly missing: string[];

  constructor(missing: string[], message?: string) {
    super(message ?? `Missing sections: ${missing.join(", ")}`);
    this.name = "SchemaError";
    this.missing = missing;
  }
}

export class ParseError extends LoadError {
  readonly kind = "parse";

  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class NetworkError extends LoadError {
  readonly kind = "network";
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "NetworkError";
    this.status = status;
  }
}

export class UnsupportedSourceError extends LoadError {
  readonly kind = "unsupported";

  constructor(message: string) {
    super(message);
    this.name = "UnsupportedSourceError";
  }
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type LoadResult = { ok: true; dataset: Dataset } | { ok: false; error: LoadError };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
