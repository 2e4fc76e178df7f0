// lib/education/errors.ts

/** Catalog or settings problem. There is no safe schema to assume, so callers let it propagate. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** The warehouse rejected or failed to run a query. */
export class WarehouseError extends Error {
  readonly sql: string;

  constructor(message: string, sql: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WarehouseError";
    this.sql = sql;
  }
}

/** Request parameter that cannot be turned into a metric, state or year. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}
