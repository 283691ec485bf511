/**
 * Error types for the GP pipeline.
 *
 * Data-shape problems are not errors here: the estimate schema recovers them
 * with defaults and records an issue. Of the classes below, only
 * ConfigurationError aborts a batch run; the others are caught per RO / per day
 * and reported in the run summary.
 */

export class UpstreamFetchError extends Error {
  readonly status: number | null;
  readonly path: string;

  constructor(path: string, status: number | null, message: string) {
    super(message);
    this.name = "UpstreamFetchError";
    this.path = path;
    this.status = status;
  }
}

export class PersistenceError extends Error {
  readonly table: string;
  readonly operation: "select" | "insert" | "upsert";

  constructor(table: string, operation: PersistenceError["operation"], message: string) {
    super(`${table} ${operation} failed: ${message}`);
    this.name = "PersistenceError";
    this.table = table;
    this.operation = operation;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ShopNotFoundError extends ConfigurationError {
  readonly shopId: number | string;

  constructor(shopId: number | string) {
    super(`Shop ${shopId} not found`);
    this.name = "ShopNotFoundError";
    this.shopId = shopId;
  }
}

export function errorMessage(e: unknown, fallback = "Unknown error"): string {
  return e instanceof Error ? e.message : fallback;
}
