/**
 * Error taxonomy for the engine.
 *
 * An undefined metric is not an error: ratios with a zero or negative
 * denominator are reported as `null`.
 */

/** Malformed position or snapshot data. Rejected per item, never aborts a cycle. */
export class InvalidInputError extends Error {
  readonly field: string;
  readonly asset?: string;

  constructor(message: string, field: string, asset?: string) {
    super(message);
    this.name = "InvalidInputError";
    this.field = field;
    this.asset = asset;
  }
}

export type PersistenceOperation = "insert" | "upsert" | "select";

/** Store unreachable or write rejected. Eligible for retry on the next cycle. */
export class PersistenceError extends Error {
  readonly table: string;
  readonly operation: PersistenceOperation;
  /** The metrics row of a tick was stored but its position rows were not. */
  readonly partial: boolean;

  constructor(
    message: string,
    table: string,
    operation: PersistenceOperation,
    options: { partial?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "PersistenceError";
    this.table = table;
    this.operation = operation;
    this.partial = options.partial ?? false;
  }
}

/** Snapshot older than the freshness bound. Flagged, computation still runs. */
export class StaleDataError extends Error {
  readonly ageMs: number;
  readonly maxAgeMs: number;

  constructor(ageMs: number, maxAgeMs: number) {
    super(
      `Snapshot is ${(ageMs / 1000).toFixed(1)}s old (limit ${(maxAgeMs / 1000).toFixed(1)}s)`
    );
    this.name = "StaleDataError";
    this.ageMs = ageMs;
    this.maxAgeMs = maxAgeMs;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
