// src/errors.ts

/**
 * Base class for every failure that aborts a generation run.
 */
export class SeederError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownTableError extends SeederError {
  constructor(
    readonly token: string,
    readonly validTables: readonly string[],
  ) {
    super(
      `Unknown table '${token}'. Available tables: ${validTables.join(", ")}`,
    );
  }
}

export class InvalidTableSpecError extends SeederError {
  constructor(
    readonly token: string,
    reason: string,
  ) {
    super(`Invalid table spec '${token}': ${reason}`);
  }
}

export class CycleError extends SeederError {
  constructor(readonly remaining: readonly string[]) {
    super(
      `Circular dependency detected involving tables: ${remaining.join(", ")}`,
    );
  }
}

/** A required table has no rows in this run and none in the store. */
export class MissingPrerequisiteError extends SeederError {
  constructor(
    readonly table: string,
    readonly requiredBy: string,
  ) {
    super(
      `No ${table} found (required by ${requiredBy}). Generate ${table} first or drop --no-deps.`,
    );
  }
}

export class UniquenessExhaustedError extends SeederError {
  constructor(
    readonly table: string,
    readonly column: string,
    detail: string,
  ) {
    super(`Could not find a unique ${table}.${column}: ${detail}`);
  }
}
