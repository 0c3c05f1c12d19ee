export class ConfigurationError extends Error {
  constructor(readonly fields: string[]) {
    super(
      `Missing or invalid configuration: ${fields.join(", ")}. ` +
        "Set these in your .env file or environment variables.",
    );
    this.name = "ConfigurationError";
  }
}

export interface WriteProgress {
  batchesWritten: number;
  rowsWritten: number;
  rowsPending: number;
}

/** A destination write failed after retries; rows after `rowsWritten` were never persisted. */
export class PersistenceError extends Error {
  constructor(
    readonly progress: WriteProgress,
    cause: unknown,
  ) {
    super(
      `Failed to write results after ${progress.batchesWritten} batch(es); ${progress.rowsPending} row(s) not written`,
      { cause },
    );
    this.name = "PersistenceError";
  }
}
