/**
 * Store-layer failures. Record-level rejects and flags are returned as data
 * (BatchDecision) and never thrown; only these propagate.
 */

export class DuplicateJobError extends Error {
  constructor(readonly externalId: string) {
    super(`Job ${externalId} already exists`);
    this.name = "DuplicateJobError";
  }
}

/** A write failed after its retry. Scoped to one record; the batch continues. */
export class TransactionFailure extends Error {
  constructor(
    readonly externalId: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`Transaction for job ${externalId} failed after ${attempts} attempt(s): ${describeError(options?.cause)}`, options);
    this.name = "TransactionFailure";
  }
}

/** The store is unreachable. Aborts the rest of the batch. */
export class FatalStoreFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalStoreFailure";
  }
}

const CONNECTIVITY_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "57P01", // admin_shutdown
  "57P02", // crash_shutdown
  "57P03", // cannot_connect_now
]);

function errorCode(err: unknown): string | null {
  if (typeof err !== "object" || err === null || !("code" in err)) return null;
  return typeof err.code === "string" ? err.code : null;
}

/** True for socket-level errors and SQLSTATE class 08 (connection exception). */
export function isConnectivityError(err: unknown): boolean {
  if (err instanceof FatalStoreFailure) return true;
  const code = errorCode(err);
  if (code && (CONNECTIVITY_CODES.has(code) || code.startsWith("08"))) return true;
  return err instanceof Error && /connection terminated|connection refused|not queryable/i.test(err.message);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
