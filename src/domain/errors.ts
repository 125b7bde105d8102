/**
 * Error taxonomy shared by the ingestion and search paths.
 *
 * - input errors are rejected synchronously and never retried
 * - transient errors are retried by {@link withRetry} until the policy is exhausted
 * - content errors skip a single file inside an ingestion job
 * - everything else is fatal to the operation that raised it
 */

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export class TransientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientError";
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly operation: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(
      `${operation} failed after ${attempts} attempt(s): ${describeError(options?.cause)}`,
      options,
    );
    this.name = "RetryExhaustedError";
  }
}

export class DocumentNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`Not found in document store: ${path || "/"}`);
    this.name = "DocumentNotFoundError";
  }
}

export class UnauthorizedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnauthorizedError";
  }
}

export class UnsupportedFormatError extends Error {
  constructor(readonly extension: string, supported: string[]) {
    super(
      `Unsupported extension: ${extension || "(none)"}. Allowed: ${supported.join(", ")}`,
    );
    this.name = "UnsupportedFormatError";
  }
}

export class CorruptContentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorruptContentError";
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Ingestion job not found: ${jobId}`);
    this.name = "JobNotFoundError";
  }
}

export class IndexedDocumentNotFoundError extends Error {
  constructor(readonly reference: string) {
    super(`Indexed document not found: ${reference}`);
    this.name = "IndexedDocumentNotFoundError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(readonly from: string, readonly to: string) {
    super(`Invalid ingestion job transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

const TRANSIENT_NODE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EBUSY",
  "EMFILE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const code = readErrorCode(error);
  if (code) {
    if (TRANSIENT_NODE_CODES.has(code)) {
      return true;
    }
    // Postgres: connection exceptions, operator intervention, too many connections.
    if (/^08[0-9A-Z]{3}$/.test(code) || /^57P0[1-3]$/.test(code) || code === "53300") {
      return true;
    }
  }

  // fetch() wraps socket failures in a TypeError whose cause carries the code.
  if (error.name === "TypeError" && error.message === "fetch failed") {
    return true;
  }
  return error.cause !== undefined && error.cause !== error && isTransientError(error.cause);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return error === undefined ? "unknown error" : String(error);
}

function readErrorCode(error: Error): string | null {
  if (!("code" in error)) {
    return null;
  }
  return typeof error.code === "string" ? error.code : null;
}
