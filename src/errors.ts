// src/errors.ts

/** Base for every failure a handler turns into a user-facing message. */
export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Missing file, missing title, oversized upload. Shown inline on the form. */
export class ValidationError extends AppError {
  constructor(message: string, status = 400) {
    super(message, status);
  }
}

/** A report link whose analysis is no longer stored. */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** The server cannot call the model at all (no API key). */
export class ConfigurationError extends AppError {
  readonly hint: string;

  constructor(message: string, hint: string) {
    super(message, 500);
    this.hint = hint;
  }
}

/** The model call itself failed: network, auth, rate limit, empty reply. */
export class UpstreamError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 502, options);
  }
}

/** The model reply has its numbered headings out of order. */
export class MalformedResponseError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}

export function errorMessage(e: unknown): string {
  return e && typeof e === "object" && "message" in e ? String(e.message) : String(e);
}

export function statusOf(e: unknown): number {
  return e instanceof AppError ? e.status : 500;
}

/** Message shown to the person who submitted the paper. */
export function userMessage(e: unknown): string {
  if (e instanceof ConfigurationError) return `${e.message} ${e.hint}`;
  if (e instanceof UpstreamError) {
    return `Analysis failed. Check your API key or try a different paper. (${e.message})`;
  }
  if (e instanceof AppError) return e.message;
  return `Something went wrong while analyzing the paper: ${errorMessage(e)}`;
}
