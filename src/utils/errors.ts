/**
 * Error taxonomy
 *
 * Run-level errors (DiscoveryError, CorruptStateError) abort a run before
 * any work starts. Item-level errors carry a FailureKind that the retry
 * policy acts on.
 */

import { ZodError } from "zod";
import type { FailureKind } from "../types";

// ============================================================================
// Item-level errors
// ============================================================================

interface ItemErrorOptions {
  cause?: unknown;
  status?: number;
}

export class ItemError extends Error {
  readonly kind: FailureKind;
  readonly status?: number;

  constructor(kind: FailureKind, message: string, options: ItemErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ItemError";
    this.kind = kind;
    this.status = options.status;
  }
}

export class TransientError extends ItemError {
  constructor(message: string, options: ItemErrorOptions = {}) {
    super("transient", message, options);
    this.name = "TransientError";
  }
}

export class PermanentError extends ItemError {
  constructor(message: string, options: ItemErrorOptions = {}) {
    super("permanent", message, options);
    this.name = "PermanentError";
  }
}

export class RateLimitedError extends ItemError {
  readonly retryAfterMs?: number;

  constructor(message: string, options: ItemErrorOptions & { retryAfterMs?: number } = {}) {
    super("rate-limited", message, { ...options, status: options.status ?? 429 });
    this.name = "RateLimitedError";
    this.retryAfterMs = options.retryAfterMs;
  }
}

// ============================================================================
// Run-level errors
// ============================================================================

export class DiscoveryError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "DiscoveryError";
  }
}

export class CorruptStateError extends Error {
  readonly path: string;

  constructor(path: string, details: string, options: { cause?: unknown } = {}) {
    super(`State file ${path} is corrupt: ${details}. Fix or move it away manually; it was left untouched.`, options);
    this.name = "CorruptStateError";
    this.path = path;
  }
}

export class CancelledError extends Error {
  constructor(message = "Export cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

// ============================================================================
// Classification
// ============================================================================

// File-system codes that retrying cannot fix
const PERMANENT_FS_CODES = new Set(["ENOENT", "ENOTDIR", "EISDIR", "ENAMETOOLONG"]);

function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map any thrown value to the failure kind the retry policy understands
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof ItemError) {
    return error.kind;
  }
  if (error instanceof ZodError || error instanceof SyntaxError) {
    return "permanent";
  }
  if (error instanceof Error) {
    const code = errorCode(error);
    if (code && PERMANENT_FS_CODES.has(code)) {
      return "permanent";
    }
  }
  // Network failures, timeouts, aborts, disk pressure and the unknown
  return "transient";
}

export function retryAfterOf(error: unknown): number | undefined {
  return error instanceof RateLimitedError ? error.retryAfterMs : undefined;
}

export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.map(String).join(".") || "value"}: ${issue.message}`).join("; ");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
