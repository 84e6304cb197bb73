/**
 * Guildforge — src/lib/errors.ts
 * WHAT: Error taxonomy for the overhaul engine, leveling and the reaction panel,
 *       plus classification of raw discord.js failures into that taxonomy.
 * FLOWS:
 *  - classifyRemoteError(err, operation) → GuildforgeError (transient | permanent | passthrough)
 *  - isTransient(err) → boolean (worth retrying)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyRemoteError, isTransient } from "./errors.js";
 *  const classified = classifyRemoteError(err, "createRole");
 *  if (classified.kind === "permanent_remote" && classified.code === 50013) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

export interface ValidationIssue {
  /** Dotted path into the configuration, e.g. "categoryTemplates.1.channels.0.name" */
  path: string;
  message: string;
}

/**
 * Configuration violates an invariant. Raised before any remote call.
 */
export class ValidationError extends Error {
  readonly kind = "validation" as const;

  constructor(
    readonly issues: ValidationIssue[],
    message = `Invalid configuration: ${issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ")}`
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Rate limit, timeout or 5xx. Retried with backoff; only surfaces once retries run out.
 * retryAfterMs is the server-provided wait, when there was one.
 */
export class TransientRemoteError extends Error {
  readonly kind = "transient_remote" as const;

  constructor(
    readonly operation: string,
    message: string,
    readonly details: { retryAfterMs?: number; status?: number; code?: string | number; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = "TransientRemoteError";
  }

  get retryAfterMs(): number | undefined {
    return this.details.retryAfterMs;
  }
}

/**
 * Permission denial, conflicting resource or invalid payload. Never retried.
 */
export class PermanentRemoteError extends Error {
  readonly kind = "permanent_remote" as const;

  constructor(
    readonly operation: string,
    message: string,
    readonly details: { status?: number; code?: string | number; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = "PermanentRemoteError";
  }

  get code(): string | number | undefined {
    return this.details.code;
  }
}

/** Role add/remove failed while reconciling a tier change. Logged, never fails the XP write. */
export class ReconciliationError extends Error {
  readonly kind = "reconciliation" as const;

  constructor(
    readonly userId: string,
    readonly roleId: string,
    readonly action: "add" | "remove",
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "ReconciliationError";
  }
}

/** A second overhaul against a guild that already has one running. */
export class RunInProgressError extends Error {
  readonly kind = "run_in_progress" as const;

  constructor(readonly guildId: string) {
    super(`An overhaul is already running for guild ${guildId}`);
    this.name = "RunInProgressError";
  }
}

export type ConfirmationFailure = "missing" | "mismatch" | "expired";

export class ConfirmationError extends Error {
  readonly kind = "confirmation" as const;

  constructor(readonly reason: ConfirmationFailure) {
    super(
      reason === "expired"
        ? "Confirmation token expired; request a new one"
        : reason === "mismatch"
          ? "Confirmation token does not match this guild and configuration"
          : "Confirmation token is required"
    );
    this.name = "ConfirmationError";
  }
}

export type SelectionRejection =
  | "not_configured"
  | "disabled"
  | "everyone"
  | "managed"
  | "protected"
  | "hierarchy";

/** applySelection refused the role. No remote mutation happened. */
export class SelectionRejectedError extends Error {
  readonly kind = "selection_rejected" as const;

  constructor(
    readonly roleId: string,
    readonly reason: SelectionRejection,
    message: string
  ) {
    super(message);
    this.name = "SelectionRejectedError";
  }
}

/** Discriminated union of all error types */
export type GuildforgeError =
  | ValidationError
  | TransientRemoteError
  | PermanentRemoteError
  | ReconciliationError
  | RunInProgressError
  | ConfirmationError
  | SelectionRejectedError;

export function isGuildforgeError(err: unknown): err is GuildforgeError {
  return (
    err instanceof ValidationError ||
    err instanceof TransientRemoteError ||
    err instanceof PermanentRemoteError ||
    err instanceof ReconciliationError ||
    err instanceof RunInProgressError ||
    err instanceof ConfirmationError ||
    err instanceof SelectionRejectedError
  );
}

// ===== Error Classification =====

/**
 * Node.js libuv codes for connections that dropped or never reached Discord.
 * EAI_AGAIN is a transient DNS failure.
 */
const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function field(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

function numberField(source: object, key: string): number | undefined {
  const value = field(source, key);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Discord puts retry_after (seconds) in the 429 body. discord.js surfaces it
 * as rawError.retry_after on DiscordAPIError.
 */
function retryAfterFromBody(source: object): number | undefined {
  const rawError = field(source, "rawError");
  if (typeof rawError !== "object" || rawError === null) return undefined;
  const seconds = numberField(rawError, "retry_after");
  return seconds === undefined ? undefined : Math.ceil(seconds * 1000);
}

/**
 * Classify any caught error from a remote call.
 *
 * Ordered from most specific to least: our own errors pass through untouched,
 * then discord.js RateLimitError, then HTTP status, then network codes. Anything
 * left over is permanent: retrying an unknown failure against a rate-limited API
 * costs budget every other caller shares.
 */
export function classifyRemoteError(err: unknown, operation: string): GuildforgeError {
  if (isGuildforgeError(err)) return err;

  if (typeof err !== "object" || err === null) {
    return new PermanentRemoteError(operation, String(err ?? "Unknown error (null/undefined)"));
  }

  const nameValue = field(err, "name");
  const name = typeof nameValue === "string" ? nameValue : "";
  const messageValue = field(err, "message");
  const message = typeof messageValue === "string" && messageValue ? messageValue : String(err);
  const rawCode = field(err, "code");
  const code = typeof rawCode === "number" || typeof rawCode === "string" ? rawCode : undefined;
  const status = numberField(err, "status") ?? numberField(err, "httpStatus");

  // @discordjs/rest throws RateLimitError (name "RateLimitError[route]") when
  // rejectOnRateLimit is set; retryAfter is already in milliseconds.
  if (name.startsWith("RateLimitError")) {
    return new TransientRemoteError(operation, message, {
      retryAfterMs: numberField(err, "retryAfter") ?? numberField(err, "timeToReset"),
      status: 429,
      cause: err,
    });
  }

  if (status === 429) {
    return new TransientRemoteError(operation, message, {
      retryAfterMs: numberField(err, "retryAfterMs") ?? retryAfterFromBody(err),
      status,
      code,
      cause: err,
    });
  }

  if (status !== undefined && status >= 500 && status < 600) {
    return new TransientRemoteError(operation, message, { status, code, cause: err });
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return new TransientRemoteError(operation, message, { code, cause: err });
  }

  // The REST client aborts requests that exceed its timeout.
  if (name === "AbortError") {
    return new TransientRemoteError(operation, message, { code: "ABORTED", cause: err });
  }

  return new PermanentRemoteError(operation, message, { status, code, cause: err });
}

// ===== Error Predicates =====

export function isTransient(err: GuildforgeError): err is TransientRemoteError {
  return err.kind === "transient_remote";
}

/**
 * Discord codes that mean "the thing is gone or we're not allowed". They are
 * operational, not bugs.
 * - 10003 Unknown Channel, 10008 Unknown Message, 10011 Unknown Role
 * - 50001 Missing Access, 50013 Missing Permissions
 */
const QUIET_DISCORD_CODES = [10003, 10008, 10011, 50001, 50013];

/**
 * Check if error should be reported to Sentry.
 * Alerts should mean "something is broken", not "Discord rate limited us".
 */
export function shouldReportToSentry(err: GuildforgeError): boolean {
  switch (err.kind) {
    case "permanent_remote":
      return !(typeof err.code === "number" && QUIET_DISCORD_CODES.includes(err.code));

    case "transient_remote":
    case "validation":
    case "confirmation":
    case "selection_rejected":
    case "run_in_progress":
    case "reconciliation":
      return false;
  }
}

/**
 * Discord "unknown resource" codes. Used to detect a deleted panel message or channel.
 */
export function isUnknownResource(err: GuildforgeError): boolean {
  return err.kind === "permanent_remote" && (err.code === 10003 || err.code === 10008 || err.details.status === 404);
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: GuildforgeError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "transient_remote":
      return {
        ...base,
        operation: err.operation,
        httpStatus: err.details.status,
        retryAfterMs: err.retryAfterMs,
      };

    case "permanent_remote":
      return {
        ...base,
        operation: err.operation,
        discordCode: err.code,
        httpStatus: err.details.status,
      };

    case "validation":
      return { ...base, issues: err.issues };

    case "reconciliation":
      return { ...base, userId: err.userId, roleId: err.roleId, action: err.action };

    case "selection_rejected":
      return { ...base, roleId: err.roleId, reason: err.reason };

    default:
      return base;
  }
}

/**
 * Get a user-friendly error message for the status artifact
 */
export function userFriendlyMessage(err: GuildforgeError): string {
  switch (err.kind) {
    case "permanent_remote":
      if (err.code === 50013) {
        return `I don't have permission to do that (${err.operation}).`;
      }
      if (err.code === 30005) {
        return "This server has reached the maximum number of roles.";
      }
      if (err.code === 30013) {
        return "This server has reached the maximum number of channels.";
      }
      return err.message;

    case "transient_remote":
      return `Discord kept failing on ${err.operation}: ${err.message}`;

    case "validation":
      return err.issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("\n");

    default:
      return err.message;
  }
}
