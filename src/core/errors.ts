// ---------------------------------------------------------------------------
// Error hierarchy for the Alma API governor.
// ---------------------------------------------------------------------------

import type { ApiArea, Environment, Permission } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all governor errors.
 */
export class AlmaClientError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AlmaClientError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Startup errors ──────────────────────────────────────────────────────────

/** The credential file or a configuration value is missing or invalid. */
export class ConfigurationError extends AlmaClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

// ── Credential errors ───────────────────────────────────────────────────────

/** No API key matches the requested zone, environment, area and permission. */
export class CredentialNotFoundError extends AlmaClientError {
  public readonly zone: string;
  public readonly environment: Environment;
  public readonly area: ApiArea;
  public readonly permission: Permission;

  constructor(
    zone: string,
    environment: Environment,
    area: ApiArea,
    permission: Permission,
    options?: ErrorOptions,
  ) {
    super(
      `No API key found: zone "${zone}", area "${area}", permission "${permission}", environment "${environment}"`,
      options,
    );
    this.name = "CredentialNotFoundError";
    this.zone = zone;
    this.environment = environment;
    this.area = area;
    this.permission = permission;
  }
}

// ── Request errors ──────────────────────────────────────────────────────────

/** Transport failure (connection reset, DNS, timeout) after all retries. */
export class NetworkError extends AlmaClientError {
  public readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NetworkError";
    this.url = url;
  }
}

/** The remote API answered with a 4xx status. */
export class RemoteRejectedError extends AlmaClientError {
  public readonly status: number;
  public readonly body: string;
  /** Message extracted from the Alma error envelope, if any. */
  public readonly remoteMessage: string | null;

  constructor(
    status: number,
    body: string,
    remoteMessage: string | null,
    options?: ErrorOptions,
  ) {
    super(
      `Request rejected with HTTP ${status}: ${remoteMessage ?? "unknown error"}`,
      options,
    );
    this.name = "RemoteRejectedError";
    this.status = status;
    this.body = body;
    this.remoteMessage = remoteMessage;
  }
}

/** The remote API answered with a 5xx status after the retry. */
export class RemoteServerError extends AlmaClientError {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string, options?: ErrorOptions) {
    super(`Remote server error HTTP ${status}`, options);
    this.name = "RemoteServerError";
    this.status = status;
    this.body = body;
  }
}

// ── Fatal errors ────────────────────────────────────────────────────────────

/** The institution's daily call budget fell under the configured floor. */
export class QuotaHaltedError extends AlmaClientError {
  public readonly remainingCalls: number | null;
  public readonly floor: number;

  constructor(remainingCalls: number | null, floor: number, options?: ErrorOptions) {
    super(
      `API quota halted: ${remainingCalls ?? "unknown"} calls remaining, floor is ${floor}`,
      options,
    );
    this.name = "QuotaHaltedError";
    this.remainingCalls = remainingCalls;
    this.floor = floor;
  }
}

// ── Document errors ─────────────────────────────────────────────────────────

/** A response body could not be parsed into a document. */
export class DocumentParseError extends AlmaClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DocumentParseError";
  }
}

// ── Handle errors ───────────────────────────────────────────────────────────

/** A handle lacks the data or identifier an operation needs. */
export class ResourceStateError extends AlmaClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResourceStateError";
  }
}
