// ---------------------------------------------------------------------------
// Core types for the Alma API governor.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** Institution code as it appears in the credential file (e.g. "UBS", "NZ"). */
export type ZoneCode = string & { readonly __brand: "ZoneCode" };

// ── Enums ───────────────────────────────────────────────────────────────────

export const Environment = {
  PRODUCTION: "production",
  SANDBOX: "sandbox",
} as const;
export type Environment = (typeof Environment)[keyof typeof Environment];

export const Permission = {
  READ: "read",
  READ_WRITE: "read-write",
} as const;
export type Permission = (typeof Permission)[keyof typeof Permission];

/**
 * API areas as named in the Alma developer network key configuration.
 * The list is open: any string found in the credential file is accepted.
 */
export const ApiArea = {
  BIBS: "Bibs",
  USERS: "Users",
  CONF: "Conf",
  ACQUISITIONS: "Acquisitions",
  ANALYTICS: "Analytics",
} as const;
export type ApiArea = (typeof ApiArea)[keyof typeof ApiArea] | (string & {});

export const ResourceKind = {
  BIB: "bib",
  HOLDING: "holding",
  ITEM: "item",
  USER: "user",
  LOAN: "loan",
  REQUEST: "request",
  FEE: "fee",
  SET: "set",
  JOB: "job",
} as const;
export type ResourceKind = (typeof ResourceKind)[keyof typeof ResourceKind];

export type DataFormat = "xml" | "json";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type MutationKind = "create" | "update" | "delete";

// ── Credentials ─────────────────────────────────────────────────────────────

export interface CredentialEntry {
  readonly zone: ZoneCode;
  readonly environment: Environment;
  readonly area: ApiArea;
  readonly permission: Permission;
  readonly apiKey: string;
  /** Human-readable key label from the credential file. */
  readonly name: string;
}

// ── Documents ───────────────────────────────────────────────────────────────

/** Parsed form of an XML or JSON resource body. */
export type Document = Record<string, unknown>;

// ── Quota ───────────────────────────────────────────────────────────────────

export type GovernorState = "ready" | "throttled" | "halted";

export interface QuotaSnapshot {
  state: GovernorState;
  /** Last known remaining daily calls, `null` before the first response. */
  remainingCalls: number | null;
  /** Dispatches recorded in the trailing rate window. */
  callsInWindow: number;
  /** Callers currently sleeping in the throttle loop. */
  throttledCallers: number;
}

// ── HTTP ────────────────────────────────────────────────────────────────────

export interface ApiRequest {
  method: HttpMethod;
  /**
   * Path relative to the API base URL (e.g. "/bibs/99123"), or an absolute
   * URL such as a `link` taken from an earlier response.
   */
  path: string;
  credential: CredentialEntry;
  format: DataFormat;
  query?: Record<string, string>;
  body?: string;
}

export interface ApiResponse {
  status: number;
  payload: string;
  contentType: string;
  quota: { remainingCalls: number | null };
}

// ── Backups ─────────────────────────────────────────────────────────────────

export interface BackupRecord {
  readonly kind: ResourceKind;
  readonly zone: ZoneCode;
  readonly environment: Environment;
  readonly resourceId: string;
  /** The mutation the snapshot precedes, or "save" for a manual backup. */
  readonly operation: MutationKind | "save";
  readonly timestamp: Date;
  readonly format: DataFormat;
  readonly payload: string;
}

// ── Configuration ───────────────────────────────────────────────────────────

export interface GovernorConfig {
  /** Width of the rate window in ms. */
  windowMs: number;
  /** Dispatches allowed within one window before callers are throttled. */
  maxCallsPerWindow: number;
  /** How long a throttled caller sleeps before re-checking. */
  throttleDelayMs: number;
  /** Remaining daily calls under which the governor halts. */
  quotaFloor: number;
}

export interface ExecutorConfig {
  baseUrl: string;
  timeoutMs: number;
  maxNetworkRetries: number;
  maxServerRetries: number;
  maxRateLimitRetries: number;
  retryDelayMs: number;
}

export interface BackupConfig {
  directory: string;
  /** Re-fetch remote state before update/delete so the backup is current. */
  refreshBeforeMutation: boolean;
}

export interface GuardConfig {
  /** Rethrow after marking the handle failed. */
  strict: boolean;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}

export interface ClientConfig {
  /** Path of the credential file, `null` when `alma_api_keys` is unset. */
  credentialFile: string | null;
  executor: ExecutorConfig;
  governor: GovernorConfig;
  backup: BackupConfig;
  guard: GuardConfig;
  logging: LoggingConfig;
}
