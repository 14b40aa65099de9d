// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { ClientConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

/** Environment variable holding the path of the API key file. */
export const CREDENTIAL_FILE_ENV_VAR = "alma_api_keys";

export const DEFAULT_API_BASE_URL =
  "https://api-eu.hosted.exlibrisgroup.com/almaws/v1";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  [CREDENTIAL_FILE_ENV_VAR]: z.string().min(1).optional(),
  ALMA_API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
  ALMA_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ALMA_MAX_NETWORK_RETRIES: z.coerce.number().int().nonnegative().default(2),
  ALMA_MAX_SERVER_RETRIES: z.coerce.number().int().nonnegative().default(1),
  ALMA_MAX_RATE_LIMIT_RETRIES: z.coerce.number().int().nonnegative().default(3),
  ALMA_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(3_000),
  ALMA_CALLS_PER_SECOND: z.coerce.number().int().positive().default(25),
  ALMA_THROTTLE_DELAY_MS: z.coerce.number().int().positive().default(3_000),
  ALMA_QUOTA_FLOOR: z.coerce.number().int().nonnegative().default(5_000),
  ALMA_BACKUP_DIR: z.string().min(1).default("records"),
  ALMA_BACKUP_REFRESH: booleanFlag.default("true"),
  ALMA_GUARD_STRICT: booleanFlag.default("false"),
  ALMA_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  ALMA_LOG_PRETTY: booleanFlag.default("false"),
});

/**
 * Load the client configuration from environment variables.
 *
 * Every setting except the credential file path has a hard-coded default.
 * Invalid values raise {@link ConfigurationError}.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`, {
      cause: result.error,
    });
  }
  const e = result.data;

  return {
    credentialFile: e[CREDENTIAL_FILE_ENV_VAR] ?? null,

    executor: {
      baseUrl: e.ALMA_API_BASE_URL.replace(/\/+$/, ""),
      timeoutMs: e.ALMA_REQUEST_TIMEOUT_MS,
      maxNetworkRetries: e.ALMA_MAX_NETWORK_RETRIES,
      maxServerRetries: e.ALMA_MAX_SERVER_RETRIES,
      maxRateLimitRetries: e.ALMA_MAX_RATE_LIMIT_RETRIES,
      retryDelayMs: e.ALMA_RETRY_DELAY_MS,
    },

    governor: {
      windowMs: 1_000,
      maxCallsPerWindow: e.ALMA_CALLS_PER_SECOND,
      throttleDelayMs: e.ALMA_THROTTLE_DELAY_MS,
      quotaFloor: e.ALMA_QUOTA_FLOOR,
    },

    backup: {
      directory: e.ALMA_BACKUP_DIR,
      refreshBeforeMutation: e.ALMA_BACKUP_REFRESH,
    },

    guard: {
      strict: e.ALMA_GUARD_STRICT,
    },

    logging: {
      level: e.ALMA_LOG_LEVEL,
      prettyPrint: e.ALMA_LOG_PRETTY,
      redactSecrets: true,
    },
  };
}
