// ---------------------------------------------------------------------------
// Pino logger factory and request-scoped child loggers.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { ApiRequest, LoggingConfig } from "../core/types.js";

export type Logger = pino.Logger;

/** API keys travel in credentials and the Authorization header. */
const SECRET_PATHS: string[] = [
  "apiKey",
  "*.apiKey",
  "credential.apiKey",
  "*.password",
  "headers.Authorization",
  "*.headers.Authorization",
];

/**
 * Create the root logger of a client.
 *
 * JSON output by default; `prettyPrint` routes through the `pino-pretty`
 * transport.  Every line carries `service` and `version`.
 */
export function createLogger(config: LoggingConfig): Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "alma-governor",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    ...(config.redactSecrets
      ? { redact: { paths: SECRET_PATHS, censor: "[REDACTED]" } }
      : {}),
  };

  if (!config.prettyPrint) return pino(baseOptions);

  return pino({
    ...baseOptions,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    },
  });
}

/**
 * Child logger for one API request.  Retries of the same request share its
 * `requestId`; the key is identified by its name only.
 */
export function createRequestLogger(base: Logger, request: ApiRequest): Logger {
  return base.child({
    requestId: randomUUID(),
    method: request.method,
    path: request.path,
    zone: request.credential.zone,
    environment: request.credential.environment,
    key: request.credential.name,
  });
}
