// ---------------------------------------------------------------------------
// Credential registry.
// Reads the API key file named by `alma_api_keys`, validates it with Zod and
// indexes the keys by institution zone.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";

import type {
  ApiArea,
  CredentialEntry,
  Environment,
  Permission,
  ZoneCode,
} from "../core/types.js";
import { ConfigurationError, CredentialNotFoundError } from "../core/errors.js";
import { CREDENTIAL_FILE_ENV_VAR } from "./config.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const SupportedApiSchema = z.object({
  Area: z.string().min(1),
  Env: z.enum(["P", "S"]),
  Permissions: z.enum(["R", "RW"]),
});

export const ApiKeySchema = z.object({
  API_Key: z.string().min(1),
  Name: z.string().default(""),
  Supported_APIs: z.array(SupportedApiSchema),
});

export const CredentialFileSchema = z.object({
  apikeys: z.record(z.array(ApiKeySchema)),
  zones: z.record(z.string().min(1)).optional(),
});

export type CredentialFile = z.infer<typeof CredentialFileSchema>;

const ENVIRONMENTS: Record<"P" | "S", Environment> = {
  P: "production",
  S: "sandbox",
};

const PERMISSIONS: Record<"R" | "RW", Permission> = {
  R: "read",
  RW: "read-write",
};

function isSufficient(granted: Permission, required: Permission): boolean {
  return granted === "read-write" || required === "read";
}

// ── Registry ────────────────────────────────────────────────────────────────

/**
 * Read-only index of API keys.  Entries for one zone keep the order in which
 * they appear in the file; {@link resolve} returns the first match.
 */
export class CredentialRegistry {
  private readonly entries: ReadonlyMap<ZoneCode, readonly CredentialEntry[]>;
  private readonly aliases: ReadonlyMap<string, ZoneCode>;

  constructor(file: CredentialFile) {
    const entries = new Map<ZoneCode, CredentialEntry[]>();

    for (const [zone, keys] of Object.entries(file.apikeys)) {
      const zoneCode = zone as ZoneCode;
      const list: CredentialEntry[] = [];
      for (const key of keys) {
        for (const api of key.Supported_APIs) {
          list.push(
            Object.freeze({
              zone: zoneCode,
              environment: ENVIRONMENTS[api.Env],
              area: api.Area,
              permission: PERMISSIONS[api.Permissions],
              apiKey: key.API_Key,
              name: key.Name,
            }),
          );
        }
      }
      entries.set(zoneCode, list);
    }

    this.entries = entries;
    this.aliases = new Map(
      Object.entries(file.zones ?? {}).map(([alias, code]) => [
        alias,
        code as ZoneCode,
      ]),
    );
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  /**
   * Translate a logical zone name through the alias table.  Names without an
   * alias pass through unchanged.
   */
  resolveZoneAlias(logicalName: string): ZoneCode {
    return this.aliases.get(logicalName) ?? (logicalName as ZoneCode);
  }

  /**
   * Return the first key for the zone whose environment and area match and
   * whose permission covers `permission`.  A read-write key satisfies a read
   * request; a read key never satisfies a write.
   */
  resolve(
    zone: string,
    environment: Environment,
    area: ApiArea,
    permission: Permission,
  ): CredentialEntry {
    const zoneCode = this.resolveZoneAlias(zone);
    const candidates = this.entries.get(zoneCode) ?? [];

    const match = candidates.find(
      (c) =>
        c.environment === environment &&
        c.area === area &&
        isSufficient(c.permission, permission),
    );
    if (!match) {
      throw new CredentialNotFoundError(zoneCode, environment, area, permission);
    }
    return match;
  }

  /** Every institution code present in the key file. */
  getZoneCodes(): ZoneCode[] {
    return [...this.entries.keys()];
  }

  /** Number of (key, area, environment) entries across all zones. */
  get size(): number {
    let total = 0;
    for (const list of this.entries.values()) total += list.length;
    return total;
  }
}

// ── Loading ─────────────────────────────────────────────────────────────────

/**
 * Load and validate the key file at `filePath`.  The file is parsed with the
 * YAML parser, which accepts plain JSON as well.
 *
 * Any failure is a {@link ConfigurationError}: a missing or malformed key
 * file is a startup precondition, not a per-call condition.
 */
export function loadCredentialRegistry(filePath: string): CredentialRegistry {
  const absolutePath = path.resolve(filePath);

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read API key file: ${absolutePath}`, {
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigurationError(`API key file could not be parsed: ${absolutePath}`, {
      cause: err,
    });
  }

  const result = CredentialFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(
      `API key file ${absolutePath} failed validation: ${issues}`,
      { cause: result.error },
    );
  }

  return new CredentialRegistry(result.data);
}

// ── Process-wide default ────────────────────────────────────────────────────

let defaultRegistry: CredentialRegistry | null = null;

/**
 * Return the process-wide registry, loading it from the file named by the
 * `alma_api_keys` environment variable on first use.
 */
export function getDefaultCredentialRegistry(
  env: NodeJS.ProcessEnv = process.env,
): CredentialRegistry {
  if (defaultRegistry) return defaultRegistry;

  const filePath = env[CREDENTIAL_FILE_ENV_VAR];
  if (!filePath) {
    throw new ConfigurationError(
      `Environment variable "${CREDENTIAL_FILE_ENV_VAR}" is not set`,
    );
  }

  defaultRegistry = loadCredentialRegistry(filePath);
  return defaultRegistry;
}

/** Drop the cached default registry.  Intended for tests. */
export function resetDefaultCredentialRegistry(): void {
  defaultRegistry = null;
}
