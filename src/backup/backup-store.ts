// ---------------------------------------------------------------------------
// Backup store – append-only snapshots of resources taken before mutation.
//
// Layout:
//   <directory>/<zone>/<environment>/<kind>_<id>_<timestamp>_<operation>.<ext>
//
// The timestamp is a compact UTC form (YYYYMMDDTHHmmssSSSZ) so that a lexical
// sort of one resource's files is chronological.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";

import type {
  BackupRecord,
  DataFormat,
  Environment,
  MutationKind,
  ResourceKind,
  ZoneCode,
} from "../core/types.js";

/** Where a resource's backups live. */
export interface BackupRef {
  kind: ResourceKind;
  zone: ZoneCode;
  environment: Environment;
  resourceId: string;
}

export interface BackupStore {
  /** Persist `record`; resolves with its location once durable. */
  write(record: BackupRecord): Promise<string>;
  /** Most recent backup for `ref`, or `null` when none exists. */
  latest(ref: BackupRef): Promise<BackupRecord | null>;
}

const OPERATIONS: ReadonlyArray<MutationKind | "save"> = [
  "create",
  "update",
  "delete",
  "save",
];

export class FileBackupStore implements BackupStore {
  private readonly directory: string;
  private readonly logger: Logger;

  constructor(directory: string, logger: Logger) {
    this.directory = path.resolve(directory);
    this.logger = logger.child({ component: "FileBackupStore" });
  }

  async write(record: BackupRecord): Promise<string> {
    const dir = this.dirFor(record);
    await fs.mkdir(dir, { recursive: true });

    const base = `${record.kind}_${safeId(record.resourceId)}_${formatStamp(record.timestamp)}_${record.operation}`;

    // Two snapshots of one resource in the same millisecond get a counter
    // suffix instead of overwriting each other.
    for (let n = 0; ; n++) {
      const name = n === 0 ? `${base}.${record.format}` : `${base}_${n}.${record.format}`;
      const filePath = path.join(dir, name);
      try {
        await fs.writeFile(filePath, record.payload, { encoding: "utf-8", flag: "wx" });
        this.logger.info(
          { kind: record.kind, resourceId: record.resourceId, operation: record.operation, filePath },
          "Backup written",
        );
        return filePath;
      } catch (err: unknown) {
        if (!isAlreadyExists(err)) throw err;
      }
    }
  }

  async latest(ref: BackupRef): Promise<BackupRecord | null> {
    const dir = this.dirFor(ref);
    const pattern = new RegExp(
      `^${escapeRegExp(`${ref.kind}_${safeId(ref.resourceId)}_`)}(\\d{8}T\\d{9}Z)_(${OPERATIONS.join("|")})(?:_\\d+)?\\.(xml|json)$`,
    );

    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw err;
    }

    const candidates = names.filter((n) => pattern.test(n)).sort();
    const newest = candidates[candidates.length - 1];
    if (newest === undefined) return null;

    const match = pattern.exec(newest);
    if (!match) return null;
    const [, stamp, operation, format] = match;

    const payload = await fs.readFile(path.join(dir, newest), "utf-8");
    return {
      kind: ref.kind,
      zone: ref.zone,
      environment: ref.environment,
      resourceId: ref.resourceId,
      operation: toOperation(operation),
      timestamp: parseStamp(stamp),
      format: toFormat(format),
      payload,
    };
  }

  private dirFor(ref: Pick<BackupRef, "zone" | "environment">): string {
    return path.join(this.directory, safeId(ref.zone), ref.environment);
  }
}

// ── Helpers ────────────────────────────────────────────────────────────────

function safeId(id: string): string {
  return id.replace(/[^A-Za-z0-9.-]/g, "_");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function formatStamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, "");
}

function parseStamp(stamp: string): Date {
  const iso = `${stamp.slice(0, 4)}-${stamp.slice(4, 6)}-${stamp.slice(6, 8)}T${stamp.slice(9, 11)}:${stamp.slice(11, 13)}:${stamp.slice(13, 15)}.${stamp.slice(15, 18)}Z`;
  return new Date(iso);
}

function toOperation(value: string): MutationKind | "save" {
  return OPERATIONS.find((op) => op === value) ?? "save";
}

function toFormat(value: string): DataFormat {
  return value === "json" ? "json" : "xml";
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
