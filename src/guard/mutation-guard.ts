// ---------------------------------------------------------------------------
// MutationGuard – backup-before-mutate and skip-on-error for every handle.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  BackupConfig,
  DataFormat,
  Environment,
  GuardConfig,
  MutationKind,
  ResourceKind,
  ZoneCode,
} from "../core/types.js";
import { QuotaHaltedError, ResourceStateError } from "../core/errors.js";
import type { BackupStore } from "../backup/backup-store.js";

/** Identifier used in backups of a resource the API has not numbered yet. */
export const UNSAVED_RESOURCE_ID = "new";

/**
 * What the guard needs from a handle.  {@link ResourceHandle} implements it;
 * the guard never reaches into resource-specific state.
 */
export interface GuardedResource {
  readonly kind: ResourceKind;
  readonly zone: ZoneCode;
  readonly environment: Environment;
  readonly format: DataFormat;
  readonly resourceId: string | null;
  readonly failed: boolean;
  readonly failure: unknown;
  /** Serialized in-memory document, the payload a create would send. */
  serialize(): string;
  /** Serialized document as last received from the API. */
  readonly lastFetchedPayload: string | null;
  /** Fetch and serialize the current remote state. */
  fetchRemotePayload(): Promise<string>;
  markFailed(error: unknown): void;
  clearFailure(): void;
}

export interface GuardOptions {
  /** Snapshot to back up instead of the one derived from `operation`. */
  backupPayload?: string;
  /** Commit without a backup; used when each child handle backs up itself. */
  skipBackup?: boolean;
}

export class MutationGuard {
  private readonly store: BackupStore;
  private readonly backupConfig: BackupConfig;
  private readonly guardConfig: GuardConfig;
  private readonly logger: Logger;

  constructor(
    store: BackupStore,
    backupConfig: BackupConfig,
    guardConfig: GuardConfig,
    logger: Logger,
  ) {
    this.store = store;
    this.backupConfig = backupConfig;
    this.guardConfig = guardConfig;
    this.logger = logger.child({ component: "MutationGuard" });
  }

  /**
   * Run `commit` for `operation` on `handle` behind a backup.
   *
   * A failed handle is returned untouched.  Any error from the backup or
   * the commit marks the handle failed and is not rethrown, except
   * {@link QuotaHaltedError}, and except in strict mode.
   */
  async guard<H extends GuardedResource>(
    operation: MutationKind,
    handle: H,
    commit: () => Promise<void>,
    options: GuardOptions = {},
  ): Promise<H> {
    const log = this.logger.child({
      kind: handle.kind,
      zone: handle.zone,
      environment: handle.environment,
      resourceId: handle.resourceId,
      operation,
    });

    if (handle.failed) {
      log.error({ err: handle.failure }, "Mutation skipped, handle is failed");
      return handle;
    }

    try {
      if (options.skipBackup !== true) {
        const payload =
          options.backupPayload ?? (await this.backupPayload(operation, handle));
        await this.store.write({
          kind: handle.kind,
          zone: handle.zone,
          environment: handle.environment,
          resourceId: handle.resourceId ?? UNSAVED_RESOURCE_ID,
          operation,
          timestamp: new Date(),
          format: handle.format,
          payload,
        });
      }

      await commit();
      handle.clearFailure();
      log.info({ resourceId: handle.resourceId }, "Mutation committed");
    } catch (error: unknown) {
      if (error instanceof QuotaHaltedError) throw error;
      this.fail(handle, error, log);
    }

    return handle;
  }

  /**
   * Refuse `operation` on `handle` without backup or network call.  The
   * refusal is handled like a failed mutation: a failed handle is returned
   * untouched, a healthy one is marked failed with `error`.
   */
  async refuse<H extends GuardedResource>(
    operation: MutationKind,
    handle: H,
    error: Error,
  ): Promise<H> {
    const log = this.logger.child({
      kind: handle.kind,
      zone: handle.zone,
      environment: handle.environment,
      resourceId: handle.resourceId,
      operation,
    });
    if (handle.failed) {
      log.error({ err: handle.failure }, "Mutation skipped, handle is failed");
      return handle;
    }
    this.fail(handle, error, log);
    return handle;
  }

  /**
   * Write a manual backup of the handle's in-memory document.  Failures mark
   * the handle failed, like a mutation would.
   */
  async snapshot<H extends GuardedResource>(handle: H): Promise<H> {
    if (handle.failed) {
      this.logger.error(
        { kind: handle.kind, resourceId: handle.resourceId, err: handle.failure },
        "Backup skipped, handle is failed",
      );
      return handle;
    }

    try {
      await this.store.write({
        kind: handle.kind,
        zone: handle.zone,
        environment: handle.environment,
        resourceId: handle.resourceId ?? UNSAVED_RESOURCE_ID,
        operation: "save",
        timestamp: new Date(),
        format: handle.format,
        payload: handle.serialize(),
      });
    } catch (error: unknown) {
      handle.markFailed(error);
      this.logger.error(
        { kind: handle.kind, resourceId: handle.resourceId, err: error },
        "Backup failed, handle marked failed",
      );
      if (this.guardConfig.strict) throw error;
    }
    return handle;
  }

  private fail(handle: GuardedResource, error: unknown, log: Logger): void {
    handle.markFailed(error);
    log.error({ err: error }, "Mutation failed, handle marked failed");
    if (this.guardConfig.strict) throw error;
  }

  private async backupPayload(
    operation: MutationKind,
    handle: GuardedResource,
  ): Promise<string> {
    if (operation === "create") return handle.serialize();
    if (this.backupConfig.refreshBeforeMutation) return handle.fetchRemotePayload();

    const cached = handle.lastFetchedPayload;
    if (cached === null) {
      throw new ResourceStateError(
        `Cannot ${operation} ${handle.kind} ${handle.resourceId ?? UNSAVED_RESOURCE_ID}: no fetched state to back up`,
      );
    }
    return cached;
  }
}
