// ---------------------------------------------------------------------------
// Alma client -- composition root wiring config, logging, governance and
// resource factories.
// ---------------------------------------------------------------------------

import type { ClientConfig, Document, Environment } from "./core/types.js";
import { CREDENTIAL_FILE_ENV_VAR, loadConfig } from "./config/config.js";
import {
  type CredentialRegistry,
  getDefaultCredentialRegistry,
} from "./config/credential-registry.js";
import { createLogger, type Logger } from "./logging/logger.js";
import {
  type HaltHandler,
  QUOTA_EXHAUSTED_EXIT_CODE,
  QuotaGovernor,
} from "./orchestrator/quota-governor.js";
import { RequestExecutor } from "./http/request-executor.js";
import { type BackupStore, FileBackupStore } from "./backup/backup-store.js";
import { MutationGuard } from "./guard/mutation-guard.js";
import type { ResourceContext } from "./resources/base/resource-handle.js";
import { Bib } from "./resources/inventory/bib.js";
import { Holding } from "./resources/inventory/holding.js";
import { Item } from "./resources/inventory/item.js";
import { User } from "./resources/users/user.js";
import { Loan } from "./resources/users/loan.js";
import { UserRequest } from "./resources/users/request.js";
import { Fee } from "./resources/users/fee.js";
import { searchUsers } from "./resources/users/user-search.js";
import { RecSet } from "./resources/config/recset.js";
import { Job, type JobType } from "./resources/config/job.js";

export interface AlmaClientOptions {
  /** Defaults to {@link loadConfig} over `process.env`. */
  config?: ClientConfig;
  logger?: Logger;
  /** Defaults to the process-wide registry read from the key file. */
  registry?: CredentialRegistry;
  /** Share one governor between clients talking to the same institution. */
  governor?: QuotaGovernor;
  backupStore?: BackupStore;
  /** Called once when the quota floor is breached.  Defaults to exiting. */
  onHalt?: HaltHandler;
}

/** Where a handle lives: zone code (or alias) and environment. */
export interface Scope {
  zone: string;
  environment?: Environment;
}

/**
 * Entry point for every resource handle.  All handles created by one client
 * share its governor, guard and backup store.
 */
export class AlmaClient {
  public readonly config: ClientConfig;
  public readonly logger: Logger;
  public readonly registry: CredentialRegistry;
  public readonly governor: QuotaGovernor;

  private readonly ctx: ResourceContext;

  constructor(options: AlmaClientOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.logger = options.logger ?? createLogger(this.config.logging);
    this.registry = options.registry ?? defaultRegistry(this.config);

    const onHalt: HaltHandler =
      options.onHalt ??
      (() => {
        process.exit(QUOTA_EXHAUSTED_EXIT_CODE);
      });
    this.governor =
      options.governor ?? new QuotaGovernor(this.config.governor, this.logger, onHalt);

    const executor = new RequestExecutor(this.config.executor, this.governor, this.logger);
    const backups =
      options.backupStore ?? new FileBackupStore(this.config.backup.directory, this.logger);
    const guard = new MutationGuard(backups, this.config.backup, this.config.guard, this.logger);

    this.ctx = { registry: this.registry, executor, guard, backups, logger: this.logger };
  }

  // ── Inventory ───────────────────────────────────────────────────────────

  bib(mmsId: string, scope: Scope): Bib {
    return new Bib(this.ctx, { ...scope, mmsId });
  }

  /**
   * IZ bib found through the MMS ID of its Network Zone record.  Use
   * `loadOrCopyFromNz()` to copy the record into the IZ when it is missing.
   */
  bibByNzId(nzMmsId: string, scope: Scope): Bib {
    return new Bib(this.ctx, { ...scope, nzMmsId });
  }

  /** Unsaved bib built from a `{ bib: ... }` document; call `create()`. */
  newBib(data: Document, scope: Scope): Bib {
    return new Bib(this.ctx, { ...scope, data });
  }

  holding(mmsId: string, holdingId: string, scope: Scope): Holding {
    return new Holding(this.ctx, { ...scope, mmsId, holdingId });
  }

  newHolding(mmsId: string, data: Document, scope: Scope): Holding {
    return new Holding(this.ctx, { ...scope, mmsId, data });
  }

  item(mmsId: string, holdingId: string, itemId: string, scope: Scope): Item {
    return new Item(this.ctx, { ...scope, mmsId, holdingId, itemId });
  }

  itemByBarcode(barcode: string, scope: Scope): Item {
    return new Item(this.ctx, { ...scope, barcode });
  }

  newItem(mmsId: string, holdingId: string, data: Document, scope: Scope): Item {
    return new Item(this.ctx, { ...scope, mmsId, holdingId, data });
  }

  // ── Users ───────────────────────────────────────────────────────────────

  user(primaryId: string, scope: Scope): User {
    return new User(this.ctx, { ...scope, primaryId });
  }

  newUser(data: Document, scope: Scope): User {
    return new User(this.ctx, { ...scope, data });
  }

  /** Users matching an Alma `q` expression, e.g. `"primary_id~test"`. */
  searchUsers(query: string, scope: Scope): Promise<User[]> {
    return searchUsers(this.ctx, query, scope);
  }

  loan(primaryId: string, loanId: string, scope: Scope): Loan {
    return new Loan(this.ctx, { ...scope, primaryId, loanId });
  }

  /** Unsaved loan of the item with `itemBarcode`; `data` names circ desk and library. */
  newLoan(primaryId: string, itemBarcode: string, data: Document, scope: Scope): Loan {
    return new Loan(this.ctx, { ...scope, primaryId, itemBarcode, data });
  }

  /** Pass `null` as user to read a request without knowing its requester. */
  request(primaryId: string | null, requestId: string, scope: Scope): UserRequest {
    return new UserRequest(this.ctx, { ...scope, primaryId: primaryId ?? undefined, requestId });
  }

  newRequest(primaryId: string, data: Document, scope: Scope): UserRequest {
    return new UserRequest(this.ctx, { ...scope, primaryId, data });
  }

  fee(primaryId: string, feeId: string, scope: Scope): Fee {
    return new Fee(this.ctx, { ...scope, primaryId, feeId });
  }

  newFee(primaryId: string, data: Document, scope: Scope): Fee {
    return new Fee(this.ctx, { ...scope, primaryId, data });
  }

  // ── Configuration ───────────────────────────────────────────────────────

  recSet(setId: string, scope: Scope): RecSet {
    return new RecSet(this.ctx, { ...scope, setId });
  }

  job(jobId: string, scope: Scope & { jobType?: JobType }): Job {
    return new Job(this.ctx, { ...scope, jobId });
  }
}

export function createAlmaClient(options: AlmaClientOptions = {}): AlmaClient {
  return new AlmaClient(options);
}

function defaultRegistry(config: ClientConfig): CredentialRegistry {
  return getDefaultCredentialRegistry(
    config.credentialFile === null ? {} : { [CREDENTIAL_FILE_ENV_VAR]: config.credentialFile },
  );
}
