export { AlmaClient, createAlmaClient } from "./app.js";
export type { AlmaClientOptions, Scope } from "./app.js";

export * from "./core/types.js";
export * from "./core/errors.js";

export { loadConfig, CREDENTIAL_FILE_ENV_VAR, DEFAULT_API_BASE_URL } from "./config/config.js";
export {
  CredentialRegistry,
  loadCredentialRegistry,
  getDefaultCredentialRegistry,
  resetDefaultCredentialRegistry,
} from "./config/credential-registry.js";
export type { CredentialFile } from "./config/credential-registry.js";
export { createLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";

export {
  QuotaGovernor,
  QUOTA_HEADER,
  QUOTA_EXHAUSTED_EXIT_CODE,
} from "./orchestrator/quota-governor.js";
export type { HaltHandler } from "./orchestrator/quota-governor.js";
export { RequestExecutor } from "./http/request-executor.js";
export { FileBackupStore } from "./backup/backup-store.js";
export type { BackupRef, BackupStore } from "./backup/backup-store.js";
export { MutationGuard } from "./guard/mutation-guard.js";
export type { GuardedResource, GuardOptions } from "./guard/mutation-guard.js";

export { ResourceHandle } from "./resources/base/resource-handle.js";
export type { ResourceContext, HandleOptions } from "./resources/base/resource-handle.js";
export { Bib } from "./resources/inventory/bib.js";
export { Holding, ITEM_PAGE_LIMIT } from "./resources/inventory/holding.js";
export type { DeleteOptions } from "./resources/inventory/holding.js";
export { Item } from "./resources/inventory/item.js";
export { User } from "./resources/users/user.js";
export { searchUsers, USER_PAGE_LIMIT } from "./resources/users/user-search.js";
export type { UserSearchScope } from "./resources/users/user-search.js";
export { Loan, RENEWED_STATUS } from "./resources/users/loan.js";
export { UserRequest, DEFAULT_CANCEL_REASON } from "./resources/users/request.js";
export type { CancelOptions } from "./resources/users/request.js";
export { Fee } from "./resources/users/fee.js";
export type { FeeOperation, FeeOperationOptions } from "./resources/users/fee.js";
export { RecSet } from "./resources/config/recset.js";
export type { SetMember } from "./resources/config/recset.js";
export { Job } from "./resources/config/job.js";
export type { JobType, JobInstanceState } from "./resources/config/job.js";
export type { MarcField } from "./utils/marc-parser.js";
