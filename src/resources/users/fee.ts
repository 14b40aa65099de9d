// ---------------------------------------------------------------------------
// Fee – fine or fee on a user account, JSON under /users/{id}/fees.
//
// Fees are never PUT or deleted.  They change through POST operations:
//   pay | waive | dispute | restore
// ---------------------------------------------------------------------------

import type { Document } from "../../core/types.js";
import { ResourceStateError } from "../../core/errors.js";
import { ResourceHandle, type HandleOptions, type ResourceContext } from "../base/resource-handle.js";
import { readText } from "../../utils/documents.js";

export type FeeOperation = "pay" | "waive" | "dispute" | "restore";

export interface FeeOperationOptions {
  /** Defaults to the balance for pay and waive. */
  amount?: number;
  /** Payment method; defaults to ONLINE for pay. */
  method?: string;
  /** Reason code; defaults to OTHER for waive. */
  reason?: string;
  comment?: string;
  externalTransactionId?: string;
}

export interface FeeOptions extends HandleOptions {
  primaryId: string;
  feeId?: string;
}

export class Fee extends ResourceHandle {
  public readonly kind = "fee";
  public readonly area = "Users";
  public readonly primaryId: string;

  private feeIdValue: string | null;

  constructor(ctx: ResourceContext, options: FeeOptions) {
    super(ctx, "json", options);
    this.primaryId = options.primaryId;
    this.feeIdValue = options.feeId ?? (options.data ? readText(options.data, ["id"]) : null);
  }

  get resourceId(): string | null {
    return this.feeIdValue;
  }

  get feeId(): string | null {
    return this.feeIdValue;
  }

  get balance(): number | null {
    const balance = readText(this.data, ["balance"]);
    if (balance === null) return null;
    const parsed = Number(balance);
    return Number.isNaN(parsed) ? null : parsed;
  }

  get status(): string | null {
    return readText(this.data, ["status", "value"]);
  }

  /** Run a fee operation and take the returned fee as the new state. */
  async operate(operation: FeeOperation, options: FeeOperationOptions = {}): Promise<this> {
    return this.guarded("update", async () => {
      if (this.data === null) await this.refresh();
      const response = await this.send("POST", this.resourcePath(), "read-write", {
        query: this.operationQuery(operation, options),
      });
      this.accept(response);
      this.logger.info(
        { operation, balance: this.balance },
        `${this.describe()}: ${operation} done`,
      );
    });
  }

  async update(): Promise<this> {
    return this.refuse("update", "Fees change through pay, waive, dispute or restore");
  }

  async delete(): Promise<this> {
    return this.refuse("delete", "Fees cannot be deleted through the API");
  }

  protected resourcePath(): string {
    return `${this.collectionPath()}/${this.requireId(this.feeIdValue, "fee ID")}`;
  }

  protected collectionPath(): string {
    return `/users/${this.requireId(this.primaryId, "primary ID")}/fees`;
  }

  protected adoptIdentity(doc: Document): void {
    this.feeIdValue = readText(doc, ["id"]) ?? this.feeIdValue;
  }

  private operationQuery(
    operation: FeeOperation,
    options: FeeOperationOptions,
  ): Record<string, string> {
    const query: Record<string, string> = { op: operation };

    const needsAmount = operation === "pay" || operation === "waive";
    const amount = options.amount ?? (needsAmount ? this.balance : null);
    if (needsAmount && amount === null) {
      throw new ResourceStateError(`${this.describe()}: no amount given and no balance known`);
    }
    if (amount !== null) query["amount"] = String(amount);

    const method = options.method ?? (operation === "pay" ? "ONLINE" : undefined);
    if (method !== undefined) query["method"] = method;
    const reason = options.reason ?? (operation === "waive" ? "OTHER" : undefined);
    if (reason !== undefined) query["reason"] = reason;
    if (options.comment !== undefined) query["comment"] = options.comment;
    if (options.externalTransactionId !== undefined) {
      query["external_transaction_id"] = options.externalTransactionId;
    }
    return query;
  }
}
