// ---------------------------------------------------------------------------
// Loan – an item on loan to a user, JSON under /users/{id}/loans.
// ---------------------------------------------------------------------------

import type { Document } from "../../core/types.js";
import { ResourceHandle, type HandleOptions, type ResourceContext } from "../base/resource-handle.js";
import { Item } from "../inventory/item.js";
import { readText } from "../../utils/documents.js";

/** `last_renew_status.desc` of a loan Alma has renewed. */
export const RENEWED_STATUS = "Renewed Successfully";

export interface LoanOptions extends HandleOptions {
  primaryId: string;
  loanId?: string;
  /** Barcode of the item to lend; sent on create. */
  itemBarcode?: string;
}

export class Loan extends ResourceHandle {
  public readonly kind = "loan";
  public readonly area = "Users";
  public readonly primaryId: string;

  private loanIdValue: string | null;
  private readonly itemBarcode: string | null;

  constructor(ctx: ResourceContext, options: LoanOptions) {
    super(ctx, "json", options);
    this.primaryId = options.primaryId;
    this.loanIdValue =
      options.loanId ?? (options.data ? readText(options.data, ["loan_id"]) : null);
    this.itemBarcode = options.itemBarcode ?? null;
  }

  get resourceId(): string | null {
    return this.loanIdValue;
  }

  get loanId(): string | null {
    return this.loanIdValue;
  }

  get dueDate(): string | null {
    return readText(this.data, ["due_date"]);
  }

  /** Item handle of the loaned item, `null` while its ids are unknown. */
  getItem(): Item | null {
    if (this.skipIfFailed("getItem")) return null;
    const mmsId = readText(this.data, ["mms_id"]);
    const holdingId = readText(this.data, ["holding_id"]);
    const itemId = readText(this.data, ["item_id"]);
    if (mmsId === null || holdingId === null || itemId === null) return null;
    return new Item(this.ctx, {
      zone: this.zone,
      environment: this.environment,
      mmsId,
      holdingId,
      itemId,
    });
  }

  /**
   * Ask Alma to renew the loan.  A refused renewal is not an error: the loan
   * stays healthy and the status is logged as a warning.
   */
  async renew(): Promise<this> {
    return this.guarded("update", async () => {
      const response = await this.send("POST", this.resourcePath(), "read-write", {
        body: "{}",
        query: { op: "renew" },
      });
      this.accept(response);

      const status = readText(this.data, ["last_renew_status", "desc"]);
      if (status === RENEWED_STATUS) {
        this.logger.info({ dueDate: this.dueDate }, `${this.describe()}: loan renewed`);
      } else {
        this.logger.warn({ status }, `${this.describe()}: loan not renewed`);
      }
    });
  }

  /** Set a new due date, e.g. "2026-12-31T23:59:00Z". */
  async changeDueDate(dueDate: string): Promise<this> {
    return this.guarded("update", async () => {
      const response = await this.send("PUT", this.resourcePath(), "read-write", {
        body: JSON.stringify({ due_date: dueDate }),
      });
      this.accept(response);
      this.logger.info({ dueDate }, `${this.describe()}: due date changed`);
    });
  }

  /** Loans end when the item is returned; Alma has no loan DELETE. */
  async delete(): Promise<this> {
    return this.refuse("delete", "Loans cannot be deleted through the API");
  }

  protected resourcePath(): string {
    return `${this.collectionPath()}/${this.requireId(this.loanIdValue, "loan ID")}`;
  }

  protected collectionPath(): string {
    return `/users/${this.requireId(this.primaryId, "primary ID")}/loans`;
  }

  protected createQuery(): Record<string, string> | undefined {
    return this.itemBarcode === null ? undefined : { item_barcode: this.itemBarcode };
  }

  protected adoptIdentity(doc: Document): void {
    this.loanIdValue = readText(doc, ["loan_id"]) ?? this.loanIdValue;
  }
}
