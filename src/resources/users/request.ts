// ---------------------------------------------------------------------------
// UserRequest – hold or booking request of a user.
//
// Created on a specific item (item_pid) or on a title (mms_id), read from
// the request body.  Alma accepts "ALL" in place of the user id on reads.
// ---------------------------------------------------------------------------

import type { Document } from "../../core/types.js";
import { ResourceStateError } from "../../core/errors.js";
import { ResourceHandle, type HandleOptions, type ResourceContext } from "../base/resource-handle.js";
import { readText } from "../../utils/documents.js";

export const DEFAULT_CANCEL_REASON = "CannotBeFulfilled";

const ANY_USER = "ALL";

export interface UserRequestOptions extends HandleOptions {
  primaryId?: string;
  requestId?: string;
}

export interface CancelOptions {
  /** Code of the cancellation reason table. */
  reason?: string;
  note?: string;
  /** Defaults to true. */
  notifyUser?: boolean;
}

export class UserRequest extends ResourceHandle {
  public readonly kind = "request";
  public readonly area = "Users";

  private primary: string | null;
  private requestIdValue: string | null;

  constructor(ctx: ResourceContext, options: UserRequestOptions) {
    super(ctx, "json", options);
    const data = options.data;
    this.primary = options.primaryId ?? (data ? readText(data, ["user_primary_id"]) : null);
    this.requestIdValue = options.requestId ?? (data ? readText(data, ["request_id"]) : null);
  }

  get resourceId(): string | null {
    return this.requestIdValue;
  }

  get requestId(): string | null {
    return this.requestIdValue;
  }

  get primaryId(): string | null {
    return this.primary;
  }

  get status(): string | null {
    return readText(this.data, ["request_status"]);
  }

  /** Cancel the request.  {@link delete} cancels with the default reason. */
  async cancel(options: CancelOptions = {}): Promise<this> {
    return this.guarded("delete", async () => {
      await this.send("DELETE", this.resourcePath(), "read-write", {
        query: cancelQuery(options),
      });
      this.logger.info(
        { reason: options.reason ?? DEFAULT_CANCEL_REASON },
        `${this.describe()}: request cancelled`,
      );
    });
  }

  protected resourcePath(): string {
    const user = this.primary === null ? ANY_USER : encodeURIComponent(this.primary);
    return `/users/${user}/requests/${this.requireId(this.requestIdValue, "request ID")}`;
  }

  protected collectionPath(): string {
    return `/users/${this.requireId(this.primary, "primary ID")}/requests`;
  }

  protected createQuery(): Record<string, string> {
    const itemId = readText(this.data, ["item_id"]);
    if (itemId !== null) return { item_pid: itemId };
    const mmsId = readText(this.data, ["mms_id"]);
    if (mmsId !== null) return { mms_id: mmsId };
    throw new ResourceStateError(`${this.describe()}: request needs an item_id or an mms_id`);
  }

  protected deleteQuery(): Record<string, string> {
    return cancelQuery({});
  }

  protected adoptIdentity(doc: Document): void {
    this.requestIdValue = readText(doc, ["request_id"]) ?? this.requestIdValue;
    this.primary = readText(doc, ["user_primary_id"]) ?? this.primary;
  }
}

function cancelQuery(options: CancelOptions): Record<string, string> {
  const query: Record<string, string> = {
    reason: options.reason ?? DEFAULT_CANCEL_REASON,
    notify_user: String(options.notifyUser ?? true),
  };
  if (options.note !== undefined) query["note"] = options.note;
  return query;
}
