// ---------------------------------------------------------------------------
// User – patron or staff account, JSON under the Users area.
// ---------------------------------------------------------------------------

import type { Document } from "../../core/types.js";
import { ResourceHandle, type HandleOptions, type ResourceContext } from "../base/resource-handle.js";
import { readText } from "../../utils/documents.js";

export interface UserOptions extends HandleOptions {
  primaryId?: string;
}

export class User extends ResourceHandle {
  public readonly kind = "user";
  public readonly area = "Users";

  private primary: string | null;

  constructor(ctx: ResourceContext, options: UserOptions) {
    super(ctx, "json", options);
    this.primary = options.primaryId ?? (options.data ? readText(options.data, ["primary_id"]) : null);
  }

  get resourceId(): string | null {
    return this.primary;
  }

  get primaryId(): string | null {
    return this.primary;
  }

  /**
   * Set a new password on the in-memory account.  The user must change it
   * at next login.  Call {@link update} (or {@link create}) to send it.
   */
  setPassword(password: string): this {
    return this.edit((doc) => {
      doc["password"] = password;
      doc["force_password_change"] = "TRUE";
      this.logger.info(`${this.describe()}: password set`);
    });
  }

  protected resourcePath(): string {
    return `/users/${this.requireId(this.primary, "primary ID")}`;
  }

  protected collectionPath(): string {
    return "/users";
  }

  protected adoptIdentity(doc: Document): void {
    this.primary = readText(doc, ["primary_id"]) ?? this.primary;
  }
}
