// ---------------------------------------------------------------------------
// RecSet – itemized or logical set of records under /conf/sets.
// ---------------------------------------------------------------------------

import type { Document } from "../../core/types.js";
import { ResourceHandle, type HandleOptions, type ResourceContext } from "../base/resource-handle.js";
import { getIn, isRecord, readText, toArray } from "../../utils/documents.js";

const MEMBER_PAGE_LIMIT = 100;

export interface SetMember {
  id: string;
  description: string | null;
}

export interface RecSetOptions extends HandleOptions {
  setId?: string;
}

export class RecSet extends ResourceHandle {
  public readonly kind = "set";
  public readonly area = "Conf";

  private setIdValue: string | null;

  constructor(ctx: ResourceContext, options: RecSetOptions) {
    super(ctx, "json", options);
    this.setIdValue = options.setId ?? null;
  }

  get resourceId(): string | null {
    return this.setIdValue;
  }

  get setId(): string | null {
    return this.setIdValue;
  }

  get name(): string | null {
    return readText(this.data, ["name"]);
  }

  /** Member count as reported by the set itself, `null` until loaded. */
  get memberCount(): number | null {
    const count = readText(this.data, ["number_of_members", "value"]);
    if (count === null) return null;
    const parsed = Number.parseInt(count, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }

  protected resourcePath(): string {
    return `/conf/sets/${this.requireId(this.setIdValue, "set ID")}`;
  }

  protected collectionPath(): string {
    return "/conf/sets";
  }

  protected adoptIdentity(doc: Document): void {
    this.setIdValue = readText(doc, ["id"]) ?? this.setIdValue;
  }

  /** All members of the set, read page by page. */
  async getMembers(): Promise<SetMember[]> {
    if (this.skipIfFailed("getMembers")) return [];

    const path = `${this.resourcePath()}/members`;
    const members: SetMember[] = [];
    let offset = 0;
    let total = Number.POSITIVE_INFINITY;

    while (offset < total) {
      const page = await this.fetchDocument({
        path,
        query: { limit: String(MEMBER_PAGE_LIMIT), offset: String(offset) },
      });
      total = Number(getIn(page, ["total_record_count"]) ?? 0);

      const batch = toArray(page["member"]).filter(isRecord);
      if (batch.length === 0) break;
      offset += batch.length;
      for (const member of batch) {
        const id = readText(member, ["id"]);
        if (id !== null) members.push({ id, description: readText(member, ["description"]) });
      }
    }

    this.logger.info({ count: members.length }, `${this.describe()}: members fetched`);
    return members;
  }
}
