// ---------------------------------------------------------------------------
// Holding – MARC holdings record attached to a bib.
//
// Library and location are read from MARC 852:
//   852$b - Library code
//   852$c - Location code
// ---------------------------------------------------------------------------

import type { Document } from "../../core/types.js";
import { ResourceStateError } from "../../core/errors.js";
import { ResourceHandle, type HandleOptions, type ResourceContext } from "../base/resource-handle.js";
import { Item } from "./item.js";
import { getIn, isRecord, readText, toArray } from "../../utils/documents.js";
import { extractAllDataFields, extractDataField } from "../../utils/marc-parser.js";

/** Page size of the item list; a full page means items may be missing. */
export const ITEM_PAGE_LIMIT = 100;

export interface DeleteOptions {
  /** Delete dependent records (holdings, items) first. */
  force?: boolean;
}

export interface HoldingOptions extends HandleOptions {
  mmsId: string;
  holdingId?: string;
}

export class Holding extends ResourceHandle {
  public readonly kind = "holding";
  public readonly area = "Bibs";
  public readonly mmsId: string;

  private holdingIdValue: string | null;
  private items: Item[] | null = null;

  constructor(ctx: ResourceContext, options: HoldingOptions) {
    super(ctx, "xml", options);
    this.mmsId = options.mmsId;
    this.holdingIdValue = options.holdingId ?? null;
  }

  get resourceId(): string | null {
    return this.holdingIdValue;
  }

  get holdingId(): string | null {
    return this.holdingIdValue;
  }

  get library(): string | null {
    return extractDataField(this.record(), "852", "b");
  }

  get location(): string | null {
    return extractDataField(this.record(), "852", "c");
  }

  /** Replace 852$b.  The subfield must already exist. */
  setLibrary(code: string): this {
    return this.edit(() => this.replace852("b", code));
  }

  /** Replace 852$c.  The subfield must already exist. */
  setLocation(code: string): this {
    return this.edit(() => this.replace852("c", code));
  }

  protected resourcePath(): string {
    return `${this.collectionPath()}/${this.requireId(this.holdingIdValue, "holding ID")}`;
  }

  protected collectionPath(): string {
    return `/bibs/${this.requireId(this.mmsId, "MMS ID")}/holdings`;
  }

  protected adoptIdentity(doc: Document): void {
    this.holdingIdValue = readText(doc, ["holding", "holding_id"]) ?? this.holdingIdValue;
  }

  /**
   * Items of the holding, read from one page of {@link ITEM_PAGE_LIMIT}.
   * Each returned handle is pre-loaded with its list entry.
   */
  async getItems(): Promise<Item[]> {
    if (this.skipIfFailed("getItems")) return [];
    if (this.items !== null) return this.items;

    const holdingId = this.requireId(this.holdingIdValue, "holding ID");
    const doc = await this.fetchDocument({
      path: `${this.collectionPath()}/${holdingId}/items`,
      query: { limit: String(ITEM_PAGE_LIMIT) },
    });

    const entries = toArray(getIn(doc, ["items", "item"])).filter(isRecord);
    if (entries.length >= ITEM_PAGE_LIMIT) {
      this.logger.warn(
        { count: entries.length },
        `${this.describe()}: at least ${ITEM_PAGE_LIMIT} items, some may be missing`,
      );
    } else if (entries.length === 0) {
      this.logger.warn(`${this.describe()}: no item found`);
    } else {
      this.logger.info({ count: entries.length }, `${this.describe()}: items fetched`);
    }

    this.items = entries.map(
      (entry) =>
        new Item(this.ctx, {
          zone: this.zone,
          environment: this.environment,
          mmsId: this.mmsId,
          holdingId: this.holdingIdValue ?? holdingId,
          itemId: readText(entry, ["item_data", "pid"]) ?? undefined,
          data: { item: entry },
        }),
    );
    return this.items;
  }

  /** Delete the holding.  With `force`, its items are deleted first. */
  async delete(options: DeleteOptions = {}): Promise<this> {
    return this.guarded("delete", async () => {
      if (options.force === true) await this.removeItems();
      await this.deleteRemote();
    });
  }

  /** Delete every item of the holding, each behind its own backup. */
  async deleteItems(): Promise<this> {
    return this.guarded("delete", () => this.removeItems(), { skipBackup: true });
  }

  private async removeItems(): Promise<void> {
    for (const item of await this.getItems()) {
      await item.delete();
      if (item.failed) {
        throw new ResourceStateError(`${this.describe()}: ${item.describe()} not deleted`, {
          cause: item.failure,
        });
      }
    }
    this.items = [];
  }

  private record(): unknown {
    return getIn(this.data, ["holding", "record"]);
  }

  private replace852(code: string, value: string): void {
    const field = extractAllDataFields(this.record(), "852")[0];
    const subfield = toArray(field?.["subfield"]).find(
      (sub) => isRecord(sub) && sub["@_code"] === code,
    );
    if (!isRecord(subfield)) {
      throw new ResourceStateError(`${this.describe()}: no 852$${code} to update`);
    }
    this.logger.info(`${this.describe()}: 852$${code} changed to "${value}"`);
    subfield["#text"] = value;
  }
}
