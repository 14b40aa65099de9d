// ---------------------------------------------------------------------------
// Item – physical item of a holding.
//
//   <item>
//     <bib_data><mms_id/></bib_data>
//     <holding_data><holding_id/></holding_data>
//     <item_data><pid/><barcode/></item_data>
//   </item>
//
// An item can be addressed either by its full path or, when only a barcode
// is known, through GET /items?item_barcode=...
// ---------------------------------------------------------------------------

import type { Document } from "../../core/types.js";
import { ResourceStateError } from "../../core/errors.js";
import {
  ResourceHandle,
  type FetchTarget,
  type HandleOptions,
  type ResourceContext,
} from "../base/resource-handle.js";
import { readText, writeText } from "../../utils/documents.js";

export interface ItemOptions extends HandleOptions {
  mmsId?: string;
  holdingId?: string;
  itemId?: string;
  /** Look the item up by barcode when its identifiers are not known. */
  barcode?: string;
}

export class Item extends ResourceHandle {
  public readonly kind = "item";
  public readonly area = "Bibs";

  private mms: string | null;
  private holding: string | null;
  private pid: string | null;
  private readonly lookupBarcode: string | null;

  constructor(ctx: ResourceContext, options: ItemOptions) {
    super(ctx, "xml", options);
    this.mms = options.mmsId ?? null;
    this.holding = options.holdingId ?? null;
    this.pid = options.itemId ?? null;
    this.lookupBarcode = options.barcode ?? null;
  }

  get resourceId(): string | null {
    return this.pid;
  }

  get itemId(): string | null {
    return this.pid;
  }

  get mmsId(): string | null {
    return this.mms;
  }

  get holdingId(): string | null {
    return this.holding;
  }

  get barcode(): string | null {
    return readText(this.data, ["item", "item_data", "barcode"]);
  }

  /** Replace the barcode of a loaded item. */
  setBarcode(barcode: string): this {
    return this.edit((doc) => {
      const previous = readText(doc, ["item", "item_data", "barcode"]);
      if (previous === null) {
        throw new ResourceStateError(`${this.describe()}: no barcode field to update`);
      }
      writeText(doc, ["item", "item_data", "barcode"], barcode);
      this.logger.info(`${this.describe()}: barcode changed from "${previous}" to "${barcode}"`);
    });
  }

  protected fetchTarget(): FetchTarget {
    if (this.pid === null && this.lookupBarcode !== null) {
      return { path: "/items", query: { item_barcode: this.lookupBarcode } };
    }
    return { path: this.resourcePath() };
  }

  protected resourcePath(): string {
    return `${this.collectionPath()}/${this.requireId(this.pid, "item ID")}`;
  }

  protected collectionPath(): string {
    const mmsId = this.requireId(this.mms, "MMS ID");
    const holdingId = this.requireId(this.holding, "holding ID");
    return `/bibs/${mmsId}/holdings/${holdingId}/items`;
  }

  protected adoptIdentity(doc: Document): void {
    this.mms = readText(doc, ["item", "bib_data", "mms_id"]) ?? this.mms;
    this.holding = readText(doc, ["item", "holding_data", "holding_id"]) ?? this.holding;
    this.pid = readText(doc, ["item", "item_data", "pid"]) ?? this.pid;
  }
}
