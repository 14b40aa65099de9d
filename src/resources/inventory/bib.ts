// ---------------------------------------------------------------------------
// Bib – bibliographic record, XML under the Bibs area.
//
//   <bib>
//     <mms_id>...</mms_id>
//     <linked_record_id type="NZ">...</linked_record_id>
//     <record> controlfield / datafield ... </record>
//   </bib>
//
// An IZ record linked to the Network Zone can also be found by its NZ MMS ID
// (GET /bibs?nz_mms_id=...) and copied from the NZ when it is missing.
// ---------------------------------------------------------------------------

import type { Document } from "../../core/types.js";
import { RemoteRejectedError, ResourceStateError } from "../../core/errors.js";
import {
  ResourceHandle,
  type FetchTarget,
  type HandleOptions,
  type ResourceContext,
} from "../base/resource-handle.js";
import { Holding, type DeleteOptions } from "./holding.js";
import { getIn, isRecord, readText, textOf, toArray } from "../../utils/documents.js";
import {
  appendDataFields,
  extractControlField,
  extractLocalFields,
  type MarcField,
} from "../../utils/marc-parser.js";

/** Body Alma expects for unlink and copy operations. */
const EMPTY_BIB = "<bib/>";

export interface BibOptions extends HandleOptions {
  mmsId?: string;
  /** Look the IZ record up by the MMS ID of its Network Zone record. */
  nzMmsId?: string;
}


export class Bib extends ResourceHandle {
  public readonly kind = "bib";
  public readonly area = "Bibs";

  private mms: string | null;
  private readonly lookupNzId: string | null;
  private holdings: Holding[] | null = null;

  constructor(ctx: ResourceContext, options: BibOptions) {
    super(ctx, "xml", options);
    this.mms = options.mmsId ?? null;
    this.lookupNzId = options.nzMmsId ?? null;
  }

  get resourceId(): string | null {
    return this.mms;
  }

  get mmsId(): string | null {
    return this.mms;
  }

  /** MMS ID of the linked Network Zone record, if any. */
  get nzMmsId(): string | null {
    const linked = toArray(getIn(this.data, ["bib", "linked_record_id"]));
    for (const entry of linked) {
      if (isRecord(entry) && entry["@_type"] === "NZ") return textOf(entry);
    }
    return null;
  }

  /** The MARC `<record>` element, `null` until loaded. */
  get record(): Record<string, unknown> | null {
    const record = getIn(this.data, ["bib", "record"]);
    return isRecord(record) ? record : null;
  }

  protected fetchTarget(): FetchTarget {
    if (this.mms === null && this.lookupNzId !== null) {
      return { path: "/bibs", query: { nz_mms_id: this.lookupNzId } };
    }
    return { path: this.resourcePath() };
  }

  protected resourcePath(): string {
    return `/bibs/${this.requireId(this.mms, "MMS ID")}`;
  }

  protected collectionPath(): string {
    return "/bibs";
  }

  protected deleteQuery(): Record<string, string> {
    return { override: "true" };
  }

  /** A lookup by NZ MMS ID answers with a `<bibs>` list. */
  protected unwrap(doc: Document): Document {
    if (doc["bibs"] === undefined) return doc;
    const first = toArray(getIn(doc, ["bibs", "bib"])).find(isRecord);
    if (first === undefined) {
      throw new ResourceStateError(`${this.describe()}: no IZ record linked to the NZ record`);
    }
    return { bib: first };
  }

  protected adoptIdentity(doc: Document): void {
    this.mms =
      readText(doc, ["bib", "mms_id"]) ??
      extractControlField(getIn(doc, ["bib", "record"]), "001") ??
      this.mms;
  }

  // ── MARC helpers ────────────────────────────────────────────────────────

  /** Data fields whose subfield 9 is LOCAL. */
  getLocalFields(): MarcField[] {
    if (this.skipIfFailed("getLocalFields")) return [];
    return extractLocalFields(this.record);
  }

  /**
   * Append data fields to the record, keeping all data fields sorted by tag.
   * Marks the handle dirty; call {@link update} to push the change.
   */
  addDatafields(fields: MarcField[]): this {
    return this.edit(() => {
      const record = this.record;
      if (record === null) {
        throw new ResourceStateError(`${this.describe()}: record has no MARC data`);
      }
      appendDataFields(record, fields);
    });
  }

  // ── Related resources ───────────────────────────────────────────────────

  /** Holdings attached to the record.  Fetched once, then cached. */
  async getHoldings(): Promise<Holding[]> {
    if (this.skipIfFailed("getHoldings")) return [];
    if (this.holdings !== null) return this.holdings;

    const mmsId = this.requireId(this.mms, "MMS ID");
    const doc = await this.fetchDocument({ path: `/bibs/${mmsId}/holdings` });

    const ids = toArray(getIn(doc, ["holdings", "holding"]))
      .map((h) => readText(h, ["holding_id"]))
      .filter((id): id is string => id !== null);

    if (ids.length === 0) {
      this.logger.warn(`${this.describe()}: no holding found`);
    } else {
      this.logger.info({ count: ids.length }, `${this.describe()}: holdings fetched`);
    }

    this.holdings = ids.map(
      (holdingId) =>
        new Holding(this.ctx, {
          zone: this.zone,
          environment: this.environment,
          mmsId: this.mms ?? mmsId,
          holdingId,
        }),
    );
    return this.holdings;
  }

  private async removeHoldings(force: boolean): Promise<void> {
    const holdings = await this.getHoldings();
    for (const holding of holdings) {
      await holding.delete({ force });
      if (holding.failed) {
        throw new ResourceStateError(`${this.describe()}: ${holding.describe()} not deleted`, {
          cause: holding.failure,
        });
      }
    }
    this.holdings = [];
  }

  // ── Mutations ───────────────────────────────────────────────────────────

  /**
   * Delete the record.  With `force`, holdings and their items go first.
   * A record linked to the Network Zone is unlinked before the delete.
   */
  async delete(options: DeleteOptions = {}): Promise<this> {
    return this.guarded("delete", async () => {
      if (options.force === true) await this.removeHoldings(true);
      if (this.data === null) await this.refresh();

      const path = this.resourcePath();
      if (this.nzMmsId !== null) {
        await this.send("POST", path, "read-write", {
          body: EMPTY_BIB,
          query: { op: "unlink_from_nz" },
        });
        this.logger.info({ nzMmsId: this.nzMmsId }, `${this.describe()}: unlinked from NZ`);
      }
      await this.deleteRemote();
    });
  }

  /** Delete every holding of the record; `force` deletes their items too. */
  async deleteHoldings(options: DeleteOptions = {}): Promise<this> {
    return this.guarded("delete", () => this.removeHoldings(options.force === true), {
      skipBackup: true,
    });
  }

  /** Create the IZ record as a copy of the Network Zone record. */
  async copyFromNz(): Promise<this> {
    return this.guarded(
      "create",
      async () => {
        const nzMmsId = this.lookupNzId ?? this.nzMmsId;
        if (nzMmsId === null) {
          throw new ResourceStateError(`${this.describe()}: no NZ MMS ID to copy from`);
        }
        const response = await this.send("POST", "/bibs", "read-write", {
          body: EMPTY_BIB,
          query: { from_nz_mms_id: nzMmsId },
        });
        this.accept(response);
        this.logger.info({ nzMmsId }, `${this.describe()}: copied from NZ`);
      },
      { backupPayload: EMPTY_BIB },
    );
  }

  /**
   * Load the IZ record of an NZ lookup, copying it from the NZ when Alma
   * rejects the lookup.  Other errors propagate like any read.
   */
  async loadOrCopyFromNz(): Promise<this> {
    try {
      return await this.load();
    } catch (error: unknown) {
      if (this.lookupNzId === null) throw error;
      if (!(error instanceof RemoteRejectedError) && !(error instanceof ResourceStateError)) {
        throw error;
      }
      this.logger.warn({ err: error }, `${this.describe()}: not in IZ, copying from NZ`);
      return this.copyFromNz();
    }
  }
}
