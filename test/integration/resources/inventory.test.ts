// ---------------------------------------------------------------------------
// Integration tests for bib, holding and item handles.
//
// A FakeAlma router stands in for the API behind a mocked global fetch;
// backups go to a temporary directory.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { createAlmaClient, type AlmaClient } from "../../../src/app.js";
import {
  CredentialNotFoundError,
  QuotaHaltedError,
  RemoteRejectedError,
  RemoteServerError,
  ResourceStateError,
} from "../../../src/core/errors.js";
import { getIn, toArray, xmlCodec, isRecord } from "../../../src/utils/documents.js";
import { extractAllDataFields, extractControlField } from "../../../src/utils/marc-parser.js";
import {
  createSilentLogger,
  createTestConfig,
  createTestRegistry,
  errorJson,
  FakeAlma,
  xml,
} from "../../helpers/fake-alma.js";

// ── Fixtures ─────────────────────────────────────────────────────────────

const MMS_ID = "991000000000005504";
const NZ_MMS_ID = "991170000000005501";
const HOLDING_ID = "221000000000005504";
const ITEM_ID = "231000000000005504";

const BIB_PATH = `/bibs/${MMS_ID}`;
const HOLDING_PATH = `${BIB_PATH}/holdings/${HOLDING_ID}`;
const ITEM_PATH = `${HOLDING_PATH}/items/${ITEM_ID}`;

function bibXml(): string {
  return (
    `<bib><mms_id>${MMS_ID}</mms_id>` +
    `<linked_record_id type="NZ">${NZ_MMS_ID}</linked_record_id>` +
    "<record>" +
    `<controlfield tag="001">${MMS_ID}</controlfield>` +
    '<datafield tag="245" ind1="1" ind2="0"><subfield code="a">Sample title</subfield></datafield>' +
    '<datafield tag="650" ind1=" " ind2="7"><subfield code="a">Archive</subfield><subfield code="9">LOCAL</subfield></datafield>' +
    "</record></bib>"
  );
}

function holdingXml(): string {
  return (
    `<holding><holding_id>${HOLDING_ID}</holding_id><record>` +
    '<datafield tag="852" ind1="4" ind2=" "><subfield code="b">MAIN</subfield><subfield code="c">STACKS</subfield></datafield>' +
    "</record></holding>"
  );
}

function itemXml(barcode = "BC-0001"): string {
  return (
    `<item><bib_data><mms_id>${MMS_ID}</mms_id></bib_data>` +
    `<holding_data><holding_id>${HOLDING_ID}</holding_id></holding_data>` +
    `<item_data><pid>${ITEM_ID}</pid><barcode>${barcode}</barcode></item_data></item>`
  );
}

function datafieldTags(body: string | null): unknown[] {
  const record = getIn(xmlCodec.parse(body ?? ""), ["bib", "record"]);
  return toArray(isRecord(record) ? record["datafield"] : undefined).map((f) =>
    isRecord(f) ? f["@_tag"] : null,
  );
}

const SCOPE = { zone: "UBS" } as const;

const LEADER = "     nam a22     uu 4500";
const FIELD_008 = "260101s2026    sz            000 0 ger  ";

function fixedFieldBibXml(): string {
  return (
    `<bib><mms_id>${MMS_ID}</mms_id><record>` +
    `<leader>${LEADER}</leader>` +
    `<controlfield tag="001">${MMS_ID}</controlfield>` +
    `<controlfield tag="008">${FIELD_008}</controlfield>` +
    '<datafield tag="245" ind1="1" ind2="0"><subfield code="a">Sample title </subfield></datafield>' +
    '<datafield tag="650" ind1=" " ind2="7"><subfield code="a">Archive</subfield><subfield code="9">LOCAL</subfield></datafield>' +
    "</record></bib>"
  );
}

/** GET serves the stored body; PUT replaces it and echoes it back. */
function serveStored(fake: FakeAlma, resourcePath: string, initial: string): () => string {
  let stored = initial;
  fake
    .on("GET", resourcePath, () => xml(stored))
    .on("PUT", resourcePath, (req) => {
      stored = req.body ?? "";
      return xml(stored);
    });
  return () => stored;
}

// ── Tests ────────────────────────────────────────────────────────────────

describe("inventory handles", () => {
  const originalFetch = globalThis.fetch;
  let mockFetch: ReturnType<typeof vi.fn>;
  let fake: FakeAlma;
  let backupDir: string;
  let client: AlmaClient;
  let onHalt: ReturnType<typeof vi.fn>;

  function backupFiles(environment = "production"): string[] {
    const dir = path.join(backupDir, "UBS", environment);
    return fs.existsSync(dir) ? fs.readdirSync(dir).sort() : [];
  }

  beforeEach(() => {
    backupDir = fs.mkdtempSync(path.join(os.tmpdir(), "alma-inventory-"));
    fake = new FakeAlma();
    mockFetch = vi.fn(fake.handle);
    globalThis.fetch = mockFetch;
    onHalt = vi.fn();
    client = createAlmaClient({
      config: createTestConfig(backupDir),
      logger: createSilentLogger(),
      registry: createTestRegistry(),
      onHalt,
    });
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
    fs.rmSync(backupDir, { recursive: true, force: true });
  });

  // ── Bib reads ─────────────────────────────────────────────────────────

  it("loads a bib with the read key and exposes its identifiers", async () => {
    fake.on("GET", BIB_PATH, xml(bibXml()));

    const bib = await client.bib(MMS_ID, SCOPE).load();

    expect(bib.failed).toBe(false);
    expect(bib.mmsId).toBe(MMS_ID);
    expect(bib.nzMmsId).toBe(NZ_MMS_ID);
    expect(bib.getLocalFields().map((f) => f["@_tag"])).toEqual(["650"]);
    expect(fake.requests[0]?.headers.get("authorization")).toBe("apikey test-ubs-bibs-read");
  });

  it("does not fetch again once loaded", async () => {
    fake.on("GET", BIB_PATH, xml(bibXml()));

    const bib = await client.bib(MMS_ID, SCOPE).load();
    await bib.load();

    expect(fake.calls("GET", BIB_PATH)).toHaveLength(1);
  });

  it("translates a zone alias before resolving keys", async () => {
    fake.on("GET", BIB_PATH, xml(bibXml()));

    const bib = await client.bib(MMS_ID, { zone: "Basel" }).load();

    expect(bib.zone).toBe("UBS");
    expect(bib.failed).toBe(false);
  });

  it("surfaces a missing key on read without calling the API", async () => {
    await expect(client.bib(MMS_ID, { zone: "NZ" }).load()).rejects.toBeInstanceOf(
      CredentialNotFoundError,
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("surfaces a rejected read", async () => {
    fake.on("GET", BIB_PATH, {
      status: 400,
      contentType: "application/json",
      body: errorJson("Input parameters mmsId is not valid."),
    });

    await expect(client.bib(MMS_ID, SCOPE).load()).rejects.toMatchObject({
      status: 400,
      remoteMessage: "Input parameters mmsId is not valid.",
    });
  });

  // ── Bib mutations ─────────────────────────────────────────────────────

  it("backs up the remote record, then updates with the read-write key", async () => {
    fake
      .on("GET", BIB_PATH, xml(bibXml()))
      .on("PUT", BIB_PATH, (req) => xml(req.body ?? ""));

    const bib = await client.bib(MMS_ID, SCOPE).load();
    bib.addDatafields([
      { "@_tag": "500", "@_ind1": " ", "@_ind2": " ", subfield: [{ "@_code": "a", "#text": "Note" }] },
    ]);
    expect(bib.isDirty).toBe(true);

    await bib.update();

    expect(bib.failed).toBe(false);
    expect(bib.isDirty).toBe(false);
    expect(fake.requests.map((r) => r.method)).toEqual(["GET", "GET", "PUT"]);

    const put = fake.calls("PUT", BIB_PATH)[0];
    expect(put?.headers.get("authorization")).toBe("apikey test-ubs-rw");
    expect(put?.headers.get("content-type")).toBe("application/xml");
    expect(datafieldTags(put?.body ?? null)).toEqual(["245", "500", "650"]);

    const files = backupFiles();
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(new RegExp(`^bib_${MMS_ID}_\\d{8}T\\d{9}Z_update\\.xml$`));
    expect(fs.readFileSync(path.join(backupDir, "UBS", "production", files[0] ?? ""), "utf-8")).toBe(
      bibXml(),
    );
  });

  it("unlinks a record from the NZ, then deletes it with override", async () => {
    fake
      .on("GET", BIB_PATH, xml(bibXml()))
      .on("POST", BIB_PATH, xml(bibXml()))
      .on("DELETE", BIB_PATH, { status: 204, remaining: 90_000 });

    const bib = await client.bib(MMS_ID, SCOPE).delete();

    expect(bib.failed).toBe(false);
    expect(fake.requests.map((r) => r.method)).toEqual(["GET", "GET", "POST", "DELETE"]);
    const unlink = fake.calls("POST", BIB_PATH)[0];
    expect(unlink?.query.get("op")).toBe("unlink_from_nz");
    expect(unlink?.body).toBe("<bib/>");
    expect(fake.calls("DELETE", BIB_PATH)[0]?.query.get("override")).toBe("true");
    expect(backupFiles()).toHaveLength(1);
    expect(backupFiles()[0]).toMatch(/_delete\.xml$/);
  });

  it("deletes a record without NZ link directly", async () => {
    const localOnly = bibXml().replace(
      `<linked_record_id type="NZ">${NZ_MMS_ID}</linked_record_id>`,
      "",
    );
    fake.on("GET", BIB_PATH, xml(localOnly)).on("DELETE", BIB_PATH, { status: 204 });

    const bib = await client.bib(MMS_ID, SCOPE).load();
    await bib.delete();

    expect(bib.failed).toBe(false);
    expect(fake.requests.map((r) => r.method)).toEqual(["GET", "GET", "DELETE"]);
  });

  it("force-deletes items and holdings before the record", async () => {
    fake
      .on("GET", BIB_PATH, xml(bibXml()))
      .on("GET", `${BIB_PATH}/holdings`, xml(`<holdings total_record_count="1">${holdingXml()}</holdings>`))
      .on("GET", HOLDING_PATH, xml(holdingXml()))
      .on("GET", `${HOLDING_PATH}/items`, xml(`<items total_record_count="1">${itemXml()}</items>`))
      .on("GET", ITEM_PATH, xml(itemXml()))
      .on("DELETE", ITEM_PATH, { status: 204 })
      .on("DELETE", HOLDING_PATH, { status: 204 })
      .on("POST", BIB_PATH, xml(bibXml()))
      .on("DELETE", BIB_PATH, { status: 204 });

    const bib = await client.bib(MMS_ID, SCOPE).delete({ force: true });

    expect(bib.failed).toBe(false);
    expect(fake.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      `GET ${BIB_PATH}`,
      `GET ${BIB_PATH}/holdings`,
      `GET ${HOLDING_PATH}`,
      `GET ${HOLDING_PATH}/items`,
      `GET ${ITEM_PATH}`,
      `DELETE ${ITEM_PATH}`,
      `DELETE ${HOLDING_PATH}`,
      `GET ${BIB_PATH}`,
      `POST ${BIB_PATH}`,
      `DELETE ${BIB_PATH}`,
    ]);
    const files = backupFiles();
    expect(files).toHaveLength(3);
    expect(files[0]).toMatch(new RegExp(`^bib_${MMS_ID}_\\d{8}T\\d{9}Z_delete\\.xml$`));
    expect(files[1]).toMatch(new RegExp(`^holding_${HOLDING_ID}_\\d{8}T\\d{9}Z_delete\\.xml$`));
    expect(files[2]).toMatch(new RegExp(`^item_${ITEM_ID}_\\d{8}T\\d{9}Z_delete\\.xml$`));
  });

  it("keeps the record when an item of the cascade cannot be deleted", async () => {
    fake
      .on("GET", BIB_PATH, xml(bibXml()))
      .on("GET", `${BIB_PATH}/holdings`, xml(`<holdings total_record_count="1">${holdingXml()}</holdings>`))
      .on("GET", HOLDING_PATH, xml(holdingXml()))
      .on("GET", `${HOLDING_PATH}/items`, xml(`<items total_record_count="1">${itemXml()}</items>`))
      .on("GET", ITEM_PATH, xml(itemXml()))
      .on("DELETE", ITEM_PATH, {
        status: 400,
        contentType: "application/json",
        body: errorJson("Item has active loan."),
      });

    const bib = await client.bib(MMS_ID, SCOPE).delete({ force: true });

    expect(bib.failed).toBe(true);
    expect(bib.failure).toBeInstanceOf(ResourceStateError);
    expect(fake.calls("DELETE", HOLDING_PATH)).toHaveLength(0);
    expect(fake.calls("POST", BIB_PATH)).toHaveLength(0);
    expect(fake.calls("DELETE", BIB_PATH)).toHaveLength(0);
  });

  it("deletes all holdings without backing up the bib itself", async () => {
    fake
      .on("GET", `${BIB_PATH}/holdings`, xml(`<holdings total_record_count="1">${holdingXml()}</holdings>`))
      .on("GET", HOLDING_PATH, xml(holdingXml()))
      .on("DELETE", HOLDING_PATH, { status: 204 });

    const bib = await client.bib(MMS_ID, SCOPE).deleteHoldings();

    expect(bib.failed).toBe(false);
    expect(fake.calls("DELETE", HOLDING_PATH)).toHaveLength(1);
    expect(fake.calls("GET", `${HOLDING_PATH}/items`)).toHaveLength(0);
    expect(backupFiles()).toHaveLength(1);
    expect(backupFiles()[0]).toMatch(/^holding_/);
    await expect(bib.getHoldings()).resolves.toEqual([]);
  });

  it("finds the IZ record through its NZ MMS ID", async () => {
    fake.on("GET", "/bibs", xml(`<bibs total_record_count="1">${bibXml()}</bibs>`));

    const bib = await client.bibByNzId(NZ_MMS_ID, SCOPE).load();

    expect(fake.calls("GET", "/bibs")[0]?.query.get("nz_mms_id")).toBe(NZ_MMS_ID);
    expect(bib.mmsId).toBe(MMS_ID);
    expect(bib.nzMmsId).toBe(NZ_MMS_ID);
    expect(bib.record).not.toBeNull();
  });

  it("copies the record from the NZ when the IZ has none", async () => {
    fake
      .on("GET", "/bibs", xml('<bibs total_record_count="0"></bibs>'))
      .on("POST", "/bibs", xml(bibXml()));

    const bib = await client.bibByNzId(NZ_MMS_ID, SCOPE).loadOrCopyFromNz();

    expect(bib.failed).toBe(false);
    expect(bib.mmsId).toBe(MMS_ID);
    const copy = fake.calls("POST", "/bibs")[0];
    expect(copy?.query.get("from_nz_mms_id")).toBe(NZ_MMS_ID);
    expect(copy?.body).toBe("<bib/>");
    const files = backupFiles();
    expect(files[0]).toMatch(/^bib_new_\d{8}T\d{9}Z_create\.xml$/);
    expect(fs.readFileSync(path.join(backupDir, "UBS", "production", files[0] ?? ""), "utf-8")).toBe(
      "<bib/>",
    );
  });

  it("does not copy from the NZ when the lookup fails for another reason", async () => {
    fake.on("GET", "/bibs", { status: 500, contentType: "application/json", body: errorJson("Internal") });

    await expect(client.bibByNzId(NZ_MMS_ID, SCOPE).loadOrCopyFromNz()).rejects.toBeInstanceOf(
      RemoteServerError,
    );
    expect(fake.calls("POST", "/bibs")).toHaveLength(0);
  });

  it("creates a bib and adopts the assigned MMS ID", async () => {
    fake.on("POST", "/bibs", xml(bibXml()));

    const draft = bibXml()
      .replace(`<mms_id>${MMS_ID}</mms_id>`, "")
      .replace(`<controlfield tag="001">${MMS_ID}</controlfield>`, "");
    const bib = client.newBib(xmlCodec.parse(draft), SCOPE);
    expect(bib.mmsId).toBeNull();

    await bib.create();

    expect(bib.mmsId).toBe(MMS_ID);
    expect(backupFiles()[0]).toMatch(/^bib_new_\d{8}T\d{9}Z_create\.xml$/);
  });

  it("marks the handle failed on a rejected update and skips later mutations", async () => {
    fake
      .on("GET", BIB_PATH, xml(bibXml()))
      .on("PUT", BIB_PATH, {
        status: 400,
        contentType: "application/json",
        body: errorJson("Mandatory field is missing."),
        remaining: 90_000,
      })
      .on("DELETE", BIB_PATH, { status: 204 });

    const bib = await client.bib(MMS_ID, SCOPE).load();
    const returned = await bib.update();

    expect(returned).toBe(bib);
    expect(bib.failed).toBe(true);
    expect(bib.failure).toBeInstanceOf(RemoteRejectedError);

    const requestsBefore = fake.requests.length;
    await bib.delete();
    await bib.refresh();
    await bib.save();

    expect(fake.requests).toHaveLength(requestsBefore);
    expect(fake.calls("DELETE", BIB_PATH)).toHaveLength(0);
    expect(backupFiles()).toHaveLength(1);
  });

  it("rethrows mutation failures in strict mode", async () => {
    client = createAlmaClient({
      config: createTestConfig(backupDir, { guard: { strict: true } }),
      logger: createSilentLogger(),
      registry: createTestRegistry(),
      onHalt,
    });
    fake.on("GET", BIB_PATH, xml(bibXml())).on("PUT", BIB_PATH, {
      status: 400,
      contentType: "application/json",
      body: errorJson("Mandatory field is missing."),
    });

    const bib = await client.bib(MMS_ID, SCOPE).load();

    await expect(bib.update()).rejects.toBeInstanceOf(RemoteRejectedError);
    expect(bib.failed).toBe(true);
  });

  it("restores the last backup into memory", async () => {
    fake
      .on("GET", BIB_PATH, xml(bibXml()))
      .on("PUT", BIB_PATH, (req) => xml(req.body ?? ""));

    const bib = await client.bib(MMS_ID, SCOPE).load();
    await bib.addDatafields([{ "@_tag": "500", subfield: [{ "@_code": "a", "#text": "Note" }] }]).update();
    expect(extractAllDataFields(bib.record, "500")).toHaveLength(1);

    await bib.restoreFromBackup();

    expect(bib.isDirty).toBe(true);
    expect(extractAllDataFields(bib.record, "500")).toHaveLength(0);
  });

  it("fails the handle when no backup exists to restore", async () => {
    const bib = await client.bib(MMS_ID, SCOPE).restoreFromBackup();
    expect(bib.failed).toBe(true);
  });

  it("writes a manual save backup", async () => {
    fake.on("GET", BIB_PATH, xml(bibXml()));

    const bib = await client.bib(MMS_ID, SCOPE).load();
    await bib.save();

    expect(backupFiles()[0]).toMatch(new RegExp(`^bib_${MMS_ID}_\\d{8}T\\d{9}Z_save\\.xml$`));
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("uses the sandbox key and directory for sandbox handles", async () => {
    fake
      .on("GET", BIB_PATH, xml(bibXml()))
      .on("PUT", BIB_PATH, (req) => xml(req.body ?? ""));

    const bib = await client.bib(MMS_ID, { zone: "UBS", environment: "sandbox" }).load();
    await bib.update();

    expect(fake.requests.every((r) => r.headers.get("authorization") === "apikey test-ubs-rw")).toBe(
      true,
    );
    expect(backupFiles("sandbox")).toHaveLength(1);
    expect(backupFiles("production")).toHaveLength(0);
  });

  // ── Quota ─────────────────────────────────────────────────────────────

  it("halts every handle once the quota floor is breached", async () => {
    fake.on("GET", BIB_PATH, { ...xml(bibXml()), remaining: 4_000 });

    const bib = await client.bib(MMS_ID, SCOPE).load();
    const other = client.bib(MMS_ID, SCOPE);

    await expect(other.load()).rejects.toBeInstanceOf(QuotaHaltedError);
    await expect(bib.update()).rejects.toBeInstanceOf(QuotaHaltedError);
    expect(bib.failed).toBe(false);
    expect(onHalt).toHaveBeenCalledTimes(1);
    expect(fake.requests).toHaveLength(1);
    expect(client.governor.state).toBe("halted");
  });

  // ── Holdings and items ────────────────────────────────────────────────

  it("lists the holdings of a bib", async () => {
    fake.on(
      "GET",
      `${BIB_PATH}/holdings`,
      xml(
        '<holdings total_record_count="2">' +
          `<holding><holding_id>${HOLDING_ID}</holding_id></holding>` +
          "<holding><holding_id>222000000000005504</holding_id></holding>" +
          "</holdings>",
      ),
    );

    const holdings = await client.bib(MMS_ID, SCOPE).getHoldings();

    expect(holdings.map((h) => h.holdingId)).toEqual([HOLDING_ID, "222000000000005504"]);
    expect(holdings[0]?.mmsId).toBe(MMS_ID);
  });

  it("reads and edits library and location of a holding", async () => {
    fake.on("GET", HOLDING_PATH, xml(holdingXml()));

    const holding = await client.holding(MMS_ID, HOLDING_ID, SCOPE).load();
    expect(holding.library).toBe("MAIN");
    expect(holding.location).toBe("STACKS");

    holding.setLocation("ARCHIVE");

    expect(holding.location).toBe("ARCHIVE");
    expect(holding.isDirty).toBe(true);
    expect(holding.toString()).toContain(
      '<datafield tag="852" ind1="4" ind2=" "><subfield code="b">MAIN</subfield><subfield code="c">ARCHIVE</subfield></datafield>',
    );
  });

  it("fails the holding when 852 lacks the subfield to edit", async () => {
    fake.on(
      "GET",
      HOLDING_PATH,
      xml(`<holding><holding_id>${HOLDING_ID}</holding_id><record></record></holding>`),
    );

    const holding = await client.holding(MMS_ID, HOLDING_ID, SCOPE).load();
    holding.setLibrary("OTHER");

    expect(holding.failed).toBe(true);
  });

  it("lists items of a holding with their data pre-loaded", async () => {
    fake.on(
      "GET",
      `${HOLDING_PATH}/items`,
      xml(`<items total_record_count="1">${itemXml()}</items>`),
    );

    const items = await client.holding(MMS_ID, HOLDING_ID, SCOPE).getItems();

    expect(items).toHaveLength(1);
    expect(items[0]?.itemId).toBe(ITEM_ID);
    expect(items[0]?.barcode).toBe("BC-0001");
    expect(fake.calls("GET", `${HOLDING_PATH}/items`)[0]?.query.get("limit")).toBe("100");
  });

  it("finds an item by barcode and updates it at its full path", async () => {
    fake
      .on("GET", "/items", (req) =>
        req.query.get("item_barcode") === "BC-0001"
          ? xml(itemXml())
          : { status: 400, contentType: "application/json", body: errorJson("No items found") },
      )
      .on("GET", ITEM_PATH, xml(itemXml()))
      .on("PUT", ITEM_PATH, (req) => xml(req.body ?? ""));

    const item = await client.itemByBarcode("BC-0001", SCOPE).load();
    expect(item.itemId).toBe(ITEM_ID);
    expect(item.holdingId).toBe(HOLDING_ID);

    await item.setBarcode("BC-0002").update();

    expect(item.failed).toBe(false);
    expect(item.barcode).toBe("BC-0002");
    expect(fake.calls("PUT", ITEM_PATH)).toHaveLength(1);
    expect(fake.calls("GET", "/items")).toHaveLength(1);
  });

  // ── Round trips ───────────────────────────────────────────────────────

  it("stores an added field and leaves fixed-length fields intact", async () => {
    const stored = serveStored(fake, BIB_PATH, fixedFieldBibXml());
    const note =
      '<datafield tag="500" ind1=" " ind2=" "><subfield code="a">Note</subfield></datafield>';

    const bib = await client.bib(MMS_ID, SCOPE).load();
    await bib
      .addDatafields([
        { "@_tag": "500", "@_ind1": " ", "@_ind2": " ", subfield: [{ "@_code": "a", "#text": "Note" }] },
      ])
      .update();

    expect(bib.failed).toBe(false);
    expect(stored()).toBe(
      fixedFieldBibXml().replace('<datafield tag="650"', `${note}<datafield tag="650"`),
    );

    const reread = await client.bib(MMS_ID, SCOPE).load();
    expect(getIn(reread.data, ["bib", "record", "leader"])).toBe(LEADER);
    expect(extractControlField(reread.record, "008")).toBe(FIELD_008);
    expect(extractAllDataFields(reread.record, "500")).toHaveLength(1);
  });

  it("stores a new barcode and nothing else", async () => {
    const stored = serveStored(fake, ITEM_PATH, itemXml());

    const item = await client.item(MMS_ID, HOLDING_ID, ITEM_ID, SCOPE).load();
    await item.setBarcode("BC-0002").update();

    expect(item.failed).toBe(false);
    expect(stored()).toBe(itemXml("BC-0002"));

    const reread = await client.item(MMS_ID, HOLDING_ID, ITEM_ID, SCOPE).load();
    expect(reread.barcode).toBe("BC-0002");
  });
});
