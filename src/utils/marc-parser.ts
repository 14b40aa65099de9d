// ---------------------------------------------------------------------------
// MARC XML helpers for fast-xml-parser output.
//
// fast-xml-parser can return either a single object or an array for repeated
// XML elements.  Every helper in this module handles both cases transparently.
//
// Expected parsed structure (with ignoreAttributes: false):
//   record.datafield  -> array | single object, each with @_tag, subfield(s)
//   record.controlfield -> array | single object, each with @_tag, #text
//   subfield -> array | single object, each with @_code, #text
// ---------------------------------------------------------------------------

import { isRecord, textOf, toArray } from "./documents.js";

export type MarcField = Record<string, unknown>;

function fieldsOf(record: unknown, kind: "datafield" | "controlfield"): MarcField[] {
  if (!isRecord(record)) return [];
  return toArray(record[kind]).filter(isRecord);
}

// ── Data-field helpers ────────────────────────────────────────────────────

/**
 * Extract the text content of a specific subfield from the *first* matching
 * MARC data field.
 *
 * @returns  The subfield text, or `null` if not found.
 */
export function extractDataField(
  record: unknown,
  tag: string,
  subfield: string,
): string | null {
  const fields = extractAllDataFields(record, tag);
  if (fields.length === 0) return null;
  return extractSubfieldValues(fields[0], subfield)[0] ?? null;
}

/**
 * Return *all* data-field objects for the given MARC tag.
 *
 * Each returned object retains the shape produced by fast-xml-parser,
 * including `@_tag`, `@_ind1`, `@_ind2`, and a `subfield` property.
 */
export function extractAllDataFields(record: unknown, tag: string): MarcField[] {
  return fieldsOf(record, "datafield").filter((f) => f["@_tag"] === tag);
}

// ── Control-field helpers ─────────────────────────────────────────────────

/**
 * Extract the text of a MARC control field (001–009).
 *
 * @returns  The field text, or `null` if not found.
 */
export function extractControlField(record: unknown, tag: string): string | null {
  const field = fieldsOf(record, "controlfield").find((cf) => cf["@_tag"] === tag);
  return field ? textOf(field) : null;
}

// ── Subfield extraction helpers ───────────────────────────────────────────

/**
 * Given a single data-field object, return all subfield text values that
 * match the given code.
 */
export function extractSubfieldValues(datafield: unknown, code: string): string[] {
  if (!isRecord(datafield)) return [];
  const results: string[] = [];
  for (const sub of toArray(datafield["subfield"])) {
    if (isRecord(sub) && sub["@_code"] === code) {
      const text = textOf(sub);
      if (text !== null) results.push(text);
    }
  }
  return results;
}

// ── Local fields ──────────────────────────────────────────────────────────

/**
 * Data fields flagged as local extensions (subfield 9 = "LOCAL",
 * case-insensitive).
 */
export function extractLocalFields(record: unknown): MarcField[] {
  return fieldsOf(record, "datafield").filter((f) =>
    extractSubfieldValues(f, "9").some((v) => v.toLowerCase() === "local"),
  );
}

// ── Mutation ──────────────────────────────────────────────────────────────

/**
 * Append data fields to a record and re-sort all data fields by tag.  The
 * sort is stable, so fields sharing a tag keep their relative order.
 */
export function appendDataFields(record: Record<string, unknown>, fields: MarcField[]): void {
  const merged = [...fieldsOf(record, "datafield"), ...fields.map((f) => structuredClone(f))];
  record["datafield"] = sortFieldsByTag(merged);
}

export function sortFieldsByTag(fields: MarcField[]): MarcField[] {
  const tagOf = (f: MarcField): string =>
    typeof f["@_tag"] === "string" ? f["@_tag"] : "000";
  return [...fields].sort((a, b) => tagOf(a).localeCompare(tagOf(b)));
}
