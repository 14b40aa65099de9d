// ---------------------------------------------------------------------------
// Document codecs and path helpers.
//
// XML bodies are parsed with fast-xml-parser into plain objects:
//   - attributes are prefixed "@_" (e.g. "@_tag")
//   - text of an element that also has attributes lives under "#text"
//   - tag and attribute values stay strings (MMS IDs exceed 2^53)
// ---------------------------------------------------------------------------

import { XMLBuilder, XMLParser } from "fast-xml-parser";

import type { DataFormat, Document } from "../core/types.js";
import { DocumentParseError } from "../core/errors.js";

/** Elements that repeat inside MARC records. */
const REPEATED_TAGS = new Set(["controlfield", "datafield", "subfield"]);

/** List wrappers whose children must always be arrays. */
const LIST_PATHS = new Set(["bibs.bib", "holdings.holding", "items.item"]);

const ATTRIBUTE_PREFIX = "@_";
const TEXT_NODE = "#text";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
  // Attribute values and leaf text are kept verbatim: MARC indicators are
  // often " " and fixed-length fields (leader, 008) may end in blanks.
  // Layout whitespace between elements is removed by dropLayoutText.
  trimValues: false,
  // Entities must be decoded on parse so that the builder's re-encoding
  // yields the original text.
  processEntities: true,
  htmlEntities: false,
  isArray: (name, jpath) => REPEATED_TAGS.has(name) || LIST_PATHS.has(jpath),
});

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  format: false,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
});

// ── Guards ────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalise a value that may be a single object or an array into an array.
 */
export function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

// ── Codecs ────────────────────────────────────────────────────────────────

export interface DocumentCodec {
  readonly format: DataFormat;
  parse(body: string): Document;
  serialize(doc: Document): string;
}

export const xmlCodec: DocumentCodec = {
  format: "xml",

  parse(body: string): Document {
    let parsed: unknown;
    try {
      parsed = xmlParser.parse(body, true);
    } catch (err) {
      throw new DocumentParseError(
        `Failed to parse XML: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    if (!isRecord(parsed)) {
      throw new DocumentParseError("XML body has no root element");
    }
    dropLayoutText(parsed);
    return parsed;
  },

  serialize(doc: Document): string {
    return String(xmlBuilder.build(doc));
  },
};

/**
 * Remove whitespace-only "#text" from elements that also hold child
 * elements.  Text of leaf elements is never touched.
 */
function dropLayoutText(node: Record<string, unknown>): void {
  const keys = Object.keys(node);
  const hasChildElements = keys.some(
    (key) => key !== TEXT_NODE && !key.startsWith(ATTRIBUTE_PREFIX),
  );
  if (hasChildElements && isBlankText(node[TEXT_NODE])) {
    delete node[TEXT_NODE];
  }
  for (const key of keys) {
    for (const child of toArray(node[key])) {
      if (isRecord(child)) dropLayoutText(child);
    }
  }
}

function isBlankText(value: unknown): boolean {
  if (typeof value === "string") return value.trim() === "";
  return Array.isArray(value) && value.every((part) => isBlankText(part));
}

export const jsonCodec: DocumentCodec = {
  format: "json",

  parse(body: string): Document {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw new DocumentParseError(
        `Failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    if (!isRecord(parsed)) {
      throw new DocumentParseError("JSON body is not an object");
    }
    return parsed;
  },

  serialize(doc: Document): string {
    return JSON.stringify(doc);
  },
};

export function codecFor(format: DataFormat): DocumentCodec {
  return format === "xml" ? xmlCodec : jsonCodec;
}

// ── Path helpers ──────────────────────────────────────────────────────────

/** Walk `path` through nested objects; `undefined` when any step is missing. */
export function getIn(doc: unknown, path: readonly string[]): unknown {
  let node: unknown = doc;
  for (const key of path) {
    if (!isRecord(node)) return undefined;
    node = node[key];
  }
  return node;
}

/**
 * Text content at `path`.  Handles plain values as well as elements that
 * carry attributes (`{ "#text": ..., "@_attr": ... }`).
 */
export function readText(doc: unknown, path: readonly string[]): string | null {
  return textOf(getIn(doc, path));
}

export function textOf(node: unknown): string | null {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  if (isRecord(node)) return textOf(node["#text"]);
  return null;
}

/**
 * Set the text at `path`, creating missing intermediate objects.  An element
 * with attributes keeps them and only has its "#text" replaced.
 */
export function writeText(doc: Document, path: readonly string[], value: string): void {
  if (path.length === 0) return;

  let node: Record<string, unknown> = doc;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }

  const leaf = path[path.length - 1];
  const current = node[leaf];
  if (isRecord(current)) {
    current["#text"] = value;
  } else {
    node[leaf] = value;
  }
}
