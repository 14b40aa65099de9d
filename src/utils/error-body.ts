// ---------------------------------------------------------------------------
// Extraction of the human-readable message from Alma error envelopes.
//
// JSON:  { "errorList": { "error": [ { "errorMessage": "..." } ] } }
// XML:   <web_service_result xmlns="http://com/exlibris/urm/general/xmlbeans">
//          <errorList><error><errorMessage>...</errorMessage></error></errorList>
//        </web_service_result>
// ---------------------------------------------------------------------------

import { XMLParser } from "fast-xml-parser";

import { isRecord, toArray } from "./documents.js";

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  processEntities: false,
  parseTagValue: false,
});

/**
 * Return the first `errorMessage` found in an Alma error body, or `null`
 * when the body is empty or has no recognisable envelope.
 */
export function extractErrorMessage(
  body: string,
  contentType: string,
): string | null {
  const trimmed = body.trim();
  if (trimmed === "") return null;

  try {
    const parsed: unknown =
      contentType.includes("json") || trimmed.startsWith("{")
        ? JSON.parse(trimmed)
        : xmlParser.parse(trimmed);
    return findErrorMessage(parsed);
  } catch {
    // Bodies that are neither JSON nor XML carry no envelope.
    return null;
  }
}

function findErrorMessage(node: unknown): string | null {
  if (!isRecord(node)) return null;

  const direct = node["errorMessage"];
  if (typeof direct === "string") return direct;

  for (const value of Object.values(node)) {
    for (const child of toArray(value)) {
      const found = findErrorMessage(child);
      if (found !== null) return found;
    }
  }
  return null;
}
