import matter from "gray-matter";
import { MalformedHeaderError, toError } from "../errors";
import { headerToObject, readHeaderFields } from "./header";
import type { Document, Header, HeaderValue, SourceIdentifier } from "./model";
import { formatOf } from "./source-id";

export const HEADER_SENTINEL = "---";
const BYTE_ORDER_MARK = "\uFEFF";

function isSentinel(line: string | undefined): boolean {
  return line !== undefined && line.trimEnd() === HEADER_SENTINEL;
}

function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
}

function normalizeValue(value: unknown, key: string, file: string): HeaderValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item: unknown) => normalizeValue(item, key, file)));
  }
  if (typeof value === "object") {
    const nested: Record<string, HeaderValue> = {};
    for (const [nestedKey, nestedValue] of Object.entries(value)) {
      nested[nestedKey] = normalizeValue(nestedValue, `${key}.${nestedKey}`, file);
    }
    return Object.freeze(nested);
  }
  throw new MalformedHeaderError(file, `unsupported value for "${key}"`);
}

function decodeHeader(headerLines: string[], file: string): Header {
  // gray-matter would end the block at any line starting with the delimiter.
  const stray = headerLines.findIndex((line) => line.startsWith(HEADER_SENTINEL));
  if (stray !== -1) {
    throw new MalformedHeaderError(file, `line ${stray + 2} starts with "${HEADER_SENTINEL}" inside the header`);
  }

  const headerText = headerLines.join("\n");
  let data: unknown;
  try {
    // Options bypass gray-matter's cache, which shares `data` between calls.
    data = matter(`${HEADER_SENTINEL}\n${headerText}\n${HEADER_SENTINEL}\n`, {}).data;
  } catch (err) {
    throw new MalformedHeaderError(file, toError(err).message);
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new MalformedHeaderError(file, "header must be a list of key: value pairs");
  }

  const header = new Map<string, HeaderValue>();
  for (const [key, value] of Object.entries(data)) {
    header.set(key, normalizeValue(value, key, file));
  }
  return header;
}

/**
 * Split raw document text into header and body.
 *
 * A document without an opening `---` line has an empty header and is
 * all body. An opening line without a closing one is rejected rather than
 * read as a partial header. A leading byte-order mark is dropped.
 */
export function parseDocument(raw: string, source: SourceIdentifier): Document {
  const text = raw.startsWith(BYTE_ORDER_MARK) ? raw.slice(BYTE_ORDER_MARK.length) : raw;
  const lines = text.split("\n");
  let header: Header = new Map();
  let body = text;

  if (isSentinel(lines[0])) {
    let endIndex = -1;
    for (let i = 1; i < lines.length; i++) {
      if (isSentinel(lines[i])) {
        endIndex = i;
        break;
      }
    }

    if (endIndex === -1) {
      throw new MalformedHeaderError(source.path, `opening "${HEADER_SENTINEL}" is never closed`);
    }

    header = decodeHeader(lines.slice(1, endIndex), source.path);
    body = lines.slice(endIndex + 1).join("\n");
  }

  const fields = readHeaderFields(header, source.path);

  return Object.freeze({
    source: Object.freeze({ ...source }),
    format: formatOf(source),
    header,
    fields: Object.freeze(fields),
    body,
  });
}

export function serializeDocument(doc: Document): string {
  if (doc.header.size === 0) {
    const firstLine = doc.body.split("\n", 1)[0];
    return isSentinel(firstLine) ? `${HEADER_SENTINEL}\n${HEADER_SENTINEL}\n${doc.body}` : doc.body;
  }

  // gray-matter always ends with a blank line after the closing
  // delimiter; drop it so the body comes back byte for byte.
  const block = matter.stringify("", headerToObject(doc.header));
  return `${block.replace(/\n\n$/, "\n")}${doc.body}`;
}
