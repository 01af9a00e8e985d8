import type { Block, BlockKind } from "./model";

export const DEFAULT_EXCERPT_SEPARATOR = "\n\n";

const FENCE_RE = /^ {0,3}(`{3,}|~{3,})/;
const HEADING_RE = /^ {0,3}#{1,6}(\s|$)/;
const RULE_RE = /^ {0,3}([-*_])( *\1){2,} *$/;
const BLOCKQUOTE_RE = /^ {0,3}>/;
const LIST_RE = /^ {0,3}([-*+]|\d{1,9}[.)])\s/;
const HTML_RE = /^ {0,3}<[A-Za-z!/]/;

function classify(line: string): BlockKind {
  if (HEADING_RE.test(line)) return "heading";
  if (RULE_RE.test(line)) return "rule";
  if (BLOCKQUOTE_RE.test(line)) return "blockquote";
  if (LIST_RE.test(line)) return "list";
  if (HTML_RE.test(line)) return "html";
  return "paragraph";
}

function isBlank(line: string | undefined): boolean {
  return line === undefined || line.trim() === "";
}

function closesFence(line: string, marker: string): boolean {
  const char = marker[0] === "~" ? "~" : "`";
  return new RegExp(`^ {0,3}\\${char}{${marker.length},}\\s*$`).test(line);
}

/**
 * Walk a body block by block without building the whole list.
 *
 * Only block boundaries are recognised: blank lines, fenced code, and
 * single-line headings. Nothing inside a block is interpreted.
 */
export function* iterateBlocks(body: string): Generator<Block> {
  const lines = body.split("\n").map((line) => line.replace(/\r$/, ""));
  let i = 0;

  while (i < lines.length) {
    const line = lines[i] ?? "";
    if (isBlank(line)) {
      i++;
      continue;
    }

    const fence = line.match(FENCE_RE);
    if (fence?.[1]) {
      const marker = fence[1];
      const start = i;
      i++;
      while (i < lines.length && !closesFence(lines[i] ?? "", marker)) {
        i++;
      }
      // An unterminated fence runs to the end of the body.
      yield { kind: "code", text: lines.slice(start, i + 1).join("\n"), line: start + 1 };
      i++;
      continue;
    }

    const kind = classify(line);
    const start = i;
    i++;
    if (kind !== "heading") {
      while (i < lines.length) {
        const next = lines[i] ?? "";
        if (isBlank(next) || FENCE_RE.test(next) || HEADING_RE.test(next)) break;
        i++;
      }
    }

    yield { kind, text: lines.slice(start, i).join("\n"), line: start + 1 };
  }
}

/**
 * Leading part of a body for listing pages: everything before a custom
 * separator, or the first paragraph with the default one.
 */
export function excerptOf(body: string, separator = DEFAULT_EXCERPT_SEPARATOR): string {
  if (separator !== DEFAULT_EXCERPT_SEPARATOR) {
    const index = body.indexOf(separator);
    return (index === -1 ? body : body.slice(0, index)).trim();
  }

  for (const block of iterateBlocks(body)) {
    if (block.kind === "paragraph") {
      return block.text;
    }
  }
  return "";
}
