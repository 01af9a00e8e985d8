import type { HeaderFields } from "./header";

export type HeaderScalar = string | number | boolean | null;

export type HeaderValue =
  | HeaderScalar
  | readonly HeaderValue[]
  | { readonly [key: string]: HeaderValue };

/** Frontmatter fields in source order. */
export type Header = ReadonlyMap<string, HeaderValue>;

export type SourceFormat = "markdown" | "html";

export interface SourceIdentifier {
  /** Path relative to the content directory, posix separators */
  path: string;
  /** Basename without extension */
  stem: string;
  extension: string;
  /** `YYYY-MM-DD` from a dated filename, e.g. `2019-04-08-hello.md` */
  date: string | null;
  slug: string;
}

export interface Document {
  readonly source: SourceIdentifier;
  readonly format: SourceFormat;
  readonly header: Header;
  /** Recognised header keys, validated */
  readonly fields: HeaderFields;
  readonly body: string;
}

export type BlockKind = "heading" | "paragraph" | "code" | "blockquote" | "list" | "html" | "rule";

export interface Block {
  kind: BlockKind;
  text: string;
  /** 1-based line within the body */
  line: number;
}
