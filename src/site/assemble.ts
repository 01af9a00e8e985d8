import type { Document } from "../content/model";

/** Documents sharing a layout, newest first. */
export type Collection = readonly Document[];

export interface AssembleOptions {
  defaultLayout: string;
  includeUnpublished?: boolean;
}

export interface Assembly {
  /** Documents that will be rendered, in store enumeration order */
  documents: readonly Document[];
  collections: ReadonlyMap<string, Collection>;
}

const DATE_PREFIX_RE = /^\d{4}-\d{2}-\d{2}/;

export function layoutOf(document: Document, defaultLayout: string): string {
  return document.fields.layout ?? defaultLayout;
}

/** Filename date first, then a `date` header field. */
export function sortDateOf(document: Document): string | null {
  if (document.source.date) {
    return document.source.date;
  }
  const match = document.fields.date?.match(DATE_PREFIX_RE);
  return match ? match[0] : null;
}

export function compareByDateDescending(a: Document, b: Document): number {
  const dateA = sortDateOf(a);
  const dateB = sortDateOf(b);
  if (dateA === dateB) return 0;
  if (dateA === null) return 1;
  if (dateB === null) return -1;
  return dateA < dateB ? 1 : -1;
}

export function isPublished(document: Document): boolean {
  return document.fields.published !== false;
}

export function assembleCollections(documents: readonly Document[], options: AssembleOptions): Assembly {
  const included = documents.filter((document) => options.includeUnpublished || isPublished(document));

  const partitions = new Map<string, Document[]>();
  for (const document of included) {
    const layout = layoutOf(document, options.defaultLayout);
    const partition = partitions.get(layout);
    if (partition) {
      partition.push(document);
    } else {
      partitions.set(layout, [document]);
    }
  }

  // Array#sort is stable, so equal dates keep enumeration order.
  const collections = new Map<string, Collection>();
  for (const [layout, partition] of partitions) {
    collections.set(layout, Object.freeze([...partition].sort(compareByDateDescending)));
  }

  return { documents: Object.freeze(included), collections };
}

export function takeEntries(collection: Collection, limit?: number): Collection {
  return limit === undefined ? collection : collection.slice(0, limit);
}
