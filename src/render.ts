import { marked } from "marked";
import type { MissingFieldPolicy } from "./config";
import { excerptOf, iterateBlocks } from "./content/blocks";
import { headerToObject } from "./content/header";
import type { Document } from "./content/model";
import { MissingTemplateFieldError, SiteError, UnknownLayoutError } from "./errors";
import { findMissingPageFields } from "./presentation/fields";
import { createTemplateEnvironment, type TemplateSet } from "./presentation/templates";
import { layoutOf, sortDateOf, takeEntries, type Collection } from "./site/assemble";
import { deriveUrl, type PermalinkStyle } from "./site/url";

export interface RenderOptions {
  defaultLayout: string;
  listingLayouts: string[];
  listCollection: string;
  permalink: PermalinkStyle;
  missingFields: MissingFieldPolicy;
  excerptSeparator: string;
  dateLocale: string;
}

export interface RenderContext {
  collections: ReadonlyMap<string, Collection>;
  /** Exposed to templates as `site` */
  site: Record<string, unknown>;
  options: RenderOptions;
}

export interface EntrySummary {
  title: string;
  url: string;
  date: string | null;
  slug: string;
  excerpt?: string;
}

export interface RenderResult {
  html: string;
  url: string;
  layout: string;
  /** Printed `page.<key>` fields the header lacks, rendered as "" */
  missingFields: string[];
}

export interface Renderer {
  render(document: Document): RenderResult;
}

const DEFAULT_ENTRIES_LAYOUT = "list";

function markdownToHtml(markdown: string): string {
  const html = marked.parse(markdown, { async: false });
  if (typeof html !== "string") {
    throw new SiteError("Markdown conversion returned a promise; async marked extensions are not supported");
  }
  return html;
}

export function convertBody(document: Document, body = document.body): string {
  return document.format === "html" ? body : markdownToHtml(body);
}

function titleOf(document: Document): string {
  if (document.fields.title) {
    return document.fields.title;
  }
  for (const block of iterateBlocks(document.body)) {
    if (block.kind === "heading") {
      return block.text.replace(/^ {0,3}#{1,6}\s*/, "").replace(/\s*#*\s*$/, "");
    }
  }
  return document.source.slug;
}

function isListing(document: Document, layout: string, options: RenderOptions): boolean {
  return options.listingLayouts.includes(layout) || document.fields.limit !== undefined;
}

/**
 * Bind a template set to one render pass. The returned renderer is a pure
 * function of the document: the same document renders to the same bytes.
 */
export function createRenderer(templates: TemplateSet, context: RenderContext): Renderer {
  const { options } = context;
  const env = createTemplateEnvironment(templates, { dateLocale: options.dateLocale });
  const excerpts = new Map<Document, string>();

  const urlOf = (document: Document): string => deriveUrl(document.source, document.fields, options.permalink);

  const summarize = (document: Document, withExcerpt: boolean): EntrySummary => {
    const summary: EntrySummary = {
      title: titleOf(document),
      url: urlOf(document),
      date: sortDateOf(document),
      slug: document.source.slug,
    };
    if (withExcerpt) {
      let excerpt = excerpts.get(document);
      if (excerpt === undefined) {
        excerpt = convertBody(document, excerptOf(document.body, options.excerptSeparator));
        excerpts.set(document, excerpt);
      }
      summary.excerpt = excerpt;
    }
    return summary;
  };

  const collectionSummaries: Record<string, EntrySummary[]> = {};
  for (const [layout, collection] of context.collections) {
    collectionSummaries[layout] = collection.map((document) => summarize(document, false));
  }

  return {
    render(document: Document): RenderResult {
      const layout = layoutOf(document, options.defaultLayout);
      if (!templates.has(layout)) {
        throw new UnknownLayoutError(document.source.path, layout);
      }

      const url = urlOf(document);
      const date = sortDateOf(document);
      const page: Record<string, unknown> = {
        ...headerToObject(document.header),
        layout,
        url,
        slug: document.source.slug,
        path: document.source.path,
        ...(date !== null && document.fields.date === undefined && { date }),
      };

      const missingFields = findMissingPageFields(layout, templates, page);
      if (missingFields.length > 0 && options.missingFields === "error") {
        throw new MissingTemplateFieldError(document.source.path, layout, missingFields);
      }

      const vars: Record<string, unknown> = {
        content: convertBody(document),
        page,
        site: context.site,
        collections: collectionSummaries,
      };

      if (isListing(document, layout, options)) {
        const collection = context.collections.get(document.fields.collection ?? options.listCollection) ?? [];
        const showExcerpts = document.fields.show_excerpts ?? false;
        vars.entries = takeEntries(collection, document.fields.limit).map((entry) =>
          summarize(entry, showExcerpts)
        );
        vars.show_excerpts = showExcerpts;
        vars.entries_layout = document.fields.entries_layout ?? DEFAULT_ENTRIES_LAYOUT;
      }

      return { html: env.render(layout, vars), url, layout, missingFields };
    },
  };
}

/** Render one document against a template set. */
export function renderDocument(document: Document, templates: TemplateSet, context: RenderContext): RenderResult {
  return createRenderer(templates, context).render(document);
}
