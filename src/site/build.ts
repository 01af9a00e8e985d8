import { resolve } from "path";
import type { ResolvedConfig } from "../config";
import { loadStore } from "../content/load";
import type { Document } from "../content/model";
import { toError, DuplicateOutputError, type BuildIssue } from "../errors";
import { loadTemplateSet, type TemplateSet } from "../presentation/templates";
import { createRenderer } from "../render";
import { assembleCollections } from "./assemble";
import { outputPathForUrl } from "./url";
import { writePage } from "./write";

export interface BuildSiteOptions {
  rootDir: string;
  config: ResolvedConfig;
  /** false renders everything but writes nothing */
  write?: boolean;
}

export interface BuiltPage {
  /** Source path relative to the content directory */
  file: string;
  url: string;
  outputPath: string;
}

export interface MissingFieldWarning {
  file: string;
  layout: string;
  fields: string[];
}

export interface BuildReport {
  documentCount: number;
  pages: BuiltPage[];
  issues: BuildIssue[];
  warnings: MissingFieldWarning[];
}

interface RenderedPage extends BuiltPage {
  html: string;
  layout: string;
  missingFields: string[];
}

interface RenderPass {
  rendered: RenderedPage[];
  issues: BuildIssue[];
}

function renderPass(
  documents: readonly Document[],
  templates: TemplateSet,
  config: ResolvedConfig,
  outputDir: string
): RenderPass {
  const assembly = assembleCollections(documents, {
    defaultLayout: config.defaultLayout,
    includeUnpublished: config.includeUnpublished,
  });
  const renderer = createRenderer(templates, {
    collections: assembly.collections,
    site: config.site,
    options: config,
  });

  const rendered: RenderedPage[] = [];
  const issues: BuildIssue[] = [];
  const claimed = new Map<string, string>();

  for (const document of assembly.documents) {
    const file = document.source.path;
    try {
      const result = renderer.render(document);
      const outputPath = resolve(outputDir, outputPathForUrl(result.url));

      const owner = claimed.get(outputPath);
      if (owner !== undefined) {
        throw new DuplicateOutputError(file, outputPath, owner);
      }
      claimed.set(outputPath, file);
      rendered.push({ file, outputPath, ...result });
    } catch (err) {
      issues.push({ file, error: toError(err) });
    }
  }
  return { rendered, issues };
}

/**
 * Read, assemble, render and write a whole site. A document that fails is
 * recorded in `issues` and the rest still build. Failed documents are left
 * out of the collections, so listings never link to a page that was not
 * written.
 */
export async function buildSite(opts: BuildSiteOptions): Promise<BuildReport> {
  const { config } = opts;
  const write = opts.write ?? true;
  const outputDir = resolve(opts.rootDir, config.outputDir);

  const templates = await loadTemplateSet(resolve(opts.rootDir, config.layoutsDir));
  const store = await loadStore({
    contentDir: resolve(opts.rootDir, config.contentDir),
    patterns: config.source,
  });

  let pass = renderPass(store.documents, templates, config, outputDir);
  const issues: BuildIssue[] = [...store.issues, ...pass.issues];

  if (pass.issues.length > 0) {
    const failed = new Set(pass.issues.map((issue) => issue.file));
    const survivors = store.documents.filter((document) => !failed.has(document.source.path));
    pass = renderPass(survivors, templates, config, outputDir);
    issues.push(...pass.issues);
  }

  const pages: BuiltPage[] = [];
  const warnings: MissingFieldWarning[] = [];
  for (const page of pass.rendered) {
    if (page.missingFields.length > 0) {
      warnings.push({ file: page.file, layout: page.layout, fields: page.missingFields });
    }
    if (write) {
      await writePage(page.html, page.outputPath);
    }
    pages.push({ file: page.file, url: page.url, outputPath: page.outputPath });
  }

  return {
    documentCount: store.documents.length + store.issues.length,
    pages,
    issues,
    warnings,
  };
}
