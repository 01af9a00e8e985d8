import fg from "fast-glob";
import { readFile } from "fs/promises";
import { resolve } from "path";
import { toError, type BuildIssue } from "../errors";
import type { Document } from "./model";
import { parseDocument } from "./parse";
import { parseSourceIdentifier } from "./source-id";

export interface DocumentStore {
  /** Parsed documents in store enumeration order */
  documents: readonly Document[];
  issues: BuildIssue[];
}

type LoadOutcome = { file: string; document: Document } | { file: string; error: Error };

export async function readDocumentFile(contentDir: string, relativePath: string): Promise<Document> {
  const raw = await readFile(resolve(contentDir, relativePath), "utf8");
  return parseDocument(raw, parseSourceIdentifier(relativePath));
}

/**
 * Expand glob patterns relative to the content directory. Paths matched
 * by more than one pattern appear once; the sorted result is the store
 * enumeration order.
 */
export async function resolveSourceFiles(patterns: string[], contentDir: string): Promise<string[]> {
  const seen = new Set<string>();
  const results: string[] = [];

  for (const pattern of patterns) {
    const matches = await fg(pattern, { cwd: contentDir, onlyFiles: true });
    for (const file of matches) {
      if (seen.has(file)) {
        continue;
      }
      seen.add(file);
      results.push(file);
    }
  }

  return results.sort((a, b) => a.localeCompare(b));
}

export async function loadStore(opts: { contentDir: string; patterns: string[] }): Promise<DocumentStore> {
  const files = await resolveSourceFiles(opts.patterns, opts.contentDir);

  const outcomes = await Promise.all(
    files.map(async (file): Promise<LoadOutcome> => {
      try {
        return { file, document: await readDocumentFile(opts.contentDir, file) };
      } catch (err) {
        return { file, error: toError(err) };
      }
    })
  );

  const documents: Document[] = [];
  const issues: BuildIssue[] = [];
  for (const outcome of outcomes) {
    if ("document" in outcome) {
      documents.push(outcome.document);
    } else {
      issues.push({ file: outcome.file, error: outcome.error });
    }
  }

  return { documents: Object.freeze(documents), issues };
}
