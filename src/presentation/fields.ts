import { layoutNameOf, type TemplateSet } from "./templates";

const INTERPOLATION_RE = /\{\{-?\s*([\s\S]+?)\s*-?\}\}/g;
const STRING_LITERAL_RE = /(['"`])(?:\\.|(?!\1).)*\1/g;
const PAGE_FIELD_RE = /(?<![\w.])page\.([A-Za-z_]\w*)/g;
const DEFAULT_FILTER_RE = /\|\s*default\b/;
const TEMPLATE_REFERENCE_RE = /\{%-?\s*(?:extends|include|import|from)\s+(['"])([^'"]+)\1/g;

/**
 * `page.<key>` fields a template prints without a `| default(...)`
 * fallback. Keys read only in `{% if %}` tags or other statements are
 * not counted.
 */
export function findPrintedPageFields(templateSource: string): string[] {
  const fields = new Set<string>();

  for (const match of templateSource.matchAll(INTERPOLATION_RE)) {
    // Identifiers inside quotes are text, not lookups.
    const expr = (match[1] ?? "").replace(STRING_LITERAL_RE, "");
    if (DEFAULT_FILTER_RE.test(expr)) {
      continue;
    }
    for (const field of expr.matchAll(PAGE_FIELD_RE)) {
      if (field[1]) {
        fields.add(field[1]);
      }
    }
  }

  return Array.from(fields).sort();
}

/** Printed page fields across a layout and everything it extends or includes. */
export function collectLayoutFields(layout: string, templates: TemplateSet): string[] {
  const fields = new Set<string>();
  const seen = new Set<string>();
  const pending = [layout];

  while (pending.length > 0) {
    const name = layoutNameOf(pending.pop() ?? "");
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);

    const source = templates.get(name);
    if (source === undefined) {
      continue;
    }

    for (const field of findPrintedPageFields(source)) {
      fields.add(field);
    }
    for (const reference of source.matchAll(TEMPLATE_REFERENCE_RE)) {
      if (reference[2]) {
        pending.push(reference[2]);
      }
    }
  }

  return Array.from(fields).sort();
}

export function findMissingPageFields(
  layout: string,
  templates: TemplateSet,
  page: Record<string, unknown>
): string[] {
  return collectLayoutFields(layout, templates).filter(
    (field) => page[field] === undefined || page[field] === null
  );
}
