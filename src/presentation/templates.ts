import nunjucks from "nunjucks";
import { readdir, readFile } from "fs/promises";
import { basename, resolve } from "path";
import { ConfigError, toError } from "../errors";

/** Layout name (file stem) to nunjucks source. */
export type TemplateSet = ReadonlyMap<string, string>;

const TEMPLATE_EXTENSION = ".njk";
const DATE_PREFIX_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface TemplateEnvOptions {
  dateLocale?: string;
}

export function layoutNameOf(templateName: string): string {
  return templateName.endsWith(TEMPLATE_EXTENSION)
    ? templateName.slice(0, -TEMPLATE_EXTENSION.length)
    : templateName;
}

export async function loadTemplateSet(layoutsDir: string): Promise<TemplateSet> {
  let entries: string[];
  try {
    entries = await readdir(layoutsDir);
  } catch (err) {
    throw new ConfigError(`cannot read layouts directory ${layoutsDir}: ${toError(err).message}`);
  }

  const templates = new Map<string, string>();
  for (const entry of entries.filter((name) => name.endsWith(TEMPLATE_EXTENSION)).sort()) {
    templates.set(basename(entry, TEMPLATE_EXTENSION), await readFile(resolve(layoutsDir, entry), "utf8"));
  }
  return templates;
}

/** Serves `{% extends %}` and `{% include %}` from the in-memory set. */
class TemplateSetLoader implements nunjucks.ILoader {
  constructor(private readonly templates: TemplateSet) {}

  getSource(name: string): nunjucks.LoaderSource {
    const src = this.templates.get(layoutNameOf(name));
    if (src === undefined) {
      throw new Error(`Template not found: ${name}`);
    }
    return { src, path: name, noCache: false };
  }
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== "string") {
    return null;
  }

  const dayMatch = value.match(DATE_PREFIX_RE);
  if (dayMatch) {
    return new Date(Date.UTC(Number(dayMatch[1]), Number(dayMatch[2]) - 1, Number(dayMatch[3])));
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatDate(date: Date, format: string, locale = "en"): string {
  const monthName = (month: "long" | "short") =>
    new Intl.DateTimeFormat(locale, { month, timeZone: "UTC" }).format(date);

  const replacements: Record<string, () => string> = {
    YYYY: () => String(date.getUTCFullYear()),
    YY: () => String(date.getUTCFullYear()).slice(-2),
    MMMM: () => monthName("long"),
    MMM: () => monthName("short"),
    MM: () => pad(date.getUTCMonth() + 1),
    M: () => String(date.getUTCMonth() + 1),
    DD: () => pad(date.getUTCDate()),
    D: () => String(date.getUTCDate()),
  };

  return format.replace(/YYYY|YY|MMMM|MMM|MM|M|DD|D/g, (token) => replacements[token]?.() ?? token);
}

export function truncateWords(value: unknown, count = 50): string {
  const words = String(value ?? "").trim().split(/\s+/).filter(Boolean);
  return words.length > count ? `${words.slice(0, count).join(" ")}...` : words.join(" ");
}

export function stripHtml(value: unknown): string {
  return String(value ?? "").replace(/<[^>]+>/g, "").trim();
}

export function createTemplateEnvironment(
  templates: TemplateSet,
  options?: TemplateEnvOptions
): nunjucks.Environment {
  const env = new nunjucks.Environment(new TemplateSetLoader(templates), { autoescape: false });
  const locale = options?.dateLocale ?? "en";

  env.addFilter("date", (value: unknown, outputFormat = "YYYY-MM-DD") => {
    const date = toDate(value);
    return date ? formatDate(date, String(outputFormat), locale) : String(value ?? "");
  });
  env.addFilter("truncate_words", (value: unknown, count = 50) => truncateWords(value, Number(count)));
  env.addFilter("strip_html", (value: unknown) => stripHtml(value));

  return env;
}
