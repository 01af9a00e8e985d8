import { existsSync } from "fs";
import { resolve } from "path";
import { pathToFileURL } from "url";
import { ConfigError } from "./errors";
import type { PermalinkStyle } from "./site/url";

export const MISSING_FIELD_POLICIES = ["empty", "error"] as const;
export type MissingFieldPolicy = (typeof MISSING_FIELD_POLICIES)[number];

export const PERMALINK_STYLES = ["date", "pretty"] as const;

export interface FolioConfig {
  /** Directory holding the documents, relative to the site root */
  contentDir?: string;
  /** Directory of `<layout>.njk` templates */
  layoutsDir?: string;
  /** Where rendered pages are written */
  outputDir?: string;
  /** Glob patterns, relative to contentDir, selecting documents */
  source?: string[];
  /** Layout for documents whose header sets none */
  defaultLayout?: string;
  /** Layouts that always receive `entries` */
  listingLayouts?: string[];
  /** Collection a listing page enumerates unless its header says otherwise */
  listCollection?: string;
  /** "date": /2019/04/08/slug.html, "pretty": /2019/04/08/slug/ */
  permalink?: PermalinkStyle;
  /** What to do when a layout prints `page.<key>` the header lacks */
  missingFields?: MissingFieldPolicy;
  /** Custom excerpt boundary; the default takes the first paragraph */
  excerptSeparator?: string;
  /** Locale for month names in the `date` filter */
  dateLocale?: string;
  /** Render documents marked `published: false` */
  includeUnpublished?: boolean;
  /** Free-form values exposed to templates as `site` */
  site?: Record<string, unknown>;
}

export type ResolvedConfig = Required<FolioConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  contentDir: "content",
  layoutsDir: "layouts",
  outputDir: "_site",
  source: ["**/*.md", "**/*.markdown", "**/*.html"],
  defaultLayout: "page",
  listingLayouts: ["home"],
  listCollection: "post",
  permalink: "date",
  missingFields: "empty",
  excerptSeparator: "\n\n",
  dateLocale: "en",
  includeUnpublished: false,
  site: {},
};

/** Identity helper for type-safe config files */
export function defineConfig(config: FolioConfig): FolioConfig {
  return config;
}

export const CONFIG_FILENAME = "folio.config.ts";

/** Load config from a site root, returns empty config if file doesn't exist */
export async function loadConfig(rootDir: string): Promise<FolioConfig> {
  const configPath = resolve(rootDir, CONFIG_FILENAME);
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const mod: { default?: FolioConfig } = await import(pathToFileURL(configPath).href);
    return mod.default ?? {};
  } catch (err) {
    console.error(`Failed to load ${CONFIG_FILENAME}:`, err);
    return {};
  }
}

export function isMissingFieldPolicy(value: string): value is MissingFieldPolicy {
  return MISSING_FIELD_POLICIES.some((policy) => policy === value);
}

export function isPermalinkStyle(value: string): value is PermalinkStyle {
  return PERMALINK_STYLES.some((style) => style === value);
}

/**
 * Defaults, then the config file, then overrides (CLI flags); `site`
 * merges one level deep. Layers leave a key out rather than set it to
 * undefined.
 */
export function resolveConfig(...layers: Array<FolioConfig | undefined>): ResolvedConfig {
  let resolved: ResolvedConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    if (!layer) {
      continue;
    }
    resolved = {
      ...resolved,
      ...layer,
      site: { ...resolved.site, ...layer.site },
    };
  }
  return resolved;
}

/** Reject values a plain-JS config file could set that the types forbid. */
export function validateConfig(config: ResolvedConfig): ResolvedConfig {
  if (!isMissingFieldPolicy(config.missingFields)) {
    throw new ConfigError(
      `missingFields must be one of ${MISSING_FIELD_POLICIES.join(", ")}, got "${config.missingFields}"`
    );
  }
  if (!isPermalinkStyle(config.permalink)) {
    throw new ConfigError(`permalink must be one of ${PERMALINK_STYLES.join(", ")}, got "${config.permalink}"`);
  }
  if (config.source.length === 0) {
    throw new ConfigError("source must list at least one glob pattern");
  }
  return config;
}
