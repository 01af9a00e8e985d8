import { posix } from "path";
import type { HeaderFields } from "../content/header";
import type { SourceIdentifier } from "../content/model";

export type PermalinkStyle = "date" | "pretty";

/** Directories starting with `_` (e.g. `_posts`) group sources without showing up in URLs. */
function urlDirectory(sourcePath: string): string {
  const segments = posix
    .dirname(sourcePath)
    .split("/")
    .filter((segment) => segment !== "." && segment !== "" && !segment.startsWith("_"));
  return segments.length === 0 ? "/" : `/${segments.join("/")}/`;
}

export function deriveUrl(source: SourceIdentifier, fields: HeaderFields, style: PermalinkStyle): string {
  if (fields.permalink) {
    return fields.permalink;
  }

  const directory = urlDirectory(source.path);
  if (source.stem === "index") {
    return directory;
  }

  const datePath = source.date ? `${source.date.replace(/-/g, "/")}/` : "";
  const base = `${directory}${datePath}${source.slug}`;
  return style === "pretty" ? `${base}/` : `${base}.html`;
}

/** Relative output file for a URL; directory URLs get an index.html. */
export function outputPathForUrl(url: string): string {
  const normalized = posix.normalize(`/${url}`).replace(/^\/+/, "");
  if (normalized === "" || normalized.endsWith("/")) {
    return `${normalized}index.html`;
  }
  return posix.extname(normalized) ? normalized : `${normalized}/index.html`;
}
