import { posix } from "path";
import type { SourceFormat, SourceIdentifier } from "./model";

export const SOURCE_EXTENSIONS = [".md", ".markdown", ".html"] as const;

const DATED_STEM_RE = /^(\d{4})-(\d{2})-(\d{2})-(.+)$/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function parseSourceIdentifier(relativePath: string): SourceIdentifier {
  const path = relativePath.replace(/\\/g, "/");
  const extension = posix.extname(path).toLowerCase();
  const stem = posix.basename(path, posix.extname(path));

  const match = stem.match(DATED_STEM_RE);
  if (match) {
    const [, yearRaw, monthRaw, dayRaw, slug] = match;
    if (
      yearRaw &&
      monthRaw &&
      dayRaw &&
      slug &&
      isCalendarDate(Number(yearRaw), Number(monthRaw), Number(dayRaw))
    ) {
      return { path, stem, extension, date: `${yearRaw}-${monthRaw}-${dayRaw}`, slug };
    }
  }

  return { path, stem, extension, date: null, slug: stem };
}

export function formatOf(source: SourceIdentifier): SourceFormat {
  return source.extension === ".html" ? "html" : "markdown";
}
