import { describe, expect, test } from "vitest";
import { formatOf, parseSourceIdentifier } from "./source-id";

describe("parseSourceIdentifier", () => {
  test("reads date and slug from a dated filename", () => {
    expect(parseSourceIdentifier("_posts/2019-04-08-trail-maps.md")).toEqual({
      path: "_posts/2019-04-08-trail-maps.md",
      stem: "2019-04-08-trail-maps",
      extension: ".md",
      date: "2019-04-08",
      slug: "trail-maps",
    });
  });

  test("undated files use the whole stem as slug", () => {
    const source = parseSourceIdentifier("index.md");
    expect(source.date).toBeNull();
    expect(source.slug).toBe("index");
  });

  test("an impossible calendar date is part of the slug", () => {
    const source = parseSourceIdentifier("2019-02-30-leap.md");
    expect(source.date).toBeNull();
    expect(source.slug).toBe("2019-02-30-leap");
  });

  test("normalizes windows separators", () => {
    const source = parseSourceIdentifier("notes\\2020-01-05-walk.markdown");
    expect(source.path).toBe("notes/2020-01-05-walk.markdown");
    expect(source.extension).toBe(".markdown");
    expect(source.slug).toBe("walk");
  });
});

describe("formatOf", () => {
  test("html sources are passed through, everything else is markdown", () => {
    expect(formatOf(parseSourceIdentifier("about.HTML"))).toBe("html");
    expect(formatOf(parseSourceIdentifier("about.md"))).toBe("markdown");
  });
});
