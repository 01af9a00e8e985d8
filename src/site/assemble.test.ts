import { describe, expect, test } from "vitest";
import { parseDocument } from "../content/parse";
import { parseSourceIdentifier } from "../content/source-id";
import { assembleCollections, sortDateOf, takeEntries } from "./assemble";

function doc(path: string, header: string[], body = "") {
  return parseDocument(["---", ...header, "---", body].join("\n"), parseSourceIdentifier(path));
}

const paths = (docs: ReadonlyArray<{ source: { path: string } }>) => docs.map((d) => d.source.path);

const b = doc("_posts/2019-04-08-b.md", ["layout: post"]);
const c = doc("_posts/2019-03-01-c.md", ["layout: post"]);

describe("assembleCollections", () => {
  const a = doc("_posts/2019-04-08-a.md", ["layout: post"]);
  const index = doc("index.md", ["layout: home", "limit: 2"]);
  const about = doc("about.md", []);

  test("partitions by layout, falling back to the default layout", () => {
    const { collections } = assembleCollections([index, b, about, c, a], { defaultLayout: "page" });
    expect(Array.from(collections.keys())).toEqual(["home", "post", "page"]);
    expect(paths(collections.get("page") ?? [])).toEqual(["about.md"]);
  });

  test("orders newest first and keeps store order for equal dates", () => {
    const { collections } = assembleCollections([b, c, a], { defaultLayout: "page" });
    expect(paths(collections.get("post") ?? [])).toEqual([
      "_posts/2019-04-08-b.md",
      "_posts/2019-04-08-a.md",
      "_posts/2019-03-01-c.md",
    ]);
  });

  test("a limit of two keeps only the two newest posts", () => {
    const { collections } = assembleCollections([index, b, c, a], { defaultLayout: "page" });
    const listed = takeEntries(collections.get("post") ?? [], index.fields.limit);
    expect(paths(listed)).toEqual(["_posts/2019-04-08-b.md", "_posts/2019-04-08-a.md"]);
  });

  test("undated documents sort after dated ones", () => {
    const dated = doc("2020-01-01-news.md", []);
    const { collections } = assembleCollections([about, dated], { defaultLayout: "page" });
    expect(paths(collections.get("page") ?? [])).toEqual(["2020-01-01-news.md", "about.md"]);
  });

  test("leaves out unpublished documents unless asked", () => {
    const draft = doc("_posts/2019-05-01-draft.md", ["layout: post", "published: false"]);

    const published = assembleCollections([b, draft], { defaultLayout: "page" });
    expect(paths(published.documents)).toEqual(["_posts/2019-04-08-b.md"]);

    const everything = assembleCollections([b, draft], { defaultLayout: "page", includeUnpublished: true });
    expect(paths(everything.collections.get("post") ?? [])).toEqual([
      "_posts/2019-05-01-draft.md",
      "_posts/2019-04-08-b.md",
    ]);
  });

  test("collections are frozen", () => {
    const { collections } = assembleCollections([b, c], { defaultLayout: "page" });
    expect(Object.isFrozen(collections.get("post"))).toBe(true);
  });
});

describe("sortDateOf", () => {
  test("falls back to a date header", () => {
    expect(sortDateOf(doc("notes.md", ["date: 2019-05-01 10:30:00"]))).toBe("2019-05-01");
  });

  test("is null without any date", () => {
    expect(sortDateOf(doc("notes.md", []))).toBeNull();
  });
});

describe("takeEntries", () => {
  test("returns the whole collection without a limit", () => {
    const { collections } = assembleCollections([b, c], { defaultLayout: "page" });
    expect(takeEntries(collections.get("post") ?? [], undefined)).toHaveLength(2);
  });
});
