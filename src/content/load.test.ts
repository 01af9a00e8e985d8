import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { resolve } from "path";
import { MalformedHeaderError } from "../errors";
import { loadStore, readDocumentFile, resolveSourceFiles } from "./load";

let contentDir = "";

describe("document store", () => {
  beforeAll(async () => {
    contentDir = await mkdtemp(resolve(tmpdir(), "folio-load-"));
    await mkdir(resolve(contentDir, "_posts"), { recursive: true });

    await writeFile(resolve(contentDir, "a.md"), "---\ntitle: A\n---\nBody A\n");
    await writeFile(resolve(contentDir, "_posts/2019-04-08-x.md"), "---\nlayout: post\n---\nX\n");
    await writeFile(resolve(contentDir, "broken.md"), "---\ntitle: never closed\n");
    await writeFile(resolve(contentDir, "notes.txt"), "not a document");
  });

  afterAll(async () => {
    await rm(contentDir, { recursive: true, force: true });
  });

  test("deduplicates files across overlapping glob patterns", async () => {
    const files = await resolveSourceFiles(["**/*.md", "a.*"], contentDir);
    expect(files).toEqual(["_posts/2019-04-08-x.md", "a.md", "broken.md"]);
  });

  test("reads a single document with its source identifier", async () => {
    const doc = await readDocumentFile(contentDir, "_posts/2019-04-08-x.md");
    expect(doc.source.date).toBe("2019-04-08");
    expect(doc.fields.layout).toBe("post");
    expect(doc.body).toBe("X\n");
  });

  test("collects parse failures and keeps loading", async () => {
    const store = await loadStore({ contentDir, patterns: ["**/*.md"] });

    expect(store.documents.map((doc) => doc.source.path)).toEqual(["_posts/2019-04-08-x.md", "a.md"]);
    expect(store.issues).toHaveLength(1);
    expect(store.issues[0]?.file).toBe("broken.md");
    expect(store.issues[0]?.error).toBeInstanceOf(MalformedHeaderError);
  });
});
