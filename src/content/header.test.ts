import { describe, expect, test } from "vitest";
import { MalformedHeaderError } from "../errors";
import { RECOGNIZED_HEADER_KEYS, readHeaderFields } from "./header";
import type { HeaderValue } from "./model";

function header(entries: Array<[string, HeaderValue]>): Map<string, HeaderValue> {
  return new Map(entries);
}

describe("readHeaderFields", () => {
  test("keeps only recognised keys", () => {
    const fields = readHeaderFields(
      header([
        ["layout", "post"],
        ["tags", ["a", "b"]],
      ]),
      "a.md"
    );
    expect(fields).toEqual({ layout: "post" });
  });

  test("coerces numeric titles to strings", () => {
    expect(readHeaderFields(header([["title", 2019]]), "a.md").title).toBe("2019");
  });

  test("treats empty values as unset", () => {
    expect(readHeaderFields(header([["title", null]]), "a.md")).toEqual({});
  });

  test("rejects a negative limit", () => {
    expect(() => readHeaderFields(header([["limit", -1]]), "index.md")).toThrow(MalformedHeaderError);
  });

  test("rejects a relative permalink and names the key", () => {
    expect(() => readHeaderFields(header([["permalink", "about/"]]), "about.md")).toThrow(
      'invalid "permalink"'
    );
  });

  test("lists listing-page options among recognised keys", () => {
    expect(RECOGNIZED_HEADER_KEYS).toEqual(
      expect.arrayContaining(["layout", "title", "limit", "show_excerpts", "entries_layout"])
    );
  });
});
