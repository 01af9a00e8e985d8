import { describe, expect, test } from "vitest";
import { excerptOf, iterateBlocks } from "./blocks";

const body = [
  "# Title",
  "Intro line one",
  "line two",
  "",
  "```js",
  "const a = 1;",
  "",
  "const b = 2;",
  "```",
  "",
  "> quoted",
  "",
  "- item",
  "- item two",
  "",
  "---",
  "",
  "<div>x</div>",
].join("\n");

describe("iterateBlocks", () => {
  test("splits a body on block boundaries", () => {
    const blocks = Array.from(iterateBlocks(body));
    expect(blocks.map((block) => block.kind)).toEqual([
      "heading",
      "paragraph",
      "code",
      "blockquote",
      "list",
      "rule",
      "html",
    ]);
    expect(blocks[1]).toEqual({ kind: "paragraph", text: "Intro line one\nline two", line: 2 });
    expect(blocks[2]).toEqual({
      kind: "code",
      text: "```js\nconst a = 1;\n\nconst b = 2;\n```",
      line: 5,
    });
    expect(blocks[4]?.text).toBe("- item\n- item two");
  });

  test("yields lazily", () => {
    const blocks = iterateBlocks(body);
    expect(blocks.next().value).toEqual({ kind: "heading", text: "# Title", line: 1 });
  });

  test("an unterminated fence runs to the end", () => {
    expect(Array.from(iterateBlocks("```\ncode\n\nmore"))).toEqual([
      { kind: "code", text: "```\ncode\n\nmore", line: 1 },
    ]);
  });

  test("an empty body has no blocks", () => {
    expect(Array.from(iterateBlocks("\n\n"))).toEqual([]);
  });
});

describe("excerptOf", () => {
  test("takes the first paragraph by default", () => {
    expect(excerptOf("# Heading\n\nFirst para\nwrapped.\n\nSecond.")).toBe("First para\nwrapped.");
  });

  test("cuts at a custom separator", () => {
    expect(excerptOf("Intro text\n<!--more-->\nRest", "<!--more-->")).toBe("Intro text");
  });

  test("is empty when there is no paragraph", () => {
    expect(excerptOf("# Only a heading")).toBe("");
  });
});
