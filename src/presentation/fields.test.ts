import { describe, expect, test } from "vitest";
import { collectLayoutFields, findMissingPageFields, findPrintedPageFields } from "./fields";

describe("findPrintedPageFields", () => {
  test("counts printed page fields without a default", () => {
    const source = [
      "{{ page.title }}",
      '{{ page.subtitle | default("") }}',
      "{% if page.hero %}{{ site.page.logo }}{% endif %}",
      '{{ "page.quoted" }}',
      "{{- page.author.name -}}",
    ].join("\n");

    expect(findPrintedPageFields(source)).toEqual(["author", "title"]);
  });
});

describe("layout tree", () => {
  const templates = new Map([
    ["base", "<title>{{ page.title }}</title>{% block main %}{% endblock %}"],
    ["post", '{% extends "base.njk" %}{% block main %}{{ page.date }}{% include "meta" %}{% endblock %}'],
    ["meta", "{{ page.author }}"],
  ]);

  test("follows extends and include", () => {
    expect(collectLayoutFields("post", templates)).toEqual(["author", "date", "title"]);
  });

  test("reports fields the page lacks", () => {
    expect(findMissingPageFields("post", templates, { title: "Hi", date: null })).toEqual(["author", "date"]);
  });
});
