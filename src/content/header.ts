import { z } from "zod";
import { MalformedHeaderError } from "../errors";
import type { Header, HeaderValue } from "./model";

/**
 * Header keys folio interprets. Anything else in a header is handed to
 * templates untouched.
 */
export const headerFieldsSchema = z.object({
  layout: z.string().min(1).optional(),
  title: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .optional(),
  date: z.string().optional(),
  /** Max entries on a listing page */
  limit: z.number().int().nonnegative().optional(),
  show_excerpts: z.boolean().optional(),
  /** Arrangement hint for listing templates, e.g. "grid" or "list" */
  entries_layout: z.string().min(1).optional(),
  published: z.boolean().optional(),
  permalink: z.string().startsWith("/").optional(),
  /** Which collection a listing page enumerates */
  collection: z.string().min(1).optional(),
});

export type HeaderFields = z.infer<typeof headerFieldsSchema>;

export const RECOGNIZED_HEADER_KEYS = Object.keys(headerFieldsSchema.shape);

export function readHeaderFields(header: Header, file: string): HeaderFields {
  // An empty YAML value (`title:`) means "unset", not null.
  const input: Record<string, HeaderValue> = {};
  for (const [key, value] of header) {
    if (value !== null) {
      input[key] = value;
    }
  }

  const result = headerFieldsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path.join(".") || "header";
    throw new MalformedHeaderError(file, `invalid "${key}": ${issue?.message ?? "unparsable value"}`);
  }
  return result.data;
}

export function headerToObject(header: Header): Record<string, HeaderValue> {
  return Object.fromEntries(header);
}
