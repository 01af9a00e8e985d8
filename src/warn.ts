import type { BuildIssue } from "./errors";

const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

export function formatMissingFieldWarning(file: string, layout: string, missing: string[]): string {
  const icon = "⚠️";
  const header = `${YELLOW}${BOLD}${icon} [folio] ${file}: layout "${layout}" prints missing header fields (${missing.length})${RESET}`;
  const lines = missing.map((item) => `${YELLOW}  - page.${item}${RESET}`).join("\n");
  return `${header}\n${lines}`;
}

export function formatBuildIssues(issues: BuildIssue[]): string {
  const header = `${RED}${BOLD}✖ [folio] ${issues.length} document(s) failed${RESET}`;
  const lines = issues.map((issue) => `${RED}  - ${issue.file}: ${issue.error.message}${RESET}`).join("\n");
  return `${header}\n${lines}`;
}
