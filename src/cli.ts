#!/usr/bin/env tsx
import { existsSync, realpathSync } from "fs";
import { resolve } from "path";
import { pathToFileURL } from "url";
import { parseArgs } from "util";
import { loadConfig, resolveConfig, validateConfig } from "./config";
import { SiteError, toError } from "./errors";
import { buildSite } from "./site/build";
import { formatBuildIssues, formatMissingFieldWarning } from "./warn";

const USAGE = `Usage:
  folio build [site-dir] [--out dir] [--strict] [--unpublished]
  folio check [site-dir] [--strict] [--unpublished]`;

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      out: { type: "string", short: "o" },
      strict: { type: "boolean" },
      unpublished: { type: "boolean" },
    },
    allowPositionals: true,
  });
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    console.error(toError(err).message);
    console.error(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, target] = positionals;

  if (!command) {
    console.log(USAGE);
    return 1;
  }
  if (command !== "build" && command !== "check") {
    console.error(`Unknown command: ${command}`);
    return 1;
  }

  const rootDir = resolve(target ?? ".");
  if (!existsSync(rootDir)) {
    console.error(`Site not found: ${rootDir}`);
    return 1;
  }

  try {
    // CLI flags override config values
    const config = validateConfig(
      resolveConfig(await loadConfig(rootDir), {
        ...(values.out !== undefined && { outputDir: resolve(values.out) }),
        ...(values.strict && { missingFields: "error" as const }),
        ...(values.unpublished && { includeUnpublished: true }),
      })
    );

    const report = await buildSite({ rootDir, config, write: command === "build" });
    console.log(`Found ${report.documentCount} document(s)`);

    for (const warning of report.warnings) {
      console.warn(formatMissingFieldWarning(warning.file, warning.layout, warning.fields));
    }
    if (report.issues.length > 0) {
      console.error(formatBuildIssues(report.issues));
    }

    if (command === "build") {
      console.log(`Wrote ${report.pages.length} page(s) to ${resolve(rootDir, config.outputDir)}`);
    } else {
      console.log(`Checked ${report.pages.length} page(s)`);
    }
    return report.issues.length > 0 ? 1 : 0;
  } catch (err) {
    if (err instanceof SiteError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  process.exitCode = await runCli(process.argv.slice(2));
}
