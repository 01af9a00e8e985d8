export class SiteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SiteError";
  }
}

export class MalformedHeaderError extends SiteError {
  constructor(
    public readonly file: string,
    public readonly reason: string
  ) {
    super(`Malformed header in ${file}: ${reason}`);
    this.name = "MalformedHeaderError";
  }
}

export class UnknownLayoutError extends SiteError {
  constructor(
    public readonly file: string,
    public readonly layout: string
  ) {
    super(`Unknown layout "${layout}" requested by ${file}`);
    this.name = "UnknownLayoutError";
  }
}

export class MissingTemplateFieldError extends SiteError {
  constructor(
    public readonly file: string,
    public readonly layout: string,
    public readonly fields: string[]
  ) {
    super(
      `Layout "${layout}" references header field(s) missing from ${file}: ${fields.join(", ")}`
    );
    this.name = "MissingTemplateFieldError";
  }
}

export class DuplicateOutputError extends SiteError {
  constructor(
    public readonly file: string,
    public readonly outputPath: string,
    public readonly claimedBy: string
  ) {
    super(`${file} resolves to ${outputPath}, already written for ${claimedBy}`);
    this.name = "DuplicateOutputError";
  }
}

export class ConfigError extends SiteError {
  constructor(message: string) {
    super(`Config error: ${message}`);
    this.name = "ConfigError";
  }
}

/** A per-document failure collected during a build instead of aborting it. */
export interface BuildIssue {
  file: string;
  error: Error;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
