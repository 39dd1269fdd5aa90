export type MalformedReason =
  | "missing field"
  | "invalid field"
  | "unreadable record"
  | "invalid bitrate"
  | "invalid length"
  | "invalid year"
  | "unslugerizable title";

/**
 * A record that cannot become a Track. Fatal to that record only.
 */
export class MalformedRecordError extends Error {
  constructor(
    public readonly reason: MalformedReason,
    public readonly field: string,
    public readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(`MalformedRecord: ${reason} '${field}' in ${source}`, options);
    this.name = "MalformedRecordError";
  }
}

/**
 * Two records slug to the same url. Always halts the build.
 */
export class DuplicateUrlError extends Error {
  constructor(
    public readonly url: string,
    public readonly existingSource: string,
    public readonly source: string,
  ) {
    super(`DuplicateURL: ${url} from ${source} is already taken by ${existingSource}`);
    this.name = "DuplicateUrlError";
  }
}

export class TrackNotFoundError extends Error {
  constructor(public readonly url: string) {
    super(`NotFound: no track at ${url}`);
    this.name = "TrackNotFoundError";
  }
}

export class InvalidQueryError extends Error {
  constructor(public readonly query: string, reason: string) {
    super(`InvalidQuery: ${reason} (${JSON.stringify(query)})`);
    this.name = "InvalidQueryError";
  }
}

/**
 * A write of the export failed. The caller may retry the same path.
 */
export class ExportIOFailureError extends Error {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`ExportIOFailure: could not write ${path}${detail}`, options);
    this.name = "ExportIOFailureError";
  }
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly key: string,
    public readonly value: unknown,
  ) {
    super(`Config validation error at '${key}': ${message}`);
    this.name = "ConfigValidationError";
  }
}
