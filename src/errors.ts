/**
 * Error classes shared across the report pipeline.
 * Provider failures live in integrations/llm/errors.ts.
 */

/**
 * An AI response that could not be turned into a TierResult.
 */
export class ResponseShapeError extends Error {
  constructor(
    message: string,
    public readonly excerpt?: string
  ) {
    super(message);
    this.name = "ResponseShapeError";
  }
}

/**
 * A scanner artifact that could not be read or parsed as JSON.
 * Recorded as tool status "Error"; never aborts the run.
 */
export class AdapterParseError extends Error {
  constructor(
    public readonly tool: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to parse ${tool} output from ${source}`, options);
    this.name = "AdapterParseError";
  }
}

/**
 * The comment API rejected a list, create or update call.
 */
export class PublishError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PublishError";
  }
}

/**
 * A report reached the publisher without the metadata every tier must set.
 */
export class InvalidReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidReportError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
