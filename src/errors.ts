/**
 * Error taxonomy for the conversion pipeline.
 * Every failure the pipeline reports is one of these; anything else is a bug.
 */

export type PipelineErrorKind = "fetch" | "parse" | "extract" | "assembly" | "write";

/** Base class for all pipeline failures */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  /** URL or path the failure relates to */
  readonly url?: string;

  constructor(message: string, options: { url?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.url = options.url;
  }
}

/** A URL (feed root or chapter) could not be retrieved */
export class FetchError extends PipelineError {
  readonly kind = "fetch";
}

/** The feed document is not recognizable feed content */
export class ParseError extends PipelineError {
  readonly kind = "parse";
}

/** A fetched page has no identifiable text content */
export class ExtractError extends PipelineError {
  readonly kind = "extract";
}

/** No chapters available to package */
export class AssemblyError extends PipelineError {
  readonly kind = "assembly";
}

/** The output file could not be written */
export class WriteError extends PipelineError {
  readonly kind = "write";
}

/**
 * Get a readable message from any thrown value.
 *
 * @example
 * errorMessage(new Error('boom')) // 'boom'
 * errorMessage('boom') // 'boom'
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
