/** Error codes carried by the errors this library throws on purpose. */
export type CleaningErrorCode = 'CONFIG_ERROR' | 'TEMPLATE_SYNTAX' | 'FILE_FAILURE';

/**
 * Malformed or missing configuration. Raised at load time, before any file is
 * touched. `path` names the offending field (`parseFormats[2].recognitionPattern`)
 * or is empty when the document as a whole is unusable.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR' as const;

  constructor(
    message: string,
    readonly path: string = '',
    options?: ErrorOptions,
  ) {
    super(path ? `${path}: ${message}` : message, options);
    this.name = 'ConfigError';
  }
}

/** A date template uses a directive or construct the template compiler does not know. */
export class TemplateSyntaxError extends Error {
  readonly code = 'TEMPLATE_SYNTAX' as const;

  constructor(
    message: string,
    readonly template: string,
  ) {
    super(message);
    this.name = 'TemplateSyntaxError';
  }
}

/** One input file of a batch could not be read, cleaned or written. */
export class FileFailureError extends Error {
  readonly code = 'FILE_FAILURE' as const;

  constructor(
    readonly file: string,
    cause: unknown,
  ) {
    super(`Failed to clean '${file}': ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'FileFailureError';
  }
}

/** Render an unknown thrown value as a log/event friendly message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
