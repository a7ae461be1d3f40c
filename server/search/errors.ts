/**
 * Search Errors
 *
 * Both carry an HTTP status so the Express error handler can answer with it.
 */

export class LoadError extends Error {
  readonly status = 500;

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LoadError';
  }
}

export class FieldAccessError extends Error {
  readonly status = 500;

  constructor(readonly field: string, readonly title?: string) {
    super(
      title
        ? `Catalog item "${title}" is missing required field "${field}"`
        : `Catalog item is missing required field "${field}"`,
    );
    this.name = 'FieldAccessError';
  }
}
