// Domain errors raised by the reconciliation pipeline.
// The HTTP layer maps them in StatementExceptionFilter.

/** A required column is absent from a tabular input. Fatal to the run. */
export class SchemaError extends Error {
  constructor(
    readonly column: string,
    readonly source: string,
    message = `Required column "${column}" is missing from ${source}`,
  ) {
    super(message);
    this.name = 'SchemaError';
  }
}

/** The fund column needed to partition statements is absent. */
export class MissingGroupingColumnError extends SchemaError {
  constructor(column: string, source = 'the merged trade table') {
    super(column, source, `Cannot group statements: column "${column}" is missing from ${source}`);
    this.name = 'MissingGroupingColumnError';
  }
}

export type SourceKind = 'trade book' | 'valuation feed' | 'template';

/** Trade book, feed or template could not be found. Raised before any computation. */
export class SourceNotFoundError extends Error {
  readonly paths: string[];

  constructor(
    readonly kind: SourceKind,
    paths: string | string[],
  ) {
    const searched = Array.isArray(paths) ? paths : [paths];
    super(`The ${kind} was not found (looked in: ${searched.join(', ')})`);
    this.name = 'SourceNotFoundError';
    this.paths = searched;
  }
}

/** Writing one fund's statement failed. The run carries on with the other funds. */
export class RenderWriteError extends Error {
  constructor(
    readonly fundId: string,
    readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to write statement for fund ${fundId} to ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'RenderWriteError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
