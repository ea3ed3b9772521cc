/**
 * Base class for every failure that aborts a run. Row-level problems are
 * dropped and counted instead. `code` is reported by the health endpoint.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SourceFileNotFoundError extends PipelineError {
  readonly code = 'SOURCE_FILE_NOT_FOUND';

  constructor(readonly filePath: string) {
    super(`Source file not found: ${filePath}`);
  }
}

export class MissingColumnError extends PipelineError {
  readonly code = 'MISSING_COLUMN';

  constructor(
    readonly column: string,
    readonly found: string[],
  ) {
    super(`Missing column '${column}'. Found: ${found.join(', ') || '(none)'}`);
  }
}

export class DimensionLookupError extends PipelineError {
  readonly code = 'DIMENSION_LOOKUP_FAILED';

  constructor(
    readonly dimension: string,
    readonly naturalKey: string | null,
    readonly lineNumber: number,
  ) {
    super(
      `No ${dimension} row for key ${JSON.stringify(naturalKey)} (clean line ${lineNumber}); ` +
        'dimension tables are incomplete',
    );
  }
}

export class WarehouseWriteError extends PipelineError {
  readonly code = 'WAREHOUSE_WRITE_FAILED';

  constructor(cause: unknown) {
    super(
      `Warehouse write rolled back: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class PipelineBusyError extends PipelineError {
  readonly code = 'PIPELINE_BUSY';

  constructor() {
    super('A pipeline run is already in progress');
  }
}

/** Stable code of a pipeline failure, or null for anything unexpected */
export function errorCode(err: unknown): string | null {
  return err instanceof PipelineError ? err.code : null;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
