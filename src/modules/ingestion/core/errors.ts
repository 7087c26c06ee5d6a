/**
 * Ingestion Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Source Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A region's source does not have the expected header/row shape.
 */
export interface SourceFormatError {
  readonly type: 'SourceFormatError';
  readonly message: string;
  readonly region: string;
  /** 1-based data row number, when the problem is in a data row */
  readonly row?: number;
  /** 0-based column index */
  readonly column?: number;
}

/**
 * No source file exists for the requested region.
 */
export interface SourceNotFoundError {
  readonly type: 'SourceNotFoundError';
  readonly message: string;
  readonly region: string;
}

/**
 * The source exists but could not be read or tokenized.
 */
export interface SourceReadError {
  readonly type: 'SourceReadError';
  readonly message: string;
  readonly region?: string;
  readonly cause?: unknown;
}

/**
 * The source directory holds no region files.
 */
export interface NoSourcesError {
  readonly type: 'NoSourcesError';
  readonly message: string;
  readonly rootDir: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type IngestionError = SourceFormatError | SourceNotFoundError | SourceReadError | NoSourcesError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createSourceFormatError = (
  region: string,
  message: string,
  location: { row?: number; column?: number } = {}
): SourceFormatError => ({
  type: 'SourceFormatError',
  message,
  region,
  ...(location.row !== undefined && { row: location.row }),
  ...(location.column !== undefined && { column: location.column }),
});

export const createSourceNotFoundError = (region: string, filePath?: string): SourceNotFoundError => ({
  type: 'SourceNotFoundError',
  message:
    filePath !== undefined
      ? `Source for region '${region}' not found at ${filePath}`
      : `Source for region '${region}' not found`,
  region,
});

export const createSourceReadError = (
  message: string,
  region?: string,
  cause?: unknown
): SourceReadError => ({
  type: 'SourceReadError',
  message,
  ...(region !== undefined && { region }),
  ...(cause !== undefined && { cause }),
});

export const createNoSourcesError = (rootDir: string): NoSourcesError => ({
  type: 'NoSourcesError',
  message: `No region source files found in ${rootDir}`,
  rootDir,
});
