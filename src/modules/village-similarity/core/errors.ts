/**
 * Village Similarity Module - Domain Errors
 */

import type { VillageKey } from './types.js';
import type { ElectionSchemaError } from '../../election-schema/index.js';

/**
 * The national vote total is zero, so there is no baseline to compare with.
 */
export interface NoVotesError {
  readonly type: 'NoVotesError';
  readonly message: string;
}

/**
 * A vector passed to the similarity measure has zero magnitude.
 */
export interface ZeroNormError {
  readonly type: 'ZeroNormError';
  readonly message: string;
  readonly village?: VillageKey;
}

/**
 * Two vectors do not share the same candidate ordering.
 */
export interface VectorShapeError {
  readonly type: 'VectorShapeError';
  readonly message: string;
  readonly expected: number;
  readonly actual: number;
  readonly village?: VillageKey;
}

export type SimilarityError = NoVotesError | ZeroNormError | VectorShapeError;

export type ComputeRankingError = SimilarityError | ElectionSchemaError;

export const createNoVotesError = (): NoVotesError => ({
  type: 'NoVotesError',
  message: 'National vote total is zero; no election data to rank',
});

export const createZeroNormError = (village?: VillageKey): ZeroNormError => ({
  type: 'ZeroNormError',
  message:
    village !== undefined
      ? `Share vector of ${village.county}/${village.town}/${village.village} has zero magnitude`
      : 'Share vector has zero magnitude',
  ...(village !== undefined && { village }),
});

export const createVectorShapeError = (
  expected: number,
  actual: number,
  village?: VillageKey
): VectorShapeError => ({
  type: 'VectorShapeError',
  message: `Share vector has ${String(actual)} components, expected ${String(expected)}`,
  expected,
  actual,
  ...(village !== undefined && { village }),
});

/**
 * Maps error types to HTTP status codes.
 */
export const SIMILARITY_ERROR_HTTP_STATUS: Record<ComputeRankingError['type'], number> = {
  NoVotesError: 404,
  ZeroNormError: 500,
  VectorShapeError: 500,
  DatabaseError: 500,
  DuplicateCandidateError: 500,
  UnknownStationError: 500,
  DuplicateTallyError: 500,
  EmptyElectionError: 404,
};

export const getHttpStatusForError = (error: ComputeRankingError): number => {
  return SIMILARITY_ERROR_HTTP_STATUS[error.type];
};
