import { err, ok, type Result } from 'neverthrow';

import { createSourceFormatError, type SourceFormatError } from './errors.js';
import { CANDIDATE_NAME_SEPARATOR, type CandidateSlot, type RawCell } from './types.js';

const BALLOT_NUMBER_PATTERN = /^\(\s*(\d+)\s*\)$/;
const SLOT_PREFIX_PATTERN = /^\(\s*\d+\s*\)/;

/**
 * True when a header cell opens with a ballot number, i.e. it is meant as a
 * candidate slot. Summary columns such as valid or invalid ballot counts are not.
 */
export const isCandidateSlotCell = (cell: RawCell): boolean =>
  typeof cell === 'string' && SLOT_PREFIX_PATTERN.test(cell.trim());

/**
 * Parses a candidate-slot header cell.
 *
 * The cell holds three lines: the ballot number in parentheses, then the two
 * running-mate names, e.g. `"(2)\nName A\nName B"`.
 */
export const parseCandidateHeader = (
  cell: RawCell,
  region: string,
  column: number
): Result<CandidateSlot, SourceFormatError> => {
  if (typeof cell !== 'string') {
    return err(
      createSourceFormatError(region, `Candidate header is not text: ${String(cell)}`, { column })
    );
  }

  const lines = cell
    .trim()
    .split(/\r?\n/)
    .map((line) => line.trim());

  const [numberLine, first, second] = lines;
  const match = numberLine !== undefined ? BALLOT_NUMBER_PATTERN.exec(numberLine) : null;

  if (
    lines.length !== 3 ||
    match?.[1] === undefined ||
    first === undefined ||
    first === '' ||
    second === undefined ||
    second === ''
  ) {
    return err(
      createSourceFormatError(
        region,
        `Unexpected candidate header ${JSON.stringify(cell)}; expected "(number)\\nname\\nname"`,
        { column }
      )
    );
  }

  return ok({
    number: Number.parseInt(match[1], 10),
    name: `${first}${CANDIDATE_NAME_SEPARATOR}${second}`,
  });
};
