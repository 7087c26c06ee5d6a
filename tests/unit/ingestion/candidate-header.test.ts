import { describe, expect, it } from 'vitest';

import { parseCandidateHeader } from '@/modules/ingestion/index.js';

describe('parseCandidateHeader', () => {
  it('parses ballot number and joins the two names', () => {
    const result = parseCandidateHeader('(1)\nAnn Lee\nBo Wu', 'North', 3);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ number: 1, name: 'Ann Lee/Bo Wu' });
    }
  });

  it('trims the cell and every line', () => {
    const result = parseCandidateHeader('  ( 3 ) \r\n  Ann Lee \r\n Bo Wu  ', 'North', 3);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ number: 3, name: 'Ann Lee/Bo Wu' });
    }
  });

  it('rejects a cell with two lines', () => {
    const result = parseCandidateHeader('(1)\nAnn Lee', 'North', 4);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('SourceFormatError');
      expect(result.error.region).toBe('North');
      expect(result.error.column).toBe(4);
    }
  });

  it('rejects a ballot number without parentheses', () => {
    expect(parseCandidateHeader('1\nAnn Lee\nBo Wu', 'North', 3).isErr()).toBe(true);
  });

  it('rejects an empty name line', () => {
    expect(parseCandidateHeader('(1)\n\nBo Wu', 'North', 3).isErr()).toBe(true);
  });

  it('rejects a numeric cell', () => {
    const result = parseCandidateHeader(42, 'North', 5);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Candidate header is not text: 42');
      expect(result.error.column).toBe(5);
    }
  });

  it('rejects an empty cell', () => {
    expect(parseCandidateHeader(null, 'North', 3).isErr()).toBe(true);
  });
});
