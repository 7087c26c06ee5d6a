import { describe, expect, it } from 'vitest';

import { normalizeRegion } from '@/modules/ingestion/index.js';

import { makeCandidateHeader, makeRegionTable } from '../../fixtures/builders.js';

describe('normalizeRegion', () => {
  describe('records', () => {
    it('emits one record per station and candidate', () => {
      const result = normalizeRegion(
        makeRegionTable('North', [
          ['Riverside', 'Elm', '1', '10', '20'],
          [null, 'Elm', 2, '1,234', '0'],
          ['', 'Oak', '3.0', 5, 6],
        ])
      );

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        const { records, candidates, rowsRead, rowsDropped } = result.value;
        expect(candidates).toEqual([
          { number: 1, name: 'Ann Lee/Bo Wu' },
          { number: 2, name: 'Cy Tan/Di Ho' },
        ]);
        expect(rowsRead).toBe(3);
        expect(rowsDropped).toBe(0);
        expect(records).toHaveLength(6);
        expect(records[0]).toEqual({
          county: 'North',
          town: 'Riverside',
          village: 'Elm',
          station: 1,
          candidateNumber: 1,
          candidateName: 'Ann Lee/Bo Wu',
          votes: 10,
        });
        expect(records[2]).toEqual({
          county: 'North',
          town: 'Riverside',
          village: 'Elm',
          station: 2,
          candidateNumber: 1,
          candidateName: 'Ann Lee/Bo Wu',
          votes: 1234,
        });
        expect(records[5]).toEqual({
          county: 'North',
          town: 'Riverside',
          village: 'Oak',
          station: 3,
          candidateNumber: 2,
          candidateName: 'Cy Tan/Di Ho',
          votes: 6,
        });
      }
    });

    it('trims location labels', () => {
      const result = normalizeRegion(
        makeRegionTable('North', [['  Riverside ', ' Elm  ', '1', '1', '2']])
      );

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.records[0]?.town).toBe('Riverside');
        expect(result.value.records[0]?.village).toBe('Elm');
      }
    });

    it('accepts any number of candidate columns', () => {
      const table = {
        region: 'North',
        header: [
          'town',
          'village',
          'station',
          makeCandidateHeader(3, 'Ann Lee', 'Bo Wu'),
          makeCandidateHeader(1, 'Cy Tan', 'Di Ho'),
          makeCandidateHeader(2, 'Ed Ng', 'Flo Yu'),
        ],
        rows: [['Riverside', 'Elm', '1', '3', '1', '2']],
      };

      const result = normalizeRegion(table);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.records.map((r) => [r.candidateNumber, r.votes])).toEqual([
          [3, 3],
          [1, 1],
          [2, 2],
        ]);
      }
    });
  });

  describe('missing values', () => {
    it('drops rows missing town, village, station or a vote count', () => {
      const result = normalizeRegion(
        makeRegionTable('North', [
          [null, 'Elm', '1', '1', '2'],
          ['Riverside', '  ', '2', '1', '2'],
          ['Riverside', 'Elm', null, '1', '2'],
          ['Riverside', 'Elm', '3', '', '2'],
          ['Riverside', 'Elm', '4', '1'],
          ['Riverside', 'Elm', '5', '1', '2'],
        ])
      );

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.rowsRead).toBe(6);
        expect(result.value.rowsDropped).toBe(5);
        expect(result.value.records.map((r) => r.station)).toEqual([5, 5]);
      }
    });

    it('forward-fills the town before dropping rows', () => {
      const result = normalizeRegion(
        makeRegionTable('North', [
          ['Riverside', 'Elm', '1', '1', '1'],
          ['Hillside', null, '2', '1', '1'],
          [null, 'Oak', '3', '1', '1'],
        ])
      );

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.rowsDropped).toBe(1);
        expect(result.value.records.map((r) => `${r.town}/${r.village}`)).toEqual([
          'Riverside/Elm',
          'Riverside/Elm',
          'Hillside/Oak',
          'Hillside/Oak',
        ]);
      }
    });

    it('treats NaN cells as missing', () => {
      const result = normalizeRegion(makeRegionTable('North', [['Riverside', 'Elm', 1, NaN, 2]]));

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.rowsDropped).toBe(1);
        expect(result.value.records).toEqual([]);
      }
    });
  });

  describe('format errors', () => {
    it('fails on a station id that is not an integer', () => {
      const result = normalizeRegion(
        makeRegionTable('North', [
          ['Riverside', 'Elm', '1', '1', '1'],
          ['Riverside', 'Elm', '12.5', '1', '1'],
        ])
      );

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toMatchObject({
          type: 'SourceFormatError',
          region: 'North',
          row: 2,
          column: 2,
        });
      }
    });

    it('fails on a negative vote count', () => {
      const result = normalizeRegion(makeRegionTable('North', [['Riverside', 'Elm', '1', '-3', '1']]));

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toMatchObject({ region: 'North', row: 1, column: 3 });
      }
    });

    it('fails on a fractional vote count', () => {
      const result = normalizeRegion(makeRegionTable('North', [['Riverside', 'Elm', '1', '1', 1.5]]));

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toMatchObject({ row: 1, column: 4 });
      }
    });

    it('fails on commas that are not thousands separators', () => {
      for (const votes of ['12,34', '1,2,3', ',123', '1234,567', '1,234,']) {
        const result = normalizeRegion(
          makeRegionTable('North', [['Riverside', 'Elm', '1', votes, '0']])
        );

        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error).toMatchObject({ type: 'SourceFormatError', row: 1, column: 3 });
        }
      }
    });

    it('accepts several thousands groups', () => {
      const result = normalizeRegion(
        makeRegionTable('North', [['Riverside', 'Elm', '1', '1,234,567', '12,000']])
      );

      expect(result._unsafeUnwrap().records.map((record) => record.votes)).toEqual([
        1234567, 12000,
      ]);
    });

    it('fails on an unparseable candidate header', () => {
      const table = makeRegionTable('North', []);
      const result = normalizeRegion({ ...table, header: [...table.header.slice(0, 4), 'Total'] });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toMatchObject({ type: 'SourceFormatError', column: 4 });
      }
    });

    it('fails when the header has no candidate columns', () => {
      const result = normalizeRegion({
        region: 'North',
        header: ['town', 'village', 'station'],
        rows: [],
      });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Header row has no candidate columns');
      }
    });
  });
});
