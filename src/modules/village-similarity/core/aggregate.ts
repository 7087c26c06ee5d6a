import { compareVillageKeys, villageKeyId } from '../../../common/utils/compare.js';

import type { CandidateRef, VillageKey, VillageTotals, VoteAggregation } from './types.js';
import type { VillageVoteRow } from '../../election-schema/index.js';

const addTo = (totals: Map<number, number>, candidateId: number, votes: number): void => {
  totals.set(candidateId, (totals.get(candidateId) ?? 0) + votes);
};

/**
 * Sums grouped vote rows into national and per-village totals.
 *
 * Rows for the same village and candidate are added together. Every village
 * ends up with an entry for every candidate seen anywhere in the input; the
 * missing ones are zero. Candidate names come from the first row carrying
 * the candidate.
 */
export const aggregateVotes = (rows: readonly VillageVoteRow[]): VoteAggregation => {
  const names = new Map<number, string>();
  const nationalTotals = new Map<number, number>();
  const villages = new Map<string, { key: VillageKey; totals: Map<number, number> }>();

  for (const row of rows) {
    if (!names.has(row.candidateId)) {
      names.set(row.candidateId, row.candidateName);
    }
    addTo(nationalTotals, row.candidateId, row.sumVotes);

    const key: VillageKey = { county: row.county, town: row.town, village: row.village };
    const id = villageKeyId(key);
    let entry = villages.get(id);
    if (entry === undefined) {
      entry = { key, totals: new Map() };
      villages.set(id, entry);
    }
    addTo(entry.totals, row.candidateId, row.sumVotes);
  }

  const candidates: CandidateRef[] = [...names.entries()]
    .map(([id, name]) => ({ id, name }))
    .sort((a, b) => a.id - b.id);

  const villageTotals: VillageTotals[] = [...villages.values()]
    .map(({ key, totals }) => {
      for (const candidate of candidates) {
        if (!totals.has(candidate.id)) {
          totals.set(candidate.id, 0);
        }
      }
      return { ...key, totals };
    })
    .sort(compareVillageKeys);

  return { candidates, nationalTotals, villages: villageTotals };
};
