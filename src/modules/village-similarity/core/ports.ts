/**
 * Village Similarity Module - Ports
 */

import type { ElectionRepository } from '../../election-schema/index.js';

/**
 * Read side of the election repository: the per-village grouped votes.
 */
export type VillageVotesSource = Pick<ElectionRepository, 'getVotesByVillage'>;
