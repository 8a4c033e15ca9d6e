import type { ConsensusScore } from '@/types/consensus';

/**
 * Total score descending, ties by symbol so equal scores always come out in the same order.
 */
export function rankScores(scores: readonly ConsensusScore[]): ConsensusScore[] {
  return scores.slice().sort((a, b) => {
    if (b.total !== a.total) return b.total - a.total;
    return a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
  });
}

export function selectTopK(scores: readonly ConsensusScore[], k: number): ConsensusScore[] {
  return rankScores(scores).slice(0, k);
}
