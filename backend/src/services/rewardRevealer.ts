import type { TrajectoryStore } from './trajectoryStore';

export type RewardAggregation = 'sum' | 'mean';

/**
 * Debug-only reward readout. Recomputed on every call so it always reflects
 * the latest trim.
 */
export class RewardRevealer {
  constructor(
    private readonly store: TrajectoryStore,
    private readonly aggregation: RewardAggregation = 'sum'
  ) {}

  aggregate(trajectoryId: string): number {
    const rewards = this.store.windowedRewards(trajectoryId);
    const total = rewards.reduce((sum, reward) => sum + reward, 0);
    if (this.aggregation === 'mean') {
      return rewards.length === 0 ? 0 : total / rewards.length;
    }
    return total;
  }
}
