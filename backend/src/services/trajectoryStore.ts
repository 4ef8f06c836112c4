import type { TrajectoryRecord, TrimBounds } from '../../../shared/types/session';
import { NotFoundError } from '../utils/errors';

/**
 * Half-open reward index range covered by a trim window, clamped to the
 * reward sequence: [floor(start * rate), floor(end * rate))
 */
export const rewardIndexRange = (
  record: Pick<TrajectoryRecord, 'rewards' | 'frameRate'>,
  bounds: TrimBounds
): [number, number] => {
  const length = record.rewards.length;
  const clamp = (index: number) => Math.min(Math.max(index, 0), length);
  return [clamp(Math.floor(bounds.start * record.frameRate)), clamp(Math.floor(bounds.end * record.frameRate))];
};

/**
 * Read-mostly registry of trajectory records. Trim bounds only change through
 * TrimService; every read hands out copies so callers cannot mutate the store.
 */
export class TrajectoryStore {
  private readonly records = new Map<string, TrajectoryRecord>();

  constructor(records: TrajectoryRecord[] = []) {
    records.forEach(record => this.add(record));
  }

  add(record: TrajectoryRecord): void {
    this.records.set(record.id, {
      ...record,
      rewards: [...record.rewards],
      trim: { ...record.trim },
    });
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get(id: string): TrajectoryRecord {
    const record = this.lookup(id);
    return { ...record, rewards: [...record.rewards], trim: { ...record.trim } };
  }

  currentBounds(id: string): TrimBounds {
    return { ...this.lookup(id).trim };
  }

  /**
   * Reward values inside the current trim window
   */
  windowedRewards(id: string): number[] {
    const record = this.lookup(id);
    const [from, to] = rewardIndexRange(record, record.trim);
    return record.rewards.slice(from, to);
  }

  mediaPath(id: string): string {
    return this.lookup(id).mediaPath;
  }

  /** @internal called by TrimService only */
  setBounds(id: string, bounds: TrimBounds): void {
    this.lookup(id).trim = { ...bounds };
  }

  private lookup(id: string): TrajectoryRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError('trajectory', id);
    }
    return record;
  }
}
