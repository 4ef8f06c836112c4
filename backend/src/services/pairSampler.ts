import type { TrajectoryPair } from '../../../shared/types/session';
import { FeatureDisabledError, NotFoundError } from '../utils/errors';

export const EXHAUSTED = Symbol('exhausted');

export type Exhausted = typeof EXHAUSTED;

export interface PairSamplerOptions {
  allowSkipping: boolean;
}

/**
 * Presentation queue over a fixed pool of pairs, ordered by position. The
 * cursor only moves forward, and the only way a pair comes back is an
 * explicit requeue after a skip.
 */
export class PairSampler {
  private readonly pairs = new Map<string, TrajectoryPair>();
  private queue: string[] = [];
  private cursor = 0;
  private readonly served = new Set<string>();

  constructor(pairs: TrajectoryPair[], private readonly options: PairSamplerOptions) {
    const ordered = [...pairs].sort((a, b) => a.position - b.position);
    for (const pair of ordered) {
      this.pairs.set(pair.id, { ...pair });
      if (pair.status !== 'judged') {
        this.queue.push(pair.id);
      }
    }
  }

  next(): TrajectoryPair | Exhausted {
    while (this.cursor < this.queue.length) {
      const pairId = this.queue[this.cursor];
      this.cursor += 1;
      const pair = this.lookup(pairId);
      if (pair.status === 'judged') {
        continue;
      }
      this.served.add(pairId);
      return { ...pair };
    }
    return EXHAUSTED;
  }

  /**
   * Moves a skipped pair to the back of the queue as pending again. Any entry
   * of the pair still waiting after the cursor is dropped, so it is presented
   * once. Returns false, changing nothing, when the pair is not skipped.
   */
  requeue(pairId: string): boolean {
    if (!this.options.allowSkipping) {
      throw new FeatureDisabledError('skipping');
    }
    const pair = this.lookup(pairId);
    if (pair.status !== 'skipped') {
      return false;
    }
    pair.status = 'pending';
    const waiting = this.queue.slice(this.cursor).filter(queued => queued !== pairId);
    this.queue = [...this.queue.slice(0, this.cursor), ...waiting, pairId];
    return true;
  }

  get(pairId: string): TrajectoryPair {
    return { ...this.lookup(pairId) };
  }

  has(pairId: string): boolean {
    return this.pairs.has(pairId);
  }

  all(): TrajectoryPair[] {
    return [...this.pairs.values()].map(pair => ({ ...pair }));
  }

  markJudged(pairId: string): void {
    this.lookup(pairId).status = 'judged';
  }

  /**
   * Marks a pair skipped and moves it behind every other pair, the same way
   * the repository reorders a skipped pair
   */
  markSkipped(pairId: string): void {
    const pair = this.lookup(pairId);
    const last = Math.max(...[...this.pairs.values()].map(entry => entry.position));
    pair.status = 'skipped';
    pair.position = last + 1;
  }

  wasServed(pairId: string): boolean {
    return this.served.has(pairId);
  }

  /**
   * Pairs still waiting in the queue after the cursor
   */
  remaining(): number {
    return this.queue.slice(this.cursor).filter(pairId => this.lookup(pairId).status !== 'judged').length;
  }

  /**
   * Drops every queue entry not yet presented. Returns the discarded ids.
   */
  discardRemaining(): string[] {
    const discarded = this.queue.slice(this.cursor);
    this.queue = this.queue.slice(0, this.cursor);
    return discarded;
  }

  private lookup(pairId: string): TrajectoryPair {
    const pair = this.pairs.get(pairId);
    if (!pair) {
      throw new NotFoundError('pair', pairId);
    }
    return pair;
  }
}
