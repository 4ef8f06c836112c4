import type {
  Judgment,
  PairTrimRequest,
  PairTrimResult,
  Side,
  TrajectoryPair,
  TrimBounds,
} from '../../../shared/types/session';
import { isValidTrim } from '../../../shared/utils/validation';
import { ConflictError, InvalidRangeError, StorageFailureError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { SessionRepository } from './database';
import type { PairLocks } from './pairLocks';
import type { TrajectoryStore } from './trajectoryStore';

const logger = createLogger('trim');

export interface TrimServiceDeps {
  store: TrajectoryStore;
  repository: SessionRepository;
  locks: PairLocks;
  /** Resolves a pair by id, throwing NotFound when unknown */
  resolvePair: (pairId: string) => TrajectoryPair;
  /** Committed judgment of a pair, reported when a trim arrives too late */
  findJudgment: (pairId: string) => Judgment | undefined;
}

const sameBounds = (a: TrimBounds, b: TrimBounds) => a.start === b.start && a.end === b.end;

/**
 * Applies user edits to the active window of a pair's trajectories. Trims never
 * touch the media or reward data; they only move the window, always measured
 * against the full duration.
 */
export class TrimService {
  constructor(private readonly deps: TrimServiceDeps) {}

  async applyTrim(pairId: string, side: Side, start: number, end: number): Promise<TrimBounds> {
    const pair = this.deps.resolvePair(pairId);
    const trajectoryId = side === 'left' ? pair.leftId : pair.rightId;
    this.validate(trajectoryId, start, end);

    return this.withPairLock(pair, async () => {
      await this.write(trajectoryId, { start, end });
      return this.deps.store.currentBounds(trajectoryId);
    });
  }

  /**
   * Trims both sides of a pair. Both ranges are validated before anything is
   * written, so an invalid side leaves the other untouched.
   */
  async applyPairTrim(request: PairTrimRequest): Promise<PairTrimResult> {
    const pair = this.deps.resolvePair(request.pairId);
    this.validate(pair.leftId, request.leftStart, request.leftEnd);
    this.validate(pair.rightId, request.rightStart, request.rightEnd);

    return this.withPairLock(pair, async () => {
      const previousLeft = this.deps.store.currentBounds(pair.leftId);
      await this.write(pair.leftId, { start: request.leftStart, end: request.leftEnd });
      try {
        await this.write(pair.rightId, { start: request.rightStart, end: request.rightEnd });
      } catch (error) {
        await this.revert(pair.leftId, previousLeft);
        throw error;
      }

      const left = this.deps.store.currentBounds(pair.leftId);
      const right = this.deps.store.currentBounds(pair.rightId);
      return { leftStart: left.start, leftEnd: left.end, rightStart: right.start, rightEnd: right.end };
    });
  }

  private validate(trajectoryId: string, start: number, end: number): void {
    const { duration } = this.deps.store.get(trajectoryId);
    if (!isValidTrim(start, end, duration)) {
      throw new InvalidRangeError(trajectoryId, start, end, duration);
    }
  }

  private async withPairLock<T>(pair: TrajectoryPair, work: () => Promise<T>): Promise<T> {
    if (pair.status === 'judged') {
      throw new ConflictError(pair.id, this.deps.findJudgment(pair.id));
    }
    if (!this.deps.locks.tryAcquire(pair.id, 'trim')) {
      throw new ConflictError(pair.id, undefined, this.deps.locks.holder(pair.id));
    }
    try {
      return await work();
    } finally {
      this.deps.locks.release(pair.id);
    }
  }

  private async write(trajectoryId: string, bounds: TrimBounds): Promise<void> {
    const previous = this.deps.store.currentBounds(trajectoryId);
    if (sameBounds(previous, bounds)) {
      return;
    }

    try {
      await this.deps.repository.saveTrim(trajectoryId, bounds);
    } catch (error) {
      logger.error('❌ Trim write failed, bounds unchanged', { trajectoryId, error: String(error) });
      throw new StorageFailureError('trim', error);
    }
    this.deps.store.setBounds(trajectoryId, bounds);
    logger.debug('✂️ Trim applied', { trajectoryId, ...bounds });
  }

  private async revert(trajectoryId: string, bounds: TrimBounds): Promise<void> {
    try {
      await this.deps.repository.saveTrim(trajectoryId, bounds);
    } catch (error) {
      logger.error('❌ Stored trim could not be restored', { trajectoryId, error: String(error) });
      throw new StorageFailureError('trim rollback', error);
    }
    this.deps.store.setBounds(trajectoryId, bounds);
  }
}
