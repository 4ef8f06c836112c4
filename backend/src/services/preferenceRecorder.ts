import type { Judgment, Outcome, SessionConfig, TrimSnapshot } from '../../../shared/types/session';
import { isOutcome } from '../../../shared/utils/validation';
import {
  ConflictError,
  InvalidOutcomeError,
  NotFoundError,
  StorageFailureError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { SessionRepository } from './database';
import type { PairLocks } from './pairLocks';
import type { PairSampler } from './pairSampler';

const logger = createLogger('recorder');

export interface PreferenceRecorderDeps {
  config: Pick<SessionConfig, 'allowTies' | 'allowSkipping'>;
  sampler: PairSampler;
  repository: SessionRepository;
  locks: PairLocks;
  now?: () => Date;
}

/**
 * Durable record of human judgments. A pair holds at most one committed
 * judgment; a second submission is a conflict and never an overwrite.
 * In-memory state only changes after the repository write has succeeded.
 */
export class PreferenceRecorder {
  private readonly committed = new Map<string, Judgment>();
  private readonly skipLog: Judgment[];
  private readonly now: () => Date;

  constructor(private readonly deps: PreferenceRecorderDeps, existing: Judgment[] = [], skips: Judgment[] = []) {
    this.now = deps.now ?? (() => new Date());
    existing.forEach(judgment => this.committed.set(judgment.pairId, judgment));
    this.skipLog = [...skips];
  }

  async record(pairId: string, outcome: string, trim: TrimSnapshot): Promise<Judgment> {
    if (!this.deps.sampler.has(pairId)) {
      throw new NotFoundError('pair', pairId);
    }
    const checkedOutcome = this.checkOutcome(outcome);

    const existing = this.committed.get(pairId);
    if (existing) {
      throw new ConflictError(pairId, existing);
    }
    if (!this.deps.locks.tryAcquire(pairId, 'judgment')) {
      throw new ConflictError(pairId, undefined, this.deps.locks.holder(pairId));
    }

    const judgment: Judgment = {
      pairId,
      outcome: checkedOutcome,
      timestamp: this.now().toISOString(),
      trim: { left: { ...trim.left }, right: { ...trim.right } },
    };
    try {
      if (checkedOutcome === 'skip') {
        await this.deps.repository.recordSkip(judgment);
        this.skipLog.push(judgment);
        this.deps.sampler.markSkipped(pairId);
      } else {
        await this.deps.repository.commitJudgment(judgment);
        this.committed.set(pairId, judgment);
        this.deps.sampler.markJudged(pairId);
      }
    } catch (error) {
      logger.error('❌ Judgment write failed', { pairId, outcome: checkedOutcome, error: String(error) });
      throw new StorageFailureError('judgment', error);
    } finally {
      this.deps.locks.release(pairId);
    }

    logger.info('🗳️ Judgment recorded', { pairId, outcome: checkedOutcome });
    return judgment;
  }

  get(pairId: string): Judgment {
    const judgment = this.committed.get(pairId);
    if (!judgment) {
      throw new NotFoundError('judgment', pairId);
    }
    return judgment;
  }

  find(pairId: string): Judgment | undefined {
    return this.committed.get(pairId);
  }

  list(): Judgment[] {
    return [...this.committed.values()];
  }

  /**
   * Every skip logged so far, oldest first
   */
  skips(): Judgment[] {
    return [...this.skipLog];
  }

  private checkOutcome(outcome: string): Outcome {
    if (!isOutcome(outcome)) {
      throw new InvalidOutcomeError(outcome, 'expected left, right, equal or skip');
    }
    if (outcome === 'equal' && !this.deps.config.allowTies) {
      throw new InvalidOutcomeError(outcome, 'ties are disabled for this session');
    }
    if (outcome === 'skip' && !this.deps.config.allowSkipping) {
      throw new InvalidOutcomeError(outcome, 'skipping is disabled for this session');
    }
    return outcome;
  }
}
