import type {
  Judgment,
  MediaDescriptor,
  NextPairResponse,
  PairStatus,
  PairTrimRequest,
  PairTrimResult,
  RewardResponse,
  SessionConfig,
  SessionState,
  SessionStatus,
  TrimSnapshot,
} from '../../../shared/types/session';
import { FeatureDisabledError, SessionEndedError, StorageFailureError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { SessionRepository, SessionSnapshot } from './database';
import { EXHAUSTED, PairSampler } from './pairSampler';
import { PairLocks } from './pairLocks';
import { PreferenceRecorder } from './preferenceRecorder';
import type { ResultExporter } from './resultExporter';
import { type RewardAggregation, RewardRevealer } from './rewardRevealer';
import { TrajectoryStore } from './trajectoryStore';
import { TrimService } from './trimService';

const logger = createLogger('session');

export interface SessionControllerOptions {
  config: SessionConfig;
  repository: SessionRepository;
  rewardAggregation?: RewardAggregation;
  exporter?: ResultExporter;
  mediaUrl?: (trajectoryId: string) => string;
  now?: () => Date;
}

const defaultMediaUrl = (trajectoryId: string) => `/api/session/media/${encodeURIComponent(trajectoryId)}`;

/**
 * Owns one collection session: its fixed configuration, the presentation
 * queue and the lifecycle INITIALIZING -> ACTIVE -> TERMINATING -> TERMINATED.
 * Every request handler goes through an instance of this class.
 */
export class SessionController {
  private state: SessionState = 'INITIALIZING';
  private readonly store: TrajectoryStore;
  private readonly sampler: PairSampler;
  private readonly locks = new PairLocks();
  private readonly trims: TrimService;
  private readonly recorder: PreferenceRecorder;
  private readonly revealer?: RewardRevealer;
  private readonly inFlight = new Set<Promise<unknown>>();
  private termination?: Promise<void>;
  // Cleared once in-flight work has drained and the flush begins
  private acceptingLateWork = true;

  private constructor(private readonly options: SessionControllerOptions, snapshot: SessionSnapshot) {
    const { config, repository } = options;

    // A skip is never terminal: skipped pairs return to the queue on restart
    const pairs = snapshot.pairs.map(pair =>
      pair.status === 'skipped' ? { ...pair, status: 'pending' as const } : pair
    );

    this.store = new TrajectoryStore(snapshot.trajectories);
    this.sampler = new PairSampler(pairs, { allowSkipping: config.allowSkipping });
    this.trims = new TrimService({
      store: this.store,
      repository,
      locks: this.locks,
      resolvePair: pairId => this.sampler.get(pairId),
      findJudgment: pairId => this.recorder.find(pairId),
    });
    this.recorder = new PreferenceRecorder(
      { config, sampler: this.sampler, repository, locks: this.locks, now: options.now },
      snapshot.judgments,
      snapshot.skips
    );
    if (config.debugMode) {
      this.revealer = new RewardRevealer(this.store, options.rewardAggregation);
    }
  }

  /**
   * Restores the session from the repository and activates it
   */
  static async open(options: SessionControllerOptions): Promise<SessionController> {
    const snapshot = await options.repository.load();
    const controller = new SessionController(options, snapshot);
    await controller.start();
    return controller;
  }

  get config(): SessionConfig {
    return { ...this.options.config };
  }

  get currentState(): SessionState {
    return this.state;
  }

  async nextPair(): Promise<NextPairResponse> {
    if (this.state !== 'ACTIVE') {
      throw new SessionEndedError(this.state);
    }

    const pair = this.sampler.next();
    if (pair === EXHAUSTED) {
      logger.info('🏁 All pairs presented, terminating session');
      await this.finish(false);
      return { exhausted: true };
    }

    return {
      exhausted: false,
      pairId: pair.id,
      leftMedia: this.describe(pair.leftId),
      rightMedia: this.describe(pair.rightId),
    };
  }

  async trim(request: PairTrimRequest): Promise<PairTrimResult> {
    this.ensureAccepting(request.pairId);
    if (!this.options.config.allowEditing) {
      throw new FeatureDisabledError('editing');
    }
    return this.track(() => this.trims.applyPairTrim(request));
  }

  async judge(pairId: string, outcome: string): Promise<Judgment> {
    this.ensureAccepting(pairId);
    const snapshot = this.trimSnapshot(pairId);
    const judgment = await this.track(() => this.recorder.record(pairId, outcome, snapshot));

    if (judgment.outcome === 'skip' && this.state === 'ACTIVE') {
      this.sampler.requeue(pairId);
      logger.debug('↩️ Skipped pair requeued', { pairId });
    }
    return judgment;
  }

  rewards(pairId: string): RewardResponse {
    if (!this.revealer) {
      throw new FeatureDisabledError('debug');
    }
    const pair = this.sampler.get(pairId);
    return {
      leftReward: this.revealer.aggregate(pair.leftId),
      rightReward: this.revealer.aggregate(pair.rightId),
    };
  }

  /**
   * Resolves the media file of a trajectory for streaming
   */
  mediaPath(trajectoryId: string): string {
    if (this.state === 'TERMINATED') {
      throw new SessionEndedError(this.state);
    }
    return this.store.mediaPath(trajectoryId);
  }

  /**
   * Ends the session early. Unpresented pairs are dropped from the queue,
   * in-flight work is allowed to finish. Calling again changes nothing.
   */
  async terminate(): Promise<SessionState> {
    await this.finish(true);
    return this.state;
  }

  status(): SessionStatus {
    const pairs = this.sampler.all();
    const count = (status: PairStatus) => pairs.filter(pair => pair.status === status).length;
    return {
      state: this.state,
      config: this.config,
      totalPairs: pairs.length,
      judged: count('judged'),
      skipped: count('skipped'),
      pending: count('pending'),
      remaining: this.sampler.remaining(),
      skipEvents: this.recorder.skips().length,
    };
  }

  judgments(): Judgment[] {
    return this.recorder.list();
  }

  judgment(pairId: string): Judgment {
    return this.recorder.get(pairId);
  }

  private async start(): Promise<void> {
    const resolvable = this.sampler
      .all()
      .some(pair => pair.status !== 'judged' && this.store.has(pair.leftId) && this.store.has(pair.rightId));

    if (resolvable) {
      this.state = 'ACTIVE';
      logger.info('🚀 Session active', { pairs: this.sampler.all().length, ...this.options.config });
      return;
    }

    logger.warn('⚠️ Session has nothing to present');
    await this.finish(false);
  }

  private finish(discardRemaining: boolean): Promise<void> {
    if (!this.termination) {
      this.termination = this.settle(discardRemaining);
      return this.termination;
    }
    // Only the first caller sees a flush failure; repeats wait for the same end state
    return this.termination.catch(() => undefined);
  }

  private async settle(discardRemaining: boolean): Promise<void> {
    this.state = 'TERMINATING';
    if (discardRemaining) {
      const discarded = this.sampler.discardRemaining();
      logger.info(`🛑 Terminating, ${discarded.length} queued pairs discarded`);
    }

    try {
      while (this.inFlight.size > 0) {
        await Promise.allSettled([...this.inFlight]);
      }
      this.acceptingLateWork = false;
      await this.options.repository.flush();
      await this.options.exporter?.export(this.sampler.all(), this.recorder.list());
    } catch (error) {
      logger.error('❌ Session could not be flushed', { error: String(error) });
      throw new StorageFailureError('session results', error);
    } finally {
      this.state = 'TERMINATED';
      logger.info('✅ Session terminated', { judged: this.recorder.list().length });
    }
  }

  private ensureAccepting(pairId: string): void {
    if (this.state === 'ACTIVE') {
      return;
    }
    // While terminating, only pairs the reviewer has already seen may finish
    if (
      this.state === 'TERMINATING' &&
      this.acceptingLateWork &&
      this.sampler.has(pairId) &&
      this.sampler.wasServed(pairId)
    ) {
      return;
    }
    throw new SessionEndedError(this.state);
  }

  private async track<T>(work: () => Promise<T>): Promise<T> {
    const running = work();
    this.inFlight.add(running);
    try {
      return await running;
    } finally {
      this.inFlight.delete(running);
    }
  }

  private trimSnapshot(pairId: string): TrimSnapshot {
    const pair = this.sampler.get(pairId);
    return {
      left: this.store.currentBounds(pair.leftId),
      right: this.store.currentBounds(pair.rightId),
    };
  }

  private describe(trajectoryId: string): MediaDescriptor {
    const record = this.store.get(trajectoryId);
    const mediaUrl = this.options.mediaUrl ?? defaultMediaUrl;
    return {
      trajectoryId,
      url: mediaUrl(trajectoryId),
      duration: record.duration,
      frameRate: record.frameRate,
      trim: { ...record.trim },
    };
  }
}
