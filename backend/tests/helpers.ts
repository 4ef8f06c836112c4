import type {
  Judgment,
  SessionConfig,
  TrajectoryPair,
  TrajectoryRecord,
  TrimBounds,
} from '../../shared/types/session';
import { SqliteSessionRepository, type SessionRepository, type SessionSnapshot } from '../src/services/database';
import type { SessionSeed } from '../src/services/manifest';

export const FRAME_RATE = 30;
export const STEPS = 300;

export const fullConfig: SessionConfig = {
  allowTies: true,
  allowSkipping: true,
  allowEditing: true,
  debugMode: true,
};

/** Rewards equal to their step index, 10 seconds at 30 fps */
export const makeTrajectory = (id: string, overrides: Partial<TrajectoryRecord> = {}): TrajectoryRecord => ({
  id,
  rewards: Array.from({ length: STEPS }, (_, step) => step),
  mediaPath: `${id}.mp4`,
  frameRate: FRAME_RATE,
  duration: STEPS / FRAME_RATE,
  trim: { start: 0, end: STEPS / FRAME_RATE },
  ...overrides,
});

export const makeSeed = (pairCount: number): SessionSeed => {
  const trajectories: TrajectoryRecord[] = [];
  const pairs: TrajectoryPair[] = [];
  for (let index = 1; index <= pairCount; index += 1) {
    trajectories.push(makeTrajectory(`traj-${index}a`), makeTrajectory(`traj-${index}b`));
    pairs.push({
      id: `pair-${index}`,
      leftId: `traj-${index}a`,
      rightId: `traj-${index}b`,
      status: 'pending',
      position: index - 1,
    });
  }
  return { trajectories, pairs };
};

export const seededRepository = async (pairCount: number): Promise<SqliteSessionRepository> => {
  const repository = new SqliteSessionRepository(':memory:');
  const seed = makeSeed(pairCount);
  await repository.seed(seed.trajectories, seed.pairs);
  return repository;
};

type WriteMethod = 'saveTrim' | 'commitJudgment' | 'recordSkip' | 'flush';

/**
 * Wraps a repository so tests can hold writes open or make them fail
 */
export class ControllableRepository implements SessionRepository {
  readonly failures = new Set<WriteMethod>();
  readonly calls: WriteMethod[] = [];
  private readonly gates = new Map<WriteMethod, Promise<void>>();

  constructor(private readonly inner: SessionRepository) {}

  /** Blocks the next call of the method until the returned function is called */
  hold(method: WriteMethod): () => void {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    this.gates.set(method, gate);
    return () => release();
  }

  load(): Promise<SessionSnapshot> {
    return this.inner.load();
  }

  seed(trajectories: TrajectoryRecord[], pairs: TrajectoryPair[]): Promise<void> {
    return this.inner.seed(trajectories, pairs);
  }

  async saveTrim(trajectoryId: string, bounds: TrimBounds): Promise<void> {
    await this.before('saveTrim');
    return this.inner.saveTrim(trajectoryId, bounds);
  }

  async commitJudgment(judgment: Judgment): Promise<void> {
    await this.before('commitJudgment');
    return this.inner.commitJudgment(judgment);
  }

  async recordSkip(judgment: Judgment): Promise<void> {
    await this.before('recordSkip');
    return this.inner.recordSkip(judgment);
  }

  async flush(): Promise<void> {
    await this.before('flush');
    return this.inner.flush();
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  private async before(method: WriteMethod): Promise<void> {
    this.calls.push(method);
    const gate = this.gates.get(method);
    if (gate) {
      this.gates.delete(method);
      await gate;
    }
    if (this.failures.has(method)) {
      throw new Error('disk full');
    }
  }
}
