import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import type {
  Judgment,
  TrajectoryPair,
  TrajectoryRecord,
  TrimBounds,
} from '../../../shared/types/session';
import { isOutcome, isPairStatus } from '../../../shared/utils/validation';
import { createLogger } from '../utils/logger';

const logger = createLogger('database');

export interface SessionSnapshot {
  trajectories: TrajectoryRecord[];
  pairs: TrajectoryPair[];
  judgments: Judgment[];
  skips: Judgment[];
}

/**
 * Durable storage behind the session. Every write is atomic: it either lands
 * completely or rejects and leaves the stored state untouched.
 */
export interface SessionRepository {
  load(): Promise<SessionSnapshot>;
  seed(trajectories: TrajectoryRecord[], pairs: TrajectoryPair[]): Promise<void>;
  saveTrim(trajectoryId: string, bounds: TrimBounds): Promise<void>;
  commitJudgment(judgment: Judgment): Promise<void>;
  recordSkip(judgment: Judgment): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS trajectories (
    id TEXT PRIMARY KEY,
    media_path TEXT NOT NULL,
    frame_rate REAL NOT NULL,
    duration REAL NOT NULL,
    trim_start REAL NOT NULL,
    trim_end REAL NOT NULL
  );
  CREATE TABLE IF NOT EXISTS rewards (
    trajectory_id TEXT NOT NULL REFERENCES trajectories(id),
    step INTEGER NOT NULL,
    value REAL NOT NULL,
    PRIMARY KEY (trajectory_id, step)
  );
  CREATE TABLE IF NOT EXISTS pairs (
    id TEXT PRIMARY KEY,
    position INTEGER NOT NULL UNIQUE,
    left_id TEXT NOT NULL REFERENCES trajectories(id),
    right_id TEXT NOT NULL REFERENCES trajectories(id),
    status TEXT NOT NULL CHECK (status IN ('pending', 'judged', 'skipped'))
  );
  CREATE TABLE IF NOT EXISTS judgments (
    pair_id TEXT PRIMARY KEY REFERENCES pairs(id),
    outcome TEXT NOT NULL CHECK (outcome IN ('left', 'right', 'equal')),
    timestamp TEXT NOT NULL,
    left_start REAL NOT NULL,
    left_end REAL NOT NULL,
    right_start REAL NOT NULL,
    right_end REAL NOT NULL
  );
  CREATE TABLE IF NOT EXISTS skips (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    pair_id TEXT NOT NULL REFERENCES pairs(id),
    timestamp TEXT NOT NULL,
    left_start REAL NOT NULL,
    left_end REAL NOT NULL,
    right_start REAL NOT NULL,
    right_end REAL NOT NULL
  );
  CREATE INDEX IF NOT EXISTS skips_pair_idx ON skips (pair_id);
`;

interface TrajectoryRow {
  id: string;
  media_path: string;
  frame_rate: number;
  duration: number;
  trim_start: number;
  trim_end: number;
}

interface RewardRow {
  trajectory_id: string;
  value: number;
}

interface PairRow {
  id: string;
  position: number;
  left_id: string;
  right_id: string;
  status: string;
}

interface SkipRow {
  pair_id: string;
  timestamp: string;
  left_start: number;
  left_end: number;
  right_start: number;
  right_end: number;
}

interface JudgmentRow extends SkipRow {
  outcome: string;
}

const trimOf = (row: SkipRow) => ({
  left: { start: row.left_start, end: row.left_end },
  right: { start: row.right_start, end: row.right_end },
});

const snapshotParams = (judgment: Judgment) => ({
  pairId: judgment.pairId,
  timestamp: judgment.timestamp,
  leftStart: judgment.trim.left.start,
  leftEnd: judgment.trim.left.end,
  rightStart: judgment.trim.right.start,
  rightEnd: judgment.trim.right.end,
});

export class SqliteSessionRepository implements SessionRepository {
  private readonly db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma('foreign_keys = ON');
    if (filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SCHEMA);
  }

  async load(): Promise<SessionSnapshot> {
    const rewardRows = this.db
      .prepare<[], RewardRow>('SELECT trajectory_id, value FROM rewards ORDER BY trajectory_id, step')
      .all();
    const rewardsById = new Map<string, number[]>();
    for (const row of rewardRows) {
      const list = rewardsById.get(row.trajectory_id) ?? [];
      list.push(row.value);
      rewardsById.set(row.trajectory_id, list);
    }

    const trajectories = this.db
      .prepare<[], TrajectoryRow>('SELECT * FROM trajectories ORDER BY id')
      .all()
      .map((row): TrajectoryRecord => ({
        id: row.id,
        mediaPath: row.media_path,
        frameRate: row.frame_rate,
        duration: row.duration,
        rewards: rewardsById.get(row.id) ?? [],
        trim: { start: row.trim_start, end: row.trim_end },
      }));

    const pairs = this.db
      .prepare<[], PairRow>('SELECT * FROM pairs ORDER BY position')
      .all()
      .map((row): TrajectoryPair => {
        if (!isPairStatus(row.status)) {
          throw new Error(`Stored pair ${row.id} has unknown status ${row.status}`);
        }
        return { id: row.id, position: row.position, leftId: row.left_id, rightId: row.right_id, status: row.status };
      });

    const judgments = this.db
      .prepare<[], JudgmentRow>('SELECT * FROM judgments ORDER BY timestamp, pair_id')
      .all()
      .map((row): Judgment => {
        if (!isOutcome(row.outcome)) {
          throw new Error(`Stored judgment for ${row.pair_id} has unknown outcome ${row.outcome}`);
        }
        return { pairId: row.pair_id, outcome: row.outcome, timestamp: row.timestamp, trim: trimOf(row) };
      });

    const skips = this.db
      .prepare<[], SkipRow>('SELECT * FROM skips ORDER BY id')
      .all()
      .map((row): Judgment => ({ pairId: row.pair_id, outcome: 'skip', timestamp: row.timestamp, trim: trimOf(row) }));

    return { trajectories, pairs, judgments, skips };
  }

  async seed(trajectories: TrajectoryRecord[], pairs: TrajectoryPair[]): Promise<void> {
    const insertTrajectory = this.db.prepare(
      `INSERT INTO trajectories (id, media_path, frame_rate, duration, trim_start, trim_end)
       VALUES (@id, @mediaPath, @frameRate, @duration, @trimStart, @trimEnd)`
    );
    const insertReward = this.db.prepare(
      'INSERT INTO rewards (trajectory_id, step, value) VALUES (?, ?, ?)'
    );
    const insertPair = this.db.prepare(
      `INSERT INTO pairs (id, position, left_id, right_id, status)
       VALUES (@id, @position, @leftId, @rightId, @status)`
    );

    this.db.transaction(() => {
      for (const trajectory of trajectories) {
        insertTrajectory.run({
          id: trajectory.id,
          mediaPath: trajectory.mediaPath,
          frameRate: trajectory.frameRate,
          duration: trajectory.duration,
          trimStart: trajectory.trim.start,
          trimEnd: trajectory.trim.end,
        });
        trajectory.rewards.forEach((value, step) => insertReward.run(trajectory.id, step, value));
      }
      for (const pair of pairs) {
        insertPair.run({
          id: pair.id,
          position: pair.position,
          leftId: pair.leftId,
          rightId: pair.rightId,
          status: pair.status,
        });
      }
    })();

    logger.info(`🌱 Seeded ${trajectories.length} trajectories and ${pairs.length} pairs`);
  }

  async saveTrim(trajectoryId: string, bounds: TrimBounds): Promise<void> {
    const result = this.db
      .prepare('UPDATE trajectories SET trim_start = ?, trim_end = ? WHERE id = ?')
      .run(bounds.start, bounds.end, trajectoryId);
    if (result.changes !== 1) {
      throw new Error(`Trajectory ${trajectoryId} is not stored`);
    }
  }

  async commitJudgment(judgment: Judgment): Promise<void> {
    const insert = this.db.prepare(
      `INSERT INTO judgments (pair_id, outcome, timestamp, left_start, left_end, right_start, right_end)
       VALUES (@pairId, @outcome, @timestamp, @leftStart, @leftEnd, @rightStart, @rightEnd)`
    );
    const markJudged = this.db.prepare("UPDATE pairs SET status = 'judged' WHERE id = ?");

    this.db.transaction(() => {
      insert.run({ ...snapshotParams(judgment), outcome: judgment.outcome });
      if (markJudged.run(judgment.pairId).changes !== 1) {
        throw new Error(`Pair ${judgment.pairId} is not stored`);
      }
    })();
  }

  async recordSkip(judgment: Judgment): Promise<void> {
    const insert = this.db.prepare(
      `INSERT INTO skips (pair_id, timestamp, left_start, left_end, right_start, right_end)
       VALUES (@pairId, @timestamp, @leftStart, @leftEnd, @rightStart, @rightEnd)`
    );
    // A skipped pair goes behind every other pair, matching the live requeue
    const markSkipped = this.db.prepare(
      "UPDATE pairs SET status = 'skipped', position = (SELECT MAX(position) + 1 FROM pairs) WHERE id = ?"
    );

    this.db.transaction(() => {
      insert.run(snapshotParams(judgment));
      if (markSkipped.run(judgment.pairId).changes !== 1) {
        throw new Error(`Pair ${judgment.pairId} is not stored`);
      }
    })();
  }

  async flush(): Promise<void> {
    if (this.db.memory) {
      return;
    }
    this.db.pragma('wal_checkpoint(TRUNCATE)');
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      logger.info('📦 Database closed');
    }
  }
}

export const openSessionRepository = (filename: string): SqliteSessionRepository => {
  if (filename !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }
  const repository = new SqliteSessionRepository(filename);
  logger.info('✅ Database opened', { filename });
  return repository;
};
