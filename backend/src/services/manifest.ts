import { readFile } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { TrajectoryPair, TrajectoryRecord } from '../../../shared/types/session';
import { isValidTrim } from '../../../shared/utils/validation';

const trajectorySchema = z.object({
  id: z.string().min(1),
  mediaPath: z.string().min(1),
  rewards: z.array(z.number().finite()),
  frameRate: z.number().positive(),
  duration: z.number().positive().optional(),
  trim: z.object({ start: z.number(), end: z.number() }).optional(),
});

const pairSchema = z.object({
  id: z.string().min(1).optional(),
  left: z.string().min(1),
  right: z.string().min(1),
});

export const manifestSchema = z
  .object({
    trajectories: z.array(trajectorySchema),
    pairs: z.array(pairSchema).min(1, 'A session needs at least one pair'),
  })
  .superRefine((manifest, ctx) => {
    const ids = new Set<string>();
    manifest.trajectories.forEach((trajectory, index) => {
      if (ids.has(trajectory.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['trajectories', index, 'id'], message: `Duplicate trajectory id ${trajectory.id}` });
      }
      ids.add(trajectory.id);
    });

    // Trim bounds belong to one pair side, so a trajectory may be used only once
    const used = new Set<string>();
    const pairIds = new Set<string>();
    manifest.pairs.forEach((pair, index) => {
      if (pair.id !== undefined) {
        if (pairIds.has(pair.id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['pairs', index, 'id'], message: `Duplicate pair id ${pair.id}` });
        }
        pairIds.add(pair.id);
      }
      if (pair.left === pair.right) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['pairs', index], message: 'A pair needs two different trajectories' });
      }
      for (const side of ['left', 'right'] as const) {
        const trajectoryId = pair[side];
        if (!ids.has(trajectoryId)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['pairs', index, side], message: `Unknown trajectory ${trajectoryId}` });
        } else if (used.has(trajectoryId)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['pairs', index, side], message: `Trajectory ${trajectoryId} already belongs to another pair` });
        }
        used.add(trajectoryId);
      }
    });
  });

export interface SessionSeed {
  trajectories: TrajectoryRecord[];
  pairs: TrajectoryPair[];
}

/**
 * Validates a manifest and turns it into store records with initial trim
 * bounds and queue positions.
 */
export const parseManifest = (raw: unknown, newId: () => string = () => uuidv4()): SessionSeed => {
  const manifest = manifestSchema.parse(raw);

  const trajectories = manifest.trajectories.map((entry): TrajectoryRecord => {
    const duration = entry.duration ?? entry.rewards.length / entry.frameRate;
    if (!(duration > 0)) {
      throw new Error(`Trajectory ${entry.id} has no duration and no rewards`);
    }
    const trim = entry.trim ?? { start: 0, end: duration };
    if (!isValidTrim(trim.start, trim.end, duration)) {
      throw new Error(`Trajectory ${entry.id} has an invalid trim [${trim.start}, ${trim.end}]`);
    }
    return {
      id: entry.id,
      mediaPath: entry.mediaPath,
      rewards: entry.rewards,
      frameRate: entry.frameRate,
      duration,
      trim,
    };
  });

  const pairs = manifest.pairs.map((entry, position): TrajectoryPair => ({
    id: entry.id ?? newId(),
    leftId: entry.left,
    rightId: entry.right,
    status: 'pending',
    position,
  }));

  return { trajectories, pairs };
};

export const loadManifestFile = async (filePath: string): Promise<SessionSeed> => {
  const contents = await readFile(filePath, 'utf-8');
  return parseManifest(JSON.parse(contents));
};
