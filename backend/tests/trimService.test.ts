import { describe, expect, it } from 'vitest';
import type { Judgment } from '../../shared/types/session';
import { PairLocks } from '../src/services/pairLocks';
import { PairSampler } from '../src/services/pairSampler';
import { TrajectoryStore } from '../src/services/trajectoryStore';
import { TrimService } from '../src/services/trimService';
import { ConflictError, InvalidRangeError, NotFoundError, StorageFailureError } from '../src/utils/errors';
import { ControllableRepository, seededRepository } from './helpers';

const setup = async () => {
  const inner = await seededRepository(2);
  const repository = new ControllableRepository(inner);
  const snapshot = await inner.load();
  const store = new TrajectoryStore(snapshot.trajectories);
  const sampler = new PairSampler(snapshot.pairs, { allowSkipping: true });
  const locks = new PairLocks();
  const judgments = new Map<string, Judgment>();
  const trims = new TrimService({
    store,
    repository,
    locks,
    resolvePair: pairId => sampler.get(pairId),
    findJudgment: pairId => judgments.get(pairId),
  });
  return { inner, repository, store, sampler, locks, judgments, trims };
};

describe('TrimService', () => {
  it('applies a trim to the named side and persists it', async () => {
    const { trims, store, inner } = await setup();

    await expect(trims.applyTrim('pair-1', 'left', 2, 8)).resolves.toEqual({ start: 2, end: 8 });
    expect(store.currentBounds('traj-1a')).toEqual({ start: 2, end: 8 });
    expect(store.currentBounds('traj-1b')).toEqual({ start: 0, end: 10 });

    const stored = (await inner.load()).trajectories.find(record => record.id === 'traj-1a');
    expect(stored?.trim).toEqual({ start: 2, end: 8 });
  });

  it.each([
    [-1, 5],
    [5, 5],
    [6, 5],
    [0, 10.5],
    [Number.NaN, 5],
  ])('rejects [%s, %s] without mutating anything', async (start, end) => {
    const { trims, store, repository } = await setup();

    await expect(trims.applyTrim('pair-1', 'right', start, end)).rejects.toBeInstanceOf(InvalidRangeError);
    expect(store.currentBounds('traj-1b')).toEqual({ start: 0, end: 10 });
    expect(repository.calls).toEqual([]);
  });

  it('accepts the full duration as a window', async () => {
    const { trims } = await setup();
    await expect(trims.applyTrim('pair-1', 'left', 0, 10)).resolves.toEqual({ start: 0, end: 10 });
  });

  it('measures every trim against the full duration', async () => {
    const { trims, store } = await setup();
    await trims.applyTrim('pair-1', 'left', 2, 4);
    await trims.applyTrim('pair-1', 'left', 5, 9);

    expect(store.currentBounds('traj-1a')).toEqual({ start: 5, end: 9 });
    expect(store.get('traj-1a').rewards).toHaveLength(300);
  });

  it('treats an identical trim as a no-op', async () => {
    const { trims, repository } = await setup();
    const first = await trims.applyTrim('pair-1', 'left', 2, 8);
    const second = await trims.applyTrim('pair-1', 'left', 2, 8);

    expect(second).toEqual(first);
    expect(repository.calls).toEqual(['saveTrim']);
  });

  it('fails with NotFound for unknown pairs', async () => {
    const { trims } = await setup();
    await expect(trims.applyTrim('pair-7', 'left', 1, 2)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('keeps the previous bounds when the write fails', async () => {
    const { trims, store, repository } = await setup();
    repository.failures.add('saveTrim');

    await expect(trims.applyTrim('pair-1', 'left', 2, 8)).rejects.toBeInstanceOf(StorageFailureError);
    expect(store.currentBounds('traj-1a')).toEqual({ start: 0, end: 10 });
  });

  it('trims both sides or neither', async () => {
    const { trims, store } = await setup();

    await expect(
      trims.applyPairTrim({ pairId: 'pair-2', leftStart: 1, leftEnd: 3, rightStart: 4, rightEnd: 12 })
    ).rejects.toBeInstanceOf(InvalidRangeError);
    expect(store.currentBounds('traj-2a')).toEqual({ start: 0, end: 10 });

    await expect(
      trims.applyPairTrim({ pairId: 'pair-2', leftStart: 1, leftEnd: 3, rightStart: 4, rightEnd: 6 })
    ).resolves.toEqual({ leftStart: 1, leftEnd: 3, rightStart: 4, rightEnd: 6 });
  });

  it('refuses trims on a judged pair and reports the judgment', async () => {
    const { trims, sampler, judgments } = await setup();
    const committed: Judgment = {
      pairId: 'pair-1',
      outcome: 'right',
      timestamp: '2026-03-01T12:00:00.000Z',
      trim: { left: { start: 0, end: 10 }, right: { start: 0, end: 10 } },
    };
    judgments.set('pair-1', committed);
    sampler.markJudged('pair-1');

    const error = await trims.applyTrim('pair-1', 'left', 1, 2).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConflictError);
    expect(error instanceof ConflictError && error.existing).toEqual(committed);
  });

  it('keeps serving the old bounds until the write lands', async () => {
    const { trims, store, repository } = await setup();
    const release = repository.hold('saveTrim');

    const pending = trims.applyTrim('pair-1', 'left', 2, 8);
    expect(store.currentBounds('traj-1a')).toEqual({ start: 0, end: 10 });

    release();
    await pending;
    expect(store.currentBounds('traj-1a')).toEqual({ start: 2, end: 8 });
  });

  it('lets only the first of two concurrent writes on a pair through', async () => {
    const { trims, repository, store } = await setup();
    const release = repository.hold('saveTrim');

    const first = trims.applyTrim('pair-1', 'left', 2, 8);
    await expect(trims.applyTrim('pair-1', 'right', 1, 3)).rejects.toBeInstanceOf(ConflictError);

    release();
    await expect(first).resolves.toEqual({ start: 2, end: 8 });
    expect(store.currentBounds('traj-1b')).toEqual({ start: 0, end: 10 });
  });

  it('does not block writes on other pairs', async () => {
    const { trims, repository } = await setup();
    const release = repository.hold('saveTrim');
    const first = trims.applyTrim('pair-1', 'left', 2, 8);

    await expect(trims.applyTrim('pair-2', 'left', 1, 2)).resolves.toEqual({ start: 1, end: 2 });

    release();
    await first;
  });
});
