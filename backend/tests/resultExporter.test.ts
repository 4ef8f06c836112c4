import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Judgment } from '../../shared/types/session';
import { buildPreferenceResults, ResultExporter } from '../src/services/resultExporter';
import { makeSeed } from './helpers';

const judged = (pairId: string, outcome: Judgment['outcome']): Judgment => ({
  pairId,
  outcome,
  timestamp: '2026-03-01T12:00:00.000Z',
  trim: { left: { start: 0, end: 10 }, right: { start: 0, end: 10 } },
});

describe('buildPreferenceResults', () => {
  it('encodes outcomes in queue order and leaves unjudged pairs null', () => {
    const pairs = makeSeed(4).pairs.reverse();
    const judgments = [judged('pair-3', 'equal'), judged('pair-1', 'right'), judged('pair-2', 'left')];

    expect(buildPreferenceResults(pairs, judgments)).toEqual([
      { pairId: 'pair-1', preference: 1 },
      { pairId: 'pair-2', preference: 0 },
      { pairId: 'pair-3', preference: 0.5 },
      { pairId: 'pair-4', preference: null },
    ]);
  });
});

describe('ResultExporter', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'duels-results-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes the preference vector to the result file', async () => {
    const resultFile = path.join(directory, 'nested', 'preferences.json');
    await new ResultExporter(resultFile).export(makeSeed(2).pairs, [judged('pair-2', 'left')]);

    expect(JSON.parse(await readFile(resultFile, 'utf-8'))).toEqual([
      { pairId: 'pair-1', preference: null },
      { pairId: 'pair-2', preference: 0 },
    ]);
  });

  it('only builds the results when no file is configured', async () => {
    await expect(new ResultExporter().export(makeSeed(1).pairs, [])).resolves.toEqual([
      { pairId: 'pair-1', preference: null },
    ]);
  });
});
