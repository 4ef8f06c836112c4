import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { Judgment, PreferenceResult, TrajectoryPair } from '../../../shared/types/session';
import { outcomeToPreference } from '../../../shared/utils/validation';
import { createLogger } from '../utils/logger';

const logger = createLogger('results');

export const buildPreferenceResults = (
  pairs: TrajectoryPair[],
  judgments: Judgment[]
): PreferenceResult[] => {
  const byPair = new Map(judgments.map(judgment => [judgment.pairId, judgment]));
  return [...pairs]
    .sort((a, b) => a.position - b.position)
    .map(pair => ({ pairId: pair.id, preference: outcomeToPreference(byPair.get(pair.id)?.outcome) }));
};

/**
 * Writes the preference vector consumed by reward-model training once a
 * session terminates
 */
export class ResultExporter {
  constructor(private readonly resultFile?: string) {}

  async export(pairs: TrajectoryPair[], judgments: Judgment[]): Promise<PreferenceResult[]> {
    const results = buildPreferenceResults(pairs, judgments);
    if (!this.resultFile) {
      return results;
    }

    await mkdir(path.dirname(path.resolve(this.resultFile)), { recursive: true });
    await writeFile(this.resultFile, `${JSON.stringify(results, null, 2)}\n`, 'utf-8');
    logger.info(`💾 Wrote ${results.length} preferences`, { resultFile: this.resultFile });
    return results;
  }
}
