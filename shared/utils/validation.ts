import { OUTCOMES, type Outcome, type PairStatus } from '../types/session';

export const isOutcome = (value: string): value is Outcome =>
  OUTCOMES.some(outcome => outcome === value);

export const isPairStatus = (value: string): value is PairStatus =>
  value === 'pending' || value === 'judged' || value === 'skipped';

/**
 * Bounds check shared by trims and manifest loading: 0 <= start < end <= duration
 */
export const isValidTrim = (start: number, end: number, duration: number): boolean =>
  Number.isFinite(start) && Number.isFinite(end) && start >= 0 && start < end && end <= duration;

// Encoding consumed by reward-model training scripts
export const outcomeToPreference = (outcome: Outcome | undefined): number | null => {
  switch (outcome) {
    case 'left':
      return 0;
    case 'right':
      return 1;
    case 'equal':
      return 0.5;
    default:
      return null;
  }
};
