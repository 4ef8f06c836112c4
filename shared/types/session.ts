export type Side = 'left' | 'right';

export const OUTCOMES = ['left', 'right', 'equal', 'skip'] as const;

export type Outcome = (typeof OUTCOMES)[number];

export type PairStatus = 'pending' | 'judged' | 'skipped';

export type SessionState = 'INITIALIZING' | 'ACTIVE' | 'TERMINATING' | 'TERMINATED';

export interface SessionConfig {
  allowTies: boolean;
  allowSkipping: boolean;
  allowEditing: boolean;
  debugMode: boolean;
}

export interface TrimBounds {
  start: number;
  end: number;
}

export interface TrajectoryRecord {
  id: string;
  rewards: number[];
  mediaPath: string;
  frameRate: number;
  duration: number;
  trim: TrimBounds;
}

export interface TrajectoryPair {
  id: string;
  leftId: string;
  rightId: string;
  status: PairStatus;
  position: number;
}

export interface TrimSnapshot {
  left: TrimBounds;
  right: TrimBounds;
}

export interface Judgment {
  pairId: string;
  outcome: Outcome;
  timestamp: string;
  trim: TrimSnapshot;
}

export interface PairTrimRequest {
  pairId: string;
  leftStart: number;
  leftEnd: number;
  rightStart: number;
  rightEnd: number;
}

export interface PairTrimResult {
  leftStart: number;
  leftEnd: number;
  rightStart: number;
  rightEnd: number;
}

export interface MediaDescriptor {
  trajectoryId: string;
  url: string;
  duration: number;
  frameRate: number;
  trim: TrimBounds;
}

export type NextPairResponse =
  | { exhausted: false; pairId: string; leftMedia: MediaDescriptor; rightMedia: MediaDescriptor }
  | { exhausted: true };

export interface RewardResponse {
  leftReward: number;
  rightReward: number;
}

export interface SessionStatus {
  state: SessionState;
  config: SessionConfig;
  totalPairs: number;
  judged: number;
  skipped: number;
  pending: number;
  remaining: number;
  /** Skip events in the skip log, including repeated skips of one pair */
  skipEvents: number;
}

// Preference encoding used by downstream reward-model training:
// left 0, right 1, equal 0.5, no judgment null
export interface PreferenceResult {
  pairId: string;
  preference: number | null;
}
