export type PairOperation = 'trim' | 'judgment';

/**
 * Non-blocking per-pair lock. `tryAcquire` is a compare-and-set: the first
 * writer on a pair wins and every concurrent writer is refused immediately.
 */
export class PairLocks {
  private readonly held = new Map<string, PairOperation>();

  tryAcquire(pairId: string, operation: PairOperation): boolean {
    if (this.held.has(pairId)) {
      return false;
    }
    this.held.set(pairId, operation);
    return true;
  }

  release(pairId: string): void {
    this.held.delete(pairId);
  }

  holder(pairId: string): PairOperation | undefined {
    return this.held.get(pairId);
  }
}
