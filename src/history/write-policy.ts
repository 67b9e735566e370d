/**
 * Rate-limit clock for history writes, one entry per (account, artifact).
 *
 * A write is due once strictly more than `minIntervalMs` has passed since the
 * last confirmed write, whether or not the values changed. The entry only
 * moves when the caller reports a successful write.
 */

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export type Artifact = "metrics" | "positions";

export class WritePolicy {
  private readonly lastWrite = new Map<string, number>();

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!(minIntervalMs >= 0)) {
      throw new RangeError(`minIntervalMs must be >= 0, got ${minIntervalMs}`);
    }
  }

  now(): number {
    return this.clock();
  }

  isDue(account: string, artifact: Artifact, now: number = this.clock()): boolean {
    const last = this.lastWrite.get(key(account, artifact));
    if (last === undefined || this.minIntervalMs === 0) return true;
    return now - last > this.minIntervalMs;
  }

  markWritten(account: string, artifact: Artifact, at: number = this.clock()): void {
    this.lastWrite.set(key(account, artifact), at);
  }

  lastWrittenAt(account: string, artifact: Artifact): number | undefined {
    return this.lastWrite.get(key(account, artifact));
  }
}

function key(account: string, artifact: Artifact): string {
  return `${account}:${artifact}`;
}
