export type SnapshotEntry = {
  readonly owner: object;
  readonly slot: string;
  readonly value: unknown;
};

/**
 * Ordered log of captured state. Every entry carries the operation that
 * writes its value back, so restoring needs no knowledge of the owner type.
 */
export class Snapshot {
  private readonly log: SnapshotEntry[] = [];
  private readonly restorers: Array<() => void> = [];
  private frozen = false;

  add<T>(owner: object, slot: string, value: T, restore: (value: T) => void): void {
    if (this.frozen) {
      throw new Error("Cannot add to a frozen snapshot");
    }
    this.log.push({ owner, slot, value });
    this.restorers.push(() => restore(value));
  }

  freeze(): this {
    this.frozen = true;
    Object.freeze(this.log);
    Object.freeze(this.restorers);
    return this;
  }

  get entries(): readonly SnapshotEntry[] {
    return this.log;
  }

  get size(): number {
    return this.log.length;
  }

  /** Replays the log in capture order. */
  restore(): void {
    for (const restore of this.restorers) {
      restore();
    }
  }
}
