/**
 * Capital Pool
 *
 * The one shared cash balance. Entries reserve their budget before the
 * order leaves, fills settle against cash. `runExclusive` is the single
 * serialization point for decisions that change capital or the position
 * count.
 */

export class CapitalPool {
  private cash: number;
  private reserved = 0;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(readonly initialCapital: number) {
    if (!(initialCapital > 0)) {
      throw new Error(`initial capital must be positive, got ${initialCapital}`);
    }
    this.cash = initialCapital;
  }

  getCash(): number {
    return this.cash;
  }

  getReserved(): number {
    return this.reserved;
  }

  /**
   * Cash not held back for in-flight entries
   */
  getAvailable(): number {
    return this.cash - this.reserved;
  }

  reserve(amount: number): void {
    if (amount > this.getAvailable()) {
      throw new Error(`cannot reserve ${amount}, available ${this.getAvailable()}`);
    }
    this.reserved += amount;
  }

  release(amount: number): void {
    this.reserved = Math.max(0, this.reserved - amount);
  }

  /**
   * Whether a cash movement keeps the balance non-negative
   */
  canApply(delta: number): boolean {
    return this.cash + delta >= 0;
  }

  apply(delta: number): void {
    if (!this.canApply(delta)) {
      throw new Error(`cash would go negative: ${this.cash} + ${delta}`);
    }
    this.cash += delta;
  }

  /**
   * Run `task` after every previously queued task has settled
   */
  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(() => task());
    // the caller sees the failure through `run`; the queue keeps going
    this.tail = run.catch(() => undefined);
    return run;
  }
}
