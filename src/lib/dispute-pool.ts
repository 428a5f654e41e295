/**
 * Dispute Pool
 *
 * Transaction ids currently under an open dispute. Order is irrelevant, so
 * removal swaps the last entry into the vacated slot; a position index keeps
 * membership checks O(1).
 */

import type { TransactionId } from "./ledger-events";
import type { RandomSource } from "./rng";

export class DisputePool {
  private readonly entries: TransactionId[] = [];
  private readonly positions = new Map<TransactionId, number>();

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  has(tx: TransactionId): boolean {
    return this.positions.has(tx);
  }

  /**
   * Open a dispute. A transaction cannot be disputed twice concurrently.
   */
  add(tx: TransactionId): void {
    if (this.positions.has(tx)) {
      throw new Error(`Transaction ${tx} is already under dispute`);
    }
    this.positions.set(tx, this.entries.length);
    this.entries.push(tx);
  }

  /**
   * Remove and return the entry at `index` (swap-remove)
   */
  removeAt(index: number): TransactionId {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      throw new RangeError(`Dispute pool index ${index} out of range (size ${this.entries.length})`);
    }

    const tx = this.entries[index];
    const last = this.entries.pop();
    if (last !== undefined && index < this.entries.length) {
      this.entries[index] = last;
      this.positions.set(last, index);
    }
    this.positions.delete(tx);
    return tx;
  }

  /**
   * Remove and return a uniformly random open dispute
   */
  take(rng: RandomSource): TransactionId {
    if (this.isEmpty()) {
      throw new Error("Cannot take from an empty dispute pool");
    }
    return this.removeAt(rng.randomInt(this.entries.length));
  }

  toArray(): TransactionId[] {
    return [...this.entries];
  }
}
