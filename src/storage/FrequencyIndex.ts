import { invariant } from '../utils/errors';

/**
 * Sparse value -> count map shared by the store's index and the
 * transaction stack's delta. An absent value (`undefined`) is never counted,
 * and an entry whose count reaches zero is dropped on the spot.
 */
abstract class ValueCounts {
  protected counts = new Map<string, number>();

  increase(value: string | undefined): void {
    this.modify(value, 1);
  }

  decrease(value: string | undefined): void {
    this.modify(value, -1);
  }

  modify(value: string | undefined, delta: number): void {
    if (value === undefined || delta === 0) return;

    const next = (this.counts.get(value) ?? 0) + delta;
    this.check(value, next);

    if (next === 0) {
      this.counts.delete(value);
    } else {
      this.counts.set(value, next);
    }
  }

  count(value: string): number {
    return this.counts.get(value) ?? 0;
  }

  toObject(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }

  protected abstract check(value: string, next: number): void;
}

/**
 * Absolute counts of the values held by the committed store.
 */
export class FrequencyIndex extends ValueCounts {
  protected check(value: string, next: number): void {
    invariant(next >= 0, `Frequency of '${value}' would drop to ${next}`);
  }
}

/**
 * Net change the open transactions make to the store's counts. Entries go
 * negative when open blocks overwrite or delete committed values.
 */
export class FrequencyDelta extends ValueCounts {
  protected check(): void {
    // any signed count is valid
  }

  /** Folds this delta into an absolute index */
  applyTo(index: FrequencyIndex): void {
    for (const [value, delta] of this.counts) {
      index.modify(value, delta);
    }
  }
}
