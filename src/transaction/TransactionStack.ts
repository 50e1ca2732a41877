import { Store } from '../storage/Store';
import { FrequencyDelta } from '../storage/FrequencyIndex';
import { TransactionLayer } from './TransactionLayer';
import { HistoryEntry, DELETED, written, entryValue } from './HistoryEntry';
import { invariant } from '../utils/errors';
import { createLayerLogger, transactionLogger } from '../utils/logger';

export type StackLookup =
  | { found: true; entry: HistoryEntry }
  | { found: false };

/**
 * Nested BEGIN blocks over a committed store.
 *
 * History is kept stack-wide: for each key, one entry per open layer that
 * wrote it, oldest first. A layer writing the same key twice overwrites its
 * own entry, so the last entry is always the merged view of the key.
 * `delta` is the net frequency change of all open layers relative to the
 * store.
 */
export class TransactionStack {
  private layers: TransactionLayer[] = [];
  private history = new Map<string, HistoryEntry[]>();
  private delta = new FrequencyDelta();

  private log = transactionLogger;

  constructor(private store: Store) {}

  get depth(): number {
    return this.layers.length;
  }

  isActive(): boolean {
    return this.layers.length > 0;
  }

  get(key: string): StackLookup {
    const entries = this.history.get(key);
    if (entries && entries.length > 0) {
      return { found: true, entry: entries[entries.length - 1] };
    }
    return { found: false };
  }

  set(key: string, oldValue: string | undefined, newValue: string): void {
    if (!this.record(key, written(newValue))) return;

    this.delta.decrease(oldValue);
    this.delta.increase(newValue);
  }

  unset(key: string, oldValue: string | undefined): void {
    if (oldValue === undefined) return;
    if (!this.record(key, DELETED)) return;

    this.delta.decrease(oldValue);
  }

  numEqualTo(value: string): number {
    return this.delta.count(value);
  }

  begin(): void {
    const layer = new TransactionLayer(this.layers.length + 1);
    this.layers.push(layer);

    this.log.debug({ depth: layer.depth, action: 'begin' }, 'Transaction block opened');
  }

  rollback(): void {
    const layer = this.layers.pop();
    if (!layer) return;

    const log = createLayerLogger(layer.depth);

    if (this.layers.length === 0) {
      log.debug({ keys: this.history.size, action: 'rollback' }, 'Discarding the only open block');
      this.clear();
      return;
    }

    for (const key of layer.getTouched()) {
      const entries = this.history.get(key);
      const popped = entries?.pop();
      invariant(entries && popped, `Block ${layer.depth} touched '${key}' but holds no history for it`);

      // What the key reads as once this block's write is gone
      const current = entries.length > 0
        ? entryValue(entries[entries.length - 1])
        : this.store.get(key);

      this.delta.increase(current);
      this.delta.decrease(entryValue(popped));

      if (entries.length === 0) {
        this.history.delete(key);
      }
    }

    log.debug({ keys: layer.getTouched().size, action: 'rollback' }, 'Transaction block rolled back');
  }

  commit(): void {
    if (!this.isActive()) return;

    const frequencies = this.store.frequencies;

    for (const [key, entries] of this.history) {
      invariant(entries.length > 0, `Empty history kept for '${key}'`);
      const value = entryValue(entries[entries.length - 1]);

      if (value === undefined) {
        this.store.remove(key);
      } else {
        this.store.put(key, value);
      }
    }

    this.delta.applyTo(frequencies);

    this.log.debug({
      depth: this.layers.length,
      keys: this.history.size,
      action: 'commit'
    }, 'Transaction stack committed');

    this.clear();
  }

  /** Stack-wide history, for inspection */
  getHistory(key: string): readonly HistoryEntry[] {
    return this.history.get(key) ?? [];
  }

  historyKeys(): string[] {
    return Array.from(this.history.keys());
  }

  deltaToObject(): Record<string, number> {
    return this.delta.toObject();
  }

  private record(key: string, entry: HistoryEntry): boolean {
    const layer = this.layers[this.layers.length - 1];
    if (!layer) return false;

    let entries = this.history.get(key);
    if (!entries) {
      entries = [];
      this.history.set(key, entries);
    }

    if (layer.hasTouched(key)) {
      invariant(entries.length > 0, `Block ${layer.depth} owns '${key}' but holds no history for it`);
      entries[entries.length - 1] = entry;
    } else {
      entries.push(entry);
      layer.touch(key);
    }
    return true;
  }

  private clear(): void {
    this.layers = [];
    this.history = new Map();
    this.delta = new FrequencyDelta();
  }
}
