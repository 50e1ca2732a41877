import { Store } from '../storage/Store';
import { TransactionStack } from '../transaction/TransactionStack';
import { entryValue } from '../transaction/HistoryEntry';
import { engineLogger } from '../utils/logger';
import { kvMetrics } from '../monitoring/metrics';

/**
 * Session facade over the committed store and the transaction stack.
 * With no block open every write lands in the store immediately.
 */
export class Engine {
  private store = new Store();
  private stack = new TransactionStack(this.store);

  private log = engineLogger;

  get inTransaction(): boolean {
    return this.stack.isActive();
  }

  get depth(): number {
    return this.stack.depth;
  }

  get committedKeys(): number {
    return this.store.size;
  }

  get(key: string): string | undefined {
    if (this.stack.isActive()) {
      const lookup = this.stack.get(key);
      if (lookup.found) {
        return entryValue(lookup.entry);
      }
    }
    return this.store.get(key);
  }

  set(key: string, value: string): void {
    const oldValue = this.get(key);
    if (oldValue === value) return;

    if (this.stack.isActive()) {
      this.stack.set(key, oldValue, value);
    } else {
      this.store.put(key, value);
      this.store.frequencies.decrease(oldValue);
      this.store.frequencies.increase(value);
      kvMetrics.keys.set(this.store.size);
    }

    this.log.debug({ key, depth: this.stack.depth, action: 'set' }, 'Set operation');
  }

  unset(key: string): void {
    const oldValue = this.get(key);

    if (this.stack.isActive()) {
      this.stack.unset(key, oldValue);
    } else if (oldValue !== undefined) {
      this.store.remove(key);
      this.store.frequencies.decrease(oldValue);
      kvMetrics.keys.set(this.store.size);
    }

    this.log.debug({
      key,
      existed: oldValue !== undefined,
      depth: this.stack.depth,
      action: 'unset'
    }, 'Unset operation');
  }

  numEqualTo(value: string): number {
    return this.store.count(value) + this.stack.numEqualTo(value);
  }

  begin(): void {
    this.stack.begin();

    kvMetrics.transactionsBegun.inc();
    kvMetrics.transactionDepth.set(this.stack.depth);
  }

  /** Undoes the innermost block; false when none is open */
  rollback(): boolean {
    if (!this.stack.isActive()) {
      this.log.debug({ action: 'rollback' }, 'Rollback without transaction');
      return false;
    }

    this.stack.rollback();

    kvMetrics.transactionsRolledBack.inc();
    kvMetrics.transactionDepth.set(this.stack.depth);
    return true;
  }

  /** Closes every open block into the store; false when none is open */
  commit(): boolean {
    if (!this.stack.isActive()) {
      this.log.debug({ action: 'commit' }, 'Commit without transaction');
      return false;
    }

    const depth = this.stack.depth;
    this.stack.commit();

    kvMetrics.transactionsCommitted.inc();
    kvMetrics.transactionDepth.set(0);
    kvMetrics.keys.set(this.store.size);

    this.log.info({
      closedBlocks: depth,
      keys: this.store.size,
      action: 'commit_complete'
    }, 'Transactions committed');
    return true;
  }

  /** Committed data and value counts, ignoring open blocks */
  snapshot(): { data: Record<string, string>; frequencies: Record<string, number> } {
    return {
      data: this.store.toObject(),
      frequencies: this.store.frequencies.toObject()
    };
  }

  /** Pending history and frequency delta of the open blocks */
  pending(): { history: Record<string, Array<string | null>>; frequencies: Record<string, number> } {
    const history: Record<string, Array<string | null>> = {};
    for (const key of this.stack.historyKeys()) {
      history[key] = this.stack.getHistory(key).map((entry) => entryValue(entry) ?? null);
    }
    return { history, frequencies: this.stack.deltaToObject() };
  }
}
