import { FrequencyIndex } from './FrequencyIndex';

/**
 * Committed base state: key -> value plus the index of how many keys hold
 * each value. Raw writes here never touch the index; callers keep the two
 * in step (the engine for direct writes, the stack on commit).
 */
export class Store {
  private data = new Map<string, string>();
  readonly frequencies = new FrequencyIndex();

  get(key: string): string | undefined {
    return this.data.get(key);
  }

  put(key: string, value: string): void {
    this.data.set(key, value);
  }

  remove(key: string): void {
    this.data.delete(key);
  }

  count(value: string): number {
    return this.frequencies.count(value);
  }

  get size(): number {
    return this.data.size;
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.data);
  }
}
