/**
 * One BEGIN block. It owns the keys whose latest history entry it wrote;
 * rolling it back pops exactly one entry for each of them.
 */
export class TransactionLayer {
  public readonly depth: number;
  private touched = new Set<string>();

  constructor(depth: number) {
    this.depth = depth;
  }

  touch(key: string): void {
    this.touched.add(key);
  }

  hasTouched(key: string): boolean {
    return this.touched.has(key);
  }

  getTouched(): ReadonlySet<string> {
    return this.touched;
  }
}
