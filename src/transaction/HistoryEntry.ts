/** One value recorded for a key by an open transaction block */
export type HistoryEntry =
  | { kind: 'written'; value: string }
  | { kind: 'deleted' };

export const written = (value: string): HistoryEntry => ({ kind: 'written', value });

export const DELETED: HistoryEntry = { kind: 'deleted' };

export function entryValue(entry: HistoryEntry): string | undefined {
  return entry.kind === 'written' ? entry.value : undefined;
}
