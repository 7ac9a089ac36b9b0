/**
 * Label → row id index.
 *
 * States:
 * - `stale`: must be rebuilt before the next lookup
 * - `fresh`: reflects every row
 *
 * Orthogonal to the state, `continuous` is switched on by the first label
 * lookup. While it is on and the index is fresh, appended rows patch the
 * index directly instead of marking it stale.
 *
 * Duplicate labels: last write wins, for rebuilds and patches alike.
 *
 * Numbers and strings share keys, so `2013` finds the row labelled `'2013'`.
 * `null` and booleans get keys of their own and never match a string.
 */

import type { ColumnValue } from '../core/types';

function labelKey(label: ColumnValue): string {
  if (label === null) {
    return 'null';
  }
  if (typeof label === 'boolean') {
    return `bool:${String(label)}`;
  }
  return `value:${String(label)}`;
}

export type IndexState = 'fresh' | 'stale';

export class LabelIndex {
  private readonly byLabel = new Map<string, number>();
  private _state: IndexState = 'stale';
  private _continuous = false;

  get state(): IndexState {
    return this._state;
  }

  get continuous(): boolean {
    return this._continuous;
  }

  /** Label lookups switch on continuous maintenance */
  enableContinuous(): void {
    this._continuous = true;
  }

  invalidate(): void {
    this._state = 'stale';
  }

  /**
   * Rebuild from `(rowId, label)` pairs in row order.
   */
  rebuild(entries: Iterable<[number, ColumnValue | undefined]>): void {
    this.byLabel.clear();
    for (const [rowId, label] of entries) {
      if (label !== undefined) {
        this.byLabel.set(labelKey(label), rowId);
      }
    }
    this._state = 'fresh';
  }

  /**
   * Record a newly appended row. Returns false when the index was not
   * patched and has been marked stale instead.
   */
  onAppend(rowId: number, label: ColumnValue | undefined): boolean {
    if (this._state === 'fresh' && this._continuous) {
      if (label !== undefined) {
        this.byLabel.set(labelKey(label), rowId);
      }
      return true;
    }
    this._state = 'stale';
    return false;
  }

  /** Point a label at a row id without touching the state */
  set(label: ColumnValue, rowId: number): void {
    this.byLabel.set(labelKey(label), rowId);
  }

  get(label: ColumnValue): number | undefined {
    return this.byLabel.get(labelKey(label));
  }
}
