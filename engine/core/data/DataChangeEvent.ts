/**
 * Sheetgrid Engine - Data Change Events
 *
 * Vocabulary of store notifications and the publish/subscribe feed that
 * carries them. Delivery is synchronous and in emission order; late
 * subscribers see only events emitted after they subscribed.
 */

import { logger } from '../logger.js';
import { rangeToA1, toA1, type CellRange, type CellRef } from '../types/index.js';

const log = logger.child({ component: 'ChangeFeed' });

// ============================================================================
// Events
// ============================================================================

export type DataChangeEvent =
  | { readonly type: 'cellValue'; readonly cell: CellRef }
  | { readonly type: 'cellStyle'; readonly cell: CellRef }
  | { readonly type: 'cellFormat'; readonly cell: CellRef }
  | { readonly type: 'range'; readonly range: CellRange }
  | { readonly type: 'rowInserted'; readonly index: number }
  | { readonly type: 'rowDeleted'; readonly index: number }
  | { readonly type: 'columnInserted'; readonly index: number }
  | { readonly type: 'columnDeleted'; readonly index: number }
  | { readonly type: 'merge'; readonly range: CellRange }
  | { readonly type: 'unmerge'; readonly range: CellRange }
  | { readonly type: 'reset' };

export type DataChangeType = DataChangeEvent['type'];

export const DataChange = {
  cellValue: (cell: CellRef): DataChangeEvent => ({ type: 'cellValue', cell }),
  cellStyle: (cell: CellRef): DataChangeEvent => ({ type: 'cellStyle', cell }),
  cellFormat: (cell: CellRef): DataChangeEvent => ({ type: 'cellFormat', cell }),
  range: (range: CellRange): DataChangeEvent => ({ type: 'range', range }),
  rowInserted: (index: number): DataChangeEvent => ({ type: 'rowInserted', index }),
  rowDeleted: (index: number): DataChangeEvent => ({ type: 'rowDeleted', index }),
  columnInserted: (index: number): DataChangeEvent => ({ type: 'columnInserted', index }),
  columnDeleted: (index: number): DataChangeEvent => ({ type: 'columnDeleted', index }),
  merge: (range: CellRange): DataChangeEvent => ({ type: 'merge', range }),
  unmerge: (range: CellRange): DataChangeEvent => ({ type: 'unmerge', range }),
  reset: (): DataChangeEvent => ({ type: 'reset' }),
} as const;

/** e.g. `DataChangeEvent.cellValue(B3)` */
export function describeChange(event: DataChangeEvent): string {
  switch (event.type) {
    case 'cellValue':
    case 'cellStyle':
    case 'cellFormat':
      return `DataChangeEvent.${event.type}(${toA1(event.cell)})`;
    case 'range':
    case 'merge':
    case 'unmerge':
      return `DataChangeEvent.${event.type}(${rangeToA1(event.range)})`;
    case 'rowInserted':
    case 'rowDeleted':
    case 'columnInserted':
    case 'columnDeleted':
      return `DataChangeEvent.${event.type}(${event.index})`;
    case 'reset':
      return 'DataChangeEvent.reset()';
  }
}

// ============================================================================
// Feed
// ============================================================================

export type DataChangeListener = (event: DataChangeEvent) => void;
export type FeedClosedListener = () => void;
export type Unsubscribe = () => void;

interface Subscription {
  listener: DataChangeListener;
  onClose?: FeedClosedListener;
}

export class ChangeFeed {
  private readonly subscriptions = new Set<Subscription>();
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Subscribe to future events. Subscribing to a closed feed calls
   * `onClose` right away.
   */
  subscribe(listener: DataChangeListener, onClose?: FeedClosedListener): Unsubscribe {
    if (this.closed) {
      onClose?.();
      return () => {};
    }
    const subscription: Subscription = { listener, onClose };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  emit(event: DataChangeEvent): void {
    if (this.closed) return;
    for (const { listener } of [...this.subscriptions]) {
      try {
        listener(event);
      } catch (err) {
        log.error({ err, event: describeChange(event) }, 'change listener threw');
      }
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const subscriptions = [...this.subscriptions];
    this.subscriptions.clear();
    for (const { onClose } of subscriptions) {
      try {
        onClose?.();
      } catch (err) {
        log.error({ err }, 'feed close listener threw');
      }
    }
  }
}
