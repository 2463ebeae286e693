/**
 * Synchronous change notification.
 *
 * Observers run in registration order on the caller's stack, after the
 * change they describe is visible. An observer that throws stops the
 * dispatch and the error reaches the caller that published the event.
 */

export type ChangeKind =
  | 'element-added'
  | 'element-removed'
  | 'element-moved'
  | 'element-resized'
  | 'element-restyled'
  | 'element-relabeled'
  | 'element-visibility'
  | 'connector-changed'
  | 'group-changed'
  | 'z-order-changed'
  | 'page-added'
  | 'page-removed'
  | 'page-changed'
  | 'page-moved'
  | 'diagram-changed'
  | 'diagram-replaced';

/** Where a change came from */
export type ChangeOrigin = 'direct' | 'execute' | 'undo' | 'redo' | 'load';

export interface ChangeEvent {
  readonly kind: ChangeKind;
  /** Null for diagram-level changes */
  readonly pageId: string | null;
  /** Affected element or page ids */
  readonly ids: readonly string[];
  readonly origin: ChangeOrigin;
}

export type ChangeObserver = (event: ChangeEvent) => void;

export class ChangeBus {
  private observers: ChangeObserver[] = [];
  private depth = 0;

  /** True while observers are being called */
  get dispatching(): boolean {
    return this.depth > 0;
  }

  get size(): number {
    return this.observers.length;
  }

  /** Register an observer; registering the same function twice is a no-op */
  subscribe(observer: ChangeObserver): () => void {
    if (!this.observers.includes(observer)) this.observers.push(observer);
    return () => {
      this.unsubscribe(observer);
    };
  }

  unsubscribe(observer: ChangeObserver): boolean {
    const index = this.observers.indexOf(observer);
    if (index === -1) return false;
    this.observers.splice(index, 1);
    return true;
  }

  publish(event: ChangeEvent): void {
    // Observers added or removed during dispatch take effect from the next event
    const snapshot = [...this.observers];
    this.depth++;
    try {
      for (const observer of snapshot) observer(event);
    } finally {
      this.depth--;
    }
  }
}
