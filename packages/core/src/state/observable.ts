/**
 * packages/core/src/state/observable.ts — Observer protocol.
 *
 * Why: State holders notify dependents (widgets, components, listeners) without
 * owning them. Observers are held in attach order; an observer detached while a
 * notification is in flight is not called for the rest of that notification.
 */

export interface Observer<E = void> {
  onAttach(observable: Observable<E>): void;
  onDetach(observable: Observable<E>): void;
  onNotify(event: E): void;
}

export interface Observable<E = void> {
  attach(observer: Observer<E>): void;
  detach(observer: Observer<E>): void;
  notify(event: E): void;
}

export class ObservableBase<E = void> implements Observable<E> {
  private readonly observers: Observer<E>[] = [];

  attach(observer: Observer<E>): void {
    this.observers.push(observer);
    observer.onAttach(this);
  }

  /** No-op when the observer is not attached. */
  detach(observer: Observer<E>): void {
    const index = this.observers.indexOf(observer);
    if (index < 0) return;
    this.observers.splice(index, 1);
    observer.onDetach(this);
  }

  notify(event: E): void {
    const snapshot = this.observers.slice();
    for (const observer of snapshot) {
      if (!this.observers.includes(observer)) continue;
      observer.onNotify(event);
    }
  }

  /** Attach a plain callback; detach the returned listener to stop it. */
  onUpdate(callback: (event: E) => void): UpdateListener<E> {
    const listener = new UpdateListener(callback);
    this.attach(listener);
    return listener;
  }

  get observerCount(): number {
    return this.observers.length;
  }

  isAttached(observer: Observer<E>): boolean {
    return this.observers.includes(observer);
  }
}

/** Observer that forwards notifications to a callback. */
export class UpdateListener<E = void> implements Observer<E> {
  private readonly callback: (event: E) => void;

  constructor(callback: (event: E) => void) {
    this.callback = callback;
  }

  onAttach(_observable: Observable<E>): void {}

  onDetach(_observable: Observable<E>): void {}

  onNotify(event: E): void {
    this.callback(event);
  }
}
