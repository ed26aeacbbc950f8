/**
 * packages/core/src/state/state.ts — Observable value holders.
 *
 * - `State<T>` notifies on every `set`, even when the value is unchanged.
 * - `ListState<T>` notifies once per mutating call.
 * - `ScrollState` notifies only when an offset actually changes.
 */

import { ObservableBase } from "./observable.js";

/** Optional hook that may transform (or reject, by throwing) a value before it is stored. */
export type StateValidator<T> = (value: T) => T;

export class State<T> extends ObservableBase {
  private current: T;
  private readonly validator: StateValidator<T> | undefined;

  constructor(initial: T, validator?: StateValidator<T>) {
    super();
    this.validator = validator;
    this.current = validator ? validator(initial) : initial;
  }

  value(): T {
    return this.current;
  }

  set(value: T): void {
    this.current = this.validator ? this.validator(value) : value;
    this.notify();
  }

  update(fn: (value: T) => T): void {
    this.set(fn(this.current));
  }

  override toString(): string {
    return String(this.current);
  }
}

export class ListState<T> extends ObservableBase implements Iterable<T> {
  private entries: T[];

  constructor(items: Iterable<T> = []) {
    super();
    this.entries = Array.from(items);
  }

  items(): readonly T[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  at(index: number): T | undefined {
    return this.entries.at(index);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.entries.slice()[Symbol.iterator]();
  }

  /** Replace every item with one notification. */
  set(items: Iterable<T>): void {
    this.entries = Array.from(items);
    this.notify();
  }

  push(item: T): void {
    this.entries.push(item);
    this.notify();
  }

  extend(items: Iterable<T>): void {
    for (const item of items) this.entries.push(item);
    this.notify();
  }

  insert(index: number, item: T): void {
    this.entries.splice(index, 0, item);
    this.notify();
  }

  setAt(index: number, item: T): void {
    if (index < 0 || index >= this.entries.length) {
      throw new RangeError(`ListState.setAt: index ${String(index)} out of range`);
    }
    this.entries[index] = item;
    this.notify();
  }

  removeAt(index: number): T | undefined {
    if (index < 0 || index >= this.entries.length) return undefined;
    const [removed] = this.entries.splice(index, 1);
    this.notify();
    return removed;
  }

  /** Remove the first item equal (===) to `item`. Returns false when absent. */
  remove(item: T): boolean {
    const index = this.entries.indexOf(item);
    if (index < 0) return false;
    this.entries.splice(index, 1);
    this.notify();
    return true;
  }

  pop(): T | undefined {
    if (this.entries.length === 0) return undefined;
    const item = this.entries.pop();
    this.notify();
    return item;
  }

  clear(): void {
    this.entries = [];
    this.notify();
  }

  sort(compare?: (a: T, b: T) => number): void {
    this.entries.sort(compare);
    this.notify();
  }
}

/** Persistent scroll offsets that survive component rebuilds. */
export class ScrollState extends ObservableBase {
  private offsetX: number;
  private offsetY: number;

  constructor(x = 0, y = 0) {
    super();
    this.offsetX = x;
    this.offsetY = y;
  }

  get x(): number {
    return this.offsetX;
  }

  set x(value: number) {
    if (value === this.offsetX) return;
    this.offsetX = value;
    this.notify();
  }

  get y(): number {
    return this.offsetY;
  }

  set y(value: number) {
    if (value === this.offsetY) return;
    this.offsetY = value;
    this.notify();
  }

  /** Update both offsets with at most one notification. */
  set(next: Readonly<{ x?: number; y?: number }>): void {
    const x = next.x ?? this.offsetX;
    const y = next.y ?? this.offsetY;
    if (x === this.offsetX && y === this.offsetY) return;
    this.offsetX = x;
    this.offsetY = y;
    this.notify();
  }
}
