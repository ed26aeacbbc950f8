/**
 * packages/core/src/runtime/focus.ts — Keyboard focus and Tab traversal.
 *
 * Why: The focused widget is held as a generational handle, so a widget that
 * was detached by a rebuild silently loses focus instead of receiving keys.
 *
 * Focus rules:
 *   - Focusable set: widgets whose asFocusable() is non-null
 *   - Traversal order: depth-first preorder, then stable sort by focusOrder()
 *   - Tab cycles forward, Shift+Tab backward, both wrap
 *   - Widgets whose canFocus() is false are skipped
 *
 * Scopes trap traversal (modal dialogs): pushScope() saves the current focus,
 * popScope() restores it along with the outer scope's focus list.
 */

import type { InputKeyEvent } from "../events.js";
import type { Widget } from "../widgets/widget.js";
import type { WidgetArena, WidgetHandle } from "./widgetArena.js";

export type FocusScope = Readonly<{
  name: string;
  /** Focus to restore when the scope is popped. */
  previousFocus: WidgetHandle | null;
}>;

type ScopeEntry = Readonly<{
  scope: FocusScope;
  /** Traversal list of the enclosing scope. */
  outer: readonly Widget[];
}>;

function collectPreorder(widget: Widget, out: Widget[]): void {
  if (widget.asFocusable() !== null) out.push(widget);
  for (const child of widget.childWidgets()) {
    collectPreorder(child, out);
  }
}

function canFocus(widget: Widget): boolean {
  return widget.asFocusable()?.canFocus() === true;
}

export class FocusManager {
  private readonly arena: WidgetArena<Widget>;
  private focusedHandle: WidgetHandle | null = null;
  private focusList: readonly Widget[] = [];
  private readonly scopes: ScopeEntry[] = [];

  constructor(arena: WidgetArena<Widget>) {
    this.arena = arena;
  }

  /** Currently focused widget; null once it has been detached. */
  focus(): Widget | null {
    return this.arena.resolve(this.focusedHandle);
  }

  /** Returns false when `target` already has focus. */
  setFocus(target: Widget | null): boolean {
    const current = this.focus();
    if (target === current) {
      if (target === null) this.focusedHandle = null;
      return false;
    }
    current?.unfocused();
    this.focusedHandle = target === null ? null : this.arena.track(target);
    target?.focused();
    return true;
  }

  clearFocus(): void {
    this.setFocus(null);
  }

  focusables(): readonly Widget[] {
    return this.focusList;
  }

  /** Rebuild the traversal list of the current scope from `root`. */
  collectFocusables(root: Widget): void {
    const found: Widget[] = [];
    collectPreorder(root, found);
    // Array.prototype.sort is stable: equal orders keep tree order.
    found.sort((a, b) => (a.asFocusable()?.focusOrder() ?? 0) - (b.asFocusable()?.focusOrder() ?? 0));
    this.focusList = Object.freeze(found);
  }

  focusNext(): boolean {
    return this.step(1);
  }

  focusPrevious(): boolean {
    return this.step(-1);
  }

  focusFirst(): boolean {
    const target = this.focusList.find(canFocus);
    if (target === undefined) return false;
    this.setFocus(target);
    return true;
  }

  focusLast(): boolean {
    for (let i = this.focusList.length - 1; i >= 0; i--) {
      const candidate = this.focusList[i];
      if (candidate !== undefined && canFocus(candidate)) {
        this.setFocus(candidate);
        return true;
      }
    }
    return false;
  }

  private step(direction: 1 | -1): boolean {
    const n = this.focusList.length;
    if (n === 0) return false;
    const current = this.focus();
    const index = current === null ? -1 : this.focusList.indexOf(current);
    const start = index >= 0 ? index : direction === 1 ? -1 : n;
    for (let i = 1; i <= n; i++) {
      const at = (((start + direction * i) % n) + n) % n;
      const candidate = this.focusList[at];
      if (candidate !== undefined && canFocus(candidate)) {
        this.setFocus(candidate);
        return true;
      }
    }
    return false;
  }

  pushScope(name: string): FocusScope {
    const scope: FocusScope = Object.freeze({ name, previousFocus: this.focusedHandle });
    this.scopes.push({ scope, outer: this.focusList });
    this.focusList = [];
    return scope;
  }

  /** Leave the innermost scope and restore the focus it saved (if still live). */
  popScope(): void {
    const entry = this.scopes.pop();
    if (entry === undefined) return;
    this.focusList = entry.outer;
    const previous = this.arena.resolve(entry.scope.previousFocus);
    if (previous !== null) this.setFocus(previous);
  }

  currentScope(): FocusScope | null {
    return this.scopes[this.scopes.length - 1]?.scope ?? null;
  }

  /** Tab / Shift+Tab on press. Returns true when the key was consumed. */
  handleKeyEvent(ev: InputKeyEvent): boolean {
    if (ev.action !== "press" || ev.key !== "tab") return false;
    return ev.mods.shift ? this.focusPrevious() : this.focusNext();
  }
}
