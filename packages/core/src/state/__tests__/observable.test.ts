import { assert, describe, test } from "@lattice-ui/testkit";
import { type Observable, ObservableBase, type Observer } from "../observable.js";

class RecordingObserver implements Observer {
  readonly log: string[];
  readonly name: string;
  onNotifyHook: (() => void) | null = null;

  constructor(name: string, log: string[]) {
    this.name = name;
    this.log = log;
  }

  onAttach(_o: Observable): void {
    this.log.push(`${this.name}:attach`);
  }

  onDetach(_o: Observable): void {
    this.log.push(`${this.name}:detach`);
  }

  onNotify(): void {
    this.log.push(`${this.name}:notify`);
    this.onNotifyHook?.();
  }
}

describe("ObservableBase", () => {
  test("notifies observers in attach order", () => {
    const log: string[] = [];
    const subject = new ObservableBase();
    subject.attach(new RecordingObserver("a", log));
    subject.attach(new RecordingObserver("b", log));
    subject.notify();
    assert.deepEqual(log, ["a:attach", "b:attach", "a:notify", "b:notify"]);
  });

  test("detach of an unknown observer is a no-op", () => {
    const log: string[] = [];
    const subject = new ObservableBase();
    subject.detach(new RecordingObserver("x", log));
    assert.deepEqual(log, []);
    assert.equal(subject.observerCount, 0);
  });

  test("an observer detached earlier in the same notification is skipped", () => {
    const log: string[] = [];
    const subject = new ObservableBase();
    const a = new RecordingObserver("a", log);
    const b = new RecordingObserver("b", log);
    subject.attach(a);
    subject.attach(b);
    a.onNotifyHook = () => subject.detach(b);
    log.length = 0;

    subject.notify();
    assert.deepEqual(log, ["a:notify", "b:detach"]);
  });

  test("an observer may detach itself during notify", () => {
    const log: string[] = [];
    const subject = new ObservableBase();
    const a = new RecordingObserver("a", log);
    const b = new RecordingObserver("b", log);
    subject.attach(a);
    subject.attach(b);
    a.onNotifyHook = () => subject.detach(a);
    log.length = 0;

    subject.notify();
    assert.deepEqual(log, ["a:notify", "a:detach", "b:notify"]);
    assert.equal(subject.observerCount, 1);
  });

  test("observers attached during notify wait for the next notification", () => {
    const log: string[] = [];
    const subject = new ObservableBase();
    const a = new RecordingObserver("a", log);
    const late = new RecordingObserver("late", log);
    subject.attach(a);
    a.onNotifyHook = () => {
      if (!subject.isAttached(late)) subject.attach(late);
    };
    log.length = 0;

    subject.notify();
    subject.notify();
    assert.deepEqual(log, ["a:notify", "late:attach", "a:notify", "late:notify"]);
  });

  test("onUpdate attaches a callback listener", () => {
    const subject = new ObservableBase<number>();
    const seen: number[] = [];
    const listener = subject.onUpdate((n) => seen.push(n));
    subject.notify(1);
    subject.detach(listener);
    subject.notify(2);
    assert.deepEqual(seen, [1]);
  });
});
