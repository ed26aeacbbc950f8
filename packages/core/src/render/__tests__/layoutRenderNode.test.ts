import { assert, createRng, describe, test } from "@lattice-ui/testkit";
import { point, size } from "../../layout/geometry.js";
import type { Point, Size } from "../../layout/types.js";
import { RecordingWidget } from "../../testing/recordingWidget.js";
import { Box } from "../../widgets/box.js";
import {
  LayoutRenderNode,
  type PlacedChild,
  ScrollableLayoutRenderNode,
} from "../layoutRenderNode.js";

class Item implements PlacedChild {
  readonly name: string;
  z: number;
  pos: Point = point(0, 0);
  extent: Size = size(10, 10);

  constructor(name: string, z = 1) {
    this.name = name;
    this.z = z;
  }

  getZIndex(): number {
    return this.z;
  }

  getPos(): Point {
    return this.pos;
  }

  getSize(): Size {
    return this.extent;
  }
}

const names = (items: readonly Item[]): string[] => items.map((i) => i.name);

describe("LayoutRenderNode z-order", () => {
  test("paint order is ascending by z, stable for equal z", () => {
    const node = new LayoutRenderNode<Item>(() => size(0, 0));
    node.addChild(new Item("a", 2));
    node.addChild(new Item("b", 1));
    node.addChild(new Item("c", 2));
    node.addChild(new Item("d", 1));

    assert.deepEqual(names(node.paintOrder()), ["b", "d", "a", "c"]);
    assert.deepEqual(names(node.hitTestOrder()), ["c", "a", "d", "b"]);
  });

  test("the sorted order is cached until invalidated", () => {
    const node = new LayoutRenderNode<Item>(() => size(0, 0));
    const a = new Item("a", 1);
    const b = new Item("b", 2);
    node.addChild(a);
    node.addChild(b);

    const first = node.paintOrder();
    assert.equal(node.isZOrderCached(), true);
    assert.equal(node.paintOrder(), first);

    a.z = 3;
    // Still the stale cache: z changes must be reported.
    assert.deepEqual(names(node.paintOrder()), ["a", "b"]);

    node.invalidateZOrder();
    assert.equal(node.isZOrderCached(), false);
    assert.deepEqual(names(node.paintOrder()), ["b", "a"]);
  });

  test("add, remove and clear invalidate the cache and mark layout dirty", () => {
    const node = new LayoutRenderNode<Item>(() => size(0, 0));
    const a = new Item("a");
    node.addChild(a);
    node.paintOrder();
    node.clearDirty();

    node.addChild(new Item("b"));
    assert.equal(node.isZOrderCached(), false);
    assert.equal(node.isLayoutDirty(), true);

    node.paintOrder();
    node.clearDirty();
    assert.equal(node.removeChild(a), true);
    assert.equal(node.removeChild(a), false);
    assert.equal(node.isZOrderCached(), false);
    assert.equal(node.isLayoutDirty(), true);
    assert.equal(node.childCount, 1);

    node.clearChildren();
    assert.equal(node.childCount, 0);
    assert.deepEqual(node.paintOrder(), []);
  });
});

describe("ScrollableLayoutRenderNode", () => {
  test("changing a scroll offset marks paint dirty; the same value does not", () => {
    const node = new ScrollableLayoutRenderNode<Item>(() => size(0, 0));
    node.clearDirty();
    node.scrollY = 0;
    assert.equal(node.isPaintDirty(), false);
    node.scrollY = 15;
    assert.equal(node.isPaintDirty(), true);
    assert.equal(node.isLayoutDirty(), false);
    assert.equal(node.scrollY, 15);
  });

  test("culls children outside the scrolled viewport", () => {
    const node = new ScrollableLayoutRenderNode<Item>(() => size(0, 0));
    node.setSize(size(100, 50));
    const items = ["a", "b", "c", "d"].map((name, i) => {
      const item = new Item(name);
      item.pos = point(0, i * 30);
      item.extent = size(100, 30);
      node.addChild(item);
      return item;
    });

    // Viewport y in [0, 50): a [0,30) and b [30,60) overlap.
    assert.deepEqual(names(node.visibleChildren()), ["a", "b"]);

    node.scrollY = 40;
    // Shifted: a [-40,-10) b [-10,20) c [20,50) d [50,80).
    assert.deepEqual(names(node.visibleChildren()), ["b", "c"]);
    assert.equal(node.isChildVisible(items[3] ?? new Item("missing")), false);
  });

  test("an explicit viewport overrides the node size", () => {
    const node = new ScrollableLayoutRenderNode<Item>(() => size(0, 0));
    node.setSize(size(100, 100));
    node.setViewportSize(size(100, 20));
    const below = new Item("below");
    below.pos = point(0, 25);
    node.addChild(below);

    assert.deepEqual(node.getViewportSize(), { w: 100, h: 20 });
    assert.deepEqual(names(node.visibleChildren()), []);
  });
});

describe("LayoutRenderNode z-order under random edits", () => {
  test("paint order stays sorted and hit-test order stays its reverse", () => {
    const rng = createRng(0x2ede);
    const box = new Box();
    const node = box.layoutNode;

    for (let step = 0; step < 400; step++) {
      const children = box.children();
      const op = children.length === 0 ? "add" : rng.pick(["add", "remove", "zIndex"] as const);
      if (op === "add") {
        box.add(new RecordingWidget().zIndex(rng.int(1, 5)));
      } else if (op === "remove") {
        box.remove(rng.pick(children));
      } else {
        rng.pick(children).zIndex(rng.int(1, 5));
      }

      const paint = node.paintOrder();
      const expected = box
        .children()
        .slice()
        .sort((a, b) => a.getZIndex() - b.getZIndex());
      assert.deepEqual(
        paint.map((w) => w.id),
        expected.map((w) => w.id),
        `step ${String(step)}: ${op}`,
      );
      for (let i = 1; i < paint.length; i++) {
        assert.ok((paint[i - 1]?.getZIndex() ?? 0) <= (paint[i]?.getZIndex() ?? 0));
      }
      assert.deepEqual(
        node.hitTestOrder().map((w) => w.id),
        paint.map((w) => w.id).reverse(),
      );
    }
  });
});
