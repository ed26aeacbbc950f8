import { assert, describe, test } from "@lattice-ui/testkit";
import { createDevWarnings, formatDevWarning } from "../devWarnings.js";

describe("devWarnings", () => {
  test("prefixes messages with the area", () => {
    assert.equal(formatDevWarning("animation", "bad tick"), "[lattice][animation] bad tick");
  });

  test("forwards warnings to the sink in dev mode", () => {
    const seen: string[] = [];
    const dev = createDevWarnings({ devMode: true, warn: (m) => seen.push(m) });
    dev.warn("animation", "tick failed");
    dev.warn("animation", "tick failed");
    assert.deepEqual(seen, ["[lattice][animation] tick failed", "[lattice][animation] tick failed"]);
  });

  test("warnOnce deduplicates by key", () => {
    const seen: string[] = [];
    const dev = createDevWarnings({ devMode: true, warn: (m) => seen.push(m) });
    dev.warnOnce("k1", "app", "first");
    dev.warnOnce("k1", "app", "again");
    dev.warnOnce("k2", "app", "second");
    assert.deepEqual(seen, ["[lattice][app] first", "[lattice][app] second"]);
  });

  test("stays silent outside dev mode", () => {
    const seen: string[] = [];
    const dev = createDevWarnings({ devMode: false, warn: (m) => seen.push(m) });
    dev.warn("app", "ignored");
    dev.warnOnce("k", "app", "ignored");
    assert.deepEqual(seen, []);
  });
});
