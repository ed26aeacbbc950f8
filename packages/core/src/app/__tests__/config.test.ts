import { assert, describe, test } from "@lattice-ui/testkit";
import { consoleWarn } from "../../debug/devWarnings.js";
import { isLatticeError } from "../../errors.js";
import { MAX_FPS_CAP, effectiveFps, readEnvFlag, resolveAppConfig } from "../config.js";

const isInvalidConfig = (e: unknown): boolean => isLatticeError(e, "LUI_INVALID_CONFIG");

describe("resolveAppConfig", () => {
  test("applies defaults", () => {
    const config = resolveAppConfig(undefined, {});
    assert.equal(config.fpsCap, 60);
    assert.equal(config.lowRefreshFpsCap, 10);
    assert.equal(config.lowRefresh, false);
    assert.equal(config.warn, consoleWarn);
    assert.equal(Object.isFrozen(config), true);
  });

  test("keeps explicit values", () => {
    const warn = (_message: string): void => {};
    const config = resolveAppConfig(
      { fpsCap: 120, lowRefreshFpsCap: 5, lowRefresh: true, devMode: false, warn },
      {},
    );
    assert.deepEqual(
      { ...config },
      { fpsCap: 120, lowRefreshFpsCap: 5, lowRefresh: true, devMode: false, warn },
    );
  });

  test("rejects fps caps outside 1..1000 or not integral", () => {
    for (const fpsCap of [0, -1, 1.5, Number.NaN, MAX_FPS_CAP + 1]) {
      assert.throws(() => resolveAppConfig({ fpsCap }, {}), isInvalidConfig);
    }
    assert.throws(() => resolveAppConfig({ lowRefreshFpsCap: 0 }, {}), isInvalidConfig);
    assert.equal(resolveAppConfig({ fpsCap: MAX_FPS_CAP }, {}).fpsCap, MAX_FPS_CAP);
  });

  test("low refresh comes from the environment unless set explicitly", () => {
    assert.equal(resolveAppConfig(undefined, { LATTICE_LOW_REFRESH: "1" }).lowRefresh, true);
    assert.equal(
      resolveAppConfig({ lowRefresh: false }, { LATTICE_LOW_REFRESH: "1" }).lowRefresh,
      false,
    );
  });
});

describe("readEnvFlag", () => {
  test("accepts common truthy spellings", () => {
    for (const raw of ["1", "true", "TRUE", " yes ", "On"]) {
      assert.equal(readEnvFlag({ FLAG: raw }, "FLAG"), true, raw);
    }
  });

  test("anything else is false", () => {
    for (const raw of ["0", "false", "", "enabled"]) {
      assert.equal(readEnvFlag({ FLAG: raw }, "FLAG"), false, raw);
    }
    assert.equal(readEnvFlag({}, "FLAG"), false);
  });
});

describe("effectiveFps", () => {
  test("uses the low-refresh cap when enabled", () => {
    assert.equal(effectiveFps(resolveAppConfig({ fpsCap: 30 }, {})), 30);
    assert.equal(
      effectiveFps(resolveAppConfig({ fpsCap: 30, lowRefresh: true, lowRefreshFpsCap: 4 }, {})),
      4,
    );
  });
});
