/**
 * packages/core/src/app/config.ts — App configuration.
 *
 * Invalid values fail at createApp() time with LUI_INVALID_CONFIG.
 */

import { DEV_MODE, consoleWarn } from "../debug/devWarnings.js";
import { LatticeError } from "../errors.js";
import type { AppConfig, ResolvedAppConfig } from "./types.js";

export const MAX_FPS_CAP = 1000;

export type EnvSource = Readonly<Record<string, string | undefined>>;

const DEFAULT_CONFIG = Object.freeze({
  fpsCap: 60,
  lowRefreshFpsCap: 10,
});

function invalidConfig(detail: string): never {
  throw new LatticeError("LUI_INVALID_CONFIG", detail);
}

function requireFps(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0 || v > MAX_FPS_CAP) {
    invalidConfig(`${name} must be an integer in 1..${String(MAX_FPS_CAP)}`);
  }
  return v;
}

function processEnv(): EnvSource {
  return typeof process !== "undefined" ? process.env : {};
}

/** "1", "true", "yes" and "on" (any case) enable the flag. */
export function readEnvFlag(env: EnvSource, name: string): boolean {
  const raw = env[name];
  if (raw === undefined) return false;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

export function resolveAppConfig(
  config: AppConfig | undefined,
  env: EnvSource = processEnv(),
): ResolvedAppConfig {
  const fpsCap =
    config?.fpsCap === undefined ? DEFAULT_CONFIG.fpsCap : requireFps("fpsCap", config.fpsCap);
  const lowRefreshFpsCap =
    config?.lowRefreshFpsCap === undefined
      ? DEFAULT_CONFIG.lowRefreshFpsCap
      : requireFps("lowRefreshFpsCap", config.lowRefreshFpsCap);
  const lowRefresh = config?.lowRefresh ?? readEnvFlag(env, "LATTICE_LOW_REFRESH");
  const devMode = config?.devMode ?? DEV_MODE;
  if (config?.warn !== undefined && typeof config.warn !== "function") {
    invalidConfig("warn must be a function");
  }
  const warn = config?.warn ?? consoleWarn;

  return Object.freeze({ fpsCap, lowRefreshFpsCap, lowRefresh, devMode, warn });
}

/** Tick rate the animation scheduler runs at. */
export function effectiveFps(config: ResolvedAppConfig): number {
  return config.lowRefresh ? config.lowRefreshFpsCap : config.fpsCap;
}
