/**
 * packages/core/src/debug/devWarnings.ts — Dev-mode warning sink.
 *
 * Why: The engine has no logger dependency. Recoverable faults (a failing
 * animation, an update posted for a detached widget) are reported as one-line
 * `[lattice][area]` warnings in development and stay silent in production.
 */

export type DevWarningArea = "animation" | "app";

export type WarnSink = (message: string) => void;

const NODE_ENV =
  (typeof process !== "undefined" ? process.env["NODE_ENV"] : undefined) ?? "development";

/** True unless NODE_ENV is "production". */
export const DEV_MODE = NODE_ENV !== "production";

export function consoleWarn(message: string): void {
  globalThis.console?.warn?.(message);
}

export function formatDevWarning(area: DevWarningArea, detail: string): string {
  return `[lattice][${area}] ${detail}`;
}

export type DevWarnings = Readonly<{
  devMode: boolean;
  warn: (area: DevWarningArea, detail: string) => void;
  /** Warn at most once per key for the lifetime of this sink. */
  warnOnce: (key: string, area: DevWarningArea, detail: string) => void;
}>;

export function createDevWarnings(
  opts: Readonly<{ devMode?: boolean; warn?: WarnSink }> = {},
): DevWarnings {
  const devMode = opts.devMode ?? DEV_MODE;
  const sink = opts.warn ?? consoleWarn;
  const warnedKeys = new Set<string>();

  const warn = (area: DevWarningArea, detail: string): void => {
    if (!devMode) return;
    sink(formatDevWarning(area, detail));
  };

  return Object.freeze({
    devMode,
    warn,
    warnOnce: (key: string, area: DevWarningArea, detail: string): void => {
      if (!devMode) return;
      if (warnedKeys.has(key)) return;
      warnedKeys.add(key);
      sink(formatDevWarning(area, detail));
    },
  });
}

/** Sink used by code that runs without an App (standalone scheduler, tests). */
export const defaultDevWarnings: DevWarnings = createDevWarnings();
