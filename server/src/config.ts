import type { LaunchConfig } from "./types/launch.js";

export const DEFAULT_PORT = "8080";
export const BIND_ALL_HOST = "0.0.0.0";

/**
 * Same semantics as `${PORT:-8080}`: unset or empty falls back, anything else is
 * passed through untouched.
 */
export function resolvePort(envValue: string | undefined, fallback: string = DEFAULT_PORT): string {
  if (envValue === undefined || envValue === "") {
    return fallback;
  }
  return envValue;
}

export function loadLaunchConfig(env: NodeJS.ProcessEnv = process.env): Readonly<LaunchConfig> {
  return Object.freeze({
    host: BIND_ALL_HOST,
    port: resolvePort(env.PORT),
  });
}
