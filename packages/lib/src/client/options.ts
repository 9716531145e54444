import type { NvimHostOptions } from "../types";

export const DEBUG_ENV = "NVIM_HOST_KIT_DEBUG";

export type NvimHostResolvedOptions = {
  debug: boolean;
  debugLog?: (line: string) => void;
  messageSeparator: string;
  benchThreshold: number;
  benchPrecision: number;
  tabsize: number;
};

function envFlag(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = String(env[name] ?? "").trim().toLowerCase();
  return raw !== "" && raw !== "0" && raw !== "false" && raw !== "off";
}

export function resolveOptions(
  options: NvimHostOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): NvimHostResolvedOptions {
  // The environment can turn debugging on for an embedding that defaults to
  // `debug: false`, without code changes.
  const debug = envFlag(env, DEBUG_ENV) ? true : Boolean(options.debug);
  return {
    debug,
    debugLog: options.debugLog,
    messageSeparator: options.messageSeparator ?? " ",
    benchThreshold: Number.isFinite(options.benchThreshold) ? Math.max(0, Number(options.benchThreshold)) : 0.01,
    benchPrecision: Number.isInteger(options.benchPrecision) ? Math.max(0, Number(options.benchPrecision)) : 3,
    tabsize: Number.isInteger(options.tabsize) && Number(options.tabsize) > 0 ? Number(options.tabsize) : 8,
  };
}
