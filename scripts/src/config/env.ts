import { RUNTIME_ENV_VARIABLES } from "../constants.js";
import { parseLogLevel, type LogLevel } from "../utils/logger.js";

export interface RuntimeConfig {
  logLevel: LogLevel;
  rulesPaths: string[];
  /** Snapshots are only recorded when a store directory is configured. */
  storeDir: string | null;
  project: string | null;
}

function parseList(value: string | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export function resolveRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    logLevel: parseLogLevel(env[RUNTIME_ENV_VARIABLES.logLevel]),
    rulesPaths: parseList(env[RUNTIME_ENV_VARIABLES.rulesPaths]),
    storeDir: env[RUNTIME_ENV_VARIABLES.storeDir] || null,
    project: env[RUNTIME_ENV_VARIABLES.project] || null
  };
}
