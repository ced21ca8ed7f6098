// ---------------------------------------------------------------------------
// Module configuration – environment-derived settings
// ---------------------------------------------------------------------------

import { isLogLevel, type LogLevel } from "../logging/subsystem.js";

export const ENV_LOG_LEVEL = "ARCHIVE_DEVICE_LOG_LEVEL";
export const ENV_API_URL = "ARCHIVE_API_URL";

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export type ModuleConfig = {
  logLevel: LogLevel;
  /** Used when the invocation omits `api_url`. */
  apiUrlFallback: string | null;
};

export function resolveModuleConfig(env: NodeJS.ProcessEnv = process.env): ModuleConfig {
  const rawLevel = env[ENV_LOG_LEVEL]?.trim().toLowerCase();
  const apiUrl = env[ENV_API_URL]?.trim();
  return {
    logLevel: isLogLevel(rawLevel) ? rawLevel : DEFAULT_LOG_LEVEL,
    apiUrlFallback: apiUrl ? apiUrl : null,
  };
}
