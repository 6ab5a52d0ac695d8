/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Process configuration, read from environment variables.
*/

import { isLogLevel } from './logger';
import type { LogLevel } from './logger';

export const LOG_LEVEL_VARIABLE = 'MARKUP_QUERY_LOG_LEVEL';

export interface MarkupQueryConfig {
  /** Minimum level for the default console logger. */
  logLevel: LogLevel;
}

const DEFAULT_CONFIG: MarkupQueryConfig = {
  logLevel: 'warn',
};

/**
 * Resolve configuration from `env`. Unknown values fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MarkupQueryConfig {
  const rawLevel = env[LOG_LEVEL_VARIABLE]?.trim().toLowerCase();
  return {
    logLevel: rawLevel && isLogLevel(rawLevel) ? rawLevel : DEFAULT_CONFIG.logLevel,
  };
}
