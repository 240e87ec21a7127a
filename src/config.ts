/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { LogLevel } from './common/logger';
import { LOG_LEVELS } from './common/logger';

export const LOG_LEVEL_ENV = 'TEMPLATE_TREE_LOG_LEVEL';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface TreeConfig {
  logLevel: LogLevel;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const wanted = (raw ?? '').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? DEFAULT_LOG_LEVEL;
}

/**
 * Read the runtime configuration from the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TreeConfig {
  return {
    logLevel: parseLogLevel(env[LOG_LEVEL_ENV]),
  };
}
