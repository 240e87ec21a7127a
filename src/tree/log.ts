/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { loadConfig } from '../config';

const CONTEXT = '[tree]';

function withContext(logger: Logger): Logger {
  const own = logger.clone();
  own.setContext(CONTEXT);
  return own;
}

let logger: Logger = withContext(new ConsoleLogger(loadConfig().logLevel));

/** Logger used by tree operations, the decoder and the encoder. */
export function treeLogger(): Logger {
  return logger;
}

/** Route tree logging to `next` (cloned, with the tree context set). */
export function setTreeLogger(next: Logger): void {
  logger = withContext(next);
}
