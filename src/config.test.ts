/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { loadConfig, LOG_LEVEL_ENV } from './config';

describe('loadConfig', () => {
  it('reads the log level case-insensitively', () => {
    expect(loadConfig({ [LOG_LEVEL_ENV]: ' DEBUG ' })).toEqual({ logLevel: 'debug' });
  });

  it('falls back to warn', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'warn' });
    expect(loadConfig({ [LOG_LEVEL_ENV]: 'verbose' })).toEqual({ logLevel: 'warn' });
  });
});
