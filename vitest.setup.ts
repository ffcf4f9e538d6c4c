/**
 * Keeps engine logging out of test output. Set ARCH_ENGINE_TEST_LOG_LEVEL
 * to see it.
 */

import { beforeEach } from 'vitest';
import { setLogLevel, type LogLevel } from './src/telemetry/logger.js';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const requested = process.env.ARCH_ENGINE_TEST_LOG_LEVEL;
const level = LEVELS.find((candidate) => candidate === requested) ?? 'silent';

beforeEach(() => {
  setLogLevel(level);
});
