/**
 * Unit test setup - silences logging so test output only shows Jest's report
 */

import { beforeEach, jest } from '@jest/globals';
import { configureLogger, LogLevel } from '../../packages/build/src/utils/logger';

configureLogger({ level: LogLevel.Silent, colors: false, timestamps: false });

beforeEach(() => {
  jest.clearAllMocks();
  configureLogger({ level: LogLevel.Silent, colors: false, timestamps: false });
});
