/**
 * Configuration for test environment setup
 */
import { LoggerManager } from '../../lib/portflow/src/utils/logging';
import { TestLoggerAdapter } from './test-logger-adapter';

// Register test logger in manager
LoggerManager.getInstance().setLogger(new TestLoggerAdapter());

// Always disable logs in tests, tests inspecting logs pass their own logger
LoggerManager.disableLogs();

// Set environment variable to identify test environment
process.env.NODE_ENV = 'test';

afterEach(() => {
  jest.useRealTimers();
});
