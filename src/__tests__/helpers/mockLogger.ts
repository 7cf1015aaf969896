import type { Logger } from '../../utils/logger.js';

export type MockLogger = {
  [K in keyof Logger]: jest.Mock;
};

export function createMockLogger(): MockLogger {
  return {
    info: jest.fn(),
    warn: jest.fn(),
  };
}
