/**
 * Stand-in for CustomLoggerService: records calls, writes nothing
 */
export function createLoggerStub() {
  return {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    verbose: jest.fn(),
    logSystem: jest.fn().mockResolvedValue(undefined),
    logMonitor: jest.fn().mockResolvedValue(undefined),
  };
}

export type LoggerStub = ReturnType<typeof createLoggerStub>;
