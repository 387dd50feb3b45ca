/**
 * Global test setup file
 *
 * Executed before all tests: pins the environment variables the runtime
 * reads so that ConfigServiceLive behaves the same on every machine.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error'; // Reduce noise during tests
delete process.env.LOG_FORMAT;
delete process.env.CLEANUP_TIMEOUT_MS;
delete process.env.HANDLER_TIMEOUT_MS;

export {};
