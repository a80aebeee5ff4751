/**
 * Jest Environment Setup
 * Runs BEFORE test framework is installed
 */

// Set test environment variables before any module reads configuration.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
delete process.env.LOG_FILE;
delete process.env.CONNECTZ_TRACE_MOVES;
