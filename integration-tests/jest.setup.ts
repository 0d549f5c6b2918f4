/**
 * Jest setup: keep structured logs out of test output.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
