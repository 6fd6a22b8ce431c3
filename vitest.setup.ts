/**
 * Vitest setup file - runs before all tests
 */

// Keep pipeline debug logs out of test output unless a run asks for them
process.env.LOG_LEVEL ??= 'silent';
