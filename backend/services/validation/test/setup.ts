// backend/services/validation/test/setup.ts
/**
 * Hermetic defaults for tests ONLY (never in service code). Runs before any
 * test module imports the shared logger, which requires LOG_LEVEL.
 */
process.env.NODE_ENV ??= "test";
process.env.LOG_LEVEL ??= "silent";
