/**
 * Runs before every test file. The logger reads these at import time.
 */
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "silent";

export {};
