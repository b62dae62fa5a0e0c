// Ensure server bootstrap is skipped during Vitest runs and keep test logs quiet.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
