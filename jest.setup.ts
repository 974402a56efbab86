/**
 * Jest setup file.
 * Keep the logger quiet unless a test run asks for output explicitly.
 */

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}

export {};
