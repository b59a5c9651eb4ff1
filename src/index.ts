export * from './memory/index.js';
export * from './types/index.js';
export { ContentMemoryError, ErrorCode, isContentMemoryError } from './errors.js';
export { createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
