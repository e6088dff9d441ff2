// Core
export * from './core/request.js';
export * from './core/response.js';
export * from './core/errors.js';
export * from './types/index.js';

// Cache
export * from './cache/cache-control.js';
export * from './cache/clock.js';
export * from './cache/freshness.js';
export * from './cache/revalidation.js';
export * from './cache/key-builder.js';
export * from './cache/entry.js';
export * from './cache/caching-transport.js';

// Storages
export * from './cache/memory-storage.js';
export * from './cache/file-storage.js';
export * from './cache/redis-storage.js';

// Transports
export * from './transport/undici.js';
export * from './transport/fetch.js';

// Configuration
export * from './config.js';

// Utils
export * from './utils/http-date.js';
export * from './utils/logger.js';
export * from './types/logger.js';
