export * from './interfaces/IRateLimiter';
export * from './services/rateLimiterService';
