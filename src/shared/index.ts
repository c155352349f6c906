export * from './errors/AppError';
export * from './errors/ErrorHandler';
export * from './logging/Logger';
export * from './concurrency/Semaphore';
