/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './ValidationError';
export * from './NotFoundError';
export * from './AuthError';
export * from './FetchError';
export * from './ConfigurationError';
