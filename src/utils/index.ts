export { default as logger, Logging } from './logger';
export { asyncHandler, sendSuccess, sendError } from './http';
export { AppError, RegistryFormatError, ConfigurationError, ImportError } from './AppError';
