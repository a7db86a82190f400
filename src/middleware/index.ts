export { createErrorHandler } from './errorHandler';
export { createRequestLogger } from './requestLogger';
export { validate } from './validate';
