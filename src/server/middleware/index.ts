export { correlationId, readCorrelationId, CORRELATION_HEADER } from './correlation-id.js';
export { requestLogger, routeLabel } from './request-logger.js';
export { singleFileUpload } from './upload.js';
export { errorHandler, notFoundHandler } from './error-handler.js';
