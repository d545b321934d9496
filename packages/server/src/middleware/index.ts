export { errorHandler } from './error-handler.js';
export { validate } from './validate.js';
export { requestLogger } from './request-logger.js';
export { requestContext, getRequestCache, getCurrentUser, getPodcastRole } from './request-context.js';
export { requireUser } from './require-user.js';
export { requirePodcastAccess, requirePodcastAdmin } from './podcast-access.js';
