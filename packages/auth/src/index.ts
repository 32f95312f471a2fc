export {
  createApiKeyMiddleware,
  createIdentityStore,
  createMapFinder,
  createTextErrorHandler,
  withApiKeyAuth,
  type ApiKeyErrorHandler,
  type ApiKeyFinder,
  type ApiKeyMiddleware,
  type ApiKeyMiddlewareDeps,
  type ApiKeyNext,
  type ApiKeyRequest,
  type FinderResult,
  type IdentityStore,
  type TextResponse
} from './apiKey';
export {
  API_KEY_HEADER_FORMAT,
  describeApiKeyAuthError,
  type ApiKeyAuthError,
  type ApiKeyAuthErrorCode
} from './errors';
