export {
  createKudaClient,
  createKudaClientFromEnv,
  type KudaCallResult,
  type KudaClient,
  type KudaClientOptions,
} from './client.js';
export { setupLogging } from './logging.js';

export {
  createBearerHeaderProvider,
  createStaticHeaderProvider,
  type HeaderProvider,
  type TokenSource,
} from './auth/header-provider.js';

export { defineEndpoint, type EndpointDefinition } from './core/endpoint.js';
export { RequestNormalizer, type KudaTransport } from './core/normalizer.js';
export { buildKudaRequest } from './core/request-builder.js';
export { isServiceType, ServiceType, type ServiceTypeName } from './core/service-types.js';
export type * from './core/types.js';

export * from './endpoints/index.js';

// Transport errors surface on the outer Result of every call
export { HttpNetworkError, HttpTimeoutError, ResponseParseError, TransportError } from '@kuda-client/http';
