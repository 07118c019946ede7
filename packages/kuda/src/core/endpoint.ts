import type { ZodType, ZodTypeDef } from 'zod';

import type { KudaRequest } from './types.js';

/**
 * Declarative description of one Kuda operation, consumed by {@link RequestNormalizer}.
 *
 * The success predicate is "HTTP 200 and `responseSchema` accepts the body"; the schema is
 * where each operation states which status flag and nested fields it requires. `extract`
 * only runs on validated bodies, so it can pick leaves without further checks.
 */
export interface EndpointDefinition<TRequest extends KudaRequest, TResponse, TPayload> {
  /** Client method name, used in logs. */
  readonly name: string;
  readonly serviceType: TRequest['ServiceType'];
  /** Status reported to the caller on success; creation endpoints answer 201. */
  readonly successStatus: 200 | 201;
  readonly responseSchema: ZodType<TResponse, ZodTypeDef, unknown>;
  readonly extract: (response: TResponse, request: TRequest) => TPayload;
}

/**
 * Identity helper that pins the generic parameters of a definition at its declaration.
 */
export function defineEndpoint<TRequest extends KudaRequest, TResponse, TPayload>(
  definition: EndpointDefinition<TRequest, TResponse, TPayload>
): EndpointDefinition<TRequest, TResponse, TPayload> {
  return definition;
}
