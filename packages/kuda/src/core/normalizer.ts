import type { HttpClient, TransportError } from '@kuda-client/http';
import { getLogger } from '@kuda-client/logger';
import { err, ok, type Result } from 'neverthrow';

import type { EndpointDefinition } from './endpoint.js';
import type {
  AuthFailure,
  KudaAuthenticationFailure,
  KudaEndpointFailure,
  KudaHeaders,
  KudaRawResponse,
  KudaRequest,
  KudaResponse,
  KudaSuccess,
} from './types.js';

const logger = getLogger('KudaRequestNormalizer');

/**
 * The slice of HttpClient the normalizer needs. Every Kuda operation is POSTed to the base URL.
 */
export type KudaTransport = Pick<HttpClient, 'post'>;

function endpointFailure(raw: KudaRawResponse): KudaEndpointFailure {
  return { isError: true, kind: 'endpoint-response', statusCode: raw.status, data: raw };
}

/**
 * Generic executor behind every client operation:
 * short-circuit on a failed header step, POST once, validate, extract.
 *
 * Resolves `err` only for transport failures (timeout, connection error, unparseable body).
 * Everything the API actually answered comes back as a {@link KudaResponse}.
 */
export class RequestNormalizer {
  constructor(private readonly transport: KudaTransport) {}

  async call<TRequest extends KudaRequest, TResponse, TPayload>(
    definition: EndpointDefinition<TRequest, TResponse, TPayload>,
    request: TRequest,
    headers: Result<KudaHeaders, AuthFailure>
  ): Promise<Result<KudaResponse<TPayload>, TransportError>> {
    if (headers.isErr()) {
      logger.warn(
        { operation: definition.name, status: headers.error.status, reason: headers.error.message },
        'Header generation failed, request not sent'
      );
      const failure: KudaAuthenticationFailure = {
        isError: true,
        kind: 'authentication',
        statusCode: headers.error.status,
        data: headers.error,
      };
      return ok(failure);
    }

    logger.debug(
      { operation: definition.name, serviceType: request.ServiceType, requestRef: request.RequestRef },
      'Sending Kuda request'
    );

    const sent = await this.transport.post('', request, { headers: headers.value });
    if (sent.isErr()) {
      return err(sent.error);
    }

    const raw: KudaRawResponse = { status: sent.value.status, body: sent.value.body };

    if (raw.status !== 200) {
      logger.warn(
        { operation: definition.name, requestRef: request.RequestRef, status: raw.status },
        'Kuda request failed with non-200 status'
      );
      return ok(endpointFailure(raw));
    }

    const validation = definition.responseSchema.safeParse(raw.body);
    if (!validation.success) {
      const issues = validation.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        return `${issue.message}${path}`;
      });
      logger.warn(
        { operation: definition.name, requestRef: request.RequestRef, issues },
        'Kuda response did not satisfy the success predicate'
      );
      return ok(endpointFailure(raw));
    }

    const success: KudaSuccess<TPayload> = {
      isError: false,
      statusCode: definition.successStatus,
      data: definition.extract(validation.data, request),
    };
    return ok(success);
  }
}
