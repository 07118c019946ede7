import type { ServiceTypeName } from './service-types.js';

export type KudaHeaders = Record<string, string>;

/**
 * Request envelope shared by every Kuda operation.
 */
export interface KudaRequest<TServiceType extends ServiceTypeName = ServiceTypeName, TData extends object = object> {
  ServiceType: TServiceType;
  RequestRef: string;
  Data: TData;
}

/**
 * What the transport returned, kept verbatim for callers to inspect when a call fails.
 */
export interface KudaRawResponse {
  status: number;
  body: unknown;
}

/**
 * Error side of the header step: authentication could not produce usable headers.
 */
export interface AuthFailure {
  status: number;
  message: string;
  body?: unknown;
}

export interface KudaSuccess<TPayload> {
  isError: false;
  statusCode: number;
  data: TPayload;
}

export interface KudaAuthenticationFailure {
  isError: true;
  kind: 'authentication';
  statusCode: number;
  data: AuthFailure;
}

export interface KudaEndpointFailure {
  isError: true;
  kind: 'endpoint-response';
  statusCode: number;
  data: KudaRawResponse;
}

export type KudaFailure = KudaAuthenticationFailure | KudaEndpointFailure;

/**
 * Uniform outcome of a Kuda call. Either a fully extracted payload, or a failure with
 * the raw material attached. Narrow on `isError`, then on `kind`.
 */
export type KudaResponse<TPayload> = KudaSuccess<TPayload> | KudaFailure;
