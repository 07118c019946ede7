import { v4 as uuidv4 } from 'uuid';

import type { ServiceTypeName } from './service-types.js';
import type { KudaRequest } from './types.js';

/**
 * Wrap operation data in the Kuda envelope.
 * A fresh v4 UUID is used as `RequestRef` unless the caller supplies one (e.g. for idempotent replays).
 */
export function buildKudaRequest<TServiceType extends ServiceTypeName, TData extends object>(
  serviceType: TServiceType,
  data: TData,
  requestRef: string = uuidv4()
): KudaRequest<TServiceType, TData> {
  return {
    ServiceType: serviceType,
    RequestRef: requestRef,
    Data: data,
  };
}
