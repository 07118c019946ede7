import { HttpTimeoutError } from '@kuda-client/http';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { RequestNormalizer, type KudaTransport } from '../core/normalizer.js';
import { buildKudaRequest } from '../core/request-builder.js';
import { ServiceType } from '../core/service-types.js';
import type { AuthFailure, KudaHeaders } from '../core/types.js';
import { createVirtualAccountEndpoint, virtualAccountBalanceEndpoint } from '../endpoints/accounts.js';

const HEADERS: KudaHeaders = { Authorization: 'Bearer test-token', 'Content-Type': 'application/json' };

function fakeTransport(status: number, body: unknown) {
  const post = vi
    .fn<KudaTransport['post']>()
    .mockResolvedValue(ok({ status, ok: status >= 200 && status < 300, headers: {}, body }));
  return { post };
}

const createRequest = buildKudaRequest(
  ServiceType.ADMIN_CREATE_VIRTUAL_ACCOUNT,
  {
    email: 'ada@example.com',
    phoneNumber: '08000000000',
    lastName: 'Obi',
    firstName: 'Ada',
    trackingReference: 'TRK1',
  },
  'ref-create-1'
);

describe('RequestNormalizer', () => {
  it('should report 201 and echo the tracking reference for a created virtual account', async () => {
    const transport = fakeTransport(200, { status: true, data: { accountNumber: '1234567890' } });
    const normalizer = new RequestNormalizer(transport);

    const result = await normalizer.call(createVirtualAccountEndpoint, createRequest, ok(HEADERS));

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: false,
      statusCode: 201,
      data: { account_number: '1234567890', tracking_reference: 'TRK1' },
    });
  });

  it('should POST the request envelope once with the given headers', async () => {
    const transport = fakeTransport(200, { status: true, data: { accountNumber: '1234567890' } });
    const normalizer = new RequestNormalizer(transport);

    await normalizer.call(createVirtualAccountEndpoint, createRequest, ok(HEADERS));

    expect(transport.post).toHaveBeenCalledTimes(1);
    expect(transport.post).toHaveBeenCalledWith('', createRequest, { headers: HEADERS });
  });

  it('should extract the three balances', async () => {
    const transport = fakeTransport(200, {
      status: true,
      data: { ledgerBalance: 100, availableBalance: 90, withdrawableBalance: 80 },
    });
    const normalizer = new RequestNormalizer(transport);
    const request = buildKudaRequest(ServiceType.RETRIEVE_VIRTUAL_ACCOUNT_BALANCE, { trackingReference: 'TRK1' });

    const result = await normalizer.call(virtualAccountBalanceEndpoint, request, ok(HEADERS));

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: false,
      statusCode: 200,
      data: { ledger: 100, available: 90, withdrawable: 80 },
    });
  });

  it('should short-circuit on a header failure without sending anything', async () => {
    const transport = fakeTransport(200, { status: true, data: { accountNumber: '1234567890' } });
    const normalizer = new RequestNormalizer(transport);
    const failure: AuthFailure = { status: 403, message: 'Token endpoint refused the API key' };

    const result = await normalizer.call(createVirtualAccountEndpoint, createRequest, err(failure));

    expect(transport.post).not.toHaveBeenCalled();
    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: true,
      kind: 'authentication',
      statusCode: 403,
      data: failure,
    });
  });

  it('should attach the raw response when the status is not 200', async () => {
    const body = { status: false, message: 'Unauthorized' };
    const normalizer = new RequestNormalizer(fakeTransport(401, body));

    const result = await normalizer.call(createVirtualAccountEndpoint, createRequest, ok(HEADERS));

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: true,
      kind: 'endpoint-response',
      statusCode: 401,
      data: { status: 401, body },
    });
  });

  it('should treat a 2xx other than 200 as a failure', async () => {
    const body = { status: true, data: { accountNumber: '1234567890' } };
    const normalizer = new RequestNormalizer(fakeTransport(202, body));

    const result = await normalizer.call(createVirtualAccountEndpoint, createRequest, ok(HEADERS));

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: true,
      kind: 'endpoint-response',
      statusCode: 202,
      data: { status: 202, body },
    });
  });

  it('should treat an empty body as a failure', async () => {
    const normalizer = new RequestNormalizer(fakeTransport(200, undefined));

    const result = await normalizer.call(createVirtualAccountEndpoint, createRequest, ok(HEADERS));

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: true,
      kind: 'endpoint-response',
      statusCode: 200,
      data: { status: 200, body: undefined },
    });
  });

  it('should treat a false status flag as a failure even with the fields present', async () => {
    const body = { status: false, data: { accountNumber: '1234567890' } };
    const normalizer = new RequestNormalizer(fakeTransport(200, body));

    const result = await normalizer.call(createVirtualAccountEndpoint, createRequest, ok(HEADERS));

    expect(result._unsafeUnwrap()).toMatchObject({ isError: true, statusCode: 200, data: { body } });
  });

  it('should pass transport errors through on the error channel', async () => {
    const timeout = new HttpTimeoutError('https://kuda-openapi.example.com/v2.1', 10_000);
    const post = vi.fn<KudaTransport['post']>().mockResolvedValue(err(timeout));
    const normalizer = new RequestNormalizer({ post });

    const result = await normalizer.call(createVirtualAccountEndpoint, createRequest, ok(HEADERS));

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toBe(timeout);
  });
});
