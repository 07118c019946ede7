import type { TransportError } from '@kuda-client/http';
import { ok, type Result } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import type { EndpointDefinition } from '../core/endpoint.js';
import { RequestNormalizer, type KudaTransport } from '../core/normalizer.js';
import { buildKudaRequest } from '../core/request-builder.js';
import { ServiceType } from '../core/service-types.js';
import type { KudaRequest, KudaResponse } from '../core/types.js';
import {
  bankListEndpoint,
  billersEndpoint,
  confirmTransferRecipientEndpoint,
  createVirtualAccountEndpoint,
  fundVirtualAccountEndpoint,
  mainAccountBalanceEndpoint,
  purchaseBillEndpoint,
  sendFundsFromMainAccountEndpoint,
  sendFundsFromVirtualAccountEndpoint,
  verifyBillCustomerEndpoint,
  virtualAccountBalanceEndpoint,
  withdrawFromVirtualAccountEndpoint,
} from '../endpoints/index.js';

interface EndpointCase {
  name: string;
  call: (transport: KudaTransport) => Promise<Result<KudaResponse<unknown>, TransportError>>;
  successBody: unknown;
  expectedStatus: number;
  expectedPayload: unknown;
  /** A 200 reply missing (or emptying) a field the endpoint requires. */
  incompleteBody: unknown;
}

function fakeTransport(status: number, body: unknown) {
  const post = vi
    .fn<KudaTransport['post']>()
    .mockResolvedValue(ok({ status, ok: status >= 200 && status < 300, headers: {}, body }));
  return { post };
}

function callEndpoint<TRequest extends KudaRequest, TResponse, TPayload>(
  definition: EndpointDefinition<TRequest, TResponse, TPayload>,
  request: TRequest,
  transport: KudaTransport
): Promise<Result<KudaResponse<TPayload>, TransportError>> {
  return new RequestNormalizer(transport).call(definition, request, ok({ Authorization: 'Bearer test-token' }));
}

function endpointCase<TRequest extends KudaRequest, TResponse, TPayload>(
  definition: EndpointDefinition<TRequest, TResponse, TPayload>,
  request: TRequest,
  fixtures: Omit<EndpointCase, 'name' | 'call'>
): EndpointCase {
  return {
    name: definition.name,
    call: (transport) => callEndpoint(definition, request, transport),
    ...fixtures,
  };
}

const balanceBody = { status: true, data: { ledgerBalance: 100, availableBalance: 90, withdrawableBalance: 80 } };

const cases: EndpointCase[] = [
  endpointCase(bankListEndpoint, buildKudaRequest(ServiceType.BANK_LIST, {}), {
    successBody: { status: true, data: { banks: [{ bankCode: '999129', bankName: 'Kuda' }] } },
    expectedStatus: 200,
    expectedPayload: { banks: [{ bankCode: '999129', bankName: 'Kuda' }] },
    incompleteBody: { status: true, data: { banks: [] } },
  }),
  endpointCase(
    createVirtualAccountEndpoint,
    buildKudaRequest(ServiceType.ADMIN_CREATE_VIRTUAL_ACCOUNT, {
      email: 'ada@example.com',
      phoneNumber: '08000000000',
      lastName: 'Obi',
      firstName: 'Ada',
      trackingReference: 'TRK1',
    }),
    {
      successBody: { status: true, data: { accountNumber: '1234567890' } },
      expectedStatus: 201,
      expectedPayload: { account_number: '1234567890', tracking_reference: 'TRK1' },
      incompleteBody: { status: true, data: {} },
    }
  ),
  endpointCase(
    virtualAccountBalanceEndpoint,
    buildKudaRequest(ServiceType.RETRIEVE_VIRTUAL_ACCOUNT_BALANCE, { trackingReference: 'TRK1' }),
    {
      successBody: balanceBody,
      expectedStatus: 200,
      expectedPayload: { ledger: 100, available: 90, withdrawable: 80 },
      incompleteBody: { status: true, data: { ledgerBalance: 100, availableBalance: 90 } },
    }
  ),
  endpointCase(mainAccountBalanceEndpoint, buildKudaRequest(ServiceType.ADMIN_RETRIEVE_MAIN_ACCOUNT_BALANCE, {}), {
    successBody: balanceBody,
    expectedStatus: 200,
    expectedPayload: { ledger: 100, available: 90, withdrawable: 80 },
    incompleteBody: { status: true },
  }),
  endpointCase(
    fundVirtualAccountEndpoint,
    buildKudaRequest(ServiceType.FUND_VIRTUAL_ACCOUNT, { trackingReference: 'TRK1', amount: 5000, narration: 'top up' }),
    {
      successBody: { status: true, message: 'Completed', transactionReference: 'TXN-1' },
      expectedStatus: 200,
      expectedPayload: { reference: 'TXN-1' },
      incompleteBody: { status: true, transactionReference: '' },
    }
  ),
  endpointCase(
    withdrawFromVirtualAccountEndpoint,
    buildKudaRequest(ServiceType.WITHDRAW_VIRTUAL_ACCOUNT, {
      trackingReference: 'TRK1',
      amount: 2500,
      narration: 'sweep',
    }),
    {
      successBody: { status: true, transactionReference: 'TXN-2' },
      expectedStatus: 200,
      expectedPayload: { reference: 'TXN-2' },
      incompleteBody: { status: true },
    }
  ),
  endpointCase(
    confirmTransferRecipientEndpoint,
    buildKudaRequest(ServiceType.NAME_ENQUIRY, {
      beneficiaryAccountNumber: '0123456789',
      beneficiaryBankCode: '000013',
      SenderTrackingReference: 'TRK9',
      isRequestFromVirtualAccount: true,
    }),
    {
      successBody: {
        status: true,
        data: {
          beneficiaryAccountNumber: '0123456789',
          beneficiaryName: 'Ada Obi',
          beneficiaryBankCode: '000013',
          sessionID: 'SESS-1',
          senderAccountNumber: '1234567890',
          transferCharge: 10,
          nameEnquiryID: 42,
        },
      },
      expectedStatus: 200,
      expectedPayload: {
        beneficiary_account_number: '0123456789',
        beneficiary_name: 'Ada Obi',
        beneficiary_code: '000013',
        session_id: 'SESS-1',
        sender_account: '1234567890',
        transfer_charge: 10,
        name_enquiry_id: 42,
        tracking_reference: 'TRK9',
      },
      incompleteBody: { status: true, data: { beneficiaryAccountNumber: '0123456789' } },
    }
  ),
  endpointCase(
    sendFundsFromMainAccountEndpoint,
    buildKudaRequest(ServiceType.SINGLE_FUND_TRANSFER, {
      beneficiarybankCode: '000013',
      beneficiaryAccount: '0123456789',
      beneficiaryName: 'Ada Obi',
      amount: 10_000,
      narration: 'rent',
      nameEnquirySessionID: 'SESS-1',
      senderName: 'Test Co',
    }),
    {
      successBody: { status: true, transactionReference: 'TXN-3', requestReference: 'ref-main-1' },
      expectedStatus: 200,
      expectedPayload: { transaction_reference: 'TXN-3', request_reference: 'ref-main-1' },
      incompleteBody: { status: true, requestReference: 'ref-main-1' },
    }
  ),
  endpointCase(
    sendFundsFromVirtualAccountEndpoint,
    buildKudaRequest(ServiceType.VIRTUAL_ACCOUNT_FUND_TRANSFER, {
      trackingReference: 'TRK1',
      beneficiaryAccount: '0123456789',
      beneficiaryBankCode: '000013',
      beneficiaryName: 'Ada Obi',
      amount: 7500,
      narration: 'refund',
      nameEnquiryId: '42',
      senderName: 'Test Co',
    }),
    {
      successBody: { status: true, transactionReference: 'TXN-4' },
      expectedStatus: 200,
      expectedPayload: { transaction_reference: 'TXN-4', request_reference: null },
      incompleteBody: { status: true, transactionReference: '' },
    }
  ),
  endpointCase(billersEndpoint, buildKudaRequest(ServiceType.GET_BILLERS_BY_TYPE, { BillTypeName: 'airtime' }), {
    successBody: { status: true, data: { billers: [{ billerName: 'Test Airtime', billItemIdentifier: 'KUD-AIR-1' }] } },
    expectedStatus: 200,
    expectedPayload: { billers: [{ billerName: 'Test Airtime', billItemIdentifier: 'KUD-AIR-1' }] },
    incompleteBody: { status: true, data: {} },
  }),
  endpointCase(
    verifyBillCustomerEndpoint,
    buildKudaRequest(ServiceType.VERIFY_BILL_CUSTOMER, {
      KudaBillItemIdentifier: 'KUD-ELEC-1',
      CustomerIdentification: '1111111111',
    }),
    {
      successBody: { status: true, data: { customerName: 'Ada Obi' } },
      expectedStatus: 200,
      expectedPayload: { customer_name: 'Ada Obi' },
      incompleteBody: { status: true, data: { customerName: '' } },
    }
  ),
  endpointCase(
    purchaseBillEndpoint,
    buildKudaRequest(ServiceType.PURCHASE_BILL, {
      trackingReference: 'TRK1',
      Amount: 20_000,
      BillItemIdentifier: 'KUD-AIR-1',
      PhoneNumber: '08000000000',
      CustomerIdentifier: '08000000000',
    }),
    {
      successBody: { status: true, data: { reference: 'BILL-1' } },
      expectedStatus: 200,
      expectedPayload: { reference: 'BILL-1' },
      incompleteBody: { status: true, data: { ref: 'BILL-1' } },
    }
  ),
];

for (const endpoint of cases) {
  describe(`${endpoint.name} endpoint`, () => {
    it('should return exactly the documented payload for a satisfying response', async () => {
      const result = await endpoint.call(fakeTransport(200, endpoint.successBody));

      expect(result._unsafeUnwrap()).toStrictEqual({
        isError: false,
        statusCode: endpoint.expectedStatus,
        data: endpoint.expectedPayload,
      });
    });

    it('should return the transport status and raw response for a non-200 reply', async () => {
      const body = { status: false, message: 'Invalid request' };

      const result = await endpoint.call(fakeTransport(400, body));

      expect(result._unsafeUnwrap()).toStrictEqual({
        isError: true,
        kind: 'endpoint-response',
        statusCode: 400,
        data: { status: 400, body },
      });
    });

    it('should fail a 200 reply that lacks a required field', async () => {
      const result = await endpoint.call(fakeTransport(200, endpoint.incompleteBody));

      expect(result._unsafeUnwrap()).toStrictEqual({
        isError: true,
        kind: 'endpoint-response',
        statusCode: 200,
        data: { status: 200, body: endpoint.incompleteBody },
      });
    });
  });
}

it('should define one endpoint per service type', () => {
  expect(new Set(cases.map((endpoint) => endpoint.name)).size).toBe(Object.keys(ServiceType).length);
});

describe('reply leaves outside the success predicate', () => {
  it('should accept name-enquiry optional leaves of any type and null the missing ones', async () => {
    const request = buildKudaRequest(ServiceType.NAME_ENQUIRY, {
      beneficiaryAccountNumber: '0123456789',
      beneficiaryBankCode: '000013',
      SenderTrackingReference: 'TRK9',
      isRequestFromVirtualAccount: false,
    });
    const body = {
      status: true,
      data: { beneficiaryAccountNumber: '0123456789', beneficiaryName: 'Ada Obi', transferCharge: '10.00', sessionID: 999 },
    };

    const result = await callEndpoint(confirmTransferRecipientEndpoint, request, fakeTransport(200, body));

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: false,
      statusCode: 200,
      data: {
        beneficiary_account_number: '0123456789',
        beneficiary_name: 'Ada Obi',
        beneficiary_code: null,
        session_id: 999,
        sender_account: null,
        transfer_charge: '10.00',
        name_enquiry_id: null,
        tracking_reference: 'TRK9',
      },
    });
  });

  it('should report a completed main-account transfer whatever the request reference type', async () => {
    const request = buildKudaRequest(ServiceType.SINGLE_FUND_TRANSFER, {
      beneficiarybankCode: '000013',
      beneficiaryAccount: '0123456789',
      beneficiaryName: 'Ada Obi',
      amount: 10_000,
      narration: 'rent',
      nameEnquirySessionID: 'SESS-1',
      senderName: 'Test Co',
    });

    const result = await callEndpoint(
      sendFundsFromMainAccountEndpoint,
      request,
      fakeTransport(200, { status: true, transactionReference: 'TXN', requestReference: 12345 })
    );

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: false,
      statusCode: 200,
      data: { transaction_reference: 'TXN', request_reference: 12345 },
    });
  });

  it('should accept numeric references on virtual-account transfers', async () => {
    const request = buildKudaRequest(ServiceType.VIRTUAL_ACCOUNT_FUND_TRANSFER, {
      trackingReference: 'TRK1',
      beneficiaryAccount: '0123456789',
      beneficiaryBankCode: '000013',
      beneficiaryName: 'Ada Obi',
      amount: 7500,
      narration: 'refund',
      nameEnquiryId: '42',
      senderName: 'Test Co',
    });

    const result = await callEndpoint(
      sendFundsFromVirtualAccountEndpoint,
      request,
      fakeTransport(200, { status: true, transactionReference: 778899, requestReference: null })
    );

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: false,
      statusCode: 200,
      data: { transaction_reference: 778899, request_reference: null },
    });
  });

  it('should accept a numeric account number on virtual-account creation', async () => {
    const request = buildKudaRequest(ServiceType.ADMIN_CREATE_VIRTUAL_ACCOUNT, {
      email: 'ada@example.com',
      phoneNumber: '08000000000',
      lastName: 'Obi',
      firstName: 'Ada',
      trackingReference: 'TRK1',
    });

    const result = await callEndpoint(
      createVirtualAccountEndpoint,
      request,
      fakeTransport(200, { status: true, data: { accountNumber: 1234567890 } })
    );

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: false,
      statusCode: 201,
      data: { account_number: 1234567890, tracking_reference: 'TRK1' },
    });
  });

  it('should pass bank entries through untouched', async () => {
    const result = await callEndpoint(
      bankListEndpoint,
      buildKudaRequest(ServiceType.BANK_LIST, {}),
      fakeTransport(200, { status: true, data: { banks: ['Kuda', { bankCode: '000013' }] } })
    );

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: false,
      statusCode: 200,
      data: { banks: ['Kuda', { bankCode: '000013' }] },
    });
  });

  it('should copy zero and string balances as sent', async () => {
    const result = await callEndpoint(
      mainAccountBalanceEndpoint,
      buildKudaRequest(ServiceType.ADMIN_RETRIEVE_MAIN_ACCOUNT_BALANCE, {}),
      fakeTransport(200, {
        status: true,
        data: { ledgerBalance: 0, availableBalance: '90.00', withdrawableBalance: 0 },
      })
    );

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: false,
      statusCode: 200,
      data: { ledger: 0, available: '90.00', withdrawable: 0 },
    });
  });

  it('should still fail a zero transaction reference', async () => {
    const body = { status: true, transactionReference: 0 };

    const result = await callEndpoint(
      fundVirtualAccountEndpoint,
      buildKudaRequest(ServiceType.FUND_VIRTUAL_ACCOUNT, { trackingReference: 'TRK1', amount: 5000, narration: 'top up' }),
      fakeTransport(200, body)
    );

    expect(result._unsafeUnwrap()).toStrictEqual({
      isError: true,
      kind: 'endpoint-response',
      statusCode: 200,
      data: { status: 200, body },
    });
  });
});
