import { defineEndpoint } from '../core/endpoint.js';
import { ServiceType } from '../core/service-types.js';

import {
  BillersResponseSchema,
  PurchaseBillResponseSchema,
  VerifyBillCustomerResponseSchema,
  type BillersResponse,
  type PurchaseBillResponse,
  type VerifyBillCustomerResponse,
} from './schemas.js';
import type {
  BillCustomerPayload,
  BillersPayload,
  BillersRequest,
  PurchaseBillRequest,
  TransactionReferencePayload,
  VerifyBillCustomerRequest,
} from './types.js';

export const billersEndpoint = defineEndpoint({
  name: 'billers',
  serviceType: ServiceType.GET_BILLERS_BY_TYPE,
  successStatus: 200,
  responseSchema: BillersResponseSchema,
  extract: (response: BillersResponse, _request: BillersRequest): BillersPayload => ({
    billers: response.data.billers,
  }),
});

export const verifyBillCustomerEndpoint = defineEndpoint({
  name: 'verifyBillCustomer',
  serviceType: ServiceType.VERIFY_BILL_CUSTOMER,
  successStatus: 200,
  responseSchema: VerifyBillCustomerResponseSchema,
  extract: (response: VerifyBillCustomerResponse, _request: VerifyBillCustomerRequest): BillCustomerPayload => ({
    customer_name: response.data.customerName,
  }),
});

export const purchaseBillEndpoint = defineEndpoint({
  name: 'purchaseBill',
  serviceType: ServiceType.PURCHASE_BILL,
  successStatus: 200,
  responseSchema: PurchaseBillResponseSchema,
  extract: (response: PurchaseBillResponse, _request: PurchaseBillRequest): TransactionReferencePayload => ({
    reference: response.data.reference,
  }),
});
