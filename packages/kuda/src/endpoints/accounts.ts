import { defineEndpoint } from '../core/endpoint.js';
import { ServiceType } from '../core/service-types.js';

import {
  AccountBalanceResponseSchema,
  BankListResponseSchema,
  CreateVirtualAccountResponseSchema,
  VirtualAccountTransactionResponseSchema,
  type AccountBalanceResponse,
  type BankListResponse,
  type CreateVirtualAccountResponse,
  type VirtualAccountTransactionResponse,
} from './schemas.js';
import type {
  AccountBalancePayload,
  BankListPayload,
  BankListRequest,
  CreateVirtualAccountPayload,
  CreateVirtualAccountRequest,
  FundVirtualAccountRequest,
  MainAccountBalanceRequest,
  TransactionReferencePayload,
  VirtualAccountBalanceRequest,
  WithdrawFromVirtualAccountRequest,
} from './types.js';

function toBalancePayload(response: AccountBalanceResponse): AccountBalancePayload {
  return {
    ledger: response.data.ledgerBalance,
    available: response.data.availableBalance,
    withdrawable: response.data.withdrawableBalance,
  };
}

export const bankListEndpoint = defineEndpoint({
  name: 'bankList',
  serviceType: ServiceType.BANK_LIST,
  successStatus: 200,
  responseSchema: BankListResponseSchema,
  extract: (response: BankListResponse, _request: BankListRequest): BankListPayload => ({
    banks: response.data.banks,
  }),
});

/**
 * Kuda answers 200 on creation; callers see 201.
 */
export const createVirtualAccountEndpoint = defineEndpoint({
  name: 'createVirtualAccount',
  serviceType: ServiceType.ADMIN_CREATE_VIRTUAL_ACCOUNT,
  successStatus: 201,
  responseSchema: CreateVirtualAccountResponseSchema,
  extract: (
    response: CreateVirtualAccountResponse,
    request: CreateVirtualAccountRequest
  ): CreateVirtualAccountPayload => ({
    account_number: response.data.accountNumber,
    tracking_reference: request.Data.trackingReference,
  }),
});

export const virtualAccountBalanceEndpoint = defineEndpoint({
  name: 'virtualAccountBalance',
  serviceType: ServiceType.RETRIEVE_VIRTUAL_ACCOUNT_BALANCE,
  successStatus: 200,
  responseSchema: AccountBalanceResponseSchema,
  extract: (response: AccountBalanceResponse, _request: VirtualAccountBalanceRequest): AccountBalancePayload =>
    toBalancePayload(response),
});

export const mainAccountBalanceEndpoint = defineEndpoint({
  name: 'mainAccountBalance',
  serviceType: ServiceType.ADMIN_RETRIEVE_MAIN_ACCOUNT_BALANCE,
  successStatus: 200,
  responseSchema: AccountBalanceResponseSchema,
  extract: (response: AccountBalanceResponse, _request: MainAccountBalanceRequest): AccountBalancePayload =>
    toBalancePayload(response),
});

export const fundVirtualAccountEndpoint = defineEndpoint({
  name: 'fundVirtualAccount',
  serviceType: ServiceType.FUND_VIRTUAL_ACCOUNT,
  successStatus: 200,
  responseSchema: VirtualAccountTransactionResponseSchema,
  extract: (
    response: VirtualAccountTransactionResponse,
    _request: FundVirtualAccountRequest
  ): TransactionReferencePayload => ({
    reference: response.transactionReference,
  }),
});

export const withdrawFromVirtualAccountEndpoint = defineEndpoint({
  name: 'withdrawFromVirtualAccount',
  serviceType: ServiceType.WITHDRAW_VIRTUAL_ACCOUNT,
  successStatus: 200,
  responseSchema: VirtualAccountTransactionResponseSchema,
  extract: (
    response: VirtualAccountTransactionResponse,
    _request: WithdrawFromVirtualAccountRequest
  ): TransactionReferencePayload => ({
    reference: response.transactionReference,
  }),
});
