import type { ServiceType } from '../core/service-types.js';
import type { KudaRequest } from '../core/types.js';

import type { RequiredValue } from './schemas.js';

// Request data. Amounts are in kobo.

export type EmptyData = Record<string, never>;

export interface CreateVirtualAccountData {
  email: string;
  phoneNumber: string;
  lastName: string;
  firstName: string;
  middleName?: string | undefined;
  businessName?: string | undefined;
  /** Caller-chosen id for the virtual account; echoed back on success. */
  trackingReference: string;
}

export interface VirtualAccountBalanceData {
  trackingReference: string;
}

export interface VirtualAccountTransactionData {
  trackingReference: string;
  amount: number;
  narration: string;
  ClientFeeCharge?: number | undefined;
}

export interface NameEnquiryData {
  beneficiaryAccountNumber: string;
  beneficiaryBankCode: string;
  /** Echoed back on success to correlate the later transfer and its webhook. */
  SenderTrackingReference: string;
  isRequestFromVirtualAccount: boolean;
}

export interface MainAccountTransferData {
  ClientAccountNumber?: string | undefined;
  beneficiarybankCode: string;
  beneficiaryAccount: string;
  beneficiaryName: string;
  amount: number;
  narration: string;
  nameEnquirySessionID: string;
  senderName: string;
  ClientFeeCharge?: number | undefined;
}

export interface VirtualAccountTransferData {
  trackingReference: string;
  beneficiaryAccount: string;
  beneficiaryBankCode: string;
  beneficiaryName: string;
  amount: number;
  narration: string;
  nameEnquiryId: string;
  senderName: string;
  ClientFeeCharge?: number | undefined;
}

export interface BillersData {
  /** e.g. `airtime`, `betting`, `internet`, `electricity`, `cableTv` */
  BillTypeName: string;
}

export interface VerifyBillCustomerData {
  KudaBillItemIdentifier: string;
  CustomerIdentification: string;
}

export interface PurchaseBillData {
  trackingReference: string;
  Amount: number;
  BillItemIdentifier: string;
  PhoneNumber: string;
  CustomerIdentifier: string;
}

export type BankListRequest = KudaRequest<typeof ServiceType.BANK_LIST, EmptyData>;
export type CreateVirtualAccountRequest = KudaRequest<
  typeof ServiceType.ADMIN_CREATE_VIRTUAL_ACCOUNT,
  CreateVirtualAccountData
>;
export type VirtualAccountBalanceRequest = KudaRequest<
  typeof ServiceType.RETRIEVE_VIRTUAL_ACCOUNT_BALANCE,
  VirtualAccountBalanceData
>;
export type MainAccountBalanceRequest = KudaRequest<typeof ServiceType.ADMIN_RETRIEVE_MAIN_ACCOUNT_BALANCE, EmptyData>;
export type FundVirtualAccountRequest = KudaRequest<
  typeof ServiceType.FUND_VIRTUAL_ACCOUNT,
  VirtualAccountTransactionData
>;
export type WithdrawFromVirtualAccountRequest = KudaRequest<
  typeof ServiceType.WITHDRAW_VIRTUAL_ACCOUNT,
  VirtualAccountTransactionData
>;
export type ConfirmTransferRecipientRequest = KudaRequest<typeof ServiceType.NAME_ENQUIRY, NameEnquiryData>;
export type SendFundsFromMainAccountRequest = KudaRequest<
  typeof ServiceType.SINGLE_FUND_TRANSFER,
  MainAccountTransferData
>;
export type SendFundsFromVirtualAccountRequest = KudaRequest<
  typeof ServiceType.VIRTUAL_ACCOUNT_FUND_TRANSFER,
  VirtualAccountTransferData
>;
export type BillersRequest = KudaRequest<typeof ServiceType.GET_BILLERS_BY_TYPE, BillersData>;
export type VerifyBillCustomerRequest = KudaRequest<typeof ServiceType.VERIFY_BILL_CUSTOMER, VerifyBillCustomerData>;
export type PurchaseBillRequest = KudaRequest<typeof ServiceType.PURCHASE_BILL, PurchaseBillData>;

// Payloads: stable snake_case keys, independent of the remote field names.
// Leaves the success predicate does not check keep whatever type Kuda sent.

export interface BankListPayload {
  banks: unknown[];
}

export interface CreateVirtualAccountPayload {
  account_number: RequiredValue;
  tracking_reference: string;
}

export interface AccountBalancePayload {
  ledger: unknown;
  available: unknown;
  withdrawable: unknown;
}

export interface TransactionReferencePayload {
  reference: RequiredValue;
}

export interface TransferRecipientPayload {
  beneficiary_account_number: RequiredValue;
  beneficiary_name: RequiredValue;
  /** `null` when the reply omits the field; likewise for the other optional leaves. */
  beneficiary_code: unknown;
  session_id: unknown;
  sender_account: unknown;
  transfer_charge: unknown;
  name_enquiry_id: unknown;
  tracking_reference: string;
}

export interface FundTransferPayload {
  transaction_reference: RequiredValue;
  request_reference: unknown;
}

export interface BillersPayload {
  billers: unknown[];
}

export interface BillCustomerPayload {
  customer_name: RequiredValue;
}
