/**
 * Operation selectors understood by the Kuda Open API. Every request is POSTed to the
 * same URL; the `ServiceType` field of the envelope picks the operation.
 */
export const ServiceType = {
  BANK_LIST: 'BANK_LIST',
  ADMIN_CREATE_VIRTUAL_ACCOUNT: 'ADMIN_CREATE_VIRTUAL_ACCOUNT',
  RETRIEVE_VIRTUAL_ACCOUNT_BALANCE: 'RETRIEVE_VIRTUAL_ACCOUNT_BALANCE',
  ADMIN_RETRIEVE_MAIN_ACCOUNT_BALANCE: 'ADMIN_RETRIEVE_MAIN_ACCOUNT_BALANCE',
  FUND_VIRTUAL_ACCOUNT: 'FUND_VIRTUAL_ACCOUNT',
  WITHDRAW_VIRTUAL_ACCOUNT: 'WITHDRAW_VIRTUAL_ACCOUNT',
  NAME_ENQUIRY: 'NAME_ENQUIRY',
  SINGLE_FUND_TRANSFER: 'SINGLE_FUND_TRANSFER',
  VIRTUAL_ACCOUNT_FUND_TRANSFER: 'VIRTUAL_ACCOUNT_FUND_TRANSFER',
  GET_BILLERS_BY_TYPE: 'GET_BILLERS_BY_TYPE',
  VERIFY_BILL_CUSTOMER: 'VERIFY_BILL_CUSTOMER',
  PURCHASE_BILL: 'PURCHASE_BILL',
} as const;

export type ServiceTypeName = (typeof ServiceType)[keyof typeof ServiceType];

export function isServiceType(value: string): value is ServiceTypeName {
  return Object.values<string>(ServiceType).includes(value);
}
