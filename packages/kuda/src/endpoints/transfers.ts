import { defineEndpoint } from '../core/endpoint.js';
import { ServiceType } from '../core/service-types.js';

import {
  FundTransferResponseSchema,
  NameEnquiryResponseSchema,
  type FundTransferResponse,
  type NameEnquiryResponse,
} from './schemas.js';
import type {
  ConfirmTransferRecipientRequest,
  FundTransferPayload,
  SendFundsFromMainAccountRequest,
  SendFundsFromVirtualAccountRequest,
  TransferRecipientPayload,
} from './types.js';

function toFundTransferPayload(response: FundTransferResponse): FundTransferPayload {
  return {
    transaction_reference: response.transactionReference,
    request_reference: response.requestReference ?? null,
  };
}

/**
 * Name enquiry. The session id and enquiry id it returns are required by the transfer that follows.
 */
export const confirmTransferRecipientEndpoint = defineEndpoint({
  name: 'confirmTransferRecipient',
  serviceType: ServiceType.NAME_ENQUIRY,
  successStatus: 200,
  responseSchema: NameEnquiryResponseSchema,
  extract: (response: NameEnquiryResponse, request: ConfirmTransferRecipientRequest): TransferRecipientPayload => ({
    beneficiary_account_number: response.data.beneficiaryAccountNumber,
    beneficiary_name: response.data.beneficiaryName,
    beneficiary_code: response.data.beneficiaryBankCode ?? null,
    session_id: response.data.sessionID ?? null,
    sender_account: response.data.senderAccountNumber ?? null,
    transfer_charge: response.data.transferCharge ?? null,
    name_enquiry_id: response.data.nameEnquiryID ?? null,
    tracking_reference: request.Data.SenderTrackingReference,
  }),
});

export const sendFundsFromMainAccountEndpoint = defineEndpoint({
  name: 'sendFundsFromMainAccount',
  serviceType: ServiceType.SINGLE_FUND_TRANSFER,
  successStatus: 200,
  responseSchema: FundTransferResponseSchema,
  extract: (response: FundTransferResponse, _request: SendFundsFromMainAccountRequest): FundTransferPayload =>
    toFundTransferPayload(response),
});

export const sendFundsFromVirtualAccountEndpoint = defineEndpoint({
  name: 'sendFundsFromVirtualAccount',
  serviceType: ServiceType.VIRTUAL_ACCOUNT_FUND_TRANSFER,
  successStatus: 200,
  responseSchema: FundTransferResponseSchema,
  extract: (response: FundTransferResponse, _request: SendFundsFromVirtualAccountRequest): FundTransferPayload =>
    toFundTransferPayload(response),
});
