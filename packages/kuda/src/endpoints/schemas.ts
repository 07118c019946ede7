import { z } from 'zod';

/**
 * Kuda marks a processed request with `status: true`. Anything else is a failure.
 */
const StatusFlagSchema = z.literal(true);

/**
 * A field the success predicate requires: a non-empty string or a non-zero number.
 */
const RequiredValueSchema = z.union([
  z.string().min(1),
  z.number().refine((value) => value !== 0, { message: 'Expected a non-zero number' }),
]);

/**
 * A leaf that is only copied into the payload. Its shape is not part of any predicate.
 */
const ExtractedValueSchema = z.unknown();

/** Copied into the payload without a shape check, but must be present to be copied. */
const PresentValueSchema = z.unknown().refine((value) => value !== undefined && value !== null, {
  message: 'Required',
});

const NonEmptyListSchema = z.array(ExtractedValueSchema).min(1);

export const BankListResponseSchema = z.object({
  status: StatusFlagSchema,
  data: z.object({
    banks: NonEmptyListSchema,
  }),
});

export const CreateVirtualAccountResponseSchema = z.object({
  status: StatusFlagSchema,
  data: z.object({
    accountNumber: RequiredValueSchema,
  }),
});

export const AccountBalanceResponseSchema = z.object({
  status: StatusFlagSchema,
  data: z.object({
    ledgerBalance: PresentValueSchema,
    availableBalance: PresentValueSchema,
    withdrawableBalance: PresentValueSchema,
  }),
});

export const VirtualAccountTransactionResponseSchema = z.object({
  status: StatusFlagSchema,
  transactionReference: RequiredValueSchema,
});

export const NameEnquiryResponseSchema = z.object({
  status: StatusFlagSchema,
  data: z.object({
    beneficiaryAccountNumber: RequiredValueSchema,
    beneficiaryName: RequiredValueSchema,
    beneficiaryBankCode: ExtractedValueSchema,
    sessionID: ExtractedValueSchema,
    senderAccountNumber: ExtractedValueSchema,
    transferCharge: ExtractedValueSchema,
    nameEnquiryID: ExtractedValueSchema,
  }),
});

export const FundTransferResponseSchema = z.object({
  status: StatusFlagSchema,
  transactionReference: RequiredValueSchema,
  requestReference: ExtractedValueSchema,
});

export const BillersResponseSchema = z.object({
  status: StatusFlagSchema,
  data: z.object({
    billers: NonEmptyListSchema,
  }),
});

export const VerifyBillCustomerResponseSchema = z.object({
  status: StatusFlagSchema,
  data: z.object({
    customerName: RequiredValueSchema,
  }),
});

export const PurchaseBillResponseSchema = z.object({
  status: StatusFlagSchema,
  data: z.object({
    reference: RequiredValueSchema,
  }),
});

export type RequiredValue = z.infer<typeof RequiredValueSchema>;

export type BankListResponse = z.infer<typeof BankListResponseSchema>;
export type CreateVirtualAccountResponse = z.infer<typeof CreateVirtualAccountResponseSchema>;
export type AccountBalanceResponse = z.infer<typeof AccountBalanceResponseSchema>;
export type VirtualAccountTransactionResponse = z.infer<typeof VirtualAccountTransactionResponseSchema>;
export type NameEnquiryResponse = z.infer<typeof NameEnquiryResponseSchema>;
export type FundTransferResponse = z.infer<typeof FundTransferResponseSchema>;
export type BillersResponse = z.infer<typeof BillersResponseSchema>;
export type VerifyBillCustomerResponse = z.infer<typeof VerifyBillCustomerResponseSchema>;
export type PurchaseBillResponse = z.infer<typeof PurchaseBillResponseSchema>;
