import { getKudaRequestUrl, getRequestTimeoutMs } from '@kuda-client/env';
import {
  HttpClient,
  type HttpClientHooks,
  type HttpEffects,
  type InstrumentationCollector,
  type TransportError,
} from '@kuda-client/http';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import type { HeaderProvider } from './auth/header-provider.js';
import type { EndpointDefinition } from './core/endpoint.js';
import { RequestNormalizer } from './core/normalizer.js';
import { wrapError } from './core/type-guards.js';
import type { KudaRequest, KudaResponse } from './core/types.js';
import {
  bankListEndpoint,
  createVirtualAccountEndpoint,
  fundVirtualAccountEndpoint,
  mainAccountBalanceEndpoint,
  virtualAccountBalanceEndpoint,
  withdrawFromVirtualAccountEndpoint,
} from './endpoints/accounts.js';
import { billersEndpoint, purchaseBillEndpoint, verifyBillCustomerEndpoint } from './endpoints/bills.js';
import {
  confirmTransferRecipientEndpoint,
  sendFundsFromMainAccountEndpoint,
  sendFundsFromVirtualAccountEndpoint,
} from './endpoints/transfers.js';
import type {
  AccountBalancePayload,
  BankListPayload,
  BankListRequest,
  BillCustomerPayload,
  BillersPayload,
  BillersRequest,
  ConfirmTransferRecipientRequest,
  CreateVirtualAccountPayload,
  CreateVirtualAccountRequest,
  FundTransferPayload,
  FundVirtualAccountRequest,
  MainAccountBalanceRequest,
  PurchaseBillRequest,
  SendFundsFromMainAccountRequest,
  SendFundsFromVirtualAccountRequest,
  TransactionReferencePayload,
  TransferRecipientPayload,
  VerifyBillCustomerRequest,
  VirtualAccountBalanceRequest,
  WithdrawFromVirtualAccountRequest,
} from './endpoints/types.js';

export type KudaCallResult<TPayload> = Promise<Result<KudaResponse<TPayload>, TransportError>>;

export interface KudaClient {
  bankList(request: BankListRequest): KudaCallResult<BankListPayload>;
  createVirtualAccount(request: CreateVirtualAccountRequest): KudaCallResult<CreateVirtualAccountPayload>;
  virtualAccountBalance(request: VirtualAccountBalanceRequest): KudaCallResult<AccountBalancePayload>;
  mainAccountBalance(request: MainAccountBalanceRequest): KudaCallResult<AccountBalancePayload>;
  fundVirtualAccount(request: FundVirtualAccountRequest): KudaCallResult<TransactionReferencePayload>;
  withdrawFromVirtualAccount(request: WithdrawFromVirtualAccountRequest): KudaCallResult<TransactionReferencePayload>;
  confirmTransferRecipient(request: ConfirmTransferRecipientRequest): KudaCallResult<TransferRecipientPayload>;
  sendFundsFromMainAccount(request: SendFundsFromMainAccountRequest): KudaCallResult<FundTransferPayload>;
  sendFundsFromVirtualAccount(request: SendFundsFromVirtualAccountRequest): KudaCallResult<FundTransferPayload>;
  billers(request: BillersRequest): KudaCallResult<BillersPayload>;
  verifyBillCustomer(request: VerifyBillCustomerRequest): KudaCallResult<BillCustomerPayload>;
  purchaseBill(request: PurchaseBillRequest): KudaCallResult<TransactionReferencePayload>;
  /** Releases pooled connections. Idempotent. */
  close(): Promise<void>;
}

export interface KudaClientOptions {
  /** The single Kuda Open API URL every operation is POSTed to. */
  requestUrl: string;
  headerProvider: HeaderProvider;
  timeoutMs?: number | undefined;
  hooks?: HttpClientHooks | undefined;
  instrumentation?: InstrumentationCollector | undefined;
  /** Overrides for the transport's side effects (fetch, clock, log sink). */
  effects?: Partial<HttpEffects> | undefined;
}

const KudaClientOptionsSchema = z.object({
  requestUrl: z.string().url('requestUrl must be an absolute URL'),
  timeoutMs: z.number().int().positive('timeoutMs must be a positive integer').optional(),
});

export function createKudaClient(options: KudaClientOptions): Result<KudaClient, Error> {
  const validation = KudaClientOptionsSchema.safeParse({
    requestUrl: options.requestUrl,
    timeoutMs: options.timeoutMs,
  });
  if (!validation.success) {
    const details = validation.error.issues.map((issue) => issue.message).join('; ');
    return err(new Error(`Invalid Kuda client options: ${details}`));
  }

  const http = new HttpClient(
    {
      baseUrl: validation.data.requestUrl,
      hooks: options.hooks,
      instrumentation: options.instrumentation,
      providerName: 'kuda',
      service: 'banking',
      timeout: validation.data.timeoutMs,
    },
    options.effects
  );
  const normalizer = new RequestNormalizer(http);
  const { headerProvider } = options;

  const call = async <TRequest extends KudaRequest, TResponse, TPayload>(
    definition: EndpointDefinition<TRequest, TResponse, TPayload>,
    request: TRequest
  ): KudaCallResult<TPayload> => normalizer.call(definition, request, await headerProvider.generateHeaders());

  const client: KudaClient = {
    bankList: (request) => call(bankListEndpoint, request),
    createVirtualAccount: (request) => call(createVirtualAccountEndpoint, request),
    virtualAccountBalance: (request) => call(virtualAccountBalanceEndpoint, request),
    mainAccountBalance: (request) => call(mainAccountBalanceEndpoint, request),
    fundVirtualAccount: (request) => call(fundVirtualAccountEndpoint, request),
    withdrawFromVirtualAccount: (request) => call(withdrawFromVirtualAccountEndpoint, request),
    confirmTransferRecipient: (request) => call(confirmTransferRecipientEndpoint, request),
    sendFundsFromMainAccount: (request) => call(sendFundsFromMainAccountEndpoint, request),
    sendFundsFromVirtualAccount: (request) => call(sendFundsFromVirtualAccountEndpoint, request),
    billers: (request) => call(billersEndpoint, request),
    verifyBillCustomer: (request) => call(verifyBillCustomerEndpoint, request),
    purchaseBill: (request) => call(purchaseBillEndpoint, request),
    close: () => http.close(),
  };

  return ok(client);
}

/**
 * Build a client from `KUDA_REQUEST_URL` and `KUDA_TIMEOUT_MS`.
 */
export function createKudaClientFromEnv(
  headerProvider: HeaderProvider,
  overrides: Omit<KudaClientOptions, 'requestUrl' | 'headerProvider' | 'timeoutMs'> = {}
): Result<KudaClient, Error> {
  let requestUrl: string;
  let timeoutMs: number;
  try {
    requestUrl = getKudaRequestUrl();
    timeoutMs = getRequestTimeoutMs();
  } catch (error) {
    return wrapError(error, 'Failed to read Kuda client configuration');
  }

  return createKudaClient({ ...overrides, requestUrl, headerProvider, timeoutMs });
}
