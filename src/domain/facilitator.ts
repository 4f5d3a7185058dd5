import type { PaymentPayload, PaymentRequirements, SettleResponse, SupportedResponse, VerifyResponse } from './types.js';

export interface IFacilitatorClient {
    verify(payload: PaymentPayload, requirements: PaymentRequirements, traceId: string): Promise<VerifyResponse>;
    settle(payload: PaymentPayload, requirements: PaymentRequirements, traceId: string): Promise<SettleResponse>;
    supported(traceId: string): Promise<SupportedResponse>;
}
