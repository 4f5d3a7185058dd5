export const X402_VERSION = 2;

export type PaymentScheme = 'exact';

export type TransactionEncoding = 'base64' | 'base58';

export interface ResourceInfo {
    url: string;
    description?: string;
    mimeType?: string;
}

export interface PaymentRequirements {
    scheme: PaymentScheme;
    network: string; // CAIP-2, e.g. solana:5eykt4UsFv8P8NJdTREpY1vzqKqZKvdp
    amount: string; // u64 smallest units as decimal string
    asset: string; // Mint address
    payTo: string; // Recipient wallet (owner of the destination token account)
    maxTimeoutSeconds: number;
    extra?: Record<string, unknown>;
}

export interface PaymentRequired {
    x402Version: number;
    error?: string;
    resource: ResourceInfo;
    accepts: PaymentRequirements[];
}

export interface ExactSvmPayload {
    transaction: string;
    encoding?: TransactionEncoding;
    validAfter?: number; // Unix seconds
    validBefore?: number; // Unix seconds
}

export interface PaymentPayload {
    x402Version: number;
    resource?: ResourceInfo;
    accepted: PaymentRequirements;
    payload: ExactSvmPayload;
}

export interface VerifyResponse {
    isValid: boolean;
    payer?: string;
    invalidReason?: string;
}

export interface SettleResponse {
    success: boolean;
    transaction?: string;
    network?: string;
    payer?: string;
    errorReason?: string;
}

export interface SupportedKind {
    x402Version: number;
    scheme: string;
    network: string;
    extra?: Record<string, unknown>;
}

export interface SupportedResponse {
    kinds: SupportedKind[];
    extensions: string[];
    signers: Record<string, string[]>;
}

export interface PaymentReceipt {
    transaction: string;
    network: string;
    payer?: string;
}
