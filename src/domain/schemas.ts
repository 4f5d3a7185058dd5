import { z } from 'zod';
import { isChainId } from '../utils/caip.js';

export const U64_MAX = 18446744073709551615n;

export const MIN_TIMEOUT_SECONDS = 1;
export const MAX_TIMEOUT_SECONDS = 300;

const u64String = z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer string')
    .refine(value => !/^\d+$/.test(value) || BigInt(value) <= U64_MAX, 'must fit in an unsigned 64-bit integer');

const caip2 = z.string().refine(isChainId, value => ({
    message: `'${value}' is not a valid CAIP-2 network identifier`,
}));

function isHttpsUrl(value: string): boolean {
    try {
        return new URL(value).protocol === 'https:';
    } catch {
        return false;
    }
}

const timeoutSeconds = z.number().int().min(MIN_TIMEOUT_SECONDS).max(MAX_TIMEOUT_SECONDS);

const gasPrice = z
    .union([z.number().int().nonnegative(), u64String])
    .transform(value => BigInt(value));

// ---------------------------------------------------------------------------
// Payment settings file
// ---------------------------------------------------------------------------

export const AssetSettingsSchema = z.object({
    address: z.string().min(1, 'asset address cannot be empty'),
    name: z.string().min(1, 'asset name cannot be empty'),
    decimals: z.number().int().min(0).max(255),
});

export const NetworkSettingsSchema = z
    .object({
        network: caip2,
        payTo: z.string().min(1, 'payTo address is required'),
        feePayer: z.string().min(1).optional(),
        minComputeUnitPrice: gasPrice,
        maxComputeUnitPrice: gasPrice,
        assets: z.array(AssetSettingsSchema).min(1, 'at least one asset must be configured'),
    })
    .refine(network => network.minComputeUnitPrice <= network.maxComputeUnitPrice, {
        message: 'minComputeUnitPrice must be <= maxComputeUnitPrice',
        path: ['minComputeUnitPrice'],
    });

export const ResourceSettingsSchema = z.object({
    price: u64String,
    description: z.string().optional(),
    maxTimeoutSeconds: timeoutSeconds.optional(),
});

export const PaymentSettingsSchema = z.object({
    networks: z.array(NetworkSettingsSchema).min(1, 'at least one network must be configured'),
    resources: z.record(ResourceSettingsSchema).default({}),
    defaultMaxTimeoutSeconds: timeoutSeconds.default(60),
});

export type AssetSettings = z.infer<typeof AssetSettingsSchema>;
export type NetworkSettings = z.infer<typeof NetworkSettingsSchema>;
export type ResourceSettings = z.infer<typeof ResourceSettingsSchema>;
export type PaymentSettings = z.infer<typeof PaymentSettingsSchema>;

export const FacilitatorSettingsSchema = z.object({
    baseUrl: z
        .string()
        .url('facilitator base URL must be a valid URL')
        .refine(isHttpsUrl, 'facilitator base URL must use https'),
    timeoutSeconds: timeoutSeconds,
    maxAttempts: z.number().int().min(1).max(10),
});

export type FacilitatorSettings = z.infer<typeof FacilitatorSettingsSchema>;

// ---------------------------------------------------------------------------
// x402 payment payload (request `_meta.payment`)
// ---------------------------------------------------------------------------

export const PaymentRequirementsSchema = z.object({
    scheme: z.literal('exact'),
    network: caip2,
    amount: u64String,
    asset: z.string().min(1),
    payTo: z.string().min(1),
    maxTimeoutSeconds: timeoutSeconds,
    extra: z.record(z.unknown()).optional(),
});

export const ResourceInfoSchema = z.object({
    url: z.string(),
    description: z.string().optional(),
    mimeType: z.string().optional(),
});

export const ExactSvmPayloadSchema = z.object({
    transaction: z.string().min(1, 'transaction cannot be empty'),
    encoding: z.enum(['base64', 'base58']).optional(),
    validAfter: z.number().int().nonnegative().optional(),
    validBefore: z.number().int().nonnegative().optional(),
});

export const PaymentPayloadSchema = z.object({
    x402Version: z.number().int(),
    resource: ResourceInfoSchema.optional(),
    accepted: PaymentRequirementsSchema,
    payload: ExactSvmPayloadSchema,
});

// ---------------------------------------------------------------------------
// Facilitator responses
// ---------------------------------------------------------------------------

export const VerifyResponseSchema = z
    .object({
        isValid: z.boolean(),
        payer: z.string().optional(),
        invalidReason: z.string().optional(),
        reason: z.string().optional(),
    })
    .transform(({ isValid, payer, invalidReason, reason }) => ({
        isValid,
        payer,
        invalidReason: invalidReason ?? reason,
    }));

export const SettleResponseSchema = z.object({
    success: z.boolean(),
    transaction: z.string().optional(),
    network: z.string().optional(),
    payer: z.string().optional(),
    errorReason: z.string().optional(),
});

export const SupportedResponseSchema = z.object({
    kinds: z.array(
        z.object({
            x402Version: z.number().int(),
            scheme: z.string(),
            network: z.string(),
            extra: z.record(z.unknown()).optional(),
        })
    ),
    extensions: z.array(z.string()).default([]),
    signers: z.record(z.array(z.string())).default({}),
});

// ---------------------------------------------------------------------------
// JSON-RPC transport
// ---------------------------------------------------------------------------

export const JsonRpcRequestSchema = z.object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    method: z.string().min(1),
    params: z.unknown().optional(),
});

export const ToolCallParamsSchema = z.object({
    name: z.string().min(1),
    arguments: z.record(z.unknown()).default({}),
    _meta: z.record(z.unknown()).optional(),
});

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
