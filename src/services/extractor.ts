import { PaymentPayloadSchema, formatIssues } from '../domain/schemas.js';
import { X402_VERSION, type PaymentPayload } from '../domain/types.js';

export type ExtractionResult =
    | { kind: 'absent' }
    | { kind: 'malformed'; reason: string }
    | { kind: 'claim'; claim: PaymentPayload };

const PAYMENT_META_KEY = 'payment';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the payment claim from a request's `_meta` object.
 *
 * Only the shape and protocol version are checked here; the network and the
 * transaction bytes are left to the structural validator.
 */
export function extractPaymentPayload(meta: unknown): ExtractionResult {
    if (meta === undefined || meta === null) {
        return { kind: 'absent' };
    }
    if (!isRecord(meta)) {
        return { kind: 'malformed', reason: 'Request metadata must be an object' };
    }

    const payment = meta[PAYMENT_META_KEY];
    if (payment === undefined || payment === null) {
        return { kind: 'absent' };
    }
    if (!isRecord(payment)) {
        return { kind: 'malformed', reason: 'Invalid payment payload format: expected an object' };
    }

    if (payment.x402Version !== X402_VERSION) {
        return {
            kind: 'malformed',
            reason: `Invalid x402 version ${String(payment.x402Version)}. Expected version ${X402_VERSION}`,
        };
    }

    const parsed = PaymentPayloadSchema.safeParse(payment);
    if (!parsed.success) {
        return {
            kind: 'malformed',
            reason: `Invalid payment payload format: ${formatIssues(parsed.error).join('; ')}`,
        };
    }

    return { kind: 'claim', claim: parsed.data };
}
