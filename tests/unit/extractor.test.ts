import { describe, it, expect } from 'vitest';
import { extractPaymentPayload } from '../../src/services/extractor.js';
import { MINT, PAY_TO, SOLANA_MAINNET } from '../fixtures/payments.js';

const accepted = {
    scheme: 'exact',
    network: SOLANA_MAINNET,
    amount: '10000',
    asset: MINT,
    payTo: PAY_TO,
    maxTimeoutSeconds: 60,
};

const payment = (overrides: Record<string, unknown> = {}) => ({
    x402Version: 2,
    accepted,
    payload: { transaction: 'AQID' },
    ...overrides,
});

describe('extractPaymentPayload', () => {
    it.each([undefined, null, {}, { payment: null }])('treats %j as no payment', meta => {
        expect(extractPaymentPayload(meta)).toEqual({ kind: 'absent' });
    });

    it('returns the parsed claim', () => {
        const result = extractPaymentPayload({ payment: payment() });

        expect(result).toEqual({ kind: 'claim', claim: payment() });
    });

    it('keeps optional payload fields', () => {
        const result = extractPaymentPayload({
            payment: payment({ payload: { transaction: 'AQID', encoding: 'base58', validBefore: 1700000060 } }),
        });

        expect(result.kind === 'claim' ? result.claim.payload : undefined).toEqual({
            transaction: 'AQID',
            encoding: 'base58',
            validBefore: 1700000060,
        });
    });

    it('rejects non-object metadata', () => {
        expect(extractPaymentPayload('payment')).toEqual({ kind: 'malformed', reason: 'Request metadata must be an object' });
        expect(extractPaymentPayload([1])).toEqual({ kind: 'malformed', reason: 'Request metadata must be an object' });
    });

    it('rejects a non-object payment', () => {
        expect(extractPaymentPayload({ payment: 'abc' })).toEqual({
            kind: 'malformed',
            reason: 'Invalid payment payload format: expected an object',
        });
    });

    it('rejects other protocol versions', () => {
        expect(extractPaymentPayload({ payment: payment({ x402Version: 1 }) })).toEqual({
            kind: 'malformed',
            reason: 'Invalid x402 version 1. Expected version 2',
        });
    });

    it('lists schema problems', () => {
        const result = extractPaymentPayload({
            payment: payment({ accepted: { ...accepted, scheme: 'upto' }, payload: { transaction: '' } }),
        });

        expect(result).toEqual({
            kind: 'malformed',
            reason: 'Invalid payment payload format: accepted.scheme: Invalid literal value, expected "exact"; payload.transaction: transaction cannot be empty',
        });
    });

    it('rejects an amount that is not an integer string', () => {
        const result = extractPaymentPayload({ payment: payment({ accepted: { ...accepted, amount: '10.5' } }) });

        expect(result).toEqual({
            kind: 'malformed',
            reason: 'Invalid payment payload format: accepted.amount: must be a non-negative integer string',
        });
    });
});
