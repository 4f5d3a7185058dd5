import { describe, it, expect } from 'vitest';
import { NotConfiguredError, StructuralError } from '../../src/domain/errors.js';
import { parsePaymentSettings } from '../../src/services/settings.js';
import { validateChainId } from '../../src/utils/caip.js';
import {
    MINT,
    OTHER_MINT,
    PAY_TO,
    SOLANA_DEVNET,
    SOLANA_MAINNET,
    facilitatorKey,
    paymentFixture,
    rawNetwork,
    rawSettings,
} from '../fixtures/payments.js';

const twoNetworks = () =>
    paymentFixture(
        parsePaymentSettings(
            rawSettings({
                networks: [
                    {
                        network: SOLANA_MAINNET,
                        payTo: PAY_TO,
                        minComputeUnitPrice: 1000,
                        maxComputeUnitPrice: 50000,
                        assets: [
                            { address: MINT, name: 'USDC', decimals: 6 },
                            { address: OTHER_MINT, name: 'PYUSD', decimals: 6 },
                        ],
                    },
                    {
                        network: SOLANA_DEVNET,
                        payTo: PAY_TO,
                        minComputeUnitPrice: 0,
                        maxComputeUnitPrice: 100,
                        assets: [{ address: MINT, name: 'USDC', decimals: 6 }],
                    },
                ],
                resources: {
                    premium: { price: '10000', description: 'Premium tool' },
                    slow: { price: '1', maxTimeoutSeconds: 300 },
                },
            })
        )
    );

describe('RequirementBuilder', () => {
    it('builds one exact requirement per accepted asset', () => {
        const { requirements } = twoNetworks();

        expect(requirements.build('premium', SOLANA_MAINNET)).toEqual([
            { scheme: 'exact', network: SOLANA_MAINNET, amount: '10000', asset: MINT, payTo: PAY_TO, maxTimeoutSeconds: 60 },
            { scheme: 'exact', network: SOLANA_MAINNET, amount: '10000', asset: OTHER_MINT, payTo: PAY_TO, maxTimeoutSeconds: 60 },
        ]);
    });

    it('uses the per-resource timeout when set', () => {
        const { requirements } = twoNetworks();

        expect(requirements.build('slow', validateChainId(SOLANA_DEVNET))[0].maxTimeoutSeconds).toBe(300);
    });

    it('advertises the facilitator fee payer', () => {
        const feePayer = facilitatorKey.publicKey.toBase58();
        const { requirements } = paymentFixture(parsePaymentSettings(rawSettings({ networks: [rawNetwork({ feePayer })] })));

        expect(requirements.build('premium', SOLANA_MAINNET)[0].extra).toEqual({ feePayer });
    });

    it('refuses unpriced resources and unregistered networks', () => {
        const { requirements } = twoNetworks();

        expect(() => requirements.build('unknown', SOLANA_MAINNET)).toThrow(NotConfiguredError);
        expect(() => requirements.build('unknown', SOLANA_MAINNET)).toThrow("Resource 'unknown' has no configured price");
        expect(() => requirements.build('premium', 'solana:testnet')).toThrow("Network 'solana:testnet' is not configured");
        expect(() => requirements.build('premium', 'Solana:abc')).toThrow(StructuralError);
    });

    it('builds the payment required document across all networks', () => {
        const { requirements } = twoNetworks();
        const required = requirements.buildPaymentRequired('premium');

        expect(required.x402Version).toBe(2);
        expect(required.error).toBe("Payment required to call tool 'premium'");
        expect(required.resource).toEqual({ url: 'mcp://tool/premium', description: 'Premium tool', mimeType: 'application/json' });
        expect(required.accepts.map(r => `${r.network}/${r.asset}`)).toEqual([
            `${SOLANA_MAINNET}/${MINT}`,
            `${SOLANA_MAINNET}/${OTHER_MINT}`,
            `${SOLANA_DEVNET}/${MINT}`,
        ]);
    });

    it('only emits registered network and asset pairs', () => {
        const { registry, requirements } = twoNetworks();

        for (const requirement of requirements.buildPaymentRequired('premium').accepts) {
            expect(registry.lookupPolicy(validateChainId(requirement.network))?.assets.get(requirement.asset)).toBeDefined();
        }
        expect(requirements.buildPaymentRequired('premium').accepts.some(r => r.network === SOLANA_DEVNET && r.asset === OTHER_MINT)).toBe(false);
    });

    it('reports protection and price', () => {
        const { requirements } = twoNetworks();

        expect(requirements.isProtected('premium')).toBe(true);
        expect(requirements.isProtected('ping')).toBe(false);
        expect(requirements.priceOf('slow')).toBe('1');
        expect(requirements.describeResource('slow').description).toBe('MCP tool call: slow');
    });
});
