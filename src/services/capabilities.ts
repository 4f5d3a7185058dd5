import type { SupportedResponse } from '../domain/types.js';
import { X402_VERSION } from '../domain/types.js';
import type { NetworkRegistry } from './registry.js';

export interface CapabilityGap {
    network: string;
    problem: 'scheme_not_supported' | 'fee_payer_not_advertised';
}

/**
 * Compares the configured networks with what the facilitator advertises on
 * `/supported`. Signers may be keyed by exact network or by `namespace:*`.
 */
export function findCapabilityGaps(registry: NetworkRegistry, supported: SupportedResponse): CapabilityGap[] {
    const gaps: CapabilityGap[] = [];

    for (const policy of registry.list()) {
        const listed = supported.kinds.some(
            kind => kind.scheme === 'exact' && kind.network === policy.network && kind.x402Version === X402_VERSION
        );
        if (!listed) {
            gaps.push({ network: policy.network, problem: 'scheme_not_supported' });
            continue;
        }

        if (policy.feePayer) {
            const signers = [
                ...(supported.signers[policy.network] ?? []),
                ...(supported.signers[`${policy.chainId.namespace}:*`] ?? []),
            ];
            if (!signers.includes(policy.feePayer)) {
                gaps.push({ network: policy.network, problem: 'fee_payer_not_advertised' });
            }
        }
    }

    return gaps;
}
