import { PublicKey } from '@solana/web3.js';
import type { Asset, ChainId, NetworkPolicy } from '../domain/network.js';
import type { NetworkSettings } from '../domain/schemas.js';
import { ConfigurationError, describeError } from '../domain/errors.js';
import { formatChainId, validateChainId } from '../utils/caip.js';

function isSolanaAddress(value: string): boolean {
    try {
        return new PublicKey(value).toBase58() === value;
    } catch {
        return false;
    }
}

/**
 * Read-only table of the networks this server accepts payments on.
 * Built once at start-up; safe to share across concurrent requests.
 */
export class NetworkRegistry {
    private readonly policies: ReadonlyMap<string, NetworkPolicy>;

    private constructor(policies: Map<string, NetworkPolicy>) {
        this.policies = policies;
    }

    static fromSettings(networks: NetworkSettings[]): NetworkRegistry {
        const issues: string[] = [];
        const policies = new Map<string, NetworkPolicy>();

        for (const settings of networks) {
            let chainId: ChainId;
            try {
                chainId = validateChainId(settings.network);
            } catch (error) {
                issues.push(describeError(error));
                continue;
            }

            const network = formatChainId(chainId);
            if (policies.has(network)) {
                issues.push(`Network '${network}' is configured more than once`);
                continue;
            }

            const assets = new Map<string, Asset>();
            for (const asset of settings.assets) {
                if (assets.has(asset.address)) {
                    issues.push(`Network '${network}': asset '${asset.address}' is configured more than once`);
                    continue;
                }
                assets.set(asset.address, Object.freeze({ ...asset }));
            }

            if (chainId.namespace === 'solana') {
                const addresses = [settings.payTo, ...assets.keys()];
                if (settings.feePayer) addresses.push(settings.feePayer);
                for (const address of addresses) {
                    if (!isSolanaAddress(address)) {
                        issues.push(`Network '${network}': '${address}' is not a valid Solana address`);
                    }
                }
            }

            policies.set(
                network,
                Object.freeze({
                    chainId,
                    network,
                    assets,
                    payTo: settings.payTo,
                    feePayer: settings.feePayer,
                    minGasPrice: settings.minComputeUnitPrice,
                    maxGasPrice: settings.maxComputeUnitPrice,
                })
            );
        }

        if (issues.length > 0) {
            throw new ConfigurationError(issues);
        }
        return new NetworkRegistry(policies);
    }

    lookupPolicy(chainId: ChainId): NetworkPolicy | undefined {
        return this.policies.get(formatChainId(chainId));
    }

    chainIds(): ChainId[] {
        return Array.from(this.policies.values(), policy => policy.chainId);
    }

    list(): NetworkPolicy[] {
        return Array.from(this.policies.values());
    }
}
