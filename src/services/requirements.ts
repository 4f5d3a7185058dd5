import type { ChainId } from '../domain/network.js';
import type { ResourceSettings } from '../domain/schemas.js';
import { NotConfiguredError } from '../domain/errors.js';
import { X402_VERSION, type PaymentRequired, type PaymentRequirements, type ResourceInfo } from '../domain/types.js';
import { validateChainId } from '../utils/caip.js';
import type { NetworkRegistry } from './registry.js';

export interface RequirementBuilderOptions {
    resources: Record<string, ResourceSettings>;
    defaultMaxTimeoutSeconds: number;
}

export class RequirementBuilder {
    private readonly resources: ReadonlyMap<string, ResourceSettings>;

    constructor(
        private readonly registry: NetworkRegistry,
        private readonly options: RequirementBuilderOptions
    ) {
        this.resources = new Map(Object.entries(options.resources));
    }

    isProtected(resourceId: string): boolean {
        return this.resources.has(resourceId);
    }

    priceOf(resourceId: string): string | undefined {
        return this.resources.get(resourceId)?.price;
    }

    describeResource(resourceId: string): ResourceInfo {
        return {
            url: `mcp://tool/${resourceId}`,
            description: this.resources.get(resourceId)?.description ?? `MCP tool call: ${resourceId}`,
            mimeType: 'application/json',
        };
    }

    /**
     * Emits one requirement per asset the chain accepts. Any one of them
     * satisfies the resource.
     */
    build(resourceId: string, chain: ChainId | string): PaymentRequirements[] {
        const chainId = typeof chain === 'string' ? validateChainId(chain) : chain;

        const resource = this.resources.get(resourceId);
        if (!resource) {
            throw new NotConfiguredError(`Resource '${resourceId}' has no configured price`);
        }

        const policy = this.registry.lookupPolicy(chainId);
        if (!policy) {
            throw new NotConfiguredError(`Network '${chainId.namespace}:${chainId.reference}' is not configured`);
        }

        const maxTimeoutSeconds = resource.maxTimeoutSeconds ?? this.options.defaultMaxTimeoutSeconds;

        return Array.from(policy.assets.values(), asset => {
            const requirement: PaymentRequirements = {
                scheme: 'exact',
                network: policy.network,
                amount: resource.price,
                asset: asset.address,
                payTo: policy.payTo,
                maxTimeoutSeconds,
            };
            if (policy.feePayer) {
                requirement.extra = { feePayer: policy.feePayer };
            }
            return requirement;
        });
    }

    buildPaymentRequired(resourceId: string, error?: string): PaymentRequired {
        const accepts = this.registry.chainIds().flatMap(chainId => this.build(resourceId, chainId));
        return {
            x402Version: X402_VERSION,
            error: error ?? `Payment required to call tool '${resourceId}'`,
            resource: this.describeResource(resourceId),
            accepts,
        };
    }
}
