import type { ChainId } from '../domain/network.js';
import { StructuralError } from '../domain/errors.js';

const NAMESPACE_PATTERN = /^[a-z0-9]+$/;

/**
 * Parses a CAIP-2 chain identifier (`namespace:reference`).
 *
 * Splits on the first `:` only, so the reference may itself contain colons.
 */
export function validateChainId(value: string): ChainId {
    const separator = value.indexOf(':');
    if (separator === -1) {
        throw new StructuralError(`Invalid CAIP-2 network '${value}'. Expected format: namespace:reference`);
    }

    const namespace = value.slice(0, separator);
    const reference = value.slice(separator + 1);

    if (namespace.length === 0 || reference.length === 0) {
        throw new StructuralError(`Invalid CAIP-2 network '${value}'. Namespace and reference must not be empty`);
    }
    if (!NAMESPACE_PATTERN.test(namespace)) {
        throw new StructuralError(`Invalid CAIP-2 namespace '${namespace}'. Must contain only lowercase letters and digits`);
    }

    return Object.freeze({ namespace, reference });
}

export function isChainId(value: string): boolean {
    try {
        validateChainId(value);
        return true;
    } catch {
        return false;
    }
}

export function formatChainId(chainId: ChainId): string {
    return `${chainId.namespace}:${chainId.reference}`;
}
