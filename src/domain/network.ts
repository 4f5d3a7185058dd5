export interface ChainId {
    readonly namespace: string;
    readonly reference: string;
}

export interface Asset {
    readonly address: string;
    readonly name: string;
    readonly decimals: number;
}

export interface NetworkPolicy {
    readonly chainId: ChainId;
    readonly network: string; // Canonical namespace:reference form of chainId
    readonly assets: ReadonlyMap<string, Asset>;
    readonly payTo: string;
    readonly feePayer?: string;
    readonly minGasPrice: bigint;
    readonly maxGasPrice: bigint;
}
