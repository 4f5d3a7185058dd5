import {
    ComputeBudgetProgram,
    Keypair,
    PublicKey,
    TransactionInstruction,
    TransactionMessage,
    VersionedTransaction,
} from '@solana/web3.js';
import {
    TOKEN_PROGRAM_ID,
    createAssociatedTokenAccountIdempotentInstruction,
    createTransferCheckedInstruction,
    getAssociatedTokenAddressSync,
} from '@solana/spl-token';
import type { PaymentSettings } from '../../src/domain/schemas.js';
import type { PaymentPayload, PaymentRequirements } from '../../src/domain/types.js';
import { NetworkRegistry } from '../../src/services/registry.js';
import { RequirementBuilder } from '../../src/services/requirements.js';
import { parsePaymentSettings } from '../../src/services/settings.js';

export const SOLANA_MAINNET = 'solana:5eykt4UsFv8P8NJdTREpY1vzqKqZKvdp';
export const SOLANA_DEVNET = 'solana:EtWTRABZaYq6iMfeYKouRu166VU2xqa1';

const keypair = (seed: number) => Keypair.fromSeed(new Uint8Array(32).fill(seed));

export const facilitatorKey = keypair(1);
export const payerKey = keypair(2);
export const merchantKey = keypair(3);
export const mintKey = keypair(4);
export const otherMintKey = keypair(5);
export const RECENT_BLOCKHASH = keypair(6).publicKey.toBase58();

export const PAY_TO = merchantKey.publicKey.toBase58();
export const MINT = mintKey.publicKey.toBase58();
export const OTHER_MINT = otherMintKey.publicKey.toBase58();
export const PRICE = '10000';
export const DECIMALS = 6;

export function rawNetwork(overrides: Record<string, unknown> = {}) {
    return {
        network: SOLANA_MAINNET,
        payTo: PAY_TO,
        minComputeUnitPrice: 1000,
        maxComputeUnitPrice: 50000,
        assets: [{ address: MINT, name: 'USDC', decimals: DECIMALS }],
        ...overrides,
    };
}

export function rawSettings(overrides: Record<string, unknown> = {}) {
    return {
        networks: [rawNetwork()],
        resources: {
            premium: { price: PRICE, description: 'Premium tool' },
        },
        ...overrides,
    };
}

export function paymentFixture(settings: PaymentSettings = parsePaymentSettings(rawSettings())) {
    const registry = NetworkRegistry.fromSettings(settings.networks);
    const requirements = new RequirementBuilder(registry, settings);
    return { settings, registry, requirements };
}

export interface TransferOptions {
    amount?: bigint;
    computeUnitPrice?: number;
    computeUnitLimit?: number;
    mint?: PublicKey;
    payTo?: PublicKey;
    destination?: PublicKey;
    feePayer?: PublicKey;
    owner?: PublicKey;
    createAccount?: boolean;
    tokenProgram?: PublicKey;
    extraInstructions?: TransactionInstruction[];
}

export function paymentInstructions(options: TransferOptions = {}): TransactionInstruction[] {
    const mint = options.mint ?? mintKey.publicKey;
    const owner = options.owner ?? payerKey.publicKey;
    const feePayer = options.feePayer ?? facilitatorKey.publicKey;
    const payTo = options.payTo ?? merchantKey.publicKey;
    const tokenProgram = options.tokenProgram ?? TOKEN_PROGRAM_ID;
    const source = getAssociatedTokenAddressSync(mint, owner, false, tokenProgram);
    const destination = options.destination ?? getAssociatedTokenAddressSync(mint, payTo, true, tokenProgram);

    const instructions = [
        ComputeBudgetProgram.setComputeUnitLimit({ units: options.computeUnitLimit ?? 200_000 }),
        ComputeBudgetProgram.setComputeUnitPrice({ microLamports: options.computeUnitPrice ?? 5000 }),
    ];
    if (options.createAccount ?? true) {
        instructions.push(createAssociatedTokenAccountIdempotentInstruction(feePayer, destination, payTo, mint, tokenProgram));
    }
    instructions.push(
        createTransferCheckedInstruction(source, mint, destination, owner, options.amount ?? 10_000n, DECIMALS, [], tokenProgram)
    );
    instructions.push(...(options.extraInstructions ?? []));
    return instructions;
}

/** Serializes an unsigned legacy transaction; signature slots are zero-filled. */
export function encodeInstructions(instructions: TransactionInstruction[], feePayer: PublicKey = facilitatorKey.publicKey): string {
    const message = new TransactionMessage({
        payerKey: feePayer,
        recentBlockhash: RECENT_BLOCKHASH,
        instructions,
    }).compileToLegacyMessage();
    return Buffer.from(new VersionedTransaction(message).serialize()).toString('base64');
}

export function buildTransaction(options: TransferOptions = {}): string {
    return encodeInstructions(paymentInstructions(options), options.feePayer ?? facilitatorKey.publicKey);
}

export function requirementFor(requirements: RequirementBuilder, resourceId = 'premium'): PaymentRequirements {
    return requirements.build(resourceId, SOLANA_MAINNET)[0];
}

export function buildClaim(accepted: PaymentRequirements, transaction: string = buildTransaction()): PaymentPayload {
    return {
        x402Version: 2,
        accepted,
        payload: { transaction },
    };
}
