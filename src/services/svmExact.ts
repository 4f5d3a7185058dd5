import { ComputeBudgetInstruction, ComputeBudgetProgram, PublicKey, TransactionInstruction } from '@solana/web3.js';
import {
    ASSOCIATED_TOKEN_PROGRAM_ID,
    TOKEN_2022_PROGRAM_ID,
    TOKEN_PROGRAM_ID,
    decodeTransferCheckedInstruction,
    getAssociatedTokenAddressSync,
    type DecodedTransferCheckedInstruction,
} from '@solana/spl-token';
import type { NetworkPolicy } from '../domain/network.js';
import type { PaymentPayload } from '../domain/types.js';
import { describeError, type ViolationCode } from '../domain/errors.js';
import { decodeTransaction, type DecodedTransaction } from '../utils/transaction.js';

export type StructuralResult =
    | { ok: true; payer: string; computeUnitPrice: bigint }
    | { ok: false; violation: ViolationCode; detail: string };

interface PaymentInstructions {
    computeUnitLimit: number;
    computeUnitPrice: bigint;
    createAccount?: TransactionInstruction;
    transfer: DecodedTransferCheckedInstruction;
}

class Violation extends Error {
    constructor(
        readonly code: ViolationCode,
        message: string
    ) {
        super(message);
    }
}

const TOKEN_PROGRAMS = [TOKEN_PROGRAM_ID, TOKEN_2022_PROGRAM_ID];

// Associated token account program: Create = empty data or [0], CreateIdempotent = [1]
const ATA_CREATE_DISCRIMINATORS = new Set([0, 1]);

function decodeComputeBudget(instruction: TransactionInstruction, position: number) {
    if (!instruction.programId.equals(ComputeBudgetProgram.programId)) {
        throw new Violation('instruction_layout', `Instruction ${position} must be a compute budget instruction`);
    }
    try {
        return ComputeBudgetInstruction.decodeInstructionType(instruction);
    } catch (error) {
        throw new Violation('instruction_layout', `Instruction ${position}: ${describeError(error)}`);
    }
}

function readComputeUnitLimit(instruction: TransactionInstruction): number {
    const type = decodeComputeBudget(instruction, 0);
    if (type !== 'SetComputeUnitLimit' || instruction.data.length !== 5) {
        throw new Violation('instruction_layout', 'Instruction 0 must be SetComputeUnitLimit');
    }
    return ComputeBudgetInstruction.decodeSetComputeUnitLimit(instruction).units;
}

function readComputeUnitPrice(instruction: TransactionInstruction): bigint {
    const type = decodeComputeBudget(instruction, 1);
    if (type !== 'SetComputeUnitPrice' || instruction.data.length !== 9) {
        throw new Violation('instruction_layout', 'Instruction 1 must be SetComputeUnitPrice');
    }
    return BigInt(ComputeBudgetInstruction.decodeSetComputeUnitPrice(instruction).microLamports);
}

function isCreateAssociatedAccount(instruction: TransactionInstruction): boolean {
    if (!instruction.programId.equals(ASSOCIATED_TOKEN_PROGRAM_ID)) return false;
    if (instruction.data.length === 0) return true;
    return instruction.data.length === 1 && ATA_CREATE_DISCRIMINATORS.has(instruction.data[0]);
}

function readTransferChecked(instruction: TransactionInstruction, position: number): DecodedTransferCheckedInstruction {
    const programId = TOKEN_PROGRAMS.find(program => program.equals(instruction.programId));
    if (!programId) {
        throw new Violation('instruction_layout', `Instruction ${position} must be a token program TransferChecked`);
    }
    try {
        return decodeTransferCheckedInstruction(instruction, programId);
    } catch (error) {
        throw new Violation('instruction_layout', `Instruction ${position} is not a valid TransferChecked: ${describeError(error)}`);
    }
}

/**
 * Matches the instruction list against the only layout an exact payment may take:
 * compute unit limit, compute unit price, optional associated account creation,
 * TransferChecked. Nothing may be added, dropped or reordered.
 */
function matchInstructionLayout(instructions: TransactionInstruction[]): PaymentInstructions {
    if (instructions.length !== 3 && instructions.length !== 4) {
        throw new Violation('instruction_layout', `Expected 3 or 4 instructions, got ${instructions.length}`);
    }

    const computeUnitLimit = readComputeUnitLimit(instructions[0]);
    const computeUnitPrice = readComputeUnitPrice(instructions[1]);

    let createAccount: TransactionInstruction | undefined;
    if (instructions.length === 4) {
        createAccount = instructions[2];
        if (!isCreateAssociatedAccount(createAccount)) {
            throw new Violation('instruction_layout', 'Instruction 2 must create an associated token account');
        }
    }

    const transferIndex = instructions.length - 1;
    const transfer = readTransferChecked(instructions[transferIndex], transferIndex);

    return { computeUnitLimit, computeUnitPrice, createAccount, transfer };
}

function checkGasPrice(price: bigint, policy: NetworkPolicy) {
    if (price < policy.minGasPrice || price > policy.maxGasPrice) {
        throw new Violation(
            'gas_price_out_of_bounds',
            `Compute unit price ${price} out of bounds [${policy.minGasPrice}, ${policy.maxGasPrice}]`
        );
    }
}

function checkFeePayer(decoded: DecodedTransaction, transfer: DecodedTransferCheckedInstruction, policy: NetworkPolicy) {
    const { feePayer } = decoded;

    if (policy.feePayer && !feePayer.equals(new PublicKey(policy.feePayer))) {
        throw new Violation('fee_payer_conflict', `Fee payer ${feePayer.toBase58()} is not the facilitator fee payer`);
    }
    if (feePayer.equals(transfer.keys.source.pubkey)) {
        throw new Violation('fee_payer_conflict', 'Fee payer cannot be the source of the transfer');
    }
    if (feePayer.equals(transfer.keys.owner.pubkey)) {
        throw new Violation('fee_payer_conflict', 'Fee payer cannot be the authority of the transfer');
    }

    const transferAccounts = [
        transfer.keys.source,
        transfer.keys.mint,
        transfer.keys.destination,
        transfer.keys.owner,
        ...transfer.keys.multiSigners,
    ];
    if (transferAccounts.some(account => account.pubkey.equals(feePayer))) {
        throw new Violation('fee_payer_conflict', 'Fee payer must not appear in TransferChecked instruction accounts');
    }
}

function parseAddress(value: string, code: ViolationCode, label: string): PublicKey {
    try {
        return new PublicKey(value);
    } catch {
        throw new Violation(code, `Invalid ${label} address '${value}'`);
    }
}

function checkDestination(
    instructions: PaymentInstructions,
    payTo: PublicKey,
    mint: PublicKey
) {
    const { transfer, createAccount } = instructions;
    const expected = getAssociatedTokenAddressSync(mint, payTo, true, transfer.programId, ASSOCIATED_TOKEN_PROGRAM_ID);

    if (!transfer.keys.destination.pubkey.equals(expected)) {
        throw new Violation(
            'destination_mismatch',
            `Destination ATA mismatch. Expected: ${expected.toBase58()}, Got: ${transfer.keys.destination.pubkey.toBase58()}`
        );
    }

    const created = createAccount?.keys[1]?.pubkey;
    if (createAccount && (!created || !created.equals(expected))) {
        throw new Violation('destination_mismatch', 'Associated account creation does not target the payment destination');
    }
}

/**
 * Structural check of an exact-scheme SVM payment against the network policy.
 * Pure and synchronous: identical input bytes always yield the same result.
 */
export function validateSvmExactPayment(claim: PaymentPayload, policy: NetworkPolicy): StructuralResult {
    try {
        if (policy.chainId.namespace !== 'solana') {
            throw new Violation('unsupported_network', `SVM exact validation does not apply to ${policy.network}`);
        }

        let decoded: DecodedTransaction;
        try {
            decoded = decodeTransaction(claim.payload.transaction, claim.payload.encoding);
        } catch (error) {
            throw new Violation('malformed_transaction', describeError(error));
        }

        const instructions = matchInstructionLayout(decoded.instructions);
        const { transfer } = instructions;

        checkGasPrice(instructions.computeUnitPrice, policy);
        checkFeePayer(decoded, transfer, policy);

        const requirement = claim.accepted;
        const payTo = new PublicKey(policy.payTo);
        const mint = parseAddress(requirement.asset, 'asset_mismatch', 'asset');
        checkDestination(instructions, payTo, mint);

        if (!transfer.keys.mint.pubkey.equals(mint)) {
            throw new Violation(
                'asset_mismatch',
                `Mint address mismatch. Expected: ${mint.toBase58()}, Got: ${transfer.keys.mint.pubkey.toBase58()}`
            );
        }

        const required = BigInt(requirement.amount);
        if (transfer.data.amount !== required) {
            throw new Violation('amount_mismatch', `Transfer amount mismatch. Required: ${required}, Got: ${transfer.data.amount}`);
        }

        return {
            ok: true,
            payer: transfer.keys.owner.pubkey.toBase58(),
            computeUnitPrice: instructions.computeUnitPrice,
        };
    } catch (error) {
        if (error instanceof Violation) {
            return { ok: false, violation: error.code, detail: error.message };
        }
        throw error;
    }
}
