import { MessageV0, PublicKey, TransactionInstruction, TransactionMessage, VersionedTransaction } from '@solana/web3.js';
import bs58 from 'bs58';
import type { TransactionEncoding } from '../domain/types.js';
import { describeError } from '../domain/errors.js';

export interface DecodedTransaction {
    version: 'legacy' | 0;
    feePayer: PublicKey;
    recentBlockhash: string;
    instructions: TransactionInstruction[];
}

export class TransactionDecodeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TransactionDecodeError';
    }
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

function decodeBytes(encoded: string, encoding: TransactionEncoding): Uint8Array {
    if (encoding === 'base58') {
        try {
            return bs58.decode(encoded);
        } catch (error) {
            throw new TransactionDecodeError(`Invalid base58 transaction: ${describeError(error)}`);
        }
    }

    if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
        throw new TransactionDecodeError('Invalid base64 transaction encoding');
    }
    return Uint8Array.from(Buffer.from(encoded, 'base64'));
}

/**
 * Decodes a wire-format Solana transaction (legacy or v0) into its fee payer
 * and ordered instruction list with resolved account metas.
 *
 * v0 messages that pull accounts from address lookup tables are rejected:
 * the tables live on chain and cannot be resolved here.
 */
export function decodeTransaction(encoded: string, encoding: TransactionEncoding = 'base64'): DecodedTransaction {
    const bytes = decodeBytes(encoded, encoding);

    let transaction: VersionedTransaction;
    try {
        transaction = VersionedTransaction.deserialize(bytes);
    } catch (error) {
        throw new TransactionDecodeError(`Failed to deserialize transaction: ${describeError(error)}`);
    }

    const { message } = transaction;
    if (message instanceof MessageV0 && message.addressTableLookups.length > 0) {
        throw new TransactionDecodeError('Address lookup tables are not supported in payment transactions');
    }

    let decompiled: TransactionMessage;
    try {
        decompiled = TransactionMessage.decompile(message);
    } catch (error) {
        throw new TransactionDecodeError(`Failed to decompile transaction message: ${describeError(error)}`);
    }

    return {
        version: message.version,
        feePayer: decompiled.payerKey,
        recentBlockhash: decompiled.recentBlockhash,
        instructions: decompiled.instructions,
    };
}
