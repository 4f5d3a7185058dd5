export type ViolationCode =
    | 'malformed_transaction'
    | 'instruction_layout'
    | 'gas_price_out_of_bounds'
    | 'fee_payer_conflict'
    | 'destination_mismatch'
    | 'asset_mismatch'
    | 'amount_mismatch'
    | 'unsupported_network'
    | 'requirement_mismatch'
    | 'payment_expired';

export type PaymentErrorKind =
    | 'Malformed'
    | 'StructuralViolation'
    | 'FacilitatorRejected'
    | 'FacilitatorTransient'
    | 'FacilitatorFailure'
    | 'SettlementFailed'
    | 'Cancelled';

export type PaymentStage = 'extract' | 'validate' | 'verify' | 'settle';

export interface PaymentErrorContext {
    traceId: string;
    stage: PaymentStage;
    reason: string;
    violation?: ViolationCode;
}

const VIOLATION_MESSAGES: Record<ViolationCode, string> = {
    malformed_transaction: 'Payment transaction could not be decoded',
    instruction_layout: 'Payment transaction does not satisfy the payment requirements',
    gas_price_out_of_bounds: 'Payment transaction does not satisfy the payment requirements',
    fee_payer_conflict: 'Payment transaction does not satisfy the payment requirements',
    destination_mismatch: 'Payment transaction does not satisfy the payment requirements',
    asset_mismatch: 'Payment transaction does not satisfy the payment requirements',
    amount_mismatch: 'Payment transaction does not satisfy the payment requirements',
    unsupported_network: 'Payment network is not supported',
    requirement_mismatch: 'Accepted payment requirement does not match any offered requirement',
    payment_expired: 'Payment authorization has expired',
};

/**
 * Terminal failure of a payment flow. `reason` is for logs; callers only ever
 * see `publicMessage`.
 */
export class PaymentError extends Error {
    readonly kind: PaymentErrorKind;
    readonly context: PaymentErrorContext;

    constructor(kind: PaymentErrorKind, context: PaymentErrorContext) {
        super(`${kind} at ${context.stage}: ${context.reason}`);
        this.name = 'PaymentError';
        this.kind = kind;
        this.context = context;
    }

    /** True when the caller's payment was at fault, false for server-side failures. */
    get isCallerError(): boolean {
        return this.kind === 'Malformed' || this.kind === 'StructuralViolation' || this.kind === 'FacilitatorRejected';
    }

    get publicMessage(): string {
        switch (this.kind) {
            case 'Malformed':
            case 'FacilitatorRejected':
                return this.context.reason;
            case 'StructuralViolation':
                return this.context.violation ? VIOLATION_MESSAGES[this.context.violation] : 'Payment transaction is invalid';
            case 'FacilitatorTransient':
            case 'FacilitatorFailure':
                return 'Payment facilitator is unavailable';
            case 'SettlementFailed':
                return 'Payment settlement failed';
            case 'Cancelled':
                return 'Payment was cancelled before settlement';
        }
    }
}

export class FacilitatorError extends Error {
    constructor(
        message: string,
        readonly retryable: boolean,
        readonly status?: number
    ) {
        super(message);
        this.name = 'FacilitatorError';
    }
}

export class ConfigurationError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

export class StructuralError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'StructuralError';
    }
}

export class NotConfiguredError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NotConfiguredError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
