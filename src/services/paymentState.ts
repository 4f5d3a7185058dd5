export type PaymentStatus =
    | 'Received'
    | 'RequirementIssued'
    | 'Malformed'
    | 'PaymentOffered'
    | 'StructurallyValid'
    | 'StructurallyInvalid'
    | 'FacilitatorVerified'
    | 'FacilitatorRejected'
    | 'FacilitatorUnavailable'
    | 'Settled'
    | 'SettlementFailed'
    | 'Cancelled'
    | 'Authorized';

export type PaymentEvent =
    | 'NO_PAYMENT'
    | 'PAYMENT_MALFORMED'
    | 'PAYMENT_OFFERED'
    | 'STRUCTURE_VALID'
    | 'STRUCTURE_INVALID'
    | 'VERIFIED'
    | 'VERIFY_REJECTED'
    | 'FACILITATOR_UNAVAILABLE'
    | 'SETTLED'
    | 'SETTLEMENT_FAILED'
    | 'CANCELLED'
    | 'AUTHORIZE';

const TRANSITIONS: Record<PaymentStatus, Partial<Record<PaymentEvent, PaymentStatus>>> = {
    Received: {
        NO_PAYMENT: 'RequirementIssued',
        PAYMENT_MALFORMED: 'Malformed',
        PAYMENT_OFFERED: 'PaymentOffered',
    },
    PaymentOffered: {
        STRUCTURE_VALID: 'StructurallyValid',
        STRUCTURE_INVALID: 'StructurallyInvalid',
    },
    StructurallyValid: {
        VERIFIED: 'FacilitatorVerified',
        VERIFY_REJECTED: 'FacilitatorRejected',
        FACILITATOR_UNAVAILABLE: 'FacilitatorUnavailable',
        STRUCTURE_INVALID: 'StructurallyInvalid',
        CANCELLED: 'Cancelled',
    },
    FacilitatorVerified: {
        SETTLED: 'Settled',
        SETTLEMENT_FAILED: 'SettlementFailed',
        CANCELLED: 'Cancelled',
    },
    Settled: {
        AUTHORIZE: 'Authorized',
    },
    RequirementIssued: {},
    Malformed: {},
    StructurallyInvalid: {},
    FacilitatorRejected: {},
    FacilitatorUnavailable: {},
    SettlementFailed: {},
    Cancelled: {},
    Authorized: {},
};

export class IllegalTransitionError extends Error {
    constructor(
        readonly from: PaymentStatus,
        readonly event: PaymentEvent
    ) {
        super(`Illegal payment transition: ${event} from ${from}`);
        this.name = 'IllegalTransitionError';
    }
}

export function transition(from: PaymentStatus, event: PaymentEvent): PaymentStatus {
    const next = TRANSITIONS[from][event];
    if (!next) {
        throw new IllegalTransitionError(from, event);
    }
    return next;
}

export function isTerminal(status: PaymentStatus): boolean {
    return Object.keys(TRANSITIONS[status]).length === 0;
}

/** Tracks the states one payment flow has passed through. */
export class PaymentStateMachine {
    private readonly trail: PaymentStatus[] = ['Received'];

    get status(): PaymentStatus {
        return this.trail[this.trail.length - 1];
    }

    get history(): readonly PaymentStatus[] {
        return this.trail;
    }

    dispatch(event: PaymentEvent): PaymentStatus {
        const next = transition(this.status, event);
        this.trail.push(next);
        return next;
    }

    /** Returns the finished trail; a flow may only end in a terminal state. */
    close(): readonly PaymentStatus[] {
        if (!isTerminal(this.status)) {
            throw new Error(`Payment flow ended in non-terminal state ${this.status}`);
        }
        return this.trail;
    }
}
