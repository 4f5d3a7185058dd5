import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type { IFacilitatorClient } from '../domain/facilitator.js';
import type { ChainId, NetworkPolicy } from '../domain/network.js';
import {
    FacilitatorError,
    PaymentError,
    describeError,
    type PaymentErrorKind,
    type PaymentStage,
    type ViolationCode,
} from '../domain/errors.js';
import type {
    PaymentPayload,
    PaymentReceipt,
    PaymentRequired,
    PaymentRequirements,
    SettleResponse,
    VerifyResponse,
} from '../domain/types.js';
import { validateChainId } from '../utils/caip.js';
import { traceLogger } from '../utils/logger.js';
import { extractPaymentPayload } from './extractor.js';
import { PaymentStateMachine, type PaymentEvent, type PaymentStatus } from './paymentState.js';
import type { NetworkRegistry } from './registry.js';
import type { RequirementBuilder } from './requirements.js';
import { validateSvmExactPayment, type StructuralResult } from './svmExact.js';

export type StructuralValidator = (claim: PaymentPayload, policy: NetworkPolicy) => StructuralResult;

export interface PaymentRequest {
    resourceId: string;
    meta: unknown;
    traceId?: string;
    signal?: AbortSignal;
}

export type PaymentDecision =
    | { outcome: 'payment_required'; traceId: string; paymentRequired: PaymentRequired; history: readonly PaymentStatus[] }
    | { outcome: 'rejected'; traceId: string; error: PaymentError; history: readonly PaymentStatus[] }
    | { outcome: 'authorized'; traceId: string; receipt: PaymentReceipt; history: readonly PaymentStatus[] };

export interface PaymentOrchestratorDeps {
    registry: NetworkRegistry;
    requirements: RequirementBuilder;
    facilitator: IFacilitatorClient;
    validators?: Record<string, StructuralValidator>;
    now?: () => number;
}

const DEFAULT_VALIDATORS: Record<string, StructuralValidator> = {
    solana: validateSvmExactPayment,
};

function sameRequirement(a: PaymentRequirements, b: PaymentRequirements): boolean {
    return (
        a.scheme === b.scheme &&
        a.network === b.network &&
        a.amount === b.amount &&
        a.asset === b.asset &&
        a.payTo === b.payTo &&
        a.maxTimeoutSeconds === b.maxTimeoutSeconds
    );
}

class FlowFailure extends Error {
    constructor(
        readonly event: PaymentEvent,
        readonly kind: PaymentErrorKind,
        readonly stage: PaymentStage,
        readonly reason: string,
        readonly violation?: ViolationCode
    ) {
        super(reason);
    }
}

/**
 * Runs one payment flow: extract, validate, verify, settle, authorize.
 *
 * Each stage only starts once the previous one has passed, and only the
 * `authorized` outcome may lead to the protected call being executed.
 */
export class PaymentOrchestrator {
    private readonly registry: NetworkRegistry;
    private readonly requirements: RequirementBuilder;
    private readonly facilitator: IFacilitatorClient;
    private readonly validators: Record<string, StructuralValidator>;
    private readonly now: () => number;

    constructor(deps: PaymentOrchestratorDeps) {
        this.registry = deps.registry;
        this.requirements = deps.requirements;
        this.facilitator = deps.facilitator;
        this.validators = deps.validators ?? DEFAULT_VALIDATORS;
        this.now = deps.now ?? Date.now;
    }

    async authorize(request: PaymentRequest): Promise<PaymentDecision> {
        const traceId = request.traceId ?? randomUUID();
        const log = traceLogger(traceId).child({ resource: request.resourceId });
        const machine = new PaymentStateMachine();

        try {
            const extraction = extractPaymentPayload(request.meta);

            if (extraction.kind === 'absent') {
                machine.dispatch('NO_PAYMENT');
                log.info('No payment attached, issuing payment requirements');
                return {
                    outcome: 'payment_required',
                    traceId,
                    paymentRequired: this.requirements.buildPaymentRequired(request.resourceId),
                    history: machine.close(),
                };
            }
            if (extraction.kind === 'malformed') {
                throw new FlowFailure('PAYMENT_MALFORMED', 'Malformed', 'extract', extraction.reason);
            }

            machine.dispatch('PAYMENT_OFFERED');
            const claim = extraction.claim;
            const requirement = claim.accepted;

            const payerHint = this.validateStructure(request.resourceId, claim, log);
            machine.dispatch('STRUCTURE_VALID');

            this.throwIfCancelled(request.signal, 'verify');
            const verification = await this.verify(claim, requirement, traceId);
            machine.dispatch('VERIFIED');
            if (verification.payer && verification.payer !== payerHint) {
                log.warn({ payer: verification.payer, payerHint }, 'Facilitator payer differs from transfer authority');
            }
            log.info({ payer: verification.payer }, 'Payment verified, proceeding to settlement');

            // Settlement is not handed the abort signal: once started it runs to completion.
            this.throwIfCancelled(request.signal, 'settle');
            const receipt = await this.settle(claim, requirement, traceId, verification.payer ?? payerHint);
            machine.dispatch('SETTLED');
            machine.dispatch('AUTHORIZE');

            log.info({ transaction: receipt.transaction, network: receipt.network, payer: receipt.payer }, 'Payment settled, call authorized');
            return { outcome: 'authorized', traceId, receipt, history: machine.close() };
        } catch (error) {
            if (!(error instanceof FlowFailure)) throw error;

            machine.dispatch(error.event);
            const paymentError = new PaymentError(error.kind, {
                traceId,
                stage: error.stage,
                reason: error.reason,
                violation: error.violation,
            });

            const logContext = { kind: error.kind, stage: error.stage, violation: error.violation, reason: error.reason, status: machine.status };
            if (paymentError.isCallerError) {
                log.warn(logContext, 'Payment rejected');
            } else {
                log.error(logContext, 'Payment processing failed');
            }
            return { outcome: 'rejected', traceId, error: paymentError, history: machine.close() };
        }
    }

    private validateStructure(resourceId: string, claim: PaymentPayload, log: Logger): string {
        const requirement = claim.accepted;
        const invalid = (violation: ViolationCode, reason: string) =>
            new FlowFailure('STRUCTURE_INVALID', 'StructuralViolation', 'validate', reason, violation);

        let chainId: ChainId;
        try {
            chainId = validateChainId(requirement.network);
        } catch (error) {
            throw invalid('unsupported_network', describeError(error));
        }
        const policy = this.registry.lookupPolicy(chainId);
        if (!policy) {
            throw invalid('unsupported_network', `Network '${requirement.network}' is not configured`);
        }

        const offered = this.requirements.build(resourceId, chainId);
        if (!offered.some(candidate => sameRequirement(candidate, requirement))) {
            throw invalid('requirement_mismatch', `Accepted requirement does not match any requirement offered for '${resourceId}'`);
        }

        this.checkValidityWindow(claim);

        const validator = this.validators[chainId.namespace];
        if (!validator) {
            throw invalid('unsupported_network', `No exact scheme validator for namespace '${chainId.namespace}'`);
        }

        const result = validator(claim, policy);
        if (!result.ok) {
            throw invalid(result.violation, result.detail);
        }

        log.debug({ payer: result.payer, computeUnitPrice: result.computeUnitPrice.toString() }, 'Payment transaction passed structural validation');
        return result.payer;
    }

    /**
     * The offer's own `validAfter` / `validBefore` bounds are the only clock the
     * claim carries. An offer is stale once `validAfter` lies more than
     * `maxTimeoutSeconds` in the past, and a window wider than `maxTimeoutSeconds`
     * is refused outright. Offers without bounds fall back to blockhash expiry.
     */
    private checkValidityWindow(claim: PaymentPayload) {
        const { maxTimeoutSeconds } = claim.accepted;
        const { validAfter, validBefore } = claim.payload;
        const nowSeconds = Math.floor(this.now() / 1000);
        const expired = (reason: string) =>
            new FlowFailure('STRUCTURE_INVALID', 'StructuralViolation', 'validate', reason, 'payment_expired');

        if (validAfter !== undefined && nowSeconds < validAfter) {
            throw expired('Payment authorization is not yet valid');
        }
        if (validBefore !== undefined && nowSeconds > validBefore) {
            throw expired('Payment authorization expired');
        }
        if (validAfter !== undefined && nowSeconds - validAfter > maxTimeoutSeconds) {
            throw expired(`Payment offer is ${nowSeconds - validAfter}s old, exceeding maxTimeoutSeconds ${maxTimeoutSeconds}`);
        }
        if (validAfter !== undefined && validBefore !== undefined && validBefore - validAfter > maxTimeoutSeconds) {
            throw expired(
                `Payment validity window of ${validBefore - validAfter}s exceeds maxTimeoutSeconds ${maxTimeoutSeconds}`
            );
        }
    }

    private async verify(claim: PaymentPayload, requirement: PaymentRequirements, traceId: string): Promise<VerifyResponse> {
        let verification: VerifyResponse;
        try {
            verification = await this.facilitator.verify(claim, requirement, traceId);
        } catch (error) {
            throw this.unavailable(error, 'verify');
        }

        if (!verification.isValid) {
            throw new FlowFailure(
                'VERIFY_REJECTED',
                'FacilitatorRejected',
                'verify',
                `Payment verification failed: ${verification.invalidReason ?? 'no reason given'}`
            );
        }
        return verification;
    }

    private async settle(claim: PaymentPayload, requirement: PaymentRequirements, traceId: string, payer: string): Promise<PaymentReceipt> {
        const settleFailed = (reason: string) => new FlowFailure('SETTLEMENT_FAILED', 'SettlementFailed', 'settle', reason);

        let settlement: SettleResponse;
        try {
            settlement = await this.facilitator.settle(claim, requirement, traceId);
        } catch (error) {
            throw settleFailed(`Payment settlement failed: ${describeError(error)}`);
        }

        if (!settlement.success) {
            throw settleFailed(`Payment settlement failed: ${settlement.errorReason ?? 'no reason given'}`);
        }
        if (!settlement.transaction) {
            throw settleFailed('Facilitator reported success without a transaction reference');
        }

        return {
            transaction: settlement.transaction,
            network: settlement.network ?? requirement.network,
            payer: settlement.payer ?? payer,
        };
    }

    private unavailable(error: unknown, stage: PaymentStage): FlowFailure {
        if (error instanceof FacilitatorError) {
            return new FlowFailure(
                'FACILITATOR_UNAVAILABLE',
                error.retryable ? 'FacilitatorTransient' : 'FacilitatorFailure',
                stage,
                error.message
            );
        }
        return new FlowFailure('FACILITATOR_UNAVAILABLE', 'FacilitatorFailure', stage, describeError(error));
    }

    private throwIfCancelled(signal: AbortSignal | undefined, stage: PaymentStage) {
        if (signal?.aborted) {
            throw new FlowFailure('CANCELLED', 'Cancelled', stage, `Request cancelled before ${stage}`);
        }
    }
}
