import { describe, it, expect } from 'vitest';
import {
    IllegalTransitionError,
    PaymentStateMachine,
    isTerminal,
    transition,
} from '../../src/services/paymentState.js';

describe('Payment state transitions', () => {
    it('walks the success path to Authorized', () => {
        const machine = new PaymentStateMachine();
        machine.dispatch('PAYMENT_OFFERED');
        machine.dispatch('STRUCTURE_VALID');
        machine.dispatch('VERIFIED');
        machine.dispatch('SETTLED');
        machine.dispatch('AUTHORIZE');

        expect(machine.status).toBe('Authorized');
        expect(machine.history).toEqual([
            'Received',
            'PaymentOffered',
            'StructurallyValid',
            'FacilitatorVerified',
            'Settled',
            'Authorized',
        ]);
    });

    it('issues requirements when no payment is offered', () => {
        expect(transition('Received', 'NO_PAYMENT')).toBe('RequirementIssued');
        expect(isTerminal('RequirementIssued')).toBe(true);
    });

    it('does not allow verification before structural validation', () => {
        expect(() => transition('PaymentOffered', 'VERIFIED')).toThrow(IllegalTransitionError);
    });

    it('does not allow settlement before verification', () => {
        expect(() => transition('StructurallyValid', 'SETTLED')).toThrow('Illegal payment transition: SETTLED from StructurallyValid');
    });

    it('does not allow authorization before settlement', () => {
        expect(() => transition('FacilitatorVerified', 'AUTHORIZE')).toThrow(IllegalTransitionError);
    });

    it('rejects any event after a terminal state', () => {
        const machine = new PaymentStateMachine();
        machine.dispatch('PAYMENT_OFFERED');
        machine.dispatch('STRUCTURE_INVALID');

        expect(isTerminal(machine.status)).toBe(true);
        expect(() => machine.dispatch('STRUCTURE_VALID')).toThrow(IllegalTransitionError);
        expect(machine.history).toEqual(['Received', 'PaymentOffered', 'StructurallyInvalid']);
    });

    it('allows cancellation only between validation and settlement', () => {
        expect(transition('StructurallyValid', 'CANCELLED')).toBe('Cancelled');
        expect(transition('FacilitatorVerified', 'CANCELLED')).toBe('Cancelled');
        expect(() => transition('Settled', 'CANCELLED')).toThrow(IllegalTransitionError);
    });

    it.each(['Authorized', 'Malformed', 'FacilitatorRejected', 'FacilitatorUnavailable', 'SettlementFailed', 'Cancelled'] as const)(
        '%s is terminal',
        status => {
            expect(isTerminal(status)).toBe(true);
        }
    );

    it('Settled is not terminal', () => {
        expect(isTerminal('Settled')).toBe(false);
    });

    it('closes only in a terminal state', () => {
        const machine = new PaymentStateMachine();
        machine.dispatch('PAYMENT_OFFERED');
        machine.dispatch('STRUCTURE_VALID');
        expect(() => machine.close()).toThrow('Payment flow ended in non-terminal state StructurallyValid');

        machine.dispatch('CANCELLED');
        expect(machine.close()).toEqual(['Received', 'PaymentOffered', 'StructurallyValid', 'Cancelled']);
    });
});
