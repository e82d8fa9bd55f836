// src/kernel-core/L2/Lifecycle.ts
import { ErrorCode, KernelError } from '../Errors.js';
import { EscrowActiveGuard, RecipientStatusGuard, enforce } from '../L0/Guards.js';
import { min, sub } from '../L0/Primitives.js';
import type { Address, EscrowPhase, EscrowState, Recipient, RecipientStatus, Timestamp } from '../L0/Ontology.js';

/**
 * Recipient Lifecycle
 *
 *   UNPAUSED <-> PAUSED
 *       \         /
 *       TERMINATED   (terminal)
 */
const TRANSITIONS: Record<RecipientStatus, readonly RecipientStatus[]> = {
    UNPAUSED: ['PAUSED', 'TERMINATED'],
    PAUSED: ['UNPAUSED', 'TERMINATED'],
    TERMINATED: []
};

export function canTransition(from: RecipientStatus, to: RecipientStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function transition(recipient: Recipient, to: RecipientStatus): void {
    const from = recipient.status;
    if (!canTransition(from, to)) {
        throw new KernelError(
            ErrorCode.STATE_CONFLICT,
            `Illegal recipient transition ${from} -> ${to} for ${recipient.address}`,
            { address: recipient.address, from, to }
        );
    }
    recipient.status = to;
}

export function requireRecipient(state: EscrowState, address: Address): Recipient {
    const recipient = state.recipients[address];
    if (!recipient) {
        throw new KernelError(ErrorCode.UNKNOWN_RECIPIENT, `No recipient registered at ${address}`, { address });
    }
    return recipient;
}

/**
 * Seconds of pause to add back onto the timeline when resuming.
 * After escrow termination the valuation is frozen at `terminatedAt`, so only the
 * part of the pause before that instant is compensated; the frozen locked balance
 * is then identical before and after resuming.
 */
export function pauseCompensation(recipient: Recipient, now: Timestamp, phase: EscrowPhase): Timestamp {
    const resumedAt = phase.kind === 'TERMINATED' ? min(now, phase.terminatedAt) : now;
    return sub(resumedAt, recipient.lastPausedAt, 'pause duration');
}

export function pause(state: EscrowState, address: Address, now: Timestamp): Recipient {
    enforce(EscrowActiveGuard({ phase: state.phase }));
    const recipient = requireRecipient(state, address);
    enforce(RecipientStatusGuard({ recipient, allowed: ['UNPAUSED'], operation: 'pause' }));

    transition(recipient, 'PAUSED');
    recipient.lastPausedAt = now;
    return recipient;
}

export function unpause(state: EscrowState, address: Address, now: Timestamp): Timestamp {
    const recipient = requireRecipient(state, address);
    enforce(RecipientStatusGuard({ recipient, allowed: ['PAUSED'], operation: 'unpause' }));

    const pausedFor = pauseCompensation(recipient, now, state.phase);
    transition(recipient, 'UNPAUSED');
    // The rate and total stay as committed; only the timeline moves.
    recipient.cliffDuration += pausedFor;
    recipient.endTime += pausedFor;
    return pausedFor;
}
