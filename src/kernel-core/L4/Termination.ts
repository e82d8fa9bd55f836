// src/kernel-core/L4/Termination.ts
import { AddressGuard, EscrowActiveGuard, EscrowTerminatedGuard, RecipientStatusGuard, enforce } from '../L0/Guards.js';
import { normalizeAddress, sub } from '../L0/Primitives.js';
import { claimStartTime, claimableAmount, lockedAmount } from '../L1/Schedule.js';
import { requireRecipient, transition } from '../L2/Lifecycle.js';
import type { Address, Amount, Effects, EscrowState, Timestamp } from '../L0/Ontology.js';

export interface RecipientSettlement {
    paidToRecipient: Amount;
    sweptToSafe: Amount;
}

export interface SeizureReceipt {
    seized: Amount;
    recipients: Address[];
}

/**
 * Ends one recipient's schedule: pays out what is claimable now, then sweeps
 * whatever remains of the entitlement to the safe address.
 * Nothing is paid out before the cliff has passed.
 */
export function terminateRecipient(state: EscrowState, address: Address, now: Timestamp): Effects<RecipientSettlement> {
    enforce(EscrowActiveGuard({ phase: state.phase }));
    const recipient = requireRecipient(state, address);
    enforce(RecipientStatusGuard({ recipient, allowed: ['UNPAUSED', 'PAUSED'], operation: 'terminate' }));

    const paidToRecipient = now >= claimStartTime(recipient)
        ? claimableAmount(recipient, now, state.phase)
        : 0n;
    recipient.totalClaimed += paidToRecipient;
    state.totalClaimed += paidToRecipient;

    const sweptToSafe = sub(recipient.totalVestingAmount, recipient.totalClaimed, 'terminated remainder');
    state.totalSeized += sweptToSafe;
    transition(recipient, 'TERMINATED');

    return {
        result: { paidToRecipient, sweptToSafe },
        push: [
            { account: recipient.address, amount: paidToRecipient },
            { account: state.safeAddress, amount: sweptToSafe }
        ]
    };
}

/**
 * One-way global freeze. Moves no funds; only the valuation of locked balances changes.
 */
export function terminateEscrow(state: EscrowState, now: Timestamp): Effects<Timestamp> {
    enforce(EscrowActiveGuard({ phase: state.phase }));
    state.phase = { kind: 'TERMINATED', terminatedAt: now };
    return { result: now, push: [] };
}

/**
 * Sweeps the frozen locked balance of each listed recipient to the safe address
 * in a single transfer. Unknown, terminated and already-seized recipients
 * contribute nothing.
 */
export function seizeLockedTokens(state: EscrowState, addresses: readonly Address[], now: Timestamp): Effects<SeizureReceipt> {
    enforce(EscrowTerminatedGuard({ phase: state.phase }));

    let seized = 0n;
    const swept: Address[] = [];
    for (const raw of addresses) {
        const address = normalizeAddress(raw);
        const recipient = state.recipients[address];
        if (!recipient || recipient.status === 'TERMINATED' || state.seized[address] !== undefined) continue;

        const locked = lockedAmount(recipient, now, state.phase);
        state.seized[address] = locked;
        seized += locked;
        swept.push(address);
    }
    state.totalSeized += seized;

    return {
        result: { seized, recipients: swept },
        push: [{ account: state.safeAddress, amount: seized }]
    };
}

export function transferDust(state: EscrowState): Effects<Amount> {
    const dust = state.dust;
    // Zeroed in the same commit that schedules the transfer.
    state.dust = 0n;
    state.totalDustSwept += dust;
    return {
        result: dust,
        push: [{ account: state.safeAddress, amount: dust }]
    };
}

export function updateSafeAddress(state: EscrowState, address: Address): Effects<Address> {
    enforce(EscrowActiveGuard({ phase: state.phase }));
    enforce(AddressGuard({ address, field: 'safe address' }));
    state.safeAddress = normalizeAddress(address);
    return { result: state.safeAddress, push: [] };
}
