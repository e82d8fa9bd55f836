// src/kernel-core/L3/Allocation.ts
import { ErrorCode, KernelError } from '../Errors.js';
import { AddressGuard, ClaimGuard, EscrowActiveGuard, RecipientStatusGuard, ScheduleGuard, enforce } from '../L0/Guards.js';
import { normalizeAddress, sub, sum } from '../L0/Primitives.js';
import { claimableAmount, vestingRate } from '../L1/Schedule.js';
import { requireRecipient } from '../L2/Lifecycle.js';
import type { Amount, Effects, EscrowState, ExecutionContext, Recipient, RecipientBatch, RecipientEntry } from '../L0/Ontology.js';

export interface AllocationReceipt {
    recipients: number;
    allocated: Amount;
    dust: Amount;
}

/**
 * Zips the boundary's parallel arrays into entries.
 */
export function toEntries(batch: RecipientBatch): RecipientEntry[] {
    const { addresses, amounts, startTimes, endTimes, cliffDurations } = batch;
    const lengths = [addresses.length, amounts.length, startTimes.length, endTimes.length, cliffDurations.length];
    if (lengths.some(l => l !== addresses.length)) {
        throw new KernelError(ErrorCode.INVALID_BATCH, `Parallel arrays differ in length: ${lengths.join('/')}`, { lengths: lengths.join('/') });
    }
    return addresses.map((address, i) => ({
        address,
        amount: amounts[i] ?? 0n,
        startTime: startTimes[i] ?? 0n,
        endTime: endTimes[i] ?? 0n,
        cliffDuration: cliffDurations[i] ?? 0n
    }));
}

/**
 * Validates a batch and registers every entry as an UNPAUSED recipient.
 * The funding pull is returned as an effect and runs before the commit.
 *
 * Addresses already present, or repeated inside the batch, are rejected:
 * re-adding would overwrite a live schedule and drop its claimed total.
 */
export function addRecipients(
    state: EscrowState,
    entries: readonly RecipientEntry[],
    totalFunding: Amount,
    ctx: ExecutionContext
): Effects<AllocationReceipt> {
    enforce(EscrowActiveGuard({ phase: state.phase }));
    if (entries.length === 0) {
        throw new KernelError(ErrorCode.INVALID_BATCH, 'Recipient batch is empty');
    }
    if (totalFunding <= 0n) {
        throw new KernelError(ErrorCode.INVALID_SCHEDULE, `Total funding must be positive, got ${totalFunding}`);
    }

    const seen = new Set<string>();
    const recipients = entries.map((entry): Recipient => {
        enforce(AddressGuard({ address: entry.address, field: 'recipient address' }));
        enforce(ScheduleGuard({ entry, now: ctx.now, allowPastStartTime: ctx.allowPastStartTime }));

        const address = normalizeAddress(entry.address);
        if (seen.has(address) || state.recipients[address]) {
            throw new KernelError(ErrorCode.STATE_CONFLICT, `Recipient ${address} is already registered`, {
                invariantId: 'PRE-REC-02',
                address
            });
        }
        seen.add(address);

        return {
            address,
            startTime: entry.startTime,
            endTime: entry.endTime,
            cliffDuration: entry.cliffDuration,
            lastPausedAt: 0n,
            vestingPerSec: vestingRate(entry.amount, entry.startTime, entry.endTime, entry.cliffDuration),
            totalVestingAmount: entry.amount,
            totalClaimed: 0n,
            status: 'UNPAUSED'
        };
    });

    const allocated = sum(recipients.map(r => r.totalVestingAmount));
    if (allocated > totalFunding) {
        throw new KernelError(ErrorCode.INSUFFICIENT_FUNDS, `Batch allocates ${allocated} but only ${totalFunding} is funded`, {
            allocated: allocated.toString(),
            totalFunding: totalFunding.toString()
        });
    }
    const dust = sub(totalFunding, allocated, 'batch dust');

    for (const recipient of recipients) {
        state.recipients[recipient.address] = recipient;
    }
    state.totalFunded += totalFunding;
    state.totalAllocatedSupply += allocated;
    state.dust += dust;

    return {
        result: { recipients: recipients.length, allocated, dust },
        pull: { account: ctx.caller, amount: totalFunding },
        push: []
    };
}

/**
 * Withdraws `amount` of the caller's vested, unclaimed balance.
 */
export function claim(state: EscrowState, amount: Amount, ctx: ExecutionContext): Effects<Amount> {
    const recipient = requireRecipient(state, normalizeAddress(ctx.caller));
    enforce(RecipientStatusGuard({ recipient, allowed: ['UNPAUSED'], operation: 'claim' }));

    const claimable = claimableAmount(recipient, ctx.now, state.phase);
    enforce(ClaimGuard({ recipient, amount, claimable, now: ctx.now }));

    recipient.totalClaimed += amount;
    state.totalClaimed += amount;

    return {
        result: amount,
        push: [{ account: recipient.address, amount }]
    };
}
