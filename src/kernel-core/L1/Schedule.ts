// src/kernel-core/L1/Schedule.ts
import { ErrorCode, KernelError } from '../Errors.js';
import { max, sub } from '../L0/Primitives.js';
import type { Amount, EscrowPhase, Recipient, Timestamp } from '../L0/Ontology.js';

/**
 * Schedule Model
 *
 * Pure valuation of one recipient's entitlement at a point in time.
 * Nothing here mutates; every function is a function of the stored fields,
 * the caller's clock reading and the escrow phase.
 *
 * The rate is `totalVestingAmount / (endTime - startTime - cliffDuration)`,
 * truncated once at creation. Because of the truncation, `rate * vestingSeconds`
 * can fall short of the total; the shortfall is never locked, so it is released
 * with the first claimable second and the final claim after `endTime` always
 * empties the entitlement exactly.
 */

export function vestingRate(
    totalVestingAmount: Amount,
    startTime: Timestamp,
    endTime: Timestamp,
    cliffDuration: Timestamp
): Amount {
    const vestingSeconds = sub(sub(endTime, startTime, 'vesting duration'), cliffDuration, 'vesting seconds after cliff');
    if (vestingSeconds === 0n) {
        throw new KernelError(ErrorCode.INVALID_SCHEDULE, 'Cliff must end strictly before the schedule does');
    }
    return totalVestingAmount / vestingSeconds;
}

export function claimStartTime(recipient: Recipient): Timestamp {
    return recipient.startTime + recipient.cliffDuration;
}

export function canClaim(recipient: Recipient, now: Timestamp): boolean {
    return recipient.status === 'UNPAUSED' && now >= claimStartTime(recipient);
}

function assertValued(recipient: Recipient): void {
    if (recipient.status === 'TERMINATED') {
        throw new KernelError(
            ErrorCode.STATE_CONFLICT,
            `Recipient ${recipient.address} is terminated and has no locked or claimable balance`,
            { address: recipient.address, status: recipient.status }
        );
    }
}

/**
 * Portion of the entitlement not yet vested.
 *
 * - Paused recipients are frozen at their own pause instant.
 * - Once the escrow is terminated, unpaused recipients are frozen at the
 *   termination instant, however late the query. This check precedes the
 *   end-time check on purpose: a seized balance must stay locked after `endTime`.
 * - Otherwise the lock runs down with `now`, clamped to the cliff end so a
 *   query before the cliff reports the full vesting window.
 */
export function lockedAmount(recipient: Recipient, now: Timestamp, phase: EscrowPhase): Amount {
    assertValued(recipient);
    const cliffEnd = claimStartTime(recipient);

    if (recipient.status === 'PAUSED') {
        if (recipient.lastPausedAt >= recipient.endTime) return 0n;
        return recipient.vestingPerSec * sub(recipient.endTime, max(recipient.lastPausedAt, cliffEnd), 'paused lock window');
    }

    if (phase.kind === 'TERMINATED') {
        if (phase.terminatedAt >= recipient.endTime) return 0n;
        return recipient.vestingPerSec * sub(recipient.endTime, max(phase.terminatedAt, cliffEnd), 'frozen lock window');
    }

    if (now >= recipient.endTime) return 0n;
    return recipient.vestingPerSec * sub(recipient.endTime, max(now, cliffEnd), 'lock window');
}

export function claimableAmount(recipient: Recipient, now: Timestamp, phase: EscrowPhase): Amount {
    const locked = lockedAmount(recipient, now, phase);
    return sub(recipient.totalVestingAmount, recipient.totalClaimed + locked, 'claimable');
}

/**
 * Vested so far, including what has already been claimed.
 */
export function vestedAmount(recipient: Recipient, now: Timestamp, phase: EscrowPhase): Amount {
    return sub(recipient.totalVestingAmount, lockedAmount(recipient, now, phase), 'vested');
}
