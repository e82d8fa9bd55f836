// src/kernel-core/L0/Guards.ts
import { ErrorCode, KernelError } from '../Errors.js';
import { claimStartTime } from '../L1/Schedule.js';
import { isUnsigned, isWellFormedAddress, isZeroAddress, sub } from './Primitives.js';
import type { Rejection } from './Invariants.js';
import type { Authorization } from './Ports.js';
import type { Address, Amount, EscrowPhase, Recipient, RecipientEntry, Timestamp } from './Ontology.js';

// --- Guard Pattern ---
export type GuardResult = { ok: true } | { ok: false; rejection: Rejection };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, invariantId: string, boundary: string, permissible: string, message: string): GuardResult => ({
    ok: false,
    rejection: { code, invariantId, boundary, permissible, message }
});

/**
 * Throws the guard's rejection as a KernelError; the rejection travels as metadata
 * so callers can tell exactly which precondition failed.
 */
export function enforce(result: GuardResult): void {
    if (!result.ok) {
        throw new KernelError(result.rejection.code, result.rejection.message, { ...result.rejection });
    }
}

// --- Concrete Guards ---

// 1. Authority
export const AdministratorGuard: Guard<{ caller: Address, authorization: Authorization }> = ({ caller, authorization }) => {
    if (!authorization.isAdministrator(caller)) {
        return FAIL(ErrorCode.UNAUTHORIZED, 'PRE-AUTH-01', 'Administrative Authority',
            'Only the administrator may invoke this operation.',
            `Caller ${caller} is not the administrator`);
    }
    return OK;
};

// 2. Reentrancy (one operation at a time)
export const ReentrancyGuard: Guard<{ inFlight: boolean }> = ({ inFlight }) => {
    if (inFlight) {
        return FAIL(ErrorCode.REENTRANT_CALL, 'PRE-SEC-01', 'Serialized Execution',
            'Wait for the running operation to complete.',
            'Reentrant call rejected while another operation is in flight');
    }
    return OK;
};

// 3. Time (Monotonicity)
export const TimeGuard: Guard<{ now: Timestamp, lastUpdate: Timestamp }> = ({ now, lastUpdate }) => {
    if (now < lastUpdate) {
        return FAIL(ErrorCode.TEMPORAL_PARADOX, 'PRE-TIME-01', 'Temporal Integrity',
            'Clock readings must never go backwards.',
            `Time Violation: ${now} is before last update ${lastUpdate}`);
    }
    return OK;
};

// 4. Addresses
export const AddressGuard: Guard<{ address: Address, field: string }> = ({ address, field }) => {
    if (!isWellFormedAddress(address)) {
        return FAIL(ErrorCode.INVALID_ADDRESS, 'PRE-ADDR-01', 'Address Integrity',
            'Supply a 0x-prefixed 20-byte hex address.',
            `Malformed ${field}: ${address}`);
    }
    if (isZeroAddress(address)) {
        return FAIL(ErrorCode.INVALID_ADDRESS, 'PRE-ADDR-02', 'Address Integrity',
            'Supply a non-zero address.',
            `Zero address supplied for ${field}`);
    }
    return OK;
};

// 5. Escrow phase
export const EscrowActiveGuard: Guard<{ phase: EscrowPhase }> = ({ phase }) => {
    if (phase.kind === 'TERMINATED') {
        return FAIL(ErrorCode.ESCROW_TERMINATED, 'PRE-ESC-01', 'Escrow Lifecycle',
            'Operation is only available before the escrow is terminated.',
            `Escrow terminated at ${phase.terminatedAt}`);
    }
    return OK;
};

export const EscrowTerminatedGuard: Guard<{ phase: EscrowPhase }> = ({ phase }) => {
    if (phase.kind !== 'TERMINATED') {
        return FAIL(ErrorCode.ESCROW_NOT_TERMINATED, 'PRE-ESC-02', 'Escrow Lifecycle',
            'Terminate the escrow first.',
            'Escrow is still active');
    }
    return OK;
};

// 6. Schedule shape
export const ScheduleGuard: Guard<{ entry: RecipientEntry, now: Timestamp, allowPastStartTime: boolean }> = ({ entry, now, allowPastStartTime }) => {
    const { address, amount, startTime, endTime, cliffDuration } = entry;
    if (!isUnsigned(startTime) || !isUnsigned(endTime) || !isUnsigned(cliffDuration)) {
        return FAIL(ErrorCode.INVALID_SCHEDULE, 'PRE-SCH-01', 'Schedule Shape',
            'Times and durations are unsigned.',
            `Negative time field for ${address}`);
    }
    if (!allowPastStartTime && startTime <= now) {
        return FAIL(ErrorCode.INVALID_SCHEDULE, 'PRE-SCH-02', 'Schedule Shape',
            'Start time must be strictly in the future.',
            `Start time ${startTime} is not after ${now} for ${address}`);
    }
    if (endTime <= startTime) {
        return FAIL(ErrorCode.INVALID_SCHEDULE, 'PRE-SCH-03', 'Schedule Shape',
            'End time must be strictly after start time.',
            `End time ${endTime} is not after start time ${startTime} for ${address}`);
    }
    if (cliffDuration >= sub(endTime, startTime, 'schedule duration')) {
        return FAIL(ErrorCode.INVALID_SCHEDULE, 'PRE-SCH-04', 'Schedule Shape',
            'Cliff must be shorter than the schedule.',
            `Cliff ${cliffDuration} is not shorter than duration ${endTime - startTime} for ${address}`);
    }
    if (amount <= 0n) {
        return FAIL(ErrorCode.INVALID_SCHEDULE, 'PRE-SCH-05', 'Schedule Shape',
            'Each recipient must be allocated a positive amount.',
            `Non-positive amount ${amount} for ${address}`);
    }
    return OK;
};

// 7. Recipient status
export const RecipientStatusGuard: Guard<{ recipient: Recipient, allowed: readonly Recipient['status'][], operation: string }> = ({ recipient, allowed, operation }) => {
    if (!allowed.includes(recipient.status)) {
        return FAIL(ErrorCode.STATE_CONFLICT, 'PRE-REC-01', 'Recipient Lifecycle',
            `Recipient must be ${allowed.join(' or ')} to ${operation}.`,
            `Cannot ${operation} recipient ${recipient.address} in state ${recipient.status}`);
    }
    return OK;
};

// 8. Claim
export const ClaimGuard: Guard<{ recipient: Recipient, amount: Amount, claimable: Amount, now: Timestamp }> = ({ recipient, amount, claimable, now }) => {
    if (amount <= 0n) {
        return FAIL(ErrorCode.INVALID_AMOUNT, 'PRE-CLM-01', 'Claim',
            'Claim a positive amount.',
            `Non-positive claim amount ${amount}`);
    }
    const opensAt = claimStartTime(recipient);
    if (now < opensAt) {
        return FAIL(ErrorCode.CLAIM_EXCEEDS_ENTITLEMENT, 'PRE-CLM-02', 'Claim',
            'Claims open once the cliff has passed.',
            `Cliff for ${recipient.address} ends at ${opensAt}`);
    }
    if (amount > claimable) {
        return FAIL(ErrorCode.CLAIM_EXCEEDS_ENTITLEMENT, 'PRE-CLM-03', 'Claim',
            'Claim no more than the currently claimable amount.',
            `Requested ${amount} exceeds claimable ${claimable} for ${recipient.address}`);
    }
    return OK;
};
