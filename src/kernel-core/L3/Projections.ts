import { claimStartTime, claimableAmount, lockedAmount, vestedAmount } from '../L1/Schedule.js';
import type { Address, Amount, EscrowPhase, EscrowState, Recipient, RecipientStatus, Timestamp } from '../L0/Ontology.js';

/**
 * Read-models derived from the escrow state.
 * Terminated recipients have no locked, claimable or vested valuation.
 */
export interface RecipientView {
    address: Address;
    status: RecipientStatus;
    startTime: Timestamp;
    endTime: Timestamp;
    cliffDuration: Timestamp;
    claimStartTime: Timestamp;
    lastPausedAt: Timestamp;
    vestingPerSec: Amount;
    totalVestingAmount: Amount;
    totalClaimed: Amount;
    locked: Amount | null;
    claimable: Amount | null;
    vested: Amount | null;
    valuedAt: Timestamp;
}

export interface EscrowSummary {
    phase: EscrowPhase['kind'];
    terminatedAt: Timestamp | null;
    safeAddress: Address;
    totalFunded: Amount;
    totalAllocatedSupply: Amount;
    totalClaimed: Amount;
    totalSeized: Amount;
    dust: Amount;
    totalDustSwept: Amount;
    recipients: Record<RecipientStatus, number>;
    version: number;
}

export function describeRecipient(recipient: Recipient, at: Timestamp, phase: EscrowPhase): RecipientView {
    const valued = recipient.status !== 'TERMINATED';
    return {
        address: recipient.address,
        status: recipient.status,
        startTime: recipient.startTime,
        endTime: recipient.endTime,
        cliffDuration: recipient.cliffDuration,
        claimStartTime: claimStartTime(recipient),
        lastPausedAt: recipient.lastPausedAt,
        vestingPerSec: recipient.vestingPerSec,
        totalVestingAmount: recipient.totalVestingAmount,
        totalClaimed: recipient.totalClaimed,
        locked: valued ? lockedAmount(recipient, at, phase) : null,
        claimable: valued ? claimableAmount(recipient, at, phase) : null,
        vested: valued ? vestedAmount(recipient, at, phase) : null,
        valuedAt: at
    };
}

export function summarizeEscrow(state: EscrowState): EscrowSummary {
    const recipients: Record<RecipientStatus, number> = { UNPAUSED: 0, PAUSED: 0, TERMINATED: 0 };
    for (const r of Object.values(state.recipients)) recipients[r.status]++;

    return {
        phase: state.phase.kind,
        terminatedAt: state.phase.kind === 'TERMINATED' ? state.phase.terminatedAt : null,
        safeAddress: state.safeAddress,
        totalFunded: state.totalFunded,
        totalAllocatedSupply: state.totalAllocatedSupply,
        totalClaimed: state.totalClaimed,
        totalSeized: state.totalSeized,
        dust: state.dust,
        totalDustSwept: state.totalDustSwept,
        recipients,
        version: state.version
    };
}
