// src/kernel-core/L0/Invariants.ts
import { ErrorCode } from '../Errors.js';
import { lockedAmount } from '../L1/Schedule.js';
import { isZeroAddress } from './Primitives.js';
import type { EscrowState, Recipient, Timestamp } from './Ontology.js';

export interface Invariant {
    id: string;
    boundary: string; // The named boundary (e.g. "Recipient Entitlement")
    description: string;
    permits: string; // "What would make this permissible?"
    predicate: (context: InvariantContext) => boolean;
    violation: ErrorCode;
}

export interface InvariantContext {
    state: EscrowState;
    now: Timestamp;
}

export type Rejection = {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    permissible: string;
    message: string;
};

const live = (state: EscrowState): Recipient[] =>
    Object.values(state.recipients).filter(r => r.status !== 'TERMINATED');

// I. Recipient Entitlement
export const INV_REC_01: Invariant = {
    id: 'INV-REC-01',
    boundary: 'Recipient Entitlement',
    description: 'Claimed never exceeds the recipient total',
    permits: 'Claim no more than the remaining entitlement.',
    predicate: ({ state }) => Object.values(state.recipients).every(r => r.totalClaimed <= r.totalVestingAmount),
    violation: ErrorCode.CLAIM_EXCEEDS_ENTITLEMENT
};

export const INV_REC_02: Invariant = {
    id: 'INV-REC-02',
    boundary: 'Recipient Entitlement',
    description: 'Claimed plus locked never exceeds the recipient total',
    permits: 'Only vested, unclaimed tokens may leave the escrow.',
    predicate: ({ state, now }) => live(state).every(r =>
        r.totalClaimed + lockedAmount(r, now, state.phase) <= r.totalVestingAmount
    ),
    violation: ErrorCode.CLAIM_EXCEEDS_ENTITLEMENT
};

// II. Escrow Conservation
export const INV_ESC_01: Invariant = {
    id: 'INV-ESC-01',
    boundary: 'Escrow Conservation',
    description: 'Global claimed never exceeds allocated supply',
    permits: 'Aggregate claims must stay within what was allocated.',
    predicate: ({ state }) => state.totalClaimed <= state.totalAllocatedSupply,
    violation: ErrorCode.CLAIM_EXCEEDS_ENTITLEMENT
};

export const INV_ESC_02: Invariant = {
    id: 'INV-ESC-02',
    boundary: 'Escrow Conservation',
    description: 'Every funded unit is either allocated, dust, or swept dust',
    permits: 'Funding must be fully accounted for by allocations and dust.',
    predicate: ({ state }) => state.totalAllocatedSupply + state.dust + state.totalDustSwept === state.totalFunded,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_ESC_03: Invariant = {
    id: 'INV-ESC-03',
    boundary: 'Escrow Conservation',
    description: 'Claimed plus seized never exceeds allocated supply',
    permits: 'Outflows to recipients and the safe address must stay within allocations.',
    predicate: ({ state }) => state.totalClaimed + state.totalSeized <= state.totalAllocatedSupply,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_ESC_04: Invariant = {
    id: 'INV-ESC-04',
    boundary: 'Escrow Custody',
    description: 'Safe address is never the zero address',
    permits: 'Configure a real safe address.',
    predicate: ({ state }) => !isZeroAddress(state.safeAddress),
    violation: ErrorCode.INVALID_ADDRESS
};

// --- Aggregate Check ---
export const ESCROW_INVARIANTS: Invariant[] = [
    INV_REC_01, INV_REC_02,
    INV_ESC_01, INV_ESC_02, INV_ESC_03, INV_ESC_04
];

export function checkInvariants(context: InvariantContext): { ok: true } | { ok: false; rejection: Rejection } {
    for (const inv of ESCROW_INVARIANTS) {
        if (!inv.predicate(context)) {
            return {
                ok: false,
                rejection: {
                    code: inv.violation,
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    permissible: inv.permits,
                    message: `Invariant Violation: ${inv.description}`
                }
            };
        }
    }
    return { ok: true };
}
