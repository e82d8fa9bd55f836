// src/kernel-core/L0/Ontology.ts

// --- 1. Scalars ---
export type Address = string; // 0x-prefixed, 20 bytes, lower-case once normalized
export type Timestamp = bigint; // logical seconds
export type Amount = bigint; // token base units
export type ActionID = string;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

// --- 2. Recipient ---
export type RecipientStatus = 'UNPAUSED' | 'PAUSED' | 'TERMINATED';

export interface Recipient {
    address: Address;
    startTime: Timestamp;
    endTime: Timestamp;
    cliffDuration: Timestamp;
    lastPausedAt: Timestamp; // 0 if never paused
    vestingPerSec: Amount; // fixed at creation, truncated
    totalVestingAmount: Amount;
    totalClaimed: Amount;
    status: RecipientStatus;
}

export interface RecipientEntry {
    address: Address;
    amount: Amount;
    startTime: Timestamp;
    endTime: Timestamp;
    cliffDuration: Timestamp;
}

/**
 * Parallel-array form accepted at the boundary.
 */
export interface RecipientBatch {
    addresses: Address[];
    amounts: Amount[];
    startTimes: Timestamp[];
    endTimes: Timestamp[];
    cliffDurations: Timestamp[];
}

// --- 3. Escrow ---
export type EscrowPhase =
    | { kind: 'ACTIVE' }
    | { kind: 'TERMINATED'; terminatedAt: Timestamp };

export interface EscrowState {
    phase: EscrowPhase;
    safeAddress: Address;
    totalFunded: Amount;
    totalAllocatedSupply: Amount;
    totalClaimed: Amount;
    totalSeized: Amount; // locked balances swept to the safe address
    dust: Amount;
    totalDustSwept: Amount;
    recipients: Record<Address, Recipient>;
    seized: Record<Address, Amount>; // address -> amount swept by seizeLockedTokens
    version: number;
    lastUpdate: Timestamp;
}

// --- 4. Operations (journaled) ---
export type Operation =
    | { type: 'ADD_RECIPIENTS'; entries: RecipientEntry[]; totalFunding: Amount }
    | { type: 'PAUSE'; address: Address }
    | { type: 'UNPAUSE'; address: Address }
    | { type: 'TERMINATE_RECIPIENT'; address: Address }
    | { type: 'TERMINATE_ESCROW' }
    | { type: 'CLAIM'; amount: Amount }
    | { type: 'SEIZE_LOCKED'; addresses: Address[] }
    | { type: 'TRANSFER_DUST' }
    | { type: 'UPDATE_SAFE_ADDRESS'; address: Address };

export type OperationType = Operation['type'];

export interface Action {
    actionId: ActionID;
    caller: Address;
    operation: Operation;
    timestamp: Timestamp; // clock reading taken once at entry
}

// --- 5. Fund movement ---
export interface Transfer {
    account: Address;
    amount: Amount;
}

export interface Effects<R> {
    result: R;
    pull?: Transfer; // executed before commit
    push: Transfer[]; // executed after commit, in order
}

export interface ExecutionContext {
    caller: Address;
    now: Timestamp;
    allowPastStartTime: boolean;
}
