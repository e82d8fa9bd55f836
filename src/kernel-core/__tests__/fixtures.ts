import { VestingKernel } from '../Kernel.js';
import type { KernelOptions } from '../Kernel.js';
import { ManualClock, StaticAuthorization } from '../L0/Ports.js';
import type { Address, Amount, Recipient, RecipientBatch, RecipientEntry, Timestamp } from '../L0/Ontology.js';
import { EscrowStore } from '../L2/State.js';
import { AuditLog } from '../L5/Audit.js';
import { InMemoryFundsLedger } from '../../infrastructure/ledger/InMemoryFundsLedger.js';

export const address = (n: number): Address => `0x${n.toString(16).padStart(40, '0')}`;

export const ADMIN = address(0xad);
export const SAFE = address(0x5afe);
export const ESCROW = address(0xe5c40);
export const ALICE = address(0xa11ce);
export const BOB = address(0xb0b);

// Schedules in tests start at T; the clock opens at OPENED.
export const OPENED: Timestamp = 1000n;
export const T: Timestamp = 2000n;

export function entry(overrides: Partial<RecipientEntry> = {}): RecipientEntry {
    return {
        address: ALICE,
        amount: 1000n,
        startTime: T,
        endTime: T + 1000n,
        cliffDuration: 100n,
        ...overrides
    };
}

export function toBatch(entries: RecipientEntry[]): RecipientBatch {
    return {
        addresses: entries.map(e => e.address),
        amounts: entries.map(e => e.amount),
        startTimes: entries.map(e => e.startTime),
        endTimes: entries.map(e => e.endTime),
        cliffDurations: entries.map(e => e.cliffDuration)
    };
}

export function recipient(overrides: Partial<Recipient> = {}): Recipient {
    return {
        address: ALICE,
        startTime: T,
        endTime: T + 1000n,
        cliffDuration: 100n,
        lastPausedAt: 0n,
        vestingPerSec: 1n,
        totalVestingAmount: 1000n,
        totalClaimed: 0n,
        status: 'UNPAUSED',
        ...overrides
    };
}

export interface Harness {
    kernel: VestingKernel;
    clock: ManualClock;
    ledger: InMemoryFundsLedger;
    audit: AuditLog;
}

export function createHarness(balance: Amount = 1_000_000n, options: KernelOptions = {}): Harness {
    const clock = new ManualClock(OPENED);
    const ledger = new InMemoryFundsLedger(ESCROW);
    ledger.mint(ADMIN, balance);
    ledger.approve(ADMIN, balance);

    const audit = new AuditLog();
    const kernel = new VestingKernel(
        EscrowStore.genesis(SAFE),
        { clock, funds: ledger, authorization: new StaticAuthorization(ADMIN) },
        audit,
        options
    );
    return { kernel, clock, ledger, audit };
}

/**
 * A harness with ALICE registered on the default schedule, fully funded.
 */
export function fundedHarness(amount: Amount = 1000n): Harness {
    const harness = createHarness();
    harness.kernel.addRecipientEntries(ADMIN, [entry({ amount })], amount);
    return harness;
}
