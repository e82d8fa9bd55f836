import { describe, test, expect } from '@jest/globals';
import { toEntries } from '../Allocation.js';
import { ZERO_ADDRESS } from '../../L0/Ontology.js';
import { ADMIN, ALICE, BOB, ESCROW, OPENED, T, createHarness, entry, fundedHarness, toBatch } from '../../__tests__/fixtures.js';

describe('L3 Allocation Ledger', () => {

    describe('addRecipients', () => {
        test('registers every entry, pulls the funding and books the remainder as dust', () => {
            const { kernel, ledger, audit } = createHarness();
            const batch = toBatch([entry(), entry({ address: BOB, amount: 1800n })]);

            const receipt = kernel.addRecipients(ADMIN, batch, 2900n);

            expect(receipt).toEqual({ recipients: 2, allocated: 2800n, dust: 100n });
            expect(ledger.balanceOf(ESCROW)).toBe(2900n);
            expect(ledger.balanceOf(ADMIN)).toBe(1_000_000n - 2900n);

            const bob = kernel.getRecipient(BOB);
            expect(bob?.status).toBe('UNPAUSED');
            expect(bob?.vestingPerSec).toBe(2n);
            expect(bob?.lastPausedAt).toBe(0n);
            expect(bob?.totalClaimed).toBe(0n);

            const summary = kernel.summary();
            expect(summary.totalFunded).toBe(2900n);
            expect(summary.totalAllocatedSupply).toBe(2800n);
            expect(summary.dust).toBe(100n);
            expect(summary.version).toBe(1);
            expect(audit.getTip()?.status).toBe('SUCCESS');
        });

        test('parallel arrays must line up', () => {
            const batch = toBatch([entry(), entry({ address: BOB })]);
            batch.cliffDurations.pop();
            expect(() => toEntries(batch)).toThrow('[Vesting:INVALID_BATCH]');

            const { kernel } = createHarness();
            expect(() => kernel.addRecipients(ADMIN, batch, 2000n)).toThrow('[Vesting:INVALID_BATCH]');
        });

        test('an empty batch is rejected and journaled', () => {
            const { kernel, audit } = createHarness();
            expect(() => kernel.addRecipientEntries(ADMIN, [], 10n)).toThrow('[Vesting:INVALID_BATCH]');
            expect(audit.getTip()?.status).toBe('REJECT');
            expect(audit.getTip()?.metadata).toEqual({ code: 'INVALID_BATCH' });
        });

        test('funding must be positive and cover the batch', () => {
            const { kernel, ledger } = createHarness();
            expect(() => kernel.addRecipientEntries(ADMIN, [entry()], 0n)).toThrow('[Vesting:INVALID_SCHEDULE]');
            expect(() => kernel.addRecipientEntries(ADMIN, [entry()], 999n)).toThrow('[Vesting:INSUFFICIENT_FUNDS]');
            expect(kernel.current.version).toBe(0);
            expect(ledger.balanceOf(ESCROW)).toBe(0n);
        });

        test('schedule shape is validated per entry', () => {
            const { kernel } = createHarness();
            const reject = (overrides: Parameters<typeof entry>[0]) =>
                () => kernel.addRecipientEntries(ADMIN, [entry(overrides)], 10_000n);

            expect(reject({ startTime: OPENED })).toThrow('[Vesting:INVALID_SCHEDULE]');
            expect(reject({ endTime: T })).toThrow('[Vesting:INVALID_SCHEDULE]');
            expect(reject({ cliffDuration: 1000n })).toThrow('[Vesting:INVALID_SCHEDULE]');
            expect(reject({ amount: 0n })).toThrow('[Vesting:INVALID_SCHEDULE]');
            expect(reject({ startTime: -5n })).toThrow('[Vesting:INVALID_SCHEDULE]');
            expect(reject({ address: ZERO_ADDRESS })).toThrow('[Vesting:INVALID_ADDRESS]');
            expect(reject({ address: 'alice' })).toThrow('[Vesting:INVALID_ADDRESS]');
            expect(kernel.current.version).toBe(0);
        });

        test('past start times are accepted only when enabled', () => {
            const { kernel } = createHarness(1_000_000n, { allowPastStartTime: true });
            kernel.addRecipientEntries(ADMIN, [entry({ startTime: OPENED - 500n, endTime: OPENED + 500n })], 1000n);
            expect(kernel.getRecipient(ALICE)?.startTime).toBe(OPENED - 500n);
        });

        test('duplicate recipients are rejected, within a batch and across batches', () => {
            const { kernel } = createHarness();
            expect(() => kernel.addRecipientEntries(ADMIN, [entry(), entry()], 2000n)).toThrow('[Vesting:STATE_CONFLICT]');
            expect(kernel.getRecipient(ALICE)).toBeUndefined();

            kernel.addRecipientEntries(ADMIN, [entry()], 1000n);
            expect(() => kernel.addRecipientEntries(ADMIN, [entry({ address: BOB }), entry()], 2000n)).toThrow('[Vesting:STATE_CONFLICT]');
            expect(kernel.getRecipient(BOB)).toBeUndefined();
            expect(kernel.summary().totalFunded).toBe(1000n);
        });

        test('a failed funding pull leaves no trace in the escrow', () => {
            const { kernel, ledger, audit } = createHarness(500n);
            expect(() => kernel.addRecipientEntries(ADMIN, [entry()], 1000n)).toThrow('[Vesting:INSUFFICIENT_FUNDS]');

            expect(kernel.current.version).toBe(0);
            expect(kernel.getRecipient(ALICE)).toBeUndefined();
            expect(ledger.balanceOf(ADMIN)).toBe(500n);
            expect(audit.getTip()?.status).toBe('REJECT');
        });

        test('only the administrator allocates', () => {
            const { kernel, audit } = createHarness();
            expect(() => kernel.addRecipientEntries(ALICE, [entry()], 1000n)).toThrow('[Vesting:UNAUTHORIZED]');
            expect(audit.getTip()?.metadata).toEqual({ code: 'UNAUTHORIZED', invariantId: 'PRE-AUTH-01' });
        });

        test('allocation is closed once the escrow is terminated', () => {
            const { kernel } = createHarness();
            kernel.terminateEscrow(ADMIN);
            expect(() => kernel.addRecipientEntries(ADMIN, [entry()], 1000n)).toThrow('[Vesting:ESCROW_TERMINATED]');
        });
    });

    describe('claim', () => {
        test('nothing is claimable before the cliff', () => {
            const { kernel, clock, audit } = fundedHarness();
            clock.set(T + 99n);
            expect(() => kernel.claim(ALICE, 1n)).toThrow('[Vesting:CLAIM_EXCEEDS_ENTITLEMENT]');
            expect(audit.getTip()?.metadata).toEqual({ code: 'CLAIM_EXCEEDS_ENTITLEMENT', invariantId: 'PRE-CLM-02' });
        });

        test('claims are positive and capped at the claimable amount', () => {
            const { kernel, clock, audit } = fundedHarness();
            clock.set(T + 600n);
            expect(() => kernel.claim(ALICE, 0n)).toThrow('[Vesting:INVALID_AMOUNT]');
            expect(() => kernel.claim(ALICE, 601n)).toThrow('[Vesting:CLAIM_EXCEEDS_ENTITLEMENT]');
            expect(audit.getTip()?.metadata).toEqual({ code: 'CLAIM_EXCEEDS_ENTITLEMENT', invariantId: 'PRE-CLM-03' });
        });

        test('successive claims accumulate up to the full entitlement', () => {
            const { kernel, clock, ledger } = fundedHarness();

            clock.set(T + 600n);
            expect(kernel.claim(ALICE, 600n)).toBe(600n);
            expect(() => kernel.claim(ALICE, 1n)).toThrow('[Vesting:CLAIM_EXCEEDS_ENTITLEMENT]');

            clock.set(T + 700n);
            expect(kernel.claimableOf(ALICE)).toBe(100n);
            kernel.claim(ALICE, 100n);

            clock.set(T + 2000n);
            kernel.claim(ALICE, 300n);

            expect(kernel.getRecipient(ALICE)?.totalClaimed).toBe(1000n);
            expect(kernel.summary().totalClaimed).toBe(1000n);
            expect(ledger.balanceOf(ALICE)).toBe(1000n);
            expect(ledger.balanceOf(ESCROW)).toBe(0n);
        });

        test('only registered recipients claim', () => {
            const { kernel, clock } = fundedHarness();
            clock.set(T + 600n);
            expect(() => kernel.claim(BOB, 1n)).toThrow('[Vesting:UNKNOWN_RECIPIENT]');
        });
    });
});
