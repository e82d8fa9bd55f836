import { describe, test, expect } from '@jest/globals';
import { ADMIN, ALICE, BOB, SAFE, T, createHarness, entry, fundedHarness } from '../../__tests__/fixtures.js';

describe('L3 Projections', () => {

    test('recipient view values the schedule at the requested instant', () => {
        const { kernel } = fundedHarness();
        const view = kernel.view(ALICE, T + 600n);

        expect(view).toMatchObject({
            address: ALICE,
            status: 'UNPAUSED',
            claimStartTime: T + 100n,
            locked: 400n,
            claimable: 600n,
            vested: 600n,
            valuedAt: T + 600n
        });
    });

    test('valuations before the last committed update are rejected', () => {
        const { kernel, clock } = fundedHarness();
        clock.set(T + 600n);
        kernel.claim(ALICE, 600n);

        expect(() => kernel.view(ALICE, T + 200n)).toThrow('[Vesting:TEMPORAL_PARADOX]');
        expect(() => kernel.claimableOf(ALICE, T + 200n)).toThrow('[Vesting:TEMPORAL_PARADOX]');
        expect(() => kernel.listRecipients(T + 599n)).toThrow('[Vesting:TEMPORAL_PARADOX]');
        expect(kernel.view(ALICE, T + 600n)).toMatchObject({ claimable: 0n, locked: 400n, vested: 600n });
    });

    test('terminated recipients are listed without a valuation', () => {
        const { kernel, clock } = fundedHarness();
        clock.set(T + 600n);
        kernel.terminateRecipient(ADMIN, ALICE);

        const view = kernel.view(ALICE);
        expect(view.status).toBe('TERMINATED');
        expect(view.totalClaimed).toBe(600n);
        expect(view.locked).toBeNull();
        expect(view.claimable).toBeNull();
        expect(view.vested).toBeNull();
    });

    test('summary counts recipients by status', () => {
        const { kernel, clock } = createHarness();
        kernel.addRecipientEntries(ADMIN, [entry(), entry({ address: BOB })], 2000n);
        clock.set(T + 10n);
        kernel.pause(ADMIN, BOB);

        const summary = kernel.summary();
        expect(summary).toEqual({
            phase: 'ACTIVE',
            terminatedAt: null,
            safeAddress: SAFE,
            totalFunded: 2000n,
            totalAllocatedSupply: 2000n,
            totalClaimed: 0n,
            totalSeized: 0n,
            dust: 0n,
            totalDustSwept: 0n,
            recipients: { UNPAUSED: 1, PAUSED: 1, TERMINATED: 0 },
            version: 2
        });
        expect(kernel.listRecipients(T + 10n).map(v => v.address)).toEqual([ALICE, BOB]);
    });
});
