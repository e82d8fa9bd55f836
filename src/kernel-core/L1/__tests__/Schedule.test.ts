import { describe, test, expect } from '@jest/globals';
import { canClaim, claimStartTime, claimableAmount, lockedAmount, vestedAmount, vestingRate } from '../Schedule.js';
import type { EscrowPhase } from '../../L0/Ontology.js';
import { T, recipient } from '../../__tests__/fixtures.js';

const ACTIVE: EscrowPhase = { kind: 'ACTIVE' };
const terminatedAt = (at: bigint): EscrowPhase => ({ kind: 'TERMINATED', terminatedAt: at });

describe('L1 Schedule Model', () => {

    describe('Vesting rate', () => {
        test('truncates total over the seconds after the cliff', () => {
            expect(vestingRate(1000n, T, T + 1000n, 100n)).toBe(1n);
            expect(vestingRate(5000n, 0n, 1000n, 100n)).toBe(5n);
            expect(vestingRate(899n, 0n, 1000n, 100n)).toBe(0n);
        });

        test('rejects a cliff that consumes the whole schedule', () => {
            expect(() => vestingRate(1n, 0n, 10n, 10n)).toThrow('[Vesting:INVALID_SCHEDULE]');
        });

        test('refuses to wrap when the cliff is longer than the schedule', () => {
            expect(() => vestingRate(1n, 0n, 10n, 11n)).toThrow('[Vesting:ARITHMETIC_UNDERFLOW]');
        });
    });

    describe('Cliff', () => {
        test('claims open at start plus cliff', () => {
            const r = recipient();
            expect(claimStartTime(r)).toBe(T + 100n);
            expect(canClaim(r, T + 99n)).toBe(false);
            expect(canClaim(r, T + 100n)).toBe(true);
        });

        test('paused and terminated recipients cannot claim', () => {
            expect(canClaim(recipient({ status: 'PAUSED', lastPausedAt: T + 200n }), T + 500n)).toBe(false);
            expect(canClaim(recipient({ status: 'TERMINATED' }), T + 500n)).toBe(false);
        });

        test('before the cliff the full vesting window stays locked', () => {
            expect(lockedAmount(recipient(), T - 500n, ACTIVE)).toBe(900n);
            expect(lockedAmount(recipient(), T + 50n, ACTIVE)).toBe(900n);
        });
    });

    describe('Running schedule', () => {
        test('releases the truncation remainder once the cliff passes', () => {
            const r = recipient();
            expect(lockedAmount(r, T + 100n, ACTIVE)).toBe(900n);
            expect(claimableAmount(r, T + 100n, ACTIVE)).toBe(100n);
            expect(claimableAmount(r, T + 600n, ACTIVE)).toBe(600n);
        });

        test('an evenly divisible total accrues one token per second after the cliff', () => {
            const r = recipient({ totalVestingAmount: 900n });
            expect(claimableAmount(r, T + 100n, ACTIVE)).toBe(0n);
            expect(claimableAmount(r, T + 600n, ACTIVE)).toBe(500n);
        });

        test('claimed tokens are deducted from claimable but not from vested', () => {
            const r = recipient({ totalClaimed: 300n });
            expect(claimableAmount(r, T + 600n, ACTIVE)).toBe(300n);
            expect(vestedAmount(r, T + 600n, ACTIVE)).toBe(600n);
        });

        test('everything unlocks at the end time', () => {
            const r = recipient({ totalClaimed: 250n });
            expect(lockedAmount(r, T + 1000n, ACTIVE)).toBe(0n);
            expect(claimableAmount(r, T + 5000n, ACTIVE)).toBe(750n);
        });
    });

    describe('Frozen valuations', () => {
        test('a paused recipient is valued at its pause instant', () => {
            const r = recipient({ status: 'PAUSED', lastPausedAt: T + 600n });
            expect(lockedAmount(r, T + 900n, ACTIVE)).toBe(400n);
            expect(claimableAmount(r, T + 5000n, ACTIVE)).toBe(600n);
        });

        test('a pause before the cliff keeps the whole window locked', () => {
            const r = recipient({ status: 'PAUSED', lastPausedAt: T + 50n });
            expect(lockedAmount(r, T + 2000n, ACTIVE)).toBe(900n);
        });

        test('a pause after the end time locks nothing', () => {
            const r = recipient({ status: 'PAUSED', lastPausedAt: T + 1200n });
            expect(lockedAmount(r, T + 1300n, ACTIVE)).toBe(0n);
        });

        test('escrow termination freezes unpaused recipients at the termination instant', () => {
            const r = recipient();
            expect(lockedAmount(r, T + 900n, terminatedAt(T + 600n))).toBe(400n);
            expect(lockedAmount(r, T + 5000n, terminatedAt(T + 600n))).toBe(400n);
            expect(lockedAmount(r, T + 5000n, terminatedAt(T + 1000n))).toBe(0n);
        });

        test('a pause that precedes escrow termination keeps its own valuation', () => {
            const r = recipient({ status: 'PAUSED', lastPausedAt: T + 300n });
            expect(lockedAmount(r, T + 900n, terminatedAt(T + 600n))).toBe(700n);
        });
    });

    test('terminated recipients have no valuation', () => {
        const r = recipient({ status: 'TERMINATED' });
        expect(() => lockedAmount(r, T, ACTIVE)).toThrow('[Vesting:STATE_CONFLICT]');
        expect(() => claimableAmount(r, T, ACTIVE)).toThrow('[Vesting:STATE_CONFLICT]');
    });
});
