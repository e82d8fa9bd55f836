import { describe, test, expect } from '@jest/globals';
import { ReplayEngine } from '../Replay.js';
import { hashState } from '../Crypto.js';
import { genesisState } from '../../L2/State.js';
import { AuditLog } from '../../L5/Audit.js';
import { ADMIN, ALICE, BOB, SAFE, T, createHarness, entry } from '../../__tests__/fixtures.js';

describe('L0 Replay Engine', () => {

    test('rebuilds the committed state from the journal', () => {
        const { kernel, clock, ledger, audit } = createHarness();
        kernel.addRecipientEntries(ADMIN, [entry(), entry({ address: BOB, amount: 1800n })], 2900n);

        clock.set(T + 300n);
        kernel.pause(ADMIN, BOB);
        expect(() => kernel.claim(BOB, 1n)).toThrow('[Vesting:STATE_CONFLICT]');

        clock.set(T + 600n);
        kernel.claim(ALICE, 250n);
        kernel.unpause(ADMIN, BOB);
        kernel.terminateEscrow(ADMIN);

        // An aborted payout is journaled but not replayed.
        ledger.push = () => { throw new Error('transfer reverted'); };
        expect(() => kernel.transferDust(ADMIN)).toThrow('[Vesting:INSUFFICIENT_FUNDS]');

        const result = new ReplayEngine().replay(audit, genesisState(SAFE));

        expect(result.replayed).toBe(5);
        expect(result.stateHash).toBe(hashState(kernel.current));
        expect(result.state).toEqual(kernel.current);
    });

    test('a journal that diverges from its recorded hashes is an integrity breach', () => {
        const audit = new AuditLog();
        audit.append(
            { actionId: 'forged', caller: ADMIN, operation: { type: 'TERMINATE_ESCROW' }, timestamp: 5n },
            'SUCCESS',
            undefined,
            { stateHash: 'not-the-state', version: 1 }
        );

        expect(() => new ReplayEngine().replay(audit, genesisState(SAFE))).toThrow('[Vesting:INTEGRITY_BREACH]');
    });

    test('a recorded success that no longer applies is an integrity breach', () => {
        const audit = new AuditLog();
        audit.append({ actionId: 'claim-1', caller: ALICE, operation: { type: 'CLAIM', amount: 1n }, timestamp: 5n });

        expect(() => new ReplayEngine().replay(audit, genesisState(SAFE))).toThrow('Replay failure at action claim-1');
    });
});
