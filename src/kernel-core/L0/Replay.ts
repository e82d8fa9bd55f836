import { ErrorCode, KernelError } from '../Errors.js';
import { VestingKernel } from '../Kernel.js';
import type { KernelOptions } from '../Kernel.js';
import { EscrowStore } from '../L2/State.js';
import { AuditLog } from '../L5/Audit.js';
import { hashState } from './Crypto.js';
import { ManualClock } from './Ports.js';
import type { Authorization, FundsLedger } from './Ports.js';
import type { EscrowState } from './Ontology.js';
import { createLogger } from '../../Platform/Logger.js';

const log = createLogger('ReplayEngine');

// Journaled operations already moved their funds and passed authorization.
const SETTLED_FUNDS: FundsLedger = { pull: () => undefined, push: () => undefined };
const RECORDED_AUTHORITY: Authorization = { isAdministrator: () => true };

export interface ReplayResult {
    state: EscrowState;
    replayed: number;
    stateHash: string;
}

export class ReplayEngine {
    /**
     * Rebuilds the escrow state by re-running every SUCCESS entry of the log, in
     * order, on a fresh kernel whose clock is pinned to each entry's timestamp.
     * Each rebuilt state is checked against the hash recorded with its entry.
     */
    public replay(audit: AuditLog, genesis: EscrowState, options: KernelOptions = {}): ReplayResult {
        const history = audit.getHistory();
        log.info(`Starting replay of ${history.length} events`);

        const clock = new ManualClock(genesis.lastUpdate);
        const kernel = new VestingKernel(
            new EscrowStore(genesis),
            { clock, funds: SETTLED_FUNDS, authorization: RECORDED_AUTHORITY },
            new AuditLog(),
            options
        );

        let replayed = 0;
        for (const entry of history) {
            if (entry.status !== 'SUCCESS') continue;
            const { action } = entry;

            try {
                clock.set(action.timestamp);
                kernel.dispatch(action.caller, action.operation);
            } catch (e) {
                const reason = e instanceof Error ? e.message : String(e);
                throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Replay failure at action ${action.actionId}: ${reason}`, {
                    actionId: action.actionId
                });
            }

            const recorded = entry.metadata?.['stateHash'];
            const rebuilt = hashState(kernel.current);
            if (recorded !== undefined && recorded !== rebuilt) {
                throw new KernelError(ErrorCode.INTEGRITY_BREACH, `State hash mismatch after action ${action.actionId}`, {
                    actionId: action.actionId,
                    recorded: String(recorded),
                    rebuilt
                });
            }
            replayed++;
        }

        log.info('Replay complete', { replayed, version: kernel.current.version });
        return { state: kernel.current, replayed, stateHash: hashState(kernel.current) };
    }
}
