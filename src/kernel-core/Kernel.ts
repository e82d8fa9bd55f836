import { produce } from 'immer';
import { ErrorCode, KernelError } from './Errors.js';
import { AdministratorGuard, ReentrancyGuard, TimeGuard, enforce } from './L0/Guards.js';
import { checkInvariants } from './L0/Invariants.js';
import { hashState, randomNonce } from './L0/Crypto.js';
import { normalizeAddress } from './L0/Primitives.js';
import type { Authorization, Clock, FundsLedger } from './L0/Ports.js';
import type {
    Action, Address, Amount, Effects, EscrowState, ExecutionContext, Operation,
    Recipient, RecipientBatch, RecipientEntry, Timestamp, Transfer
} from './L0/Ontology.js';
import { canClaim, claimStartTime, claimableAmount, lockedAmount, vestedAmount } from './L1/Schedule.js';
import { pause, requireRecipient, unpause } from './L2/Lifecycle.js';
import { EscrowStore } from './L2/State.js';
import { addRecipients, claim, toEntries } from './L3/Allocation.js';
import type { AllocationReceipt } from './L3/Allocation.js';
import { describeRecipient, summarizeEscrow } from './L3/Projections.js';
import type { EscrowSummary, RecipientView } from './L3/Projections.js';
import { seizeLockedTokens, terminateEscrow, terminateRecipient, transferDust, updateSafeAddress } from './L4/Termination.js';
import type { RecipientSettlement, SeizureReceipt } from './L4/Termination.js';
import { AuditLog } from './L5/Audit.js';
import type { EvidenceMetadata } from './L5/Audit.js';
import { createLogger } from '../Platform/Logger.js';

export interface KernelPorts {
    clock: Clock;
    funds: FundsLedger;
    authorization: Authorization;
}

export interface KernelOptions {
    /** Accept schedules whose start time is not in the future. */
    allowPastStartTime?: boolean;
}

type Mutator<R> = (draft: EscrowState, ctx: ExecutionContext) => Effects<R>;

interface Prepared<R> {
    next: EscrowState;
    effects: Effects<R>;
}

/**
 * VestingKernel: the only entry point that mutates the escrow.
 *
 * Every operation reads the clock once, evaluates its guards against a draft of
 * the current state, checks the escrow invariants on the result and only then
 * commits. Funding pulls run before the commit; payouts run after it, and a
 * failed payout rolls the commit back. Each outcome is journaled.
 */
export class VestingKernel {
    private inFlight = false;
    private readonly log = createLogger('VestingKernel');

    public constructor(
        public readonly state: EscrowStore,
        private ports: KernelPorts,
        private audit: AuditLog = new AuditLog(),
        private options: KernelOptions = {}
    ) { }

    public get Audit(): AuditLog { return this.audit; }

    public get current(): EscrowState { return this.state.current; }

    // --- Administrator operations ---

    public addRecipients(caller: Address, batch: RecipientBatch, totalFunding: Amount): AllocationReceipt {
        return this.addRecipientEntries(caller, toEntries(batch), totalFunding);
    }

    public addRecipientEntries(caller: Address, entries: RecipientEntry[], totalFunding: Amount): AllocationReceipt {
        return this.execute(caller, { type: 'ADD_RECIPIENTS', entries, totalFunding }, true,
            (draft, ctx) => addRecipients(draft, entries, totalFunding, ctx));
    }

    /** @returns the pause instant */
    public pause(caller: Address, address: Address): Timestamp {
        return this.execute(caller, { type: 'PAUSE', address }, true,
            (draft, ctx) => ({ result: pause(draft, normalizeAddress(address), ctx.now).lastPausedAt, push: [] }));
    }

    /** @returns seconds added to the recipient's cliff and end time */
    public unpause(caller: Address, address: Address): Timestamp {
        return this.execute(caller, { type: 'UNPAUSE', address }, true,
            (draft, ctx) => ({ result: unpause(draft, normalizeAddress(address), ctx.now), push: [] }));
    }

    public terminateRecipient(caller: Address, address: Address): RecipientSettlement {
        return this.execute(caller, { type: 'TERMINATE_RECIPIENT', address }, true,
            (draft, ctx) => terminateRecipient(draft, normalizeAddress(address), ctx.now));
    }

    public terminateEscrow(caller: Address): Timestamp {
        return this.execute(caller, { type: 'TERMINATE_ESCROW' }, true,
            (draft, ctx) => terminateEscrow(draft, ctx.now));
    }

    public seizeLockedTokens(caller: Address, addresses: Address[]): SeizureReceipt {
        return this.execute(caller, { type: 'SEIZE_LOCKED', addresses }, true,
            (draft, ctx) => seizeLockedTokens(draft, addresses, ctx.now));
    }

    public transferDust(caller: Address): Amount {
        return this.execute(caller, { type: 'TRANSFER_DUST' }, true,
            (draft) => transferDust(draft));
    }

    public updateSafeAddress(caller: Address, address: Address): Address {
        return this.execute(caller, { type: 'UPDATE_SAFE_ADDRESS', address }, true,
            (draft) => updateSafeAddress(draft, address));
    }

    // --- Recipient operations ---

    public claim(caller: Address, amount: Amount): Amount {
        return this.execute(caller, { type: 'CLAIM', amount }, false,
            (draft, ctx) => claim(draft, amount, ctx));
    }

    /**
     * Runs a journaled operation on behalf of its recorded caller.
     */
    public dispatch(caller: Address, operation: Operation): unknown {
        switch (operation.type) {
            case 'ADD_RECIPIENTS': return this.addRecipientEntries(caller, operation.entries, operation.totalFunding);
            case 'PAUSE': return this.pause(caller, operation.address);
            case 'UNPAUSE': return this.unpause(caller, operation.address);
            case 'TERMINATE_RECIPIENT': return this.terminateRecipient(caller, operation.address);
            case 'TERMINATE_ESCROW': return this.terminateEscrow(caller);
            case 'CLAIM': return this.claim(caller, operation.amount);
            case 'SEIZE_LOCKED': return this.seizeLockedTokens(caller, operation.addresses);
            case 'TRANSFER_DUST': return this.transferDust(caller);
            case 'UPDATE_SAFE_ADDRESS': return this.updateSafeAddress(caller, operation.address);
        }
    }

    // --- Queries ---

    public getRecipient(address: Address): Recipient | undefined {
        return this.state.current.recipients[normalizeAddress(address)];
    }

    public lockedOf(address: Address, at: Timestamp = this.ports.clock.now()): Amount {
        const state = this.valuedAt(at);
        return lockedAmount(requireRecipient(state, normalizeAddress(address)), at, state.phase);
    }

    public claimableOf(address: Address, at: Timestamp = this.ports.clock.now()): Amount {
        const state = this.valuedAt(at);
        return claimableAmount(requireRecipient(state, normalizeAddress(address)), at, state.phase);
    }

    public vestedOf(address: Address, at: Timestamp = this.ports.clock.now()): Amount {
        const state = this.valuedAt(at);
        return vestedAmount(requireRecipient(state, normalizeAddress(address)), at, state.phase);
    }

    public claimStartOf(address: Address): Timestamp {
        return claimStartTime(requireRecipient(this.state.current, normalizeAddress(address)));
    }

    public canClaim(address: Address, at: Timestamp = this.ports.clock.now()): boolean {
        return canClaim(requireRecipient(this.state.current, normalizeAddress(address)), at);
    }

    public view(address: Address, at: Timestamp = this.ports.clock.now()): RecipientView {
        const state = this.valuedAt(at);
        return describeRecipient(requireRecipient(state, normalizeAddress(address)), at, state.phase);
    }

    public listRecipients(at: Timestamp = this.ports.clock.now()): RecipientView[] {
        const state = this.valuedAt(at);
        return Object.values(state.recipients).map(r => describeRecipient(r, at, state.phase));
    }

    public summary(): EscrowSummary {
        return summarizeEscrow(this.state.current);
    }

    /**
     * Valuations are only defined from the last committed update onward; earlier
     * instants predate claims already recorded in the state.
     */
    private valuedAt(at: Timestamp): EscrowState {
        const state = this.state.current;
        enforce(TimeGuard({ now: at, lastUpdate: state.lastUpdate }));
        return state;
    }

    // --- Execution ---

    private execute<R>(caller: Address, operation: Operation, administrative: boolean, mutate: Mutator<R>): R {
        enforce(ReentrancyGuard({ inFlight: this.inFlight }));
        this.inFlight = true;
        try {
            const action: Action = {
                actionId: randomNonce(),
                caller,
                operation,
                timestamp: this.ports.clock.now()
            };
            return this.run(action, administrative, mutate);
        } finally {
            this.inFlight = false;
        }
    }

    private run<R>(action: Action, administrative: boolean, mutate: Mutator<R>): R {
        const { next, effects } = this.journalRejection(action, () => this.prepare(action, administrative, mutate));

        // Effects before calls: the commit lands before any payout leaves.
        this.state.commit(next, action.actionId);

        const outbound = effects.push.filter(t => t.amount > 0n);
        if (outbound.length > 0) {
            try {
                this.transact(() => {
                    for (const transfer of outbound) this.ports.funds.push(transfer.account, transfer.amount);
                });
            } catch (e) {
                this.state.rollback(action.actionId);
                const failure = this.fundsFailure('push', outbound, e);
                this.audit.append(action, 'ABORTED', failure.message, { code: failure.code });
                this.log.warn('Payout failed; commit rolled back', { actionId: action.actionId, operation: action.operation.type });
                throw failure;
            }
        }

        this.audit.append(action, 'SUCCESS', undefined, { stateHash: hashState(next), version: next.version });
        this.log.debug('Committed', { actionId: action.actionId, operation: action.operation.type, version: next.version });
        return effects.result;
    }

    private prepare<R>(action: Action, administrative: boolean, mutate: Mutator<R>): Prepared<R> {
        if (administrative) {
            enforce(AdministratorGuard({ caller: action.caller, authorization: this.ports.authorization }));
        }

        const previous = this.state.current;
        enforce(TimeGuard({ now: action.timestamp, lastUpdate: previous.lastUpdate }));

        const ctx: ExecutionContext = {
            caller: action.caller,
            now: action.timestamp,
            allowPastStartTime: this.options.allowPastStartTime ?? false
        };

        const outcome: { effects?: Effects<R> } = {};
        const next = produce(previous, draft => {
            outcome.effects = mutate(draft, ctx);
            draft.version = previous.version + 1;
            draft.lastUpdate = action.timestamp;
        });
        const { effects } = outcome;
        if (!effects) throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Operation ${action.operation.type} produced no effects`);

        enforce(checkInvariants({ state: next, now: action.timestamp }));

        // Funding arrives before the allocation is committed.
        const pull = effects.pull;
        if (pull && pull.amount > 0n) {
            try {
                this.ports.funds.pull(pull.account, pull.amount);
            } catch (e) {
                throw this.fundsFailure('pull', [pull], e);
            }
        }

        return { next, effects };
    }

    private transact(work: () => void): void {
        const { funds } = this.ports;
        if (funds.transaction) {
            funds.transaction(work);
        } else {
            work();
        }
    }

    private journalRejection<T>(action: Action, work: () => T): T {
        try {
            return work();
        } catch (e) {
            const metadata: EvidenceMetadata = { code: e instanceof KernelError ? e.code : 'INTERNAL' };
            const invariantId = e instanceof KernelError ? e.metadata?.['invariantId'] : undefined;
            if (typeof invariantId === 'string') metadata['invariantId'] = invariantId;

            const reason = e instanceof Error ? e.message : String(e);
            this.audit.append(action, 'REJECT', reason, metadata);
            this.log.info('Rejected', { actionId: action.actionId, operation: action.operation.type, reason });
            throw e;
        }
    }

    private fundsFailure(direction: 'pull' | 'push', transfers: Transfer[], cause: unknown): KernelError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        const targets = transfers.map(t => `${t.account}:${t.amount}`).join(', ');
        return new KernelError(ErrorCode.INSUFFICIENT_FUNDS, `Funds ${direction} failed (${targets}): ${reason}`, {
            direction,
            reason
        });
    }
}
