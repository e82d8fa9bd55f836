import { ErrorCode, KernelError } from '../Errors.js';
import { normalizeAddress } from './Primitives.js';
import type { Address, Amount, Timestamp } from './Ontology.js';

/**
 * Environment Port: Clock
 * Read once at the entry of every kernel operation.
 */
export interface Clock {
    now(): Timestamp;
}

/**
 * Fund Movement Port
 * Executes token transfers on behalf of the escrow. Both calls throw on failure.
 */
export interface FundsLedger {
    /** Debit `from` and credit the escrow. Fails on insufficient balance or allowance. */
    pull(from: Address, amount: Amount): void;
    /** Debit the escrow and credit `to`. Fails on insufficient escrow balance. */
    push(to: Address, amount: Amount): void;
    /**
     * Optional. When present, every push of one kernel operation runs inside it,
     * so a failure part-way through reverts the pushes that already went out.
     */
    transaction?<T>(work: () => T): T;
}

/**
 * Access Port: administrator gate for mutating operations.
 */
export interface Authorization {
    isAdministrator(caller: Address): boolean;
}

export class ManualClock implements Clock {
    constructor(private current: Timestamp = 0n) { }

    public now(): Timestamp { return this.current; }

    public set(to: Timestamp): void {
        if (to < this.current) {
            throw new KernelError(ErrorCode.TEMPORAL_PARADOX, `Clock cannot move backwards: ${this.current} -> ${to}`);
        }
        this.current = to;
    }

    public advance(seconds: Timestamp): Timestamp {
        this.set(this.current + seconds);
        return this.current;
    }
}

export class SystemClock implements Clock {
    public now(): Timestamp {
        return BigInt(Math.floor(Date.now() / 1000));
    }
}

export class StaticAuthorization implements Authorization {
    private readonly administrator: Address;

    constructor(administrator: Address) {
        this.administrator = normalizeAddress(administrator);
    }

    public isAdministrator(caller: Address): boolean {
        return normalizeAddress(caller) === this.administrator;
    }
}
