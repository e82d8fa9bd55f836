import { ErrorCode, KernelError } from '../Errors.js';
import { AddressGuard, enforce } from '../L0/Guards.js';
import { canonicalize, hash, hashState } from '../L0/Crypto.js';
import { normalizeAddress } from '../L0/Primitives.js';
import type { ActionID, Address, EscrowState, Timestamp } from '../L0/Ontology.js';

const GENESIS_PREVIOUS = '0000000000000000000000000000000000000000000000000000000000000000';

export interface StateSnapshot {
    state: EscrowState;
    hash: string;
    previousHash: string;
    actionId: ActionID;
    timestamp: Timestamp;
}

export function genesisState(safeAddress: Address): EscrowState {
    enforce(AddressGuard({ address: safeAddress, field: 'safe address' }));
    return {
        phase: { kind: 'ACTIVE' },
        safeAddress: normalizeAddress(safeAddress),
        totalFunded: 0n,
        totalAllocatedSupply: 0n,
        totalClaimed: 0n,
        totalSeized: 0n,
        dust: 0n,
        totalDustSwept: 0n,
        recipients: {},
        seized: {},
        version: 0,
        lastUpdate: 0n
    };
}

function snapshotHash(state: EscrowState, actionId: ActionID, timestamp: Timestamp, previousHash: string): string {
    return hash(canonicalize([state.version, actionId, timestamp, hashState(state), previousHash]));
}

/**
 * EscrowStore: the escrow aggregate and its hash-linked snapshot chain.
 * States are immutable; a commit appends a snapshot and a rollback removes the tip.
 */
export class EscrowStore {
    private snapshots: StateSnapshot[] = [];

    constructor(genesis: EscrowState) {
        this.snapshots.push({
            state: genesis,
            hash: snapshotHash(genesis, 'genesis', genesis.lastUpdate, GENESIS_PREVIOUS),
            previousHash: GENESIS_PREVIOUS,
            actionId: 'genesis',
            timestamp: genesis.lastUpdate
        });
    }

    public static genesis(safeAddress: Address): EscrowStore {
        return new EscrowStore(genesisState(safeAddress));
    }

    private get tip(): StateSnapshot {
        const tip = this.snapshots[this.snapshots.length - 1];
        if (!tip) throw new KernelError(ErrorCode.INTEGRITY_BREACH, 'Genesis snapshot missing');
        return tip;
    }

    public get current(): EscrowState { return this.tip.state; }

    public get hash(): string { return this.tip.hash; }

    public getSnapshotChain(): readonly StateSnapshot[] { return this.snapshots; }

    public commit(next: EscrowState, actionId: ActionID): StateSnapshot {
        const previous = this.tip;
        if (next.version !== previous.state.version + 1) {
            throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Version gap: ${previous.state.version} -> ${next.version}`);
        }
        const snapshot: StateSnapshot = {
            state: next,
            hash: snapshotHash(next, actionId, next.lastUpdate, previous.hash),
            previousHash: previous.hash,
            actionId,
            timestamp: next.lastUpdate
        };
        this.snapshots.push(snapshot);
        return snapshot;
    }

    /**
     * Drops the tip snapshot, restoring the state before the last commit.
     */
    public rollback(actionId: ActionID): void {
        const tip = this.tip;
        if (this.snapshots.length === 1 || tip.actionId !== actionId) {
            throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Cannot roll back ${actionId}: tip is ${tip.actionId}`);
        }
        this.snapshots.pop();
    }

    public verifyIntegrity(): boolean {
        for (let i = 1; i < this.snapshots.length; i++) {
            const prev = this.snapshots[i - 1];
            const curr = this.snapshots[i];
            if (!prev || !curr) return false;
            if (curr.previousHash !== prev.hash) return false;
            if (snapshotHash(curr.state, curr.actionId, curr.timestamp, curr.previousHash) !== curr.hash) return false;
        }
        return true;
    }
}
