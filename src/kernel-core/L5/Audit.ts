// src/kernel-core/L5/Audit.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { Action } from '../L0/Ontology.js';

export type EvidenceStatus = 'SUCCESS' | 'REJECT' | 'ABORTED';

export type EvidenceMetadata = Record<string, string | number>;

/**
 * Event Store Port. Appends are synchronous: an operation's journal entry is
 * written before the operation returns.
 */
export interface IEventStore {
    append(evidence: Evidence): void;
    getHistory(): Evidence[];
    getLatest(): Evidence | null;
}

// --- Evidence (one entry per operation outcome) ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    action: Action;
    status: EvidenceStatus;
    reason?: string;
    metadata?: EvidenceMetadata;
    timestamp: bigint;
}

export class AuditLog {
    private localChain: Evidence[] = [];
    private genesisHash = '0000000000000000000000000000000000000000000000000000000000000000';

    constructor(private store?: IEventStore) { }

    public append(
        action: Action,
        status: EvidenceStatus = 'SUCCESS',
        reason?: string,
        metadata?: EvidenceMetadata
    ): Evidence {
        const latest = this.getTip();
        const previousHash = latest ? latest.evidenceId : this.genesisHash;

        // The action's clock reading is the definitive time for the evidence.
        const entryTs = action.timestamp;
        const entryHash = this.calculateHash(previousHash, action, status, entryTs, reason, metadata);

        const evidence: Evidence = {
            evidenceId: entryHash,
            previousEvidenceId: previousHash,
            action,
            status,
            timestamp: entryTs,
            ...(reason ? { reason } : {}),
            ...(metadata ? { metadata } : {})
        };

        Object.freeze(evidence);

        if (this.store) {
            this.store.append(evidence);
        }

        this.localChain.push(evidence);
        return evidence;
    }

    public getHistory(): Evidence[] {
        if (this.store) {
            return this.store.getHistory();
        }
        return [...this.localChain];
    }

    public verifyChain(): boolean {
        let prev = this.genesisHash;

        for (const entry of this.getHistory()) {
            if (entry.previousEvidenceId !== prev) return false;

            const h = this.calculateHash(prev, entry.action, entry.status, entry.timestamp, entry.reason, entry.metadata);
            if (h !== entry.evidenceId) return false;

            prev = entry.evidenceId;
        }
        return true;
    }

    private calculateHash(
        prevHash: string,
        action: Action,
        status: EvidenceStatus,
        timestamp: bigint,
        reason?: string,
        metadata?: EvidenceMetadata
    ): string {
        // [PreviousHash, ActionHash, Status, Timestamp, ReasonHash, MetadataHash]
        const canonical = [
            prevHash,
            hash(canonicalize(action)),
            status,
            timestamp.toString(),
            hash(reason ?? ''),
            metadata ? hash(canonicalize(metadata)) : hash('{}')
        ];

        return hash(canonicalize(canonical));
    }

    public getTip(): Evidence | null {
        if (this.localChain.length > 0) return this.localChain[this.localChain.length - 1] ?? null;
        if (this.store) return this.store.getLatest();
        return null;
    }
}
