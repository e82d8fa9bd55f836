import Database from 'better-sqlite3';
import { z } from 'zod';
import { decodeAction, encode } from '../../kernel-core/L0/Codec.js';
import type { IEventStore, Evidence } from '../../kernel-core/L5/Audit.js';

interface AuditRow {
    sequence: number;
    evidenceId: string;
    previousEvidenceId: string;
    actionId: string;
    caller: string;
    status: string;
    timestamp: string;
    action: string;
    reason: string | null;
    metadata: string | null;
}

const StatusSchema = z.enum(['SUCCESS', 'REJECT', 'ABORTED']);
const MetadataSchema = z.record(z.union([z.string(), z.number()]));

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'vesting.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                actionId TEXT NOT NULL,
                caller TEXT NOT NULL,
                status TEXT NOT NULL,
                timestamp TEXT NOT NULL,
                action TEXT NOT NULL,
                reason TEXT,
                metadata TEXT
            )
        `);
    }

    append(evidence: Evidence): void {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                evidenceId, previousEvidenceId, actionId, caller, status, timestamp, action, reason, metadata
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.action.actionId,
            evidence.action.caller,
            evidence.status,
            evidence.timestamp.toString(),
            encode(evidence.action),
            evidence.reason ?? null,
            evidence.metadata ? JSON.stringify(evidence.metadata) : null
        );
    }

    getHistory(): Evidence[] {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence ASC');
        return stmt.all().map(row => this.mapRowToEvidence(row));
    }

    getLatest(): Evidence | null {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToEvidence(row);
    }

    private mapRowToEvidence(row: AuditRow): Evidence {
        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            action: decodeAction(row.action),
            status: StatusSchema.parse(row.status),
            timestamp: BigInt(row.timestamp),
            ...(row.reason !== null ? { reason: row.reason } : {}),
            ...(row.metadata !== null ? { metadata: MetadataSchema.parse(JSON.parse(row.metadata)) } : {})
        };
    }

    public close() {
        this.db.close();
    }
}
