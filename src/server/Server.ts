import express from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import { ZodError } from 'zod';
import { VestingKernel } from '../kernel-core/Kernel.js';
import { ErrorCode, KernelError } from '../kernel-core/Errors.js';
import { toPlain } from '../kernel-core/L0/Codec.js';
import { SystemClock, StaticAuthorization } from '../kernel-core/L0/Ports.js';
import { ReplayEngine } from '../kernel-core/L0/Replay.js';
import { EscrowStore, genesisState } from '../kernel-core/L2/State.js';
import { AuditLog } from '../kernel-core/L5/Audit.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { InMemoryFundsLedger } from '../infrastructure/ledger/InMemoryFundsLedger.js';
import { loadConfig } from '../Platform/Config.js';
import type { Config } from '../Platform/Config.js';
import { createLogger, setLogLevel } from '../Platform/Logger.js';
import { ClaimBody, RecipientBatchBody, SafeAddressBody, SeizeBody, ValuationQuery } from './Schemas.js';

const log = createLogger('VestingServer');

const STATUS: Record<ErrorCode, number> = {
    [ErrorCode.UNAUTHORIZED]: 403,
    [ErrorCode.REENTRANT_CALL]: 409,
    [ErrorCode.INVALID_ADDRESS]: 400,
    [ErrorCode.INVALID_SCHEDULE]: 400,
    [ErrorCode.INVALID_AMOUNT]: 400,
    [ErrorCode.INVALID_BATCH]: 400,
    [ErrorCode.STATE_CONFLICT]: 409,
    [ErrorCode.UNKNOWN_RECIPIENT]: 404,
    [ErrorCode.ESCROW_TERMINATED]: 409,
    [ErrorCode.ESCROW_NOT_TERMINATED]: 409,
    [ErrorCode.CLAIM_EXCEEDS_ENTITLEMENT]: 422,
    [ErrorCode.INSUFFICIENT_FUNDS]: 402,
    [ErrorCode.ARITHMETIC_UNDERFLOW]: 500,
    [ErrorCode.INTEGRITY_BREACH]: 500,
    [ErrorCode.TEMPORAL_PARADOX]: 409
};

class MissingCallerError extends Error { }

function callerOf(req: express.Request): string {
    const caller = req.header('x-caller');
    if (!caller) throw new MissingCallerError('x-caller header is required');
    return caller;
}

export class VestingServer {
    public readonly app: express.Express;
    private server?: Server;

    constructor(private kernel: VestingKernel, private port: number = 3000, private store?: SQLiteEventStore) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.port, () => {
                const bound = server.address();
                const port = bound !== null && typeof bound === 'object' ? bound.port : this.port;
                log.info(`Listening on port ${port}`);
                resolve(port);
            });
            server.on('error', reject);
            this.server = server;
        });
    }

    public stop(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (!this.server) {
                resolve();
                return;
            }
            this.server.close(err => (err ? reject(err) : resolve()));
            this.server = undefined;
        }).finally(() => {
            this.store?.close();
            this.store = undefined;
        });
    }

    private handle(work: (req: express.Request) => unknown, status: number = 200): express.RequestHandler {
        return (req, res) => {
            try {
                res.status(status).json(toPlain(work(req)));
            } catch (e) {
                this.fail(res, e);
            }
        };
    }

    private fail(res: express.Response, e: unknown): void {
        if (e instanceof KernelError) {
            res.status(STATUS[e.code]).json({ error: e.code, message: e.message, details: toPlain(e.metadata ?? {}) });
            return;
        }
        if (e instanceof ZodError) {
            res.status(400).json({ error: 'INVALID_REQUEST', message: 'Request failed validation', details: e.issues });
            return;
        }
        if (e instanceof MissingCallerError) {
            res.status(401).json({ error: 'UNAUTHENTICATED', message: e.message });
            return;
        }
        log.error('Unhandled request failure', e);
        res.status(500).json({ error: 'INTERNAL', message: e instanceof Error ? e.message : String(e) });
    }

    private setupRoutes() {
        this.app.use((req, _res, next) => {
            log.debug(`${req.method} ${req.url}`);
            next();
        });

        // Queries
        this.app.get('/escrow', this.handle(() => this.kernel.summary()));

        this.app.get('/recipients', this.handle(req => {
            const { at } = ValuationQuery.parse(req.query);
            return this.kernel.listRecipients(at);
        }));

        this.app.get('/recipients/:address', this.handle(req => {
            const { at } = ValuationQuery.parse(req.query);
            return this.kernel.view(req.params['address'] ?? '', at);
        }));

        this.app.get('/audit', this.handle(() => this.kernel.Audit.getHistory()));

        // Administration
        this.app.post('/recipients', this.handle(req => {
            const { totalFunding, ...batch } = RecipientBatchBody.parse(req.body);
            return this.kernel.addRecipients(callerOf(req), batch, totalFunding);
        }, 201));

        this.app.post('/recipients/:address/pause', this.handle(req =>
            ({ lastPausedAt: this.kernel.pause(callerOf(req), req.params['address'] ?? '') })));

        this.app.post('/recipients/:address/unpause', this.handle(req =>
            ({ pausedFor: this.kernel.unpause(callerOf(req), req.params['address'] ?? '') })));

        this.app.post('/recipients/:address/terminate', this.handle(req =>
            this.kernel.terminateRecipient(callerOf(req), req.params['address'] ?? '')));

        this.app.post('/escrow/terminate', this.handle(req =>
            ({ terminatedAt: this.kernel.terminateEscrow(callerOf(req)) })));

        this.app.post('/escrow/seize', this.handle(req => {
            const { addresses } = SeizeBody.parse(req.body);
            return this.kernel.seizeLockedTokens(callerOf(req), addresses);
        }));

        this.app.post('/escrow/dust', this.handle(req =>
            ({ transferred: this.kernel.transferDust(callerOf(req)) })));

        this.app.post('/escrow/safe-address', this.handle(req => {
            const { address } = SafeAddressBody.parse(req.body);
            return { safeAddress: this.kernel.updateSafeAddress(callerOf(req), address) };
        }));

        // Recipients
        this.app.post('/claim', this.handle(req => {
            const { amount } = ClaimBody.parse(req.body);
            return { claimed: this.kernel.claim(callerOf(req), amount) };
        }));
    }
}

/**
 * Wires a server from configuration: SQLite journal, replay of the journal
 * into a fresh escrow, and an in-memory funds ledger. The ledger holds what the
 * journaled escrow still owes in custody; the administrator keeps whatever of
 * the opening balance the journaled funding has not already drawn.
 */
export function bootstrap(config: Config): VestingServer {
    setLogLevel(config.logLevel);
    const store = new SQLiteEventStore(config.dbPath);
    const audit = new AuditLog(store);
    const options = { allowPastStartTime: config.allowPastStartTime };

    const { state, replayed } = new ReplayEngine().replay(audit, genesisState(config.safeAddress), options);
    log.info('Escrow rebuilt from journal', { replayed, version: state.version });

    const ledger = new InMemoryFundsLedger(config.escrowAccount);
    const custody = state.totalFunded - state.totalClaimed - state.totalSeized - state.totalDustSwept;
    if (custody > 0n) ledger.mint(config.escrowAccount, custody);

    const remaining = config.openingBalance > state.totalFunded ? config.openingBalance - state.totalFunded : 0n;
    if (remaining > 0n) {
        ledger.mint(config.administrator, remaining);
        ledger.approve(config.administrator, remaining);
    }

    const kernel = new VestingKernel(
        new EscrowStore(state),
        { clock: new SystemClock(), funds: ledger, authorization: new StaticAuthorization(config.administrator) },
        audit,
        options
    );
    return new VestingServer(kernel, config.port, store);
}

// Start if run directly
if (require.main === module) {
    bootstrap(loadConfig()).start().catch(e => {
        log.error('Server failed to start', e);
        process.exitCode = 1;
    });
}
