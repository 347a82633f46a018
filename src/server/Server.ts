import express from 'express';
import type { ErrorRequestHandler, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import { RecordAuthority } from '../kernel-core/Kernel.js';
import { OperationJournal, type IJournalStore } from '../kernel-core/L5/Journal.js';
import type { ISnapshotStore } from '../kernel-core/Snapshot.js';
import { isRole, type IClock } from '../kernel-core/L0/Ontology.js';
import { fingerprintOf } from '../kernel-core/L0/Crypto.js';
import { ErrorCode, type Outcome, type RejectionCode } from '../kernel-core/Errors.js';
import type { RecordFilter } from '../kernel-core/L3/Ledger.js';
import type { ServerConfig } from './Config.js';

export interface LedgerStore extends ISnapshotStore, IJournalStore {
    atomically<T>(work: () => T): T;
}

const STATUS_BY_CODE: Record<RejectionCode, number> = {
    [ErrorCode.UNAUTHORIZED]: 403,
    [ErrorCode.ACCESS_DENIED]: 403,
    [ErrorCode.INVALID_IDENTITY]: 400,
    [ErrorCode.INVALID_COUNTERPARTY]: 422,
    [ErrorCode.NOT_GRANTED]: 409,
    [ErrorCode.REPLAY_DETECTED]: 409,
};

const CALLER_HEADER = 'x-principal-id';
const RECORD_ID = /^\d+$/;

function stringField(body: unknown, name: string): string | undefined {
    if (body === null || typeof body !== 'object') return undefined;
    const value: unknown = Object.entries(body).find(([key]) => key === name)?.[1];
    return typeof value === 'string' ? value : undefined;
}

/**
 * HTTP harness over one RecordAuthority. The caller identity arrives in the
 * x-principal-id header and is assumed to be authenticated upstream.
 */
export class LedgerServer {
    private app: express.Express;
    private authority: RecordAuthority;
    private http?: HttpServer;

    constructor(private config: ServerConfig, private store?: LedgerStore, private clock?: IClock) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());

        this.authority = this.boot();
        this.setupRoutes();
    }

    // Rebuilds the authority from what the store holds: the latest snapshot and the journal.
    private boot(): RecordAuthority {
        const journal = new OperationJournal(this.store);
        const options = { journal, ...(this.clock ? { clock: this.clock } : {}) };
        const snapshot = this.store?.loadSnapshot() ?? null;
        if (!snapshot) return new RecordAuthority(this.config.admin, options);

        console.log(`[LedgerServer] Restored snapshot: ${snapshot.principals.length} principals, ${snapshot.records.length} records`);
        return RecordAuthority.restore(snapshot, options);
    }

    public get Authority(): RecordAuthority { return this.authority; }
    public get App(): express.Express { return this.app; }

    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.config.port);
            server.once('error', reject);
            server.once('listening', () => {
                const address: AddressInfo | string | null = server.address();
                const port = address !== null && typeof address === 'object' ? address.port : this.config.port;
                console.log(`[LedgerServer] Listening on port ${port}. Admin is ${this.authority.Admin}`);
                resolve(port);
            });
            this.http = server;
        });
    }

    public close(): Promise<void> {
        const server = this.http;
        if (!server) return Promise.resolve();
        return new Promise((resolve, reject) => {
            server.close(err => (err ? reject(err) : resolve()));
        });
    }

    private setupRoutes() {
        this.app.use((req, _res, next) => {
            console.log(`[LedgerServer] ${req.method} ${req.url}`);
            next();
        });

        // --- Queries ---
        this.app.get('/status', (_req, res) => {
            res.json({
                admin: this.authority.Admin,
                principals: this.authority.principals().length,
                records: this.authority.recordCount
            });
        });

        this.app.get('/principals/:id', (req, res) => {
            const principal = this.authority.principal(req.params.id);
            if (!principal) {
                res.status(404).json({ error: 'NOT_FOUND', message: `Unknown principal ${req.params.id}` });
                return;
            }
            res.json({ id: principal.id, role: principal.role });
        });

        this.app.get('/consents/:patient/:doctor', (req, res) => {
            res.json({ granted: this.authority.isGranted(req.params.patient, req.params.doctor) });
        });

        this.app.get('/records', (req, res) => {
            const filter: RecordFilter = {};
            if (typeof req.query.patient === 'string') filter.patient = req.query.patient;
            if (typeof req.query.doctor === 'string') filter.doctor = req.query.doctor;
            res.json(this.authority.records(filter));
        });

        this.app.get('/records/:id', (req, res) => {
            const record = RECORD_ID.test(req.params.id) ? this.authority.getRecord(Number(req.params.id)) : undefined;
            if (!record) {
                res.status(404).json({ error: 'NOT_FOUND', message: `Unknown record ${req.params.id}` });
                return;
            }
            res.json(record);
        });

        this.app.get('/journal', (_req, res) => {
            res.json(this.authority.Journal.history());
        });

        // --- Operations ---
        this.app.post('/principals', (req, res) => {
            const caller = this.caller(req, res);
            if (caller === undefined) return;
            const identity = stringField(req.body, 'identity');
            const role = stringField(req.body, 'role');
            if (identity === undefined || !isRole(role)) {
                this.badRequest(res, 'Expected { identity: string, role: NONE | DOCTOR | PATIENT }');
                return;
            }
            this.respond(res, this.execute(() => this.authority.register(caller, identity, role)), 201);
        });

        this.app.post('/admin/transfer', (req, res) => {
            const caller = this.caller(req, res);
            if (caller === undefined) return;
            const identity = stringField(req.body, 'identity');
            if (identity === undefined) {
                this.badRequest(res, 'Expected { identity: string }');
                return;
            }
            this.respond(res, this.execute(() => this.authority.transfer(caller, identity)), 200, admin => ({ admin }));
        });

        this.app.post('/consents', (req, res) => {
            const caller = this.caller(req, res);
            if (caller === undefined) return;
            const doctor = stringField(req.body, 'doctor');
            if (doctor === undefined) {
                this.badRequest(res, 'Expected { doctor: string }');
                return;
            }
            this.respond(res, this.execute(() => this.authority.grantAccess(caller, doctor)), 200, () => ({ patient: caller, doctor, granted: true }));
        });

        this.app.delete('/consents/:doctor', (req, res) => {
            const caller = this.caller(req, res);
            if (caller === undefined) return;
            const doctor = req.params.doctor;
            this.respond(res, this.execute(() => this.authority.revokeAccess(caller, doctor)), 200, () => ({ patient: caller, doctor, granted: false }));
        });

        this.app.post('/records', (req, res) => {
            const caller = this.caller(req, res);
            if (caller === undefined) return;
            const patient = stringField(req.body, 'patient');
            const content = stringField(req.body, 'content');
            const fingerprint = stringField(req.body, 'fingerprint') ?? (content !== undefined ? fingerprintOf(content) : undefined);
            if (patient === undefined || fingerprint === undefined) {
                this.badRequest(res, 'Expected { patient: string, fingerprint: string } or { patient: string, content: string }');
                return;
            }
            this.respond(res, this.execute(() => this.authority.addRecord(caller, patient, fingerprint)), 201, recordId => ({ recordId, fingerprint }));
        });

        const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
            if (err instanceof SyntaxError) {
                this.badRequest(res, 'Malformed JSON body');
                return;
            }
            console.error('[LedgerServer] Request failed:', err);
            res.status(500).json({ error: 'INTERNAL', message: err instanceof Error ? err.message : String(err) });
        };
        this.app.use(onError);
    }

    private caller(req: Request, res: Response): string | undefined {
        const caller = req.header(CALLER_HEADER);
        if (!caller) {
            res.status(401).json({ error: 'UNAUTHENTICATED', message: `Missing ${CALLER_HEADER} header` });
            return undefined;
        }
        return caller;
    }

    private badRequest(res: Response, message: string) {
        res.status(400).json({ error: 'BAD_REQUEST', message });
    }

    /**
     * Runs one operation against the authority. With a store, the journal row and, when
     * accepted, the new snapshot are written in one transaction. If that transaction fails
     * the in-memory authority is rebuilt from the store so it never runs ahead of it.
     */
    private execute<T>(operation: () => Outcome<T>): Outcome<T> {
        const store = this.store;
        if (!store) return operation();
        try {
            return store.atomically(() => {
                const outcome = operation();
                if (outcome.ok) store.saveSnapshot(this.authority.snapshot());
                return outcome;
            });
        } catch (err: unknown) {
            console.error('[LedgerServer] Persist failed, reloading from store:', err);
            this.authority = this.boot();
            throw err;
        }
    }

    /**
     * Writes an operation outcome. Rejection codes pass through unchanged.
     */
    private respond<T>(res: Response, outcome: Outcome<T>, status: number, render: (value: T) => unknown = value => value) {
        if (!outcome.ok) {
            console.warn(`[LedgerServer] Rejected: ${outcome.code} ${outcome.reason}`);
            res.status(STATUS_BY_CODE[outcome.code]).json({ error: outcome.code, message: outcome.reason });
            return;
        }
        res.status(status).json(render(outcome.value));
    }
}
