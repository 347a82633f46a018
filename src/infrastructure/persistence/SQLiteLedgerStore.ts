import Database from 'better-sqlite3';
import { parseSnapshot } from '../../kernel-core/Snapshot.js';
import type { AuthoritySnapshot, ISnapshotStore } from '../../kernel-core/Snapshot.js';
import { isJournalStatus, isOperation } from '../../kernel-core/L5/Journal.js';
import type { IJournalStore, JournalArgs, JournalEntry } from '../../kernel-core/L5/Journal.js';
import { ErrorCode, LedgerError, isRejectionCode } from '../../kernel-core/Errors.js';

interface SnapshotRow {
    body: string;
}

interface JournalRow {
    sequence: number;
    entryId: string;
    previousEntryId: string;
    operation: string;
    caller: string;
    args: string;
    status: string;
    code: string | null;
    timestamp: number;
}

/**
 * Snapshot and journal storage on better-sqlite3. Synchronous, like the authority it backs.
 */
export class SQLiteLedgerStore implements ISnapshotStore, IJournalStore {
    private db: Database.Database;

    constructor(dbPath: string = 'ledger.db') {
        this.db = new Database(dbPath);
        this.initialize(dbPath);
    }

    private initialize(dbPath: string) {
        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS snapshots (
                slot INTEGER PRIMARY KEY CHECK (slot = 1),
                body TEXT NOT NULL
            );
            CREATE TABLE IF NOT EXISTS journal (
                sequence INTEGER PRIMARY KEY,
                entryId TEXT UNIQUE NOT NULL,
                previousEntryId TEXT NOT NULL,
                operation TEXT NOT NULL,
                caller TEXT NOT NULL,
                args TEXT NOT NULL,
                status TEXT NOT NULL,
                code TEXT,
                timestamp INTEGER NOT NULL
            );
        `);
    }

    // Only the latest snapshot is kept; the journal holds the history.
    public saveSnapshot(snapshot: AuthoritySnapshot): void {
        this.db.prepare<[string]>(`
            INSERT INTO snapshots (slot, body) VALUES (1, ?)
            ON CONFLICT(slot) DO UPDATE SET body = excluded.body
        `).run(JSON.stringify(snapshot));
    }

    public loadSnapshot(): AuthoritySnapshot | null {
        const row = this.db.prepare<[], SnapshotRow>('SELECT body FROM snapshots WHERE slot = 1').get();
        if (!row) return null;
        return parseSnapshot(JSON.parse(row.body));
    }

    public append(entry: JournalEntry): void {
        this.db.prepare<[number, string, string, string, string, string, string, string | null, number]>(`
            INSERT INTO journal (
                sequence, entryId, previousEntryId, operation, caller, args, status, code, timestamp
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `).run(
            entry.sequence,
            entry.entryId,
            entry.previousEntryId,
            entry.operation,
            entry.caller,
            JSON.stringify(entry.args),
            entry.status,
            entry.code ?? null,
            entry.timestamp
        );
    }

    public history(): JournalEntry[] {
        const rows = this.db.prepare<[], JournalRow>('SELECT * FROM journal ORDER BY sequence ASC').all();
        return rows.map(row => this.mapRowToEntry(row));
    }

    private mapRowToEntry(row: JournalRow): JournalEntry {
        const { operation, status, code } = row;
        if (!isOperation(operation) || !isJournalStatus(status) || (code !== null && !isRejectionCode(code))) {
            throw new LedgerError(ErrorCode.INTEGRITY_BREACH, `journal row ${row.sequence} is malformed`);
        }
        return {
            sequence: row.sequence,
            entryId: row.entryId,
            previousEntryId: row.previousEntryId,
            operation,
            caller: row.caller,
            args: parseArgs(row.args, row.sequence),
            status,
            timestamp: row.timestamp,
            ...(code !== null ? { code } : {})
        };
    }

    /**
     * Runs `work` in one SQLite transaction. Journal rows and the snapshot written
     * inside it commit together or not at all.
     */
    public atomically<T>(work: () => T): T {
        return this.db.transaction(work)();
    }

    public close() {
        this.db.close();
    }
}

function parseArgs(text: string, sequence: number): JournalArgs {
    const value: unknown = JSON.parse(text);
    const args: Record<string, string | number> = {};
    if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        for (const [key, v] of Object.entries(value)) {
            if (typeof v !== 'string' && typeof v !== 'number') break;
            args[key] = v;
        }
        if (Object.keys(args).length === Object.keys(value).length) return args;
    }
    throw new LedgerError(ErrorCode.INTEGRITY_BREACH, `journal row ${sequence} has malformed args`);
}
