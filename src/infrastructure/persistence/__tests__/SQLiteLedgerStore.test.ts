import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import type Database from 'better-sqlite3';
import { SQLiteLedgerStore } from '../SQLiteLedgerStore.js';
import { RecordAuthority } from '../../../kernel-core/Kernel.js';
import { OperationJournal } from '../../../kernel-core/L5/Journal.js';
import { ErrorCode, unwrap } from '../../../kernel-core/Errors.js';

describe('SQLite Ledger Store', () => {
    let store: SQLiteLedgerStore;

    beforeEach(() => {
        store = new SQLiteLedgerStore(':memory:');
    });

    afterEach(() => {
        store.close();
    });

    test('I. An empty store has no snapshot and no journal', () => {
        expect(store.loadSnapshot()).toBeNull();
        expect(store.history()).toEqual([]);
    });

    test('II. The latest snapshot wins', () => {
        const authority = new RecordAuthority('alice', { clock: { now: () => 7 } });
        store.saveSnapshot(authority.snapshot());
        unwrap(authority.registerDoctor('alice', 'dr-bob'));
        store.saveSnapshot(authority.snapshot());

        expect(store.loadSnapshot()).toEqual(authority.snapshot());
    });

    test('III. Restoring from the store keeps replay protection', () => {
        const authority = new RecordAuthority('alice', { clock: { now: () => 7 } });
        unwrap(authority.registerDoctor('alice', 'dr-bob'));
        unwrap(authority.registerPatient('alice', 'carol'));
        unwrap(authority.grantAccess('carol', 'dr-bob'));
        unwrap(authority.addRecord('dr-bob', 'carol', 'h1'));
        store.saveSnapshot(authority.snapshot());

        const restored = RecordAuthority.restore(store.loadSnapshot());
        expect(restored.addRecord('dr-bob', 'carol', 'h1')).toMatchObject({ ok: false, code: ErrorCode.REPLAY_DETECTED });
    });

    test('IV. Journal entries round-trip with their chain intact', () => {
        const journal = new OperationJournal(store);
        const authority = new RecordAuthority('alice', { journal, clock: { now: () => 7 } });
        authority.registerDoctor('alice', 'dr-bob');
        authority.grantAccess('dr-bob', 'dr-bob');

        const reloaded = new OperationJournal(store);
        expect(reloaded.history()).toEqual(journal.history());
        expect(reloaded.verifyChain()).toBe(true);
        expect(reloaded.history()[1]).toMatchObject({
            sequence: 1,
            operation: 'GRANT',
            caller: 'dr-bob',
            status: 'REJECTED',
            code: ErrorCode.UNAUTHORIZED,
            args: { doctor: 'dr-bob' }
        });
    });

    test('V. Saving a snapshot replaces the previous one', () => {
        const authority = new RecordAuthority('alice', { clock: { now: () => 7 } });
        store.saveSnapshot(authority.snapshot());
        unwrap(authority.registerDoctor('alice', 'dr-bob'));
        store.saveSnapshot(authority.snapshot());
        unwrap(authority.registerPatient('alice', 'carol'));
        store.saveSnapshot(authority.snapshot());

        const db: Database.Database = Reflect.get(store, 'db');
        const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM snapshots').get();
        expect(row).toEqual({ count: 1 });
        expect(store.loadSnapshot()?.principals).toHaveLength(3);
    });

    test('VI. A failed transaction leaves neither journal rows nor snapshot behind', () => {
        const journal = new OperationJournal(store);
        const authority = new RecordAuthority('alice', { journal, clock: { now: () => 7 } });

        expect(() => store.atomically(() => {
            authority.registerDoctor('alice', 'dr-bob');
            store.saveSnapshot(authority.snapshot());
            throw new Error('disk full');
        })).toThrow('disk full');

        expect(store.history()).toEqual([]);
        expect(store.loadSnapshot()).toBeNull();
    });
});
