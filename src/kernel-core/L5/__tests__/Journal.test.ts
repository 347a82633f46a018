import { describe, test, expect, beforeEach } from '@jest/globals';
import { OperationJournal, type IJournalStore, type JournalEntry } from '../Journal.js';
import { GENESIS_HASH } from '../../L0/Crypto.js';
import { ErrorCode } from '../../Errors.js';

class MemoryJournalStore implements IJournalStore {
    public entries: JournalEntry[] = [];
    append(entry: JournalEntry): void {
        this.entries.push(entry);
    }
    history(): JournalEntry[] {
        return [...this.entries];
    }
}

describe('Operation Journal', () => {
    let journal: OperationJournal;

    beforeEach(() => {
        journal = new OperationJournal();
    });

    test('I. Entries are chained from the genesis hash', () => {
        const first = journal.append({ operation: 'REGISTER', caller: 'alice', args: { identity: 'dr-bob', role: 'DOCTOR' }, status: 'ACCEPTED', timestamp: 1 });
        const second = journal.append({ operation: 'GRANT', caller: 'dr-bob', args: { doctor: 'dr-bob' }, status: 'REJECTED', code: ErrorCode.UNAUTHORIZED, timestamp: 2 });

        expect(first.sequence).toBe(0);
        expect(first.previousEntryId).toBe(GENESIS_HASH);
        expect(first.entryId).toMatch(/^[0-9a-f]{64}$/);
        expect(second.sequence).toBe(1);
        expect(second.previousEntryId).toBe(first.entryId);
        expect(second.code).toBe(ErrorCode.UNAUTHORIZED);
        expect('code' in first).toBe(false);
        expect(journal.verifyChain()).toBe(true);
        expect(journal.tip()).toBe(second);
    });

    test('II. Entries are frozen', () => {
        const entry = journal.append({ operation: 'REVOKE', caller: 'carol', args: { doctor: 'dr-bob' }, status: 'ACCEPTED', timestamp: 1 });
        expect(Object.isFrozen(entry)).toBe(true);
        expect(Object.isFrozen(entry.args)).toBe(true);
    });

    test('III. Tampering with content is detected', () => {
        journal.append({ operation: 'ADD_RECORD', caller: 'dr-bob', args: { patient: 'carol', fingerprint: 'h1' }, status: 'ACCEPTED', timestamp: 1 });
        journal.append({ operation: 'ADD_RECORD', caller: 'dr-bob', args: { patient: 'carol', fingerprint: 'h1' }, status: 'REJECTED', code: ErrorCode.REPLAY_DETECTED, timestamp: 2 });

        const chain: JournalEntry[] = Reflect.get(journal, 'localChain');
        const original = chain[1];
        if (!original) throw new Error('missing entry');
        chain[1] = { ...original, status: 'ACCEPTED' };

        expect(journal.verifyChain()).toBe(false);
    });

    test('IV. Breaking the linkage is detected', () => {
        journal.append({ operation: 'TRANSFER', caller: 'alice', args: { identity: 'zed' }, status: 'ACCEPTED', timestamp: 1 });
        journal.append({ operation: 'TRANSFER', caller: 'zed', args: { identity: 'yan' }, status: 'ACCEPTED', timestamp: 2 });

        const chain: JournalEntry[] = Reflect.get(journal, 'localChain');
        const original = chain[1];
        if (!original) throw new Error('missing entry');
        chain[1] = { ...original, previousEntryId: 'bad_hash' };

        expect(journal.verifyChain()).toBe(false);
    });

    test('V. A store receives every entry and a new journal resumes its chain', () => {
        const store = new MemoryJournalStore();
        const first = new OperationJournal(store);
        const a = first.append({ operation: 'REGISTER', caller: 'alice', args: { identity: 'carol', role: 'PATIENT' }, status: 'ACCEPTED', timestamp: 1 });

        const resumed = new OperationJournal(store);
        const b = resumed.append({ operation: 'GRANT', caller: 'carol', args: { doctor: 'dr-bob' }, status: 'REJECTED', code: ErrorCode.INVALID_COUNTERPARTY, timestamp: 2 });

        expect(b.sequence).toBe(1);
        expect(b.previousEntryId).toBe(a.entryId);
        expect(store.entries).toHaveLength(2);
        expect(resumed.verifyChain()).toBe(true);
    });
});
