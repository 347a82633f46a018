// src/kernel-core/L5/Journal.ts
import { GENESIS_HASH, canonicalize, hash } from '../L0/Crypto.js';
import type { PrincipalID } from '../L0/Ontology.js';
import type { RejectionCode } from '../Errors.js';

export const OPERATIONS = ['REGISTER', 'GRANT', 'REVOKE', 'ADD_RECORD', 'TRANSFER'] as const;
export type Operation = typeof OPERATIONS[number];
export type JournalStatus = 'ACCEPTED' | 'REJECTED';

export const isOperation = (v: unknown): v is Operation => OPERATIONS.some(op => op === v);
export const isJournalStatus = (v: unknown): v is JournalStatus => v === 'ACCEPTED' || v === 'REJECTED';
export type JournalArgs = Readonly<Record<string, string | number>>;

export interface JournalEntry {
    sequence: number;
    entryId: string; // hash over the canonical entry tuple
    previousEntryId: string; // chain linkage
    operation: Operation;
    caller: PrincipalID;
    args: JournalArgs;
    status: JournalStatus;
    code?: RejectionCode;
    timestamp: number;
}

/**
 * Journal Store Port. Synchronous so that journaling never splits an operation across ticks.
 */
export interface IJournalStore {
    append(entry: JournalEntry): void;
    history(): JournalEntry[];
}

export interface JournalInput {
    operation: Operation;
    caller: PrincipalID;
    args: JournalArgs;
    status: JournalStatus;
    code?: RejectionCode;
    timestamp: number;
}

/**
 * Hash-chained trail of every operation outcome, accepted or rejected.
 */
export class OperationJournal {
    private localChain: JournalEntry[] = [];

    constructor(private store?: IJournalStore) {
        if (store) this.localChain = store.history();
    }

    public append(input: JournalInput): JournalEntry {
        const latest = this.tip();
        const previousEntryId = latest ? latest.entryId : GENESIS_HASH;
        const sequence = latest ? latest.sequence + 1 : 0;

        const entry: JournalEntry = Object.freeze({
            sequence,
            entryId: OperationJournal.calculateHash(previousEntryId, sequence, input),
            previousEntryId,
            operation: input.operation,
            caller: input.caller,
            args: Object.freeze({ ...input.args }),
            status: input.status,
            timestamp: input.timestamp,
            ...(input.code ? { code: input.code } : {})
        });

        this.store?.append(entry);
        this.localChain.push(entry);
        return entry;
    }

    public history(): JournalEntry[] {
        return [...this.localChain];
    }

    public tip(): JournalEntry | null {
        return this.localChain[this.localChain.length - 1] ?? null;
    }

    public verifyChain(): boolean {
        let prev = GENESIS_HASH;
        for (const [index, entry] of this.localChain.entries()) {
            if (entry.previousEntryId !== prev) return false;
            if (entry.sequence !== index) return false;
            if (OperationJournal.calculateHash(prev, entry.sequence, entry) !== entry.entryId) return false;
            prev = entry.entryId;
        }
        return true;
    }

    private static calculateHash(previousEntryId: string, sequence: number, input: JournalInput): string {
        // [PreviousHash, Sequence, Operation, Caller, Args, Status, Code, Timestamp]
        const canonical: [string, number, string, string, JournalArgs, string, string, number] = [
            previousEntryId,
            sequence,
            input.operation,
            input.caller,
            input.args,
            input.status,
            input.code ?? '',
            input.timestamp
        ];
        return hash(canonicalize(canonical));
    }
}
