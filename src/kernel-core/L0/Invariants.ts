// src/kernel-core/L0/Invariants.ts
import type { AuthoritySnapshot } from '../Snapshot.js';

export interface SnapshotInvariant {
    id: string;
    description: string;
    predicate: (snapshot: AuthoritySnapshot) => boolean;
}

const principalIds = (s: AuthoritySnapshot): Set<string> =>
    new Set(s.principals.filter(p => p.exists).map(p => p.id));

const allUnique = (values: string[]): boolean => new Set(values).size === values.length;

// --- Registry ---
export const ADMIN_REGISTERED: SnapshotInvariant = {
    id: 'admin-registered',
    description: 'The administrator has an existing principal entry',
    predicate: s => principalIds(s).has(s.admin)
};

export const PRINCIPALS_UNIQUE: SnapshotInvariant = {
    id: 'principals-unique',
    description: 'Each identity appears once in the registry',
    predicate: s => allUnique(s.principals.map(p => p.id))
};

export const PRINCIPALS_EXIST: SnapshotInvariant = {
    id: 'principals-exist',
    description: 'The existence flag is never cleared',
    predicate: s => s.principals.every(p => p.exists)
};

// --- Consent ---
export const GRANTS_UNIQUE: SnapshotInvariant = {
    id: 'grants-unique',
    description: 'Each patient/doctor pair appears once in the consent matrix',
    predicate: s => allUnique(s.grants.map(g => JSON.stringify([g.patient, g.doctor])))
};

export const GRANTS_REFERENCE_PRINCIPALS: SnapshotInvariant = {
    id: 'grants-reference-principals',
    description: 'Every identity in the consent matrix has a principal entry',
    predicate: s => {
        const ids = principalIds(s);
        return s.grants.every(g => ids.has(g.patient) && ids.has(g.doctor));
    }
};

// --- Ledger ---
export const RECORD_IDS_DENSE: SnapshotInvariant = {
    id: 'record-ids-dense',
    description: 'Record ids are 0-based, dense and in insertion order',
    predicate: s => s.records.every((r, i) => r.id === i)
};

export const RECORDS_REFERENCE_PRINCIPALS: SnapshotInvariant = {
    id: 'records-reference-principals',
    description: 'Every record names a registered patient and doctor',
    predicate: s => {
        const ids = principalIds(s);
        return s.records.every(r => ids.has(r.patient) && ids.has(r.doctor));
    }
};

export const RECORDS_COMMITTED: SnapshotInvariant = {
    id: 'records-committed',
    description: 'Every record fingerprint is in the replay set',
    predicate: s => {
        const seen = new Set(s.fingerprints);
        return s.records.every(r => seen.has(r.fingerprint));
    }
};

export const FINGERPRINTS_UNIQUE: SnapshotInvariant = {
    id: 'fingerprints-unique',
    description: 'No fingerprint is committed twice',
    predicate: s => allUnique(s.fingerprints) && allUnique(s.records.map(r => r.fingerprint))
};

export const SNAPSHOT_INVARIANTS: readonly SnapshotInvariant[] = [
    ADMIN_REGISTERED,
    PRINCIPALS_UNIQUE,
    PRINCIPALS_EXIST,
    GRANTS_UNIQUE,
    GRANTS_REFERENCE_PRINCIPALS,
    RECORD_IDS_DENSE,
    RECORDS_REFERENCE_PRINCIPALS,
    RECORDS_COMMITTED,
    FINGERPRINTS_UNIQUE
];

/**
 * Returns every violated invariant, in table order.
 */
export function checkSnapshotInvariants(snapshot: AuthoritySnapshot): SnapshotInvariant[] {
    return SNAPSHOT_INVARIANTS.filter(inv => !inv.predicate(snapshot));
}
