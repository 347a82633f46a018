import type { ConsentEntry, Fingerprint, LedgerRecord, Principal, PrincipalID } from './L0/Ontology.js';
import { isRole } from './L0/Ontology.js';
import { checkSnapshotInvariants } from './L0/Invariants.js';
import { IdentityGuard } from './L0/Guards.js';
import { ErrorCode, LedgerError } from './Errors.js';

export const SNAPSHOT_VERSION = 1;

/**
 * Verbatim, JSON-safe image of one authority: the administrator slot, the registry,
 * the consent matrix, the record sequence and the replay set.
 */
export interface AuthoritySnapshot {
    version: typeof SNAPSHOT_VERSION;
    admin: PrincipalID;
    principals: Principal[];
    grants: ConsentEntry[];
    records: LedgerRecord[];
    fingerprints: Fingerprint[];
}

/**
 * Snapshot Store Port: a caller-supplied storage layer.
 */
export interface ISnapshotStore {
    saveSnapshot(snapshot: AuthoritySnapshot): void;
    loadSnapshot(): AuthoritySnapshot | null;
}

type Fields = Record<string, unknown>;

const isObject = (v: unknown): v is Fields => v !== null && typeof v === 'object' && !Array.isArray(v);
const isString = (v: unknown): v is string => typeof v === 'string';

function invalid(message: string): never {
    throw new LedgerError(ErrorCode.SNAPSHOT_INVALID, message);
}

function identity(value: string, field: string): PrincipalID {
    const check = IdentityGuard({ identity: value });
    if (!check.ok) invalid(`${field} is not a valid identity: ${check.violation}`);
    return value;
}

function list<T>(value: unknown, field: string, parse: (item: unknown, index: number) => T): T[] {
    if (!Array.isArray(value)) invalid(`${field} must be an array`);
    return value.map(parse);
}

function parsePrincipal(item: unknown, index: number): Principal {
    if (!isObject(item) || !isString(item.id) || !isRole(item.role) || typeof item.exists !== 'boolean') {
        invalid(`principals[${index}] is malformed`);
    }
    return { id: identity(item.id, `principals[${index}].id`), role: item.role, exists: item.exists };
}

function parseGrant(item: unknown, index: number): ConsentEntry {
    if (!isObject(item) || !isString(item.patient) || !isString(item.doctor) || typeof item.granted !== 'boolean') {
        invalid(`grants[${index}] is malformed`);
    }
    return { patient: item.patient, doctor: item.doctor, granted: item.granted };
}

function parseRecord(item: unknown, index: number): LedgerRecord {
    if (
        !isObject(item) ||
        typeof item.id !== 'number' ||
        !Number.isInteger(item.id) ||
        !isString(item.patient) ||
        !isString(item.doctor) ||
        !isString(item.fingerprint) ||
        typeof item.createdAt !== 'number'
    ) {
        invalid(`records[${index}] is malformed`);
    }
    return { id: item.id, patient: item.patient, doctor: item.doctor, fingerprint: item.fingerprint, createdAt: item.createdAt };
}

function parseFingerprint(item: unknown, index: number): Fingerprint {
    if (!isString(item)) invalid(`fingerprints[${index}] must be a string`);
    return item;
}

/**
 * Validates an untrusted value (typically parsed JSON) as a snapshot: structure first, then
 * the cross-component invariants. Throws LedgerError(SNAPSHOT_INVALID).
 */
export function parseSnapshot(value: unknown): AuthoritySnapshot {
    if (!isObject(value)) invalid('snapshot must be an object');
    if (value.version !== SNAPSHOT_VERSION) invalid(`unsupported snapshot version: ${String(value.version)}`);
    if (!isString(value.admin)) invalid('admin must be a string');

    const snapshot: AuthoritySnapshot = {
        version: SNAPSHOT_VERSION,
        admin: identity(value.admin, 'admin'),
        principals: list(value.principals, 'principals', parsePrincipal),
        grants: list(value.grants, 'grants', parseGrant),
        records: list(value.records, 'records', parseRecord),
        fingerprints: list(value.fingerprints, 'fingerprints', parseFingerprint)
    };

    const violations = checkSnapshotInvariants(snapshot);
    if (violations.length > 0) {
        throw new LedgerError(ErrorCode.SNAPSHOT_INVALID, `invariant violated: ${violations.map(v => v.id).join(', ')}`, {
            violations: violations.map(v => v.description)
        });
    }
    return snapshot;
}
