/**
 * LEDGER ONTOLOGY
 * Primitives shared by the registry, consent matrix, record ledger and authority.
 */

// --- 1. Principal ---
export type PrincipalID = string;

export const ROLES = ['NONE', 'DOCTOR', 'PATIENT'] as const;
export type Role = typeof ROLES[number];

export function isRole(value: unknown): value is Role {
    return typeof value === 'string' && ROLES.some(r => r === value);
}

export interface Principal {
    id: PrincipalID;
    role: Role;
    exists: boolean;
}

// --- 2. Consent ---
export interface ConsentEntry {
    patient: PrincipalID;
    doctor: PrincipalID;
    granted: boolean;
}

// --- 3. Record ---
export type RecordID = number;
export type Fingerprint = string;

export interface LedgerRecord {
    readonly id: RecordID;
    readonly patient: PrincipalID;
    readonly doctor: PrincipalID;
    readonly fingerprint: Fingerprint;
    readonly createdAt: number; // ms since epoch
}

// --- 4. Environment ---
export interface IClock {
    now(): number;
}

export const SystemClock: IClock = {
    now: () => Date.now()
};
