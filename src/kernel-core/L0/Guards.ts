// src/kernel-core/L0/Guards.ts
import type { PrincipalRegistry } from '../L1/Identity.js';
import type { ConsentMatrix } from '../L2/Consent.js';
import type { Fingerprint, PrincipalID, Role } from './Ontology.js';
import { ErrorCode, type Outcome, type RejectionCode } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: RejectionCode; violation: string };

export type Guard<T> = (input: T) => GuardResult;

export const OK: GuardResult = { ok: true };
const FAIL = (code: RejectionCode, violation: string): GuardResult => ({ ok: false, code, violation });

/**
 * Returns the first failing guard result, or OK. Later checks are not evaluated once one fails.
 */
export function firstFailure(...checks: Array<() => GuardResult>): GuardResult {
    for (const check of checks) {
        const result = check();
        if (!result.ok) return result;
    }
    return OK;
}

export function toOutcome<T>(result: Extract<GuardResult, { ok: false }>): Outcome<T> {
    return { ok: false, code: result.code, reason: result.violation };
}

// --- Concrete Guards ---

// 1. Administrator
export const AdminGuard: Guard<{ caller: PrincipalID, admin: PrincipalID }> = ({ caller, admin }) => {
    if (caller !== admin) return FAIL(ErrorCode.UNAUTHORIZED, `only admin: ${caller} is not the administrator`);
    return OK;
};

// 2. Identity well-formedness: empty, blank and zero addresses are null-equivalent
const ZERO_ADDRESS = /^0x0+$/i;

export const IdentityGuard: Guard<{ identity: unknown }> = ({ identity }) => {
    if (typeof identity !== 'string' || identity.trim().length === 0) {
        return FAIL(ErrorCode.INVALID_IDENTITY, 'zero address: identity must be a non-empty string');
    }
    if (ZERO_ADDRESS.test(identity)) {
        return FAIL(ErrorCode.INVALID_IDENTITY, `zero address: ${identity}`);
    }
    return OK;
};

// 3. Role membership (current role, evaluated at call time)
export const RoleGuard: Guard<{
    registry: PrincipalRegistry,
    principal: PrincipalID,
    role: Role,
    code: RejectionCode,
    violation: string
}> = ({ registry, principal, role, code, violation }) => {
    if (!registry.holds(principal, role)) return FAIL(code, `${violation}: ${principal}`);
    return OK;
};

// 4. Consent
export const ConsentGuard: Guard<{ consent: ConsentMatrix, patient: PrincipalID, doctor: PrincipalID }> = ({ consent, patient, doctor }) => {
    if (!consent.isGranted(patient, doctor)) {
        return FAIL(ErrorCode.ACCESS_DENIED, `access not granted by patient ${patient} to ${doctor}`);
    }
    return OK;
};

export const GrantedGuard: Guard<{ consent: ConsentMatrix, patient: PrincipalID, doctor: PrincipalID }> = ({ consent, patient, doctor }) => {
    if (!consent.isGranted(patient, doctor)) {
        return FAIL(ErrorCode.NOT_GRANTED, `not granted: ${patient} has no active grant for ${doctor}`);
    }
    return OK;
};

// 5. Replay Guard
export const ReplayGuard: Guard<{ fingerprint: Fingerprint, seen: ReadonlySet<Fingerprint> }> = ({ fingerprint, seen }) => {
    if (seen.has(fingerprint)) {
        return FAIL(ErrorCode.REPLAY_DETECTED, `record hash already exists (replay blocked): ${fingerprint}`);
    }
    return OK;
};
