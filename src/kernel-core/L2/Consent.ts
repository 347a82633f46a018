import { enableMapSet, produce } from 'immer';
import type { ConsentEntry, PrincipalID } from '../L0/Ontology.js';
import { GrantedGuard, RoleGuard, type GuardResult } from '../L0/Guards.js';
import { ErrorCode } from '../Errors.js';
import type { PrincipalRegistry } from '../L1/Identity.js';

enableMapSet();

/**
 * Patient → doctor grants. An absent entry reads as not granted.
 * Grants are a capability list: a later role change does not clear them.
 */
export class ConsentMatrix {
    private grants: ReadonlyMap<PrincipalID, ReadonlyMap<PrincipalID, boolean>> = new Map();

    constructor(private registry: PrincipalRegistry) { }

    /**
     * Sets grant[patient][doctor] = true. Requires `doctor` to currently hold DOCTOR.
     * The caller's PATIENT role is checked by the authority before this is invoked.
     */
    public grant(patient: PrincipalID, doctor: PrincipalID): GuardResult {
        const check = RoleGuard({
            registry: this.registry,
            principal: doctor,
            role: 'DOCTOR',
            code: ErrorCode.INVALID_COUNTERPARTY,
            violation: 'invalid doctor'
        });
        if (!check.ok) return check;

        this.set(patient, doctor, true);
        return check;
    }

    public revoke(patient: PrincipalID, doctor: PrincipalID): GuardResult {
        const check = GrantedGuard({ consent: this, patient, doctor });
        if (!check.ok) return check;

        this.set(patient, doctor, false);
        return check;
    }

    public isGranted(patient: PrincipalID, doctor: PrincipalID): boolean {
        return this.grants.get(patient)?.get(doctor) ?? false;
    }

    /**
     * Doctors currently granted by `patient`.
     */
    public grantedBy(patient: PrincipalID): PrincipalID[] {
        const row = this.grants.get(patient);
        if (!row) return [];
        return [...row].filter(([, granted]) => granted).map(([doctor]) => doctor);
    }

    /**
     * Every stored entry, including revoked (false) ones.
     */
    public entries(): ConsentEntry[] {
        const out: ConsentEntry[] = [];
        for (const [patient, row] of this.grants) {
            for (const [doctor, granted] of row) out.push({ patient, doctor, granted });
        }
        return out;
    }

    public load(entries: Iterable<ConsentEntry>): void {
        for (const e of entries) this.set(e.patient, e.doctor, e.granted);
    }

    private set(patient: PrincipalID, doctor: PrincipalID, granted: boolean): void {
        this.grants = produce(this.grants, draft => {
            let row = draft.get(patient);
            if (!row) {
                row = new Map<PrincipalID, boolean>();
                draft.set(patient, row);
            }
            row.set(doctor, granted);
        });
    }
}
