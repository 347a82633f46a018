import type { Fingerprint, LedgerRecord, PrincipalID, RecordID } from '../L0/Ontology.js';
import { ConsentGuard, ReplayGuard, RoleGuard, firstFailure, toOutcome } from '../L0/Guards.js';
import { ErrorCode, accepted, type Outcome } from '../Errors.js';
import type { PrincipalRegistry } from '../L1/Identity.js';
import type { ConsentMatrix } from '../L2/Consent.js';

export interface RecordFilter {
    patient?: PrincipalID;
    doctor?: PrincipalID;
}

/**
 * Append-only record sequence plus the ledger-wide set of committed fingerprints.
 */
export class RecordLedger {
    private records: LedgerRecord[] = [];
    private fingerprints: Set<Fingerprint> = new Set();

    constructor(
        private registry: PrincipalRegistry,
        private consent: ConsentMatrix
    ) { }

    /**
     * Commits a record written by `doctor` for `patient`.
     *
     * Checks run in a fixed order and are re-evaluated on every call:
     * writer role, patient role, consent, then replay. Nothing is mutated unless all pass.
     */
    public add(doctor: PrincipalID, patient: PrincipalID, fingerprint: Fingerprint, now: number): Outcome<RecordID> {
        const check = firstFailure(
            () => RoleGuard({ registry: this.registry, principal: doctor, role: 'DOCTOR', code: ErrorCode.UNAUTHORIZED, violation: 'only doctor' }),
            () => RoleGuard({ registry: this.registry, principal: patient, role: 'PATIENT', code: ErrorCode.INVALID_COUNTERPARTY, violation: 'invalid patient' }),
            () => ConsentGuard({ consent: this.consent, patient, doctor }),
            () => ReplayGuard({ fingerprint, seen: this.fingerprints })
        );
        if (!check.ok) return toOutcome<RecordID>(check);

        const id = this.records.length;
        this.records.push(Object.freeze({ id, patient, doctor, fingerprint, createdAt: now }));
        this.fingerprints.add(fingerprint);
        return accepted(id);
    }

    public get(id: RecordID): LedgerRecord | undefined {
        return this.records[id];
    }

    public list(filter: RecordFilter = {}): LedgerRecord[] {
        return this.records.filter(r =>
            (filter.patient === undefined || r.patient === filter.patient) &&
            (filter.doctor === undefined || r.doctor === filter.doctor)
        );
    }

    public has(fingerprint: Fingerprint): boolean {
        return this.fingerprints.has(fingerprint);
    }

    public committedFingerprints(): Fingerprint[] {
        return [...this.fingerprints];
    }

    public get size(): number {
        return this.records.length;
    }

    /**
     * Rehydrates records and the replay set verbatim. Intended for a fresh ledger.
     */
    public load(records: Iterable<LedgerRecord>, fingerprints: Iterable<Fingerprint>): void {
        for (const r of records) this.records.push(Object.freeze({ ...r }));
        for (const f of fingerprints) this.fingerprints.add(f);
    }
}
