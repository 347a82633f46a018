import { PrincipalRegistry } from './L1/Identity.js';
import { ConsentMatrix } from './L2/Consent.js';
import { RecordLedger, type RecordFilter } from './L3/Ledger.js';
import { OperationJournal, type JournalArgs, type Operation } from './L5/Journal.js';
import { AdminGuard, IdentityGuard, RoleGuard, firstFailure, toOutcome, type GuardResult } from './L0/Guards.js';
import { SystemClock } from './L0/Ontology.js';
import type { Fingerprint, IClock, LedgerRecord, Principal, PrincipalID, RecordID, Role } from './L0/Ontology.js';
import { SNAPSHOT_VERSION, parseSnapshot, type AuthoritySnapshot } from './Snapshot.js';
import { ErrorCode, LedgerError, accepted, type Outcome } from './Errors.js';

export interface AuthorityOptions {
    clock?: IClock;
    journal?: OperationJournal;
}

/**
 * The authority: owns the single administrator slot and routes every operation
 * through the registry, consent matrix and ledger under role checks.
 *
 * Each operation is synchronous and runs its checks and its mutation without yielding,
 * so one instance is its own serialization point. Instances share nothing.
 */
export class RecordAuthority {
    private admin: PrincipalID;
    private readonly registry = new PrincipalRegistry();
    private readonly consent = new ConsentMatrix(this.registry);
    private readonly ledger = new RecordLedger(this.registry, this.consent);
    private readonly clock: IClock;
    private readonly journal: OperationJournal;

    public constructor(admin: PrincipalID, options: AuthorityOptions = {}) {
        const check = IdentityGuard({ identity: admin });
        if (!check.ok) throw new LedgerError(ErrorCode.INVALID_IDENTITY, check.violation);

        this.clock = options.clock ?? SystemClock;
        this.journal = options.journal ?? new OperationJournal();
        this.admin = admin;
        // The administrator exists but holds no clinical role while serving.
        this.registry.register(admin, 'NONE');
    }

    public get Admin(): PrincipalID { return this.admin; }
    public get Journal(): OperationJournal { return this.journal; }

    // --- Administration ---

    public register(caller: PrincipalID, identity: PrincipalID, role: Role): Outcome<Principal> {
        const now = this.clock.now();
        const auth = AdminGuard({ caller, admin: this.admin });
        if (!auth.ok) return this.settle('REGISTER', caller, { identity, role }, now, toOutcome<Principal>(auth));

        const result = this.registry.register(identity, role);
        const outcome: Outcome<Principal> = result.ok
            ? accepted({ id: identity, role, exists: true })
            : toOutcome<Principal>(result);
        return this.settle('REGISTER', caller, { identity, role }, now, outcome);
    }

    public registerDoctor(caller: PrincipalID, identity: PrincipalID): Outcome<Principal> {
        return this.register(caller, identity, 'DOCTOR');
    }

    public registerPatient(caller: PrincipalID, identity: PrincipalID): Outcome<Principal> {
        return this.register(caller, identity, 'PATIENT');
    }

    /**
     * Hands the administrator slot to `identity`. The outgoing holder's role is reset to NONE
     * and the incoming holder is (re)registered with role NONE.
     */
    public transfer(caller: PrincipalID, identity: PrincipalID): Outcome<PrincipalID> {
        const now = this.clock.now();
        const check = firstFailure(
            () => AdminGuard({ caller, admin: this.admin }),
            () => IdentityGuard({ identity })
        );
        if (!check.ok) return this.settle('TRANSFER', caller, { identity }, now, toOutcome<PrincipalID>(check));

        const previous = this.admin;
        this.registry.clearRole(previous);
        this.admin = identity;
        this.registry.register(identity, 'NONE');
        return this.settle('TRANSFER', caller, { identity, previous }, now, accepted(identity));
    }

    // --- Consent ---

    public grantAccess(caller: PrincipalID, doctor: PrincipalID): Outcome<void> {
        const now = this.clock.now();
        const check = firstFailure(
            () => this.onlyPatient(caller),
            () => this.consent.grant(caller, doctor)
        );
        const outcome: Outcome<void> = check.ok ? accepted(undefined) : toOutcome<void>(check);
        return this.settle('GRANT', caller, { doctor }, now, outcome);
    }

    public revokeAccess(caller: PrincipalID, doctor: PrincipalID): Outcome<void> {
        const now = this.clock.now();
        const check = firstFailure(
            () => this.onlyPatient(caller),
            () => this.consent.revoke(caller, doctor)
        );
        const outcome: Outcome<void> = check.ok ? accepted(undefined) : toOutcome<void>(check);
        return this.settle('REVOKE', caller, { doctor }, now, outcome);
    }

    // --- Records ---

    public addRecord(caller: PrincipalID, patient: PrincipalID, fingerprint: Fingerprint): Outcome<RecordID> {
        const now = this.clock.now();
        const outcome = this.ledger.add(caller, patient, fingerprint, now);
        return this.settle('ADD_RECORD', caller, { patient, fingerprint }, now, outcome);
    }

    // --- Queries (never fail, never journaled) ---

    public roleOf(identity: PrincipalID): Role | undefined {
        return this.registry.roleOf(identity);
    }

    public principal(identity: PrincipalID): Principal | undefined {
        return this.registry.get(identity);
    }

    public principals(): Principal[] {
        return this.registry.list();
    }

    public isGranted(patient: PrincipalID, doctor: PrincipalID): boolean {
        return this.consent.isGranted(patient, doctor);
    }

    public grantedDoctors(patient: PrincipalID): PrincipalID[] {
        return this.consent.grantedBy(patient);
    }

    public getRecord(id: RecordID): LedgerRecord | undefined {
        return this.ledger.get(id);
    }

    public records(filter?: RecordFilter): LedgerRecord[] {
        return this.ledger.list(filter);
    }

    public isCommitted(fingerprint: Fingerprint): boolean {
        return this.ledger.has(fingerprint);
    }

    public get recordCount(): number {
        return this.ledger.size;
    }

    // --- Persistence ---

    public snapshot(): AuthoritySnapshot {
        return {
            version: SNAPSHOT_VERSION,
            admin: this.admin,
            principals: this.registry.list().map(p => ({ ...p })),
            grants: this.consent.entries(),
            records: this.ledger.list().map(r => ({ ...r })),
            fingerprints: this.ledger.committedFingerprints()
        };
    }

    /**
     * Rebuilds an authority from an untrusted snapshot value. Throws LedgerError(SNAPSHOT_INVALID).
     */
    public static restore(value: unknown, options: AuthorityOptions = {}): RecordAuthority {
        const snapshot = parseSnapshot(value);
        const authority = new RecordAuthority(snapshot.admin, options);
        authority.registry.load(snapshot.principals);
        authority.consent.load(snapshot.grants);
        authority.ledger.load(snapshot.records, snapshot.fingerprints);
        return authority;
    }

    private onlyPatient(caller: PrincipalID): GuardResult {
        return RoleGuard({ registry: this.registry, principal: caller, role: 'PATIENT', code: ErrorCode.UNAUTHORIZED, violation: 'only patient' });
    }

    private settle<T>(operation: Operation, caller: PrincipalID, args: JournalArgs, timestamp: number, outcome: Outcome<T>): Outcome<T> {
        this.journal.append({
            operation,
            caller,
            args,
            timestamp,
            status: outcome.ok ? 'ACCEPTED' : 'REJECTED',
            ...(outcome.ok ? {} : { code: outcome.code })
        });
        return outcome;
    }
}
