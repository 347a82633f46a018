import { enableMapSet, produce } from 'immer';
import type { Principal, PrincipalID, Role } from '../L0/Ontology.js';
import { IdentityGuard, type GuardResult } from '../L0/Guards.js';

enableMapSet();

/**
 * Identity → role bindings. Entries are permanent once created; only the role is reassignable.
 */
export class PrincipalRegistry {
    private principals: ReadonlyMap<PrincipalID, Principal> = new Map();

    /**
     * Inserts or overwrites the role of `identity` and marks it as existing.
     * Caller authorization is the authority's concern; this only rejects malformed identities.
     */
    public register(identity: PrincipalID, role: Role): GuardResult {
        const check = IdentityGuard({ identity });
        if (!check.ok) return check;

        this.principals = produce(this.principals, draft => {
            draft.set(identity, { id: identity, role, exists: true });
        });
        return check;
    }

    /**
     * Resets the role of an existing principal to NONE. Unknown identities are left alone.
     */
    public clearRole(identity: PrincipalID): void {
        if (!this.principals.has(identity)) return;
        this.principals = produce(this.principals, draft => {
            const p = draft.get(identity);
            if (p) p.role = 'NONE';
        });
    }

    /**
     * Bulk load used when rehydrating from a snapshot. Entries are taken verbatim.
     */
    public load(entries: Iterable<Principal>): void {
        this.principals = produce(this.principals, draft => {
            for (const p of entries) draft.set(p.id, { ...p });
        });
    }

    public roleOf(identity: PrincipalID): Role | undefined {
        return this.principals.get(identity)?.role;
    }

    public get(identity: PrincipalID): Principal | undefined {
        return this.principals.get(identity);
    }

    public exists(identity: PrincipalID): boolean {
        return this.principals.get(identity)?.exists === true;
    }

    public holds(identity: PrincipalID, role: Role): boolean {
        const p = this.principals.get(identity);
        return p !== undefined && p.exists && p.role === role;
    }

    public list(): Principal[] {
        return [...this.principals.values()];
    }

    public get size(): number {
        return this.principals.size;
    }
}
