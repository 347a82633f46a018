import { describe, test, expect, beforeEach } from '@jest/globals';
import { PrincipalRegistry } from '../../L1/Identity.js';
import { ConsentMatrix } from '../Consent.js';
import { ErrorCode } from '../../Errors.js';

describe('Consent Matrix', () => {
    let registry: PrincipalRegistry;
    let consent: ConsentMatrix;

    beforeEach(() => {
        registry = new PrincipalRegistry();
        registry.register('dr-bob', 'DOCTOR');
        registry.register('carol', 'PATIENT');
        consent = new ConsentMatrix(registry);
    });

    test('I. Absent entries read as not granted', () => {
        expect(consent.isGranted('carol', 'dr-bob')).toBe(false);
        expect(consent.isGranted('nobody', 'nothing')).toBe(false);
    });

    test('II. Grant sets the entry and is idempotent', () => {
        expect(consent.grant('carol', 'dr-bob')).toEqual({ ok: true });
        const once = consent.entries();
        expect(consent.grant('carol', 'dr-bob')).toEqual({ ok: true });
        expect(consent.entries()).toEqual(once);
        expect(once).toEqual([{ patient: 'carol', doctor: 'dr-bob', granted: true }]);
    });

    test('III. Grant to a non-doctor is an invalid counterparty', () => {
        const result = consent.grant('carol', 'carol');
        expect(result).toEqual({ ok: false, code: ErrorCode.INVALID_COUNTERPARTY, violation: 'invalid doctor: carol' });

        const unknown = consent.grant('carol', 'dr-ghost');
        expect(unknown.ok).toBe(false);
        expect(consent.entries()).toEqual([]);
    });

    test('IV. Revoke clears an active grant and keeps the entry as false', () => {
        consent.grant('carol', 'dr-bob');
        expect(consent.revoke('carol', 'dr-bob')).toEqual({ ok: true });
        expect(consent.isGranted('carol', 'dr-bob')).toBe(false);
        expect(consent.entries()).toEqual([{ patient: 'carol', doctor: 'dr-bob', granted: false }]);
    });

    test('V. Revoke without an active grant fails NOT_GRANTED', () => {
        const result = consent.revoke('carol', 'dr-bob');
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.code).toBe(ErrorCode.NOT_GRANTED);

        consent.grant('carol', 'dr-bob');
        consent.revoke('carol', 'dr-bob');
        const again = consent.revoke('carol', 'dr-bob');
        expect(again.ok).toBe(false);
    });

    test('VI. Grants survive a later role change of the doctor', () => {
        consent.grant('carol', 'dr-bob');
        registry.register('dr-bob', 'PATIENT');
        expect(consent.isGranted('carol', 'dr-bob')).toBe(true);
    });

    test('VII. grantedBy lists only active grants', () => {
        registry.register('dr-dana', 'DOCTOR');
        consent.grant('carol', 'dr-bob');
        consent.grant('carol', 'dr-dana');
        consent.revoke('carol', 'dr-bob');
        expect(consent.grantedBy('carol')).toEqual(['dr-dana']);
        expect(consent.grantedBy('dr-dana')).toEqual([]);
    });
});
