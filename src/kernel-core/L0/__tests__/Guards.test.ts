import { describe, test, expect } from '@jest/globals';
import { AdminGuard, IdentityGuard, ReplayGuard, firstFailure, OK } from '../Guards.js';
import { ErrorCode } from '../../Errors.js';

describe('Guards', () => {
    test('I. AdminGuard accepts only the current administrator', () => {
        expect(AdminGuard({ caller: 'alice', admin: 'alice' })).toEqual(OK);
        expect(AdminGuard({ caller: 'eve', admin: 'alice' })).toEqual({
            ok: false,
            code: ErrorCode.UNAUTHORIZED,
            violation: 'only admin: eve is not the administrator'
        });
    });

    test('II. IdentityGuard rejects null-equivalents', () => {
        expect(IdentityGuard({ identity: '0xAlice_Admin' })).toEqual(OK);
        expect(IdentityGuard({ identity: '0x01' })).toEqual(OK);
        expect(IdentityGuard({ identity: undefined })).toMatchObject({ ok: false, code: ErrorCode.INVALID_IDENTITY });
        expect(IdentityGuard({ identity: '\t' })).toMatchObject({ ok: false, code: ErrorCode.INVALID_IDENTITY });
        expect(IdentityGuard({ identity: '0X000' })).toMatchObject({ ok: false, code: ErrorCode.INVALID_IDENTITY });
    });

    test('III. ReplayGuard is a membership test', () => {
        const seen = new Set(['h1']);
        expect(ReplayGuard({ fingerprint: 'h2', seen })).toEqual(OK);
        expect(ReplayGuard({ fingerprint: 'h1', seen })).toMatchObject({ ok: false, code: ErrorCode.REPLAY_DETECTED });
    });

    test('IV. firstFailure stops at the first failing check', () => {
        const evaluated: string[] = [];
        const result = firstFailure(
            () => { evaluated.push('a'); return OK; },
            () => { evaluated.push('b'); return AdminGuard({ caller: 'eve', admin: 'alice' }); },
            () => { evaluated.push('c'); return OK; }
        );
        expect(result).toMatchObject({ ok: false, code: ErrorCode.UNAUTHORIZED });
        expect(evaluated).toEqual(['a', 'b']);
    });
});
