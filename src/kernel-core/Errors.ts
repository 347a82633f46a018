/**
 * Ledger Error Taxonomy
 * Rejection codes for disallowed transitions and fault codes for broken inputs.
 */

export enum ErrorCode {
    // I. Rejections (returned as Outcome values, never thrown by operations)
    UNAUTHORIZED = 'UNAUTHORIZED',
    INVALID_IDENTITY = 'INVALID_IDENTITY',
    INVALID_COUNTERPARTY = 'INVALID_COUNTERPARTY',
    NOT_GRANTED = 'NOT_GRANTED',
    ACCESS_DENIED = 'ACCESS_DENIED',
    REPLAY_DETECTED = 'REPLAY_DETECTED',

    // II. Faults (thrown)
    SNAPSHOT_INVALID = 'SNAPSHOT_INVALID',
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    CONFIG_INVALID = 'CONFIG_INVALID',
}

export type RejectionCode =
    | ErrorCode.UNAUTHORIZED
    | ErrorCode.INVALID_IDENTITY
    | ErrorCode.INVALID_COUNTERPARTY
    | ErrorCode.NOT_GRANTED
    | ErrorCode.ACCESS_DENIED
    | ErrorCode.REPLAY_DETECTED;

const REJECTION_CODES: readonly RejectionCode[] = [
    ErrorCode.UNAUTHORIZED,
    ErrorCode.INVALID_IDENTITY,
    ErrorCode.INVALID_COUNTERPARTY,
    ErrorCode.NOT_GRANTED,
    ErrorCode.ACCESS_DENIED,
    ErrorCode.REPLAY_DETECTED,
];

export function isRejectionCode(value: unknown): value is RejectionCode {
    return REJECTION_CODES.some(code => code === value);
}

export class LedgerError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Ledger:${code}] ${message}`);
        this.name = 'LedgerError';
    }
}

/**
 * Result of a state-machine operation. Rejections are ordinary outcomes.
 */
export type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; code: RejectionCode; reason: string };

export const accepted = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const rejected = <T>(code: RejectionCode, reason: string): Outcome<T> => ({ ok: false, code, reason });

/**
 * For callers that prefer exceptions: returns the value or throws a LedgerError with the rejection code.
 */
export function unwrap<T>(outcome: Outcome<T>): T {
    if (!outcome.ok) {
        throw new LedgerError(outcome.code, outcome.reason);
    }
    return outcome.value;
}
