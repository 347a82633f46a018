// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

// SHA-256, hex encoded
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

/**
 * Deterministic JSON: object keys sorted at every depth.
 */
export function canonicalize(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(sortKeys);
    if (value !== null && typeof value === 'object') {
        const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return Object.fromEntries(entries.map(([k, v]) => [k, sortKeys(v)]));
    }
    return value;
}

/**
 * Content-derived fingerprint for a record payload.
 */
export function fingerprintOf(content: string | Buffer): string {
    return createHash('sha256').update(content).digest('hex');
}
