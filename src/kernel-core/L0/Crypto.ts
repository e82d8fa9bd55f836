// src/kernel-core/L0/Crypto.ts
import { createHash, randomBytes } from 'crypto';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical encoding: sorted keys, bigints as decimal strings
export function canonicalize(value: unknown): string {
    return JSON.stringify(toCanonical(value));
}

function toCanonical(value: unknown): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (Array.isArray(value)) return value.map(toCanonical);
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            const field: unknown = Reflect.get(value, key);
            if (field !== undefined) out[key] = toCanonical(field);
        }
        return out;
    }
    return value;
}

export function hashState(state: unknown): string {
    return hash(canonicalize(state));
}

// 1.3 Randomness
export function randomNonce(bytes: number = 16): string {
    return randomBytes(bytes).toString('hex');
}
