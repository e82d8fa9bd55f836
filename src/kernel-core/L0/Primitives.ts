import { ErrorCode, KernelError } from '../Errors.js';
import { ZERO_ADDRESS } from './Ontology.js';
import type { Address } from './Ontology.js';

// --- Unsigned arithmetic ---
// Amounts never wrap and never saturate: an underflow is a fault, not a zero.

export function sub(a: bigint, b: bigint, context: string): bigint {
    if (b > a) {
        throw new KernelError(
            ErrorCode.ARITHMETIC_UNDERFLOW,
            `Underflow in ${context}: ${a} - ${b}`,
            { context, minuend: a.toString(), subtrahend: b.toString() }
        );
    }
    return a - b;
}

export function max(a: bigint, b: bigint): bigint {
    return a > b ? a : b;
}

export function min(a: bigint, b: bigint): bigint {
    return a < b ? a : b;
}

export function sum(values: readonly bigint[]): bigint {
    return values.reduce((acc, v) => acc + v, 0n);
}

export function isUnsigned(value: bigint): boolean {
    return value >= 0n;
}

// --- Addresses ---
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isWellFormedAddress(value: string): boolean {
    return ADDRESS_PATTERN.test(value);
}

export function normalizeAddress(value: string): Address {
    return value.toLowerCase();
}

export function isZeroAddress(value: string): boolean {
    return normalizeAddress(value) === ZERO_ADDRESS;
}
