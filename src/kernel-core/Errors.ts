/**
 * Vesting Kernel Error Taxonomy
 * Centralized error codes for formal rejections and terminal failures.
 */

export enum ErrorCode {
    // I. Authority & Execution
    UNAUTHORIZED = 'UNAUTHORIZED',
    REENTRANT_CALL = 'REENTRANT_CALL',

    // II. Input Shape
    INVALID_ADDRESS = 'INVALID_ADDRESS',
    INVALID_SCHEDULE = 'INVALID_SCHEDULE',
    INVALID_AMOUNT = 'INVALID_AMOUNT',
    INVALID_BATCH = 'INVALID_BATCH',

    // III. Lifecycle
    STATE_CONFLICT = 'STATE_CONFLICT',
    UNKNOWN_RECIPIENT = 'UNKNOWN_RECIPIENT',
    ESCROW_TERMINATED = 'ESCROW_TERMINATED',
    ESCROW_NOT_TERMINATED = 'ESCROW_NOT_TERMINATED',

    // IV. Accounting
    CLAIM_EXCEEDS_ENTITLEMENT = 'CLAIM_EXCEEDS_ENTITLEMENT',
    INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
    ARITHMETIC_UNDERFLOW = 'ARITHMETIC_UNDERFLOW',
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',

    // V. Temporal
    TEMPORAL_PARADOX = 'TEMPORAL_PARADOX',
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Vesting:${code}] ${message}`);
        this.name = 'KernelError';
    }
}

export function isKernelError(e: unknown, code?: ErrorCode): e is KernelError {
    return e instanceof KernelError && (code === undefined || e.code === code);
}
