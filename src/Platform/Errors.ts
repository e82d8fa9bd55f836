/**
 * Platform Error Taxonomy
 * Failures raised outside the kernel: adapters and process configuration.
 */

export abstract class PlatformError extends Error {
    constructor(message: string, public readonly code: string, public readonly metadata?: Record<string, string>) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown by a funds ledger when an account cannot cover a debit.
 */
export class InsufficientBalanceError extends PlatformError {
    constructor(account: string, balance: bigint, requested: bigint) {
        super(`Insufficient balance on ${account}: has ${balance}, needs ${requested}`, 'INSUFFICIENT_BALANCE', {
            account,
            balance: balance.toString(),
            requested: requested.toString()
        });
    }
}

/**
 * Thrown by a funds ledger when the escrow may not debit an owner for that much.
 */
export class InsufficientAllowanceError extends PlatformError {
    constructor(owner: string, allowance: bigint, requested: bigint) {
        super(`Insufficient allowance from ${owner}: approved ${allowance}, needs ${requested}`, 'INSUFFICIENT_ALLOWANCE', {
            owner,
            allowance: allowance.toString(),
            requested: requested.toString()
        });
    }
}

/**
 * Thrown when the environment is missing or malformed.
 */
export class ConfigurationError extends PlatformError {
    constructor(message: string, issues: string) {
        super(message, 'CONFIGURATION_INVALID', { issues });
    }
}
