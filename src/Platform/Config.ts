/**
 * Environment Configuration
 *
 * Validates and exports the process configuration.
 * Throws on missing or malformed variables.
 */

import { z } from 'zod';
import { ConfigurationError } from './Errors.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const AddressVar = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 0x-prefixed 20-byte hex address');

const EnvSchema = z.object({
    VESTING_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    VESTING_DB_PATH: z.string().min(1).default('vesting.db'),
    VESTING_ADMIN: AddressVar,
    VESTING_SAFE_ADDRESS: AddressVar,
    VESTING_ESCROW_ACCOUNT: AddressVar.default('0x00000000000000000000000000000000000e5c40'),
    VESTING_OPENING_BALANCE: z.string().regex(/^\d+$/, 'expected an unsigned decimal integer').default('0').transform(v => BigInt(v)),
    VESTING_ALLOW_PAST_START: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),
    VESTING_LOG_LEVEL: LogLevelSchema.default('info')
});

export interface Config {
    port: number;
    dbPath: string;
    administrator: string;
    safeAddress: string;
    escrowAccount: string;
    openingBalance: bigint;
    allowPastStartTime: boolean;
    logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigurationError(`Invalid environment configuration: ${issues}`, issues);
    }
    const e = parsed.data;
    return {
        port: e.VESTING_PORT,
        dbPath: e.VESTING_DB_PATH,
        administrator: e.VESTING_ADMIN,
        safeAddress: e.VESTING_SAFE_ADDRESS,
        escrowAccount: e.VESTING_ESCROW_ACCOUNT,
        openingBalance: e.VESTING_OPENING_BALANCE,
        allowPastStartTime: e.VESTING_ALLOW_PAST_START,
        logLevel: e.VESTING_LOG_LEVEL
    };
}
