import { z } from 'zod';
import type { Action, Operation, RecipientEntry } from './Ontology.js';

/**
 * Wire form of kernel values: bigints travel as unsigned decimal strings.
 */
export const UnsignedSchema = z
    .string()
    .regex(/^\d+$/, 'expected an unsigned decimal integer')
    .transform(v => BigInt(v));

export const AddressSchema = z.string().min(1);

export const EntrySchema: z.ZodType<RecipientEntry, z.ZodTypeDef, unknown> = z.object({
    address: AddressSchema,
    amount: UnsignedSchema,
    startTime: UnsignedSchema,
    endTime: UnsignedSchema,
    cliffDuration: UnsignedSchema
});

export const OperationSchema: z.ZodType<Operation, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
    z.object({ type: z.literal('ADD_RECIPIENTS'), entries: z.array(EntrySchema), totalFunding: UnsignedSchema }),
    z.object({ type: z.literal('PAUSE'), address: AddressSchema }),
    z.object({ type: z.literal('UNPAUSE'), address: AddressSchema }),
    z.object({ type: z.literal('TERMINATE_RECIPIENT'), address: AddressSchema }),
    z.object({ type: z.literal('TERMINATE_ESCROW') }),
    z.object({ type: z.literal('CLAIM'), amount: UnsignedSchema }),
    z.object({ type: z.literal('SEIZE_LOCKED'), addresses: z.array(AddressSchema) }),
    z.object({ type: z.literal('TRANSFER_DUST') }),
    z.object({ type: z.literal('UPDATE_SAFE_ADDRESS'), address: AddressSchema })
]);

export const ActionSchema: z.ZodType<Action, z.ZodTypeDef, unknown> = z.object({
    actionId: z.string().min(1),
    caller: AddressSchema,
    operation: OperationSchema,
    timestamp: UnsignedSchema
});

export function encode(value: unknown): string {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
}

/**
 * Converts bigints to decimal strings, leaving everything else as is.
 * Used for JSON responses.
 */
export function toPlain(value: unknown): unknown {
    return JSON.parse(encode(value));
}

export function decodeAction(json: string): Action {
    return ActionSchema.parse(JSON.parse(json));
}
