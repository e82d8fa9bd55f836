import { z } from 'zod';
import { AddressSchema, UnsignedSchema } from '../kernel-core/L0/Codec.js';

/**
 * Request bodies. Amounts and times travel as unsigned decimal strings.
 */
export const RecipientBatchBody = z.object({
    addresses: z.array(AddressSchema),
    amounts: z.array(UnsignedSchema),
    startTimes: z.array(UnsignedSchema),
    endTimes: z.array(UnsignedSchema),
    cliffDurations: z.array(UnsignedSchema),
    totalFunding: UnsignedSchema
});

export const ClaimBody = z.object({ amount: UnsignedSchema });

export const SeizeBody = z.object({ addresses: z.array(AddressSchema) });

export const SafeAddressBody = z.object({ address: AddressSchema });

export const ValuationQuery = z.object({ at: UnsignedSchema.optional() });
