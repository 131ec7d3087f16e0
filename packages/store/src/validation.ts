import {z} from 'zod';

export const StoreKeySchema = z.string().min(1).max(1024);

export const StoreSetInputSchema = z
  .object({
    key: StoreKeySchema,
    value: z.instanceof(Buffer),
    ttlSeconds: z.number().int().gte(1)
  })
  .strict();
