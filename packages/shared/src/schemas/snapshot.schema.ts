import { z } from 'zod';

const count = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const memoryStatsSchema = z
  .object({
    total: count,
    used: count,
  })
  .strict();

export const networkStatsSchema = z
  .object({
    rx: count,
    tx: count,
  })
  .strict();

export const processStatsSchema = z
  .object({
    total: count,
    running: count,
    sleeping: count,
    zombie: count,
  })
  .strict();

export const snapshotSchema = z
  .object({
    cpu: z.array(z.number().min(0).max(100)),
    mem: memoryStatsSchema,
    swap: memoryStatsSchema,
    net: z.record(networkStatsSchema),
    proc: processStatsSchema,
  })
  .strict();

export type ValidatedSnapshot = z.infer<typeof snapshotSchema>;
