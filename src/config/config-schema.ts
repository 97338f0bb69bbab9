import { z } from "zod";

const positiveMs = z.number().int().positive();

export const relayConfigSchema = z.object({
  // Endpoint
  socketPath: z.string().min(1).optional(),
  socketMode: z.number().int().min(0).max(0o777).optional(),

  // Per-connection reads
  readTimeoutMs: positiveMs.optional(),
  readQuietMs: positiveMs.optional(),
  maxPayloadBytes: z.number().int().min(1).optional(),

  // Resource limits
  maxConcurrentConnections: z.number().int().min(1).optional(),

  // Correlation cache
  cacheEntryTtlMs: positiveMs.optional(),
  cacheSweepIntervalMs: positiveMs.optional(),
});
