import { z } from 'zod';

const TimeoutsSchema = z.object({
    vision: z.number().int().min(100).max(120000).default(30000),
    imageFetch: z.number().int().min(100).max(60000).default(10000),
});

export const AdminConfigSchema = z.object({
    resultsLimit: z.number().int().min(1).max(100).default(20),
    minSimilarity: z.number().min(0).max(1).default(0),
    degradedSummaryChars: z.number().int().min(1).max(2000).default(600),
    timeoutsMs: TimeoutsSchema.default({}),
});

export type AdminConfig = z.infer<typeof AdminConfigSchema>;

export const AdminConfigUpdateSchema = AdminConfigSchema
    .extend({ timeoutsMs: TimeoutsSchema.partial().strict() })
    .partial()
    .strict();

export type AdminConfigUpdate = z.infer<typeof AdminConfigUpdateSchema>;

export const DEFAULT_ADMIN_CONFIG: AdminConfig = AdminConfigSchema.parse({});
