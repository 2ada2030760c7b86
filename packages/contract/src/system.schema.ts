import { z } from 'zod';

const DependencyHealthSchema = z.object({
    connected: z.boolean(),
    latencyMs: z.number(),
});

export const QueueHealthSchema = z.object({
    name: z.string(),
    waiting: z.number().int(),
    active: z.number().int(),
    delayed: z.number().int(),
    failed: z.number().int(),
    lastFailure: z
        .object({
            at: z.string(),
            message: z.string(),
        })
        .nullable(),
});

/** Response of GET /health */
export const HealthCheckSchema = z.object({
    status: z.enum(['ok', 'unhealthy']),
    timestamp: z.string(),
    redis: DependencyHealthSchema,
    discord: z.object({
        connected: z.boolean(),
    }),
    queues: z.array(QueueHealthSchema),
});

export type HealthCheckDto = z.infer<typeof HealthCheckSchema>;
export type QueueHealthDto = z.infer<typeof QueueHealthSchema>;
