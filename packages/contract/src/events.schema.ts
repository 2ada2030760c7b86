import { z } from 'zod';

/** Type of an event series; decides the Discord category of its channel */
export const EventSeriesTypeSchema = z.enum(['campaign', 'adventure']);

export type EventSeriesType = z.infer<typeof EventSeriesTypeSchema>;

/** The `meetup_event:{id}` hash as stored in Redis */
export const StoredEventSchema = z.object({
    time: z.string().datetime({ offset: true }),
    name: z.string().min(1),
    link: z.string().min(1),
});

export type StoredEvent = z.infer<typeof StoredEventSchema>;
