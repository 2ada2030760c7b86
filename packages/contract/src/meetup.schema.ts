import { z } from 'zod';

/** Meetup sends numeric member ids; the bot stores every id as a string. */
const MeetupIdSchema = z.union([z.number().int(), z.string().min(1)]).transform(String);

export const MeetupMemberSchema = z.object({
    id: MeetupIdSchema,
    name: z.string(),
    photo: z
        .object({
            thumb_link: z.string().url(),
        })
        .optional(),
});

export type MeetupMember = z.infer<typeof MeetupMemberSchema>;

export const MeetupEventSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    /** Milliseconds since the epoch, UTC */
    time: z.number().int(),
    link: z.string().url(),
    description: z.string().optional(),
});

export type MeetupEvent = z.infer<typeof MeetupEventSchema>;

export const MeetupRsvpSchema = z.object({
    response: z.enum(['yes', 'no', 'waitlist']),
    member: z.object({
        id: MeetupIdSchema,
        event_context: z
            .object({
                host: z.boolean(),
            })
            .optional(),
    }),
});

export type MeetupRsvp = z.infer<typeof MeetupRsvpSchema>;

export const MeetupTokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string(),
    expires_in: z.number().optional(),
    refresh_token: z.string().optional(),
});

export type MeetupTokenResponse = z.infer<typeof MeetupTokenResponseSchema>;
