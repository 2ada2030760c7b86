import { z } from 'zod';

/** Linking session ids are 16 random bytes, hex encoded */
export const LinkingIdSchema = z.string().regex(/^[0-9a-f]{32}$/);

/** Query of GET /authorize/redirect, Meetup's OAuth2 callback */
export const AuthorizeRedirectQuerySchema = z.object({
    code: z.string().min(1),
    state: LinkingIdSchema,
});

export type AuthorizeRedirectQueryDto = z.infer<typeof AuthorizeRedirectQuerySchema>;
