import { z } from 'zod';

export const SessionTokensResponseSchema = z.object({
  access_token: z.string(),
  session_token: z.string(),
  token_type: z.literal('Bearer'),
  expires_in: z.number().int().nonnegative(),
  session_id: z.string(),
});

export type SessionTokensResponse = z.infer<typeof SessionTokensResponseSchema>;
