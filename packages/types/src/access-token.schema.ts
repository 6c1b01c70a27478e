import { z } from 'zod';

/**
 * Claims carried by a signed access token.
 * `scp` holds the permission set resolved when the token was minted.
 */
export const AccessTokenClaimsSchema = z.object({
  iss: z.string(),
  aud: z.union([z.string(), z.array(z.string())]),
  sub: z.string().min(1),
  sid: z.string().min(1),
  token_use: z.literal('access'),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  scp: z.array(z.string()),
});

export type AccessTokenClaims = z.infer<typeof AccessTokenClaimsSchema>;
