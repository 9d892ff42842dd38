import jwt from 'jsonwebtoken';
import { z } from 'zod';

export type AccessTokenPayload = {
  sub: string;
  role: string;
};

const accessTokenSchema = z.object({
  sub: z.string().min(1),
  role: z.string().min(1).default('user')
});

export function resolveJwtSecret(env: NodeJS.ProcessEnv = process.env): string {
  const secret = env.JWT_SECRET ?? '';
  if (!secret) {
    throw new Error('JWT_SECRET must be set before starting the API');
  }
  return secret;
}

export function signAccessToken(payload: AccessTokenPayload, secret: string, expiresInSeconds = 15 * 60) {
  return jwt.sign(payload, secret, { expiresIn: expiresInSeconds });
}

/**
 * Tokens are issued by the identity service; only the subject and role are
 * read here.
 */
export function verifyAccessToken(token: string, secret: string): AccessTokenPayload {
  const decoded = jwt.verify(token, secret);
  const parsed = accessTokenSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new Error('ACCESS_TOKEN_INVALID_PAYLOAD');
  }
  return parsed.data;
}
