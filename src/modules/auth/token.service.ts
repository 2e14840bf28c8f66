import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { JwtAlgorithm } from '../../connections/config/app.config';
import { TokenError } from '../../utils/errors';

export const TOKEN_PURPOSES = ['access', 'refresh', 'verify-email', 'reset-password'] as const;

export type TokenPurpose = (typeof TOKEN_PURPOSES)[number];

const claimsSchema = z.object({
  sub: z.string().min(1),
  purpose: z.enum(TOKEN_PURPOSES),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
  ver: z.number().int().optional(),
});

export type TokenClaims = z.infer<typeof claimsSchema>;

export interface IssuedToken {
  token: string;
  jti: string;
  expiresAt: Date;
}

export interface TokenServiceOptions {
  secret: string;
  algorithm: JwtAlgorithm;
  now?: () => Date;
}

/**
 * Signs and validates JWTs. Every token carries a `purpose` claim and is only
 * accepted where that purpose is expected, so a leaked verification or reset
 * link can never be replayed as a session credential.
 */
export class TokenService {
  private readonly secret: string;
  private readonly algorithm: JwtAlgorithm;
  private readonly now: () => Date;

  constructor(options: TokenServiceOptions) {
    this.secret = options.secret;
    this.algorithm = options.algorithm;
    this.now = options.now ?? (() => new Date());
  }

  issue(subject: string, purpose: TokenPurpose, ttlSeconds: number, extra: { ver?: number } = {}): IssuedToken {
    const jti = uuidv4();
    const iat = this.nowSeconds();
    const exp = iat + ttlSeconds;

    const payload: TokenClaims = { sub: subject, purpose, jti, iat, exp };
    if (extra.ver !== undefined) {
      payload.ver = extra.ver;
    }

    const token = jwt.sign(payload, this.secret, { algorithm: this.algorithm });

    return { token, jti, expiresAt: new Date(exp * 1000) };
  }

  /**
   * @throws TokenError `invalid` for a bad signature or malformed claims,
   * `expired` past `exp`, `wrong-purpose` when the purpose claim differs
   */
  validate(token: string, expectedPurpose: TokenPurpose): TokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: [this.algorithm],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenError('expired');
      }
      throw new TokenError('invalid');
    }

    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new TokenError('invalid');
    }

    if (parsed.data.purpose !== expectedPurpose) {
      throw new TokenError('wrong-purpose');
    }

    return parsed.data;
  }

  nowSeconds(): number {
    return Math.floor(this.now().getTime() / 1000);
  }
}
