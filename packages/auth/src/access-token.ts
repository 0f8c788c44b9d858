import { randomUUID } from 'node:crypto';
import { SignJWT, jwtVerify, type JWTPayload } from 'jose';
import {
  ACCESS_TOKEN_ALGORITHM,
  ACCESS_TOKEN_TTL_SECONDS,
  CLOCK_SKEW_TOLERANCE_SECONDS,
  MIN_JWT_SECRET_LENGTH,
} from './constants.js';
import { UnauthorizedError } from './errors.js';

export type AccessTokenConfig = {
  secret: string;
  issuer: string;
  audience: string;
  ttlSeconds?: number;
  clockToleranceSeconds?: number;
};

export type AccessTokenClaims = {
  sub: string;
  jti: string;
  iss: string;
  aud: string;
  iat: number;
  exp: number;
  token_use: 'access';
};

export type IssuedAccessToken = {
  token: string;
  expiresIn: number;
  claims: AccessTokenClaims;
};

const encoder = new TextEncoder();

function secretKey(config: AccessTokenConfig): Uint8Array {
  if (config.secret.length < MIN_JWT_SECRET_LENGTH) {
    throw new Error(`JWT secret must be at least ${MIN_JWT_SECRET_LENGTH} characters`);
  }
  return encoder.encode(config.secret);
}

export async function signAccessToken(
  config: AccessTokenConfig,
  params: { userId: string; jti?: string }
): Promise<IssuedAccessToken> {
  const issuedAt = Math.floor(Date.now() / 1000);
  const expiresIn = config.ttlSeconds ?? ACCESS_TOKEN_TTL_SECONDS;
  const exp = issuedAt + expiresIn;
  const jti = params.jti ?? randomUUID();

  const payload: JWTPayload = {
    sub: params.userId,
    token_use: 'access',
    jti,
  };

  const token = await new SignJWT(payload)
    .setProtectedHeader({ alg: ACCESS_TOKEN_ALGORITHM, typ: 'JWT' })
    .setIssuedAt(issuedAt)
    .setExpirationTime(exp)
    .setIssuer(config.issuer)
    .setAudience(config.audience)
    .sign(secretKey(config));

  return {
    token,
    expiresIn,
    claims: {
      sub: params.userId,
      jti,
      iss: config.issuer,
      aud: config.audience,
      iat: issuedAt,
      exp,
      token_use: 'access',
    },
  };
}

/**
 * Verifies signature, issuer, audience and expiry. Every failure surfaces as
 * UnauthorizedError with the jose error kept as the cause.
 */
export async function verifyAccessToken(
  config: AccessTokenConfig,
  token: string
): Promise<AccessTokenClaims> {
  let payload: JWTPayload;
  try {
    const verified = await jwtVerify(token, secretKey(config), {
      issuer: config.issuer,
      audience: config.audience,
      algorithms: [ACCESS_TOKEN_ALGORITHM],
      clockTolerance: config.clockToleranceSeconds ?? CLOCK_SKEW_TOLERANCE_SECONDS,
    });
    payload = verified.payload;
  } catch (error) {
    throw new UnauthorizedError('Invalid or expired access token', { cause: error });
  }

  const { sub, jti, iat, exp } = payload;
  if (
    payload.token_use !== 'access' ||
    typeof sub !== 'string' ||
    typeof jti !== 'string' ||
    typeof iat !== 'number' ||
    typeof exp !== 'number'
  ) {
    throw new UnauthorizedError('Invalid access token');
  }

  return {
    sub,
    jti,
    iss: config.issuer,
    aud: config.audience,
    iat,
    exp,
    token_use: 'access',
  };
}
