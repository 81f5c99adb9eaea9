import jwt from 'jsonwebtoken';

export interface AuthTokenPayload {
  sub: string; // player id
  username: string;
}

export interface TokenService {
  sign(payload: AuthTokenPayload): string;
  verify(token: string): AuthTokenPayload | null;
}

function isPayload(value: unknown): value is AuthTokenPayload {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'sub' in value &&
    typeof value.sub === 'string' &&
    'username' in value &&
    typeof value.username === 'string'
  );
}

export function createTokenService(secret: string, expiresInSeconds: number): TokenService {
  return {
    sign(payload) {
      return jwt.sign({ username: payload.username }, secret, {
        subject: payload.sub,
        expiresIn: expiresInSeconds,
        algorithm: 'HS256',
      });
    },
    verify(token) {
      try {
        const decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
        return isPayload(decoded) ? { sub: decoded.sub, username: decoded.username } : null;
      } catch {
        return null;
      }
    },
  };
}
