export interface LoginResponse {
  token: string;
}

export interface TokenHeader {
  alg: 'HS256';
  typ: 'JWT';
}

// Seconds since the epoch, as in registered JWT claims.
export interface TokenPayload {
  iat: number;
  exp: number;
}

export type TokenRejection = 'invalid' | 'expired';

export type TokenVerification =
  | { ok: true; payload: TokenPayload }
  | { ok: false; reason: TokenRejection };
