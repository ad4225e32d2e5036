/**
 * Claims embedded in a bearer token.
 * `iat` / `exp` are filled in by the signer.
 */
export interface JwtPayload {
  username: string;
  userImg: string;
  iat?: number;
  exp?: number;
}

/**
 * The shape attached to `request.user` by the JWT strategy.
 */
export interface AuthUser {
  id: number;
  username: string;
  userImg: string;
}
