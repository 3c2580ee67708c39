import jwt, { type JwtPayload } from "jsonwebtoken";

export const TOKEN_ALGORITHM = "HS256";

export type TokenFailure = "invalid" | "malformed";

export class TokenError extends Error {
  constructor(readonly reason: TokenFailure, message: string) {
    super(message);
    this.name = "TokenError";
  }
}

/** Signs an HS256 access token with `sub = email`. */
export function createAccessToken(email: string, secret: string, expireMinutes: number): string {
  return jwt.sign({ sub: email }, secret, {
    algorithm: TOKEN_ALGORITHM,
    expiresIn: expireMinutes * 60,
  });
}

/**
 * Verifies signature and expiry, returning the `sub` claim.
 * Throws TokenError("invalid") for bad or expired tokens and
 * TokenError("malformed") when the payload carries no string subject.
 */
export function verifyAccessToken(token: string, secret: string): string {
  let payload: string | JwtPayload;
  try {
    payload = jwt.verify(token, secret, { algorithms: [TOKEN_ALGORITHM] });
  } catch (err) {
    if (err instanceof jwt.JsonWebTokenError) {
      throw new TokenError("invalid", "Invalid or expired token");
    }
    throw err;
  }

  if (typeof payload === "string" || typeof payload.sub !== "string" || payload.sub === "") {
    throw new TokenError("malformed", "Invalid token format");
  }
  return payload.sub;
}
