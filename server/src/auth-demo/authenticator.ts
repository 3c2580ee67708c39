import type { Request } from "express";
import { UnauthorizedError } from "../http/errors.js";
import type { InMemoryUserStore, StoredUser } from "./store.js";
import { TokenError, verifyAccessToken } from "./tokens.js";

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/** Resolves the registered user behind a request's bearer token. */
export type Authenticator = (req: Request) => StoredUser;

export function createAuthenticator(store: InMemoryUserStore, jwtSecret: string): Authenticator {
  return (req: Request): StoredUser => {
    const header = req.headers.authorization;
    if (!header) throw new UnauthorizedError("Missing authorization header");

    const match = BEARER_PATTERN.exec(header.trim());
    if (!match) throw new UnauthorizedError("Invalid authorization header format");

    let email: string;
    try {
      email = verifyAccessToken(match[1], jwtSecret);
    } catch (err) {
      if (err instanceof TokenError) throw new UnauthorizedError(err.message);
      throw err;
    }

    const user = store.get(email);
    if (!user) throw new UnauthorizedError("User not found");
    return user;
  };
}
