import type { MiddlewareHandler } from "hono";
import { resolveToken } from "../auth/tokens.js";
import type { Ledger } from "../ledger/db.js";

export type AuthEnv = {
  Variables: {
    userId: string;
  };
};

/**
 * Bearer token validation middleware.
 *
 * Extracts the token from the Authorization header, resolves it against
 * the SQLite token store and exposes the owning user as `userId`.
 * Returns 401 on failure.
 */
export function bearerAuth(db: Ledger): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const auth = c.req.header("Authorization");

    if (!auth?.startsWith("Bearer ")) {
      return c.json(
        {
          error: "unauthorized",
          error_description:
            "Missing or malformed Authorization header. Expected: Bearer <token>",
        },
        401
      );
    }

    const token = auth.slice(7).trim();

    if (!token) {
      return c.json(
        {
          error: "unauthorized",
          error_description: "Empty bearer token.",
        },
        401
      );
    }

    const userId = resolveToken(db, token);
    if (!userId) {
      return c.json(
        {
          error: "invalid_token",
          error_description: "The access token is expired or invalid.",
        },
        401
      );
    }

    c.set("userId", userId);
    await next();
  };
}
