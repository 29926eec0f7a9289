import type { MiddlewareHandler } from "hono";
import { createLogger } from "../logger.js";
import { clientIp } from "./rate-limit.js";

const log = createLogger("audit");

/**
 * Structured audit logging middleware.
 *
 * Emits one JSON log line per request with timing, status, method, path
 * and client IP.
 */
export function auditLog(): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;
    const ip = clientIp(c.req.header("x-forwarded-for"), c.req.header("x-real-ip"));
    const userAgent = c.req.header("user-agent") || "unknown";

    await next();

    const status = c.res.status;
    const fields = {
      method,
      path,
      status,
      duration: Date.now() - start,
      ip,
      userAgent,
    };

    if (status >= 500) log.error("request", fields);
    else if (status >= 400) log.warn("request", fields);
    else log.info("request", fields);
  };
}
