/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to a log function; main.ts
 * forwards it to pino, tests pass a collector or nothing.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Request body size as declared by the client, when present */
  readonly contentLength?: number | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const declared = Number(c.req.header("Content-Length"));
    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      contentLength: Number.isFinite(declared) && declared > 0 ? declared : undefined,
    });
  };
}
