/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 */

/**
 * Hono environment type for the ledgerlens app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;
  };
}
