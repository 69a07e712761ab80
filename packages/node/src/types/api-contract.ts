/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

/**
 * Hono environment type for the Fiscus app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Tenant owning every record the request touches (set by tenant middleware) */
    tenantId: string;

    /** Actor recorded on closes and posts (set by tenant middleware) */
    actorId: string;
  };
}
