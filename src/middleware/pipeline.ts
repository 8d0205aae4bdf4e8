/**
 * Request handlers and the middleware that wraps them.
 */

export interface HandlerContext {
  /** Per-invocation id from the host; empty when it gives none. */
  requestId: string;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * The first middleware listed is the outermost:
 * `pipeline(logging, errors, validateBody(schema))(handler)` logs the
 * response the error handler produced for a failed validation.
 */
export function pipeline(...layers: Middleware[]): (handler: Handler) => Handler {
  return (handler) => {
    let wrapped = handler;
    for (let i = layers.length - 1; i >= 0; i--) {
      const layer = layers[i];
      if (layer) wrapped = layer(wrapped);
    }
    return wrapped;
  };
}
