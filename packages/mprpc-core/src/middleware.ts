// Client-side middleware types.
//
// Middleware allows intercepting requests and observing outcomes,
// enabling patterns like argument validation, tracing, logging and metrics.

/**
 * Extensions provide type-safe, symbol-keyed storage for middleware state.
 *
 * Each middleware can define a unique symbol and store/retrieve typed data
 * without conflicts with other middleware.
 *
 * @example
 * ```typescript
 * const TRACE_KEY = Symbol("trace");
 * ctx.extensions.set(TRACE_KEY, { spanId: "abc" });
 * const trace = ctx.extensions.get<{ spanId: string }>(TRACE_KEY);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }

  has(key: symbol): boolean {
    return this.data.has(key);
  }

  delete(key: symbol): boolean {
    return this.data.delete(key);
  }
}

/**
 * Context passed to middleware hooks.
 *
 * Shared by the pre and post hooks of a single call.
 */
export interface ClientContext {
  extensions: Extensions;
}

/**
 * An outgoing call as middleware sees it.
 */
export interface CallRequest {
  readonly method: string;

  /** Positional arguments; pre hooks may replace or edit them. */
  args: unknown[];
}

/**
 * Outcome of a call.
 */
export type CallOutcome = { ok: true; value: unknown } | { ok: false; error: Error };

/**
 * Rejection codes for middleware rejections.
 */
export type RejectionCode =
  | "unauthenticated"
  | "permission-denied"
  | "rate-limited"
  | "invalid-request"
  | "internal"
  | string;

/**
 * Returned by a pre hook to abort a call before it is sent.
 */
export interface Rejection {
  code: RejectionCode;
  message: string;
}

/**
 * Error thrown when middleware rejects a call.
 */
export class RejectionError extends Error {
  public readonly code: RejectionCode;

  constructor(rejection: Rejection) {
    super(rejection.message);
    this.name = "RejectionError";
    this.code = rejection.code;
  }

  static from(rejection: Rejection): RejectionError {
    return new RejectionError(rejection);
  }
}

/**
 * Client middleware.
 *
 * @example
 * ```typescript
 * const noNegatives: ClientMiddleware = {
 *   pre(ctx, request) {
 *     if (request.args.some((a) => typeof a === "number" && a < 0)) {
 *       return { code: "invalid-request", message: "negative argument" };
 *     }
 *   },
 * };
 * ```
 */
export interface ClientMiddleware {
  /**
   * Called before the call is sent. Return a Rejection to abort it.
   */
  pre?(ctx: ClientContext, request: CallRequest): Promise<Rejection | void> | Rejection | void;

  /**
   * Called after the outcome is known, including for rejected calls.
   */
  post?(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): Promise<void> | void;
}
