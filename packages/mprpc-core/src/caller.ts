// Caller abstraction over a session.
//
// Provides a uniform interface for making calls that supports middleware
// composition via the with() method.

import createDebug from "debug";

import type { ClientMiddleware, ClientContext, CallRequest, CallOutcome } from "./middleware.ts";
import { Extensions, RejectionError } from "./middleware.ts";
import type { Session } from "./session.ts";

const debug = createDebug("mprpc:caller");

/**
 * A call to make.
 */
export interface CallerRequest {
  method: string;
  args: unknown[];
}

/**
 * Interface for making calls.
 */
export interface Caller {
  /**
   * Make a call and wait for its result.
   */
  call(request: CallerRequest): Promise<unknown>;

  /**
   * Wrap this caller with middleware.
   *
   * Middleware is applied in order: first added runs first on pre,
   * and last on post (onion model).
   */
  with(middleware: ClientMiddleware): Caller;
}

/**
 * Caller that makes synchronous-style calls on a session.
 */
export class SessionCaller implements Caller {
  constructor(private readonly session: Session) {}

  call(request: CallerRequest): Promise<unknown> {
    return this.session.call(request.method, ...request.args);
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this, [middleware]);
  }
}

/**
 * Caller implementation that applies middleware around another Caller.
 *
 * Handles the pre/post middleware lifecycle:
 * 1. Create context with extensions
 * 2. Run pre() hooks (can reject or edit the arguments)
 * 3. Call inner caller
 * 4. Run post() hooks with outcome, in reverse order
 * 5. Return result or throw error
 */
export class MiddlewareCaller implements Caller {
  private inner: Caller;
  private middlewares: ClientMiddleware[];

  constructor(inner: Caller, middlewares: ClientMiddleware[]) {
    this.inner = inner;
    this.middlewares = middlewares;
  }

  async call(request: CallerRequest): Promise<unknown> {
    const ctx: ClientContext = {
      extensions: new Extensions(),
    };

    const callRequest: CallRequest = {
      method: request.method,
      args: [...request.args],
    };

    for (const mw of this.middlewares) {
      if (mw.pre) {
        const rejection = await mw.pre(ctx, callRequest);
        if (rejection) {
          const error = RejectionError.from(rejection);
          await this.runPostHooks(ctx, callRequest, { ok: false, error });
          throw error;
        }
      }
    }

    let outcome: CallOutcome;

    try {
      const value = await this.inner.call({ method: callRequest.method, args: callRequest.args });
      outcome = { ok: true, value };
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      await this.runPostHooks(ctx, callRequest, { ok: false, error });
      throw e;
    }

    await this.runPostHooks(ctx, callRequest, outcome);

    return outcome.value;
  }

  private async runPostHooks(
    ctx: ClientContext,
    request: CallRequest,
    outcome: CallOutcome,
  ): Promise<void> {
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const mw = this.middlewares[i];
      if (mw.post) {
        try {
          await mw.post(ctx, request, outcome);
        } catch (e) {
          // Every post hook runs; a failing one only gets logged
          debug("post hook failed for %s: %O", request.method, e);
        }
      }
    }
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this.inner, [...this.middlewares, middleware]);
  }
}
