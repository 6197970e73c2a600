// Logging middleware for mprpc callers.
//
// Provides request/response logging with timing information through the
// `debug` package. Enable it with DEBUG=mprpc:rpc (or DEBUG=mprpc:*).

import createDebug from "debug";
import { RemoteError } from "@mprpc/wire";

import type { ClientMiddleware, ClientContext, CallRequest, CallOutcome } from "./middleware.ts";

const START_TIME = Symbol("logging:start-time");

/** Printf-style log function, shaped like a `debug` logger. */
export type LogSink = (formatter: string, ...args: unknown[]) => void;

export interface LoggingOptions {
  /**
   * Debug namespace. Defaults to "mprpc:rpc".
   * Ignored when `log` is given.
   */
  namespace?: string;

  /**
   * Log request arguments. Defaults to true.
   */
  logArgs?: boolean;

  /**
   * Log response values. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log. Calls faster than this are skipped.
   * Defaults to 0 (log all calls).
   */
  minDuration?: number;

  /**
   * Where log lines go. Defaults to a `debug` logger for `namespace`,
   * which only prints when that namespace is enabled.
   */
  log?: LogSink;
}

/**
 * Create a logging middleware that logs all calls with timing information.
 *
 * Logs structured objects:
 * - Request: { type: "request", method, args? }
 * - Response: { type: "response", method, duration, ok, result? | error? }
 *
 * @example
 * ```typescript
 * const caller = session.asCaller().with(loggingMiddleware());
 * await caller.call({ method: "echo", args: ["hello"] });
 * // DEBUG=mprpc:rpc prints the request and the response
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): ClientMiddleware {
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;

  let log: LogSink;
  let isEnabled: () => boolean;
  if (options.log) {
    log = options.log;
    isEnabled = () => true;
  } else {
    const logger = createDebug(options.namespace ?? "mprpc:rpc");
    log = logger;
    isEnabled = () => logger.enabled;
  }

  return {
    pre(ctx: ClientContext, request: CallRequest): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!isEnabled()) return;

      const logObj: Record<string, unknown> = {
        type: "request",
        method: request.method,
      };

      if (logArgs && request.args.length > 0) {
        logObj.args = request.args;
      }

      log("→ %s %O", request.method, logObj);
    },

    post(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;

      if (duration < minDuration) return;

      if (!isEnabled()) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        method: request.method,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        if (logResults && outcome.value !== undefined) {
          logObj.result = outcome.value;
        }
        log("← %s: ✓ %s %O", request.method, logObj.duration, logObj);
        return;
      }

      logObj.ok = false;
      const error = outcome.error;
      logObj.error = { name: error.name, message: error.message };
      if (error instanceof RemoteError) {
        logObj.remoteError = error.error;
      }
      log("← %s: ✗ %s %O", request.method, logObj.duration, logObj);
    },
  };
}
