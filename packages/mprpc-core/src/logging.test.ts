// Tests for logging middleware

import { describe, it, expect, beforeEach } from "vitest";
import { RemoteError } from "@mprpc/wire";

import { loggingMiddleware, type LogSink } from "./logging.ts";
import { Extensions } from "./middleware.ts";
import type { ClientContext, CallRequest, CallOutcome } from "./middleware.ts";

describe("loggingMiddleware", () => {
  let lines: unknown[][];
  let log: LogSink;

  beforeEach(() => {
    lines = [];
    log = (formatter, ...args) => {
      lines.push([formatter, ...args]);
    };
  });

  function newContext(): ClientContext {
    return { extensions: new Extensions() };
  }

  it("logs basic request and response", () => {
    const middleware = loggingMiddleware({ log });
    const ctx = newContext();
    const request: CallRequest = { method: "add", args: [2, 3] };

    middleware.pre?.(ctx, request);
    expect(lines).toEqual([["→ %s %O", "add", { type: "request", method: "add", args: [2, 3] }]]);

    const outcome: CallOutcome = { ok: true, value: 5 };
    middleware.post?.(ctx, request, outcome);
    expect(lines).toHaveLength(2);
    const [formatter, method, duration, data] = lines[1];
    expect(formatter).toBe("← %s: ✓ %s %O");
    expect(method).toBe("add");
    expect(duration).toMatch(/^\d+\.\d{2}ms$/);
    expect(data).toEqual({
      type: "response",
      method: "add",
      duration,
      ok: true,
      result: 5,
    });
  });

  it("omits an empty argument list", () => {
    const middleware = loggingMiddleware({ log });

    middleware.pre?.(newContext(), { method: "ping", args: [] });

    expect(lines[0][2]).toEqual({ type: "request", method: "ping" });
  });

  it("does not log arguments when disabled", () => {
    const middleware = loggingMiddleware({ log, logArgs: false });

    middleware.pre?.(newContext(), { method: "echo", args: ["hello"] });

    expect(lines[0][2]).not.toHaveProperty("args");
  });

  it("does not log results when disabled", () => {
    const middleware = loggingMiddleware({ log, logResults: false });
    const ctx = newContext();
    const request: CallRequest = { method: "echo", args: ["hello"] };

    middleware.pre?.(ctx, request);
    middleware.post?.(ctx, request, { ok: true, value: "hello" });

    expect(lines[1][3]).toMatchObject({ ok: true });
    expect(lines[1][3]).not.toHaveProperty("result");
  });

  it("logs errors", () => {
    const middleware = loggingMiddleware({ log });
    const ctx = newContext();
    const request: CallRequest = { method: "divide", args: [1, 0] };

    middleware.pre?.(ctx, request);
    middleware.post?.(ctx, request, { ok: false, error: new Error("Something went wrong") });

    expect(lines[1][0]).toBe("← %s: ✗ %s %O");
    expect(lines[1][3]).toMatchObject({
      ok: false,
      error: { name: "Error", message: "Something went wrong" },
    });
    expect(lines[1][3]).not.toHaveProperty("remoteError");
  });

  it("includes the server's error payload for remote errors", () => {
    const middleware = loggingMiddleware({ log });
    const ctx = newContext();
    const request: CallRequest = { method: "divide", args: [1, 0] };

    middleware.pre?.(ctx, request);
    middleware.post?.(ctx, request, { ok: false, error: new RemoteError({ code: 3 }) });

    expect(lines[1][3]).toMatchObject({
      ok: false,
      error: { name: "RemoteError", message: '{"code":3}' },
      remoteError: { code: 3 },
    });
  });

  it("skips logging fast calls when minDuration is set", () => {
    const middleware = loggingMiddleware({ log, minDuration: 60_000 });
    const ctx = newContext();
    const request: CallRequest = { method: "fast", args: [] };

    middleware.pre?.(ctx, request);
    middleware.post?.(ctx, request, { ok: true, value: "result" });

    expect(lines).toHaveLength(1);
  });

  it("does nothing in post without a start time", () => {
    const middleware = loggingMiddleware({ log });

    middleware.post?.(newContext(), { method: "orphan", args: [] }, { ok: true, value: 1 });

    expect(lines).toEqual([]);
  });
});
