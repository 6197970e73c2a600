// In-process MessagePack-RPC server for transport tests.

import net from "node:net";
import {
  MessageType,
  decodeMessageStream,
  encodeMessage,
  messageNotify,
  messageRequest,
  messageResponse,
  type Message,
} from "@mprpc/wire";

/** Computes a response: `[error, result]`. */
export type MethodHandler = (args: unknown[]) => [error: unknown, result: unknown];

export interface TestServerOptions {
  methods?: Record<string, MethodHandler>;
  /** Close each new connection right away while this returns true. */
  dropConnection?: (index: number) => boolean;
  /** Write a stray request and notify to each client before serving it. */
  sendUnsolicited?: boolean;
}

const DEFAULT_METHODS: Record<string, MethodHandler> = {
  add: ([a, b]) => [null, Number(a) + Number(b)],
  echo: ([value]) => [null, value],
  fail: () => ["boom", null],
};

/**
 * Loopback server answering requests from `methods` and recording
 * everything it receives.
 */
export class TestServer {
  readonly received: Message[] = [];
  connections = 0;
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private readonly methods: Record<string, MethodHandler>;
  private waiters: Array<{ count: number; resolve: () => void }> = [];

  private constructor(private readonly options: TestServerOptions) {
    this.methods = { ...DEFAULT_METHODS, ...options.methods };
    this.server = net.createServer((socket) => this.accept(socket));
  }

  static async start(options: TestServerOptions = {}): Promise<TestServer> {
    const server = new TestServer(options);
    await new Promise<void>((resolve, reject) => {
      server.server.once("error", reject);
      server.server.listen(0, "127.0.0.1", () => resolve());
    });
    return server;
  }

  get address(): string {
    const info = this.server.address();
    if (info === null || typeof info === "string") {
      throw new Error("server is not listening on TCP");
    }
    return `127.0.0.1:${info.port}`;
  }

  /** Resolves once `count` messages have arrived in total. */
  waitForMessages(count: number): Promise<void> {
    if (this.received.length >= count) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push({ count, resolve });
    });
  }

  async close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }

  private accept(socket: net.Socket): void {
    const index = this.connections++;
    if (this.options.dropConnection?.(index)) {
      socket.destroy();
      return;
    }
    this.sockets.add(socket);
    socket.on("close", () => this.sockets.delete(socket));
    socket.on("error", () => socket.destroy());

    if (this.options.sendUnsolicited) {
      socket.write(encodeMessage(messageRequest(99, "ping", [])));
      socket.write(encodeMessage(messageNotify("hello", ["client"])));
    }

    this.serve(socket).catch(() => socket.destroy());
  }

  private async serve(socket: net.Socket): Promise<void> {
    for await (const message of decodeMessageStream(socket)) {
      this.record(message);
      if (message[0] !== MessageType.REQUEST) continue;

      const [, msgid, method, args] = message;
      const handler: MethodHandler | undefined = this.methods[method];
      const [error, result] = handler ? handler(args) : [`unknown method: ${method}`, null];
      socket.write(encodeMessage(messageResponse(msgid, error, result)));
    }
  }

  private record(message: Message): void {
    this.received.push(message);
    const ready = this.waiters.filter((w) => this.received.length >= w.count);
    this.waiters = this.waiters.filter((w) => this.received.length < w.count);
    for (const waiter of ready) waiter.resolve();
  }
}

/** A port nothing listens on. */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const info = server.address();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  if (info === null || typeof info === "string") {
    throw new Error("server is not listening on TCP");
  }
  return info.port;
}
