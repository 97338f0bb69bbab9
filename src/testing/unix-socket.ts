/**
 * Unix-socket helpers for tests: temp socket paths, a client that speaks the
 * hook protocol, and a connected socket pair.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { createConnection, createServer, type Socket } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface TempSocketDir {
  socketPath: string;
  dir: string;
  cleanup(): Promise<void>;
}

export async function tempSocketDir(): Promise<TempSocketDir> {
  const dir = await mkdtemp(join(tmpdir(), "hook-relay-"));
  return {
    socketPath: join(dir, "relay.sock"),
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

export interface HookClient {
  socket: Socket;
  /** Everything the server wrote, resolved when the server closes the connection. */
  response: Promise<string>;
}

/**
 * Connect, write one payload and (by default) half-close, the way the hook
 * script does. Objects are JSON-encoded.
 */
export function sendHookEvent(
  socketPath: string,
  payload: string | object,
  options: { halfClose?: boolean } = {},
): HookClient {
  const socket = createConnection({ path: socketPath });
  const body = typeof payload === "string" ? payload : JSON.stringify(payload);

  const response = new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("close", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    socket.on("error", (err: NodeJS.ErrnoException) => {
      // A reset after the server destroys the socket still counts as closed.
      if (err.code === "ECONNRESET" || err.code === "EPIPE") return;
      reject(err);
    });
  });

  socket.on("connect", () => {
    if (options.halfClose ?? true) {
      socket.end(body);
    } else {
      socket.write(body);
    }
  });

  return { socket, response };
}

export interface SocketPair {
  client: Socket;
  server: Socket;
  close(): Promise<void>;
}

/** A connected client/server socket pair over a throwaway listener. */
export async function socketPair(socketPath: string): Promise<SocketPair> {
  const listener = createServer({ allowHalfOpen: true });
  await new Promise<void>((resolve, reject) => {
    listener.once("error", reject);
    listener.listen(socketPath, resolve);
  });

  const accepted = new Promise<Socket>((resolve) => listener.once("connection", resolve));
  const client = createConnection({ path: socketPath });
  client.on("error", () => {});
  const server = await accepted;

  return {
    client,
    server,
    close: async () => {
      client.destroy();
      server.destroy();
      await new Promise<void>((resolve) => listener.close(() => resolve()));
    },
  };
}

/** Poll until `predicate` holds, or fail after `timeoutMs`. */
export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 2000,
  intervalMs = 5,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

/** Collect a socket's incoming bytes until it closes. */
export function readUntilClose(socket: Socket): Promise<string> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("close", () => resolve(Buffer.concat(chunks).toString("utf-8")));
  });
}
