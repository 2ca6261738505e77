import { createServer, type Server as HttpServer } from "http";
import type { AddressInfo } from "net";
import { Server } from "socket.io";
import { io as createClient, type Socket } from "socket.io-client";

export class ListenPermissionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ListenPermissionError";
  }
}

export type SocketTestServer = {
  io: Server;
  httpServer: HttpServer;
  url: string;
  close: () => Promise<void>;
};

export type TestClient = {
  socket: Socket;
  events: Array<{ event: string; args: unknown[] }>;
};

async function closeServer(io: Server, httpServer: HttpServer) {
  await new Promise<void>((resolve) => io.close(() => resolve()));
  if (httpServer.listening) {
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  }
}

export async function startSocketTestServer(
  configure?: (io: Server) => void
): Promise<SocketTestServer> {
  const httpServer = createServer();
  const io = new Server(httpServer, { serveClient: false });
  configure?.(io);

  return await new Promise<SocketTestServer>((resolve, reject) => {
    httpServer
      .listen(0, "127.0.0.1", () => {
        const address = httpServer.address();
        if (!address || typeof address === "string") {
          reject(new Error("test server has no TCP address"));
          return;
        }
        const { port }: AddressInfo = address;
        resolve({
          io,
          httpServer,
          url: `http://127.0.0.1:${port}`,
          close: async () => {
            await closeServer(io, httpServer);
          }
        });
      })
      .on("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "EPERM" || err.code === "EACCES") {
          reject(new ListenPermissionError("Cannot bind test socket server (permission denied)"));
        } else {
          reject(err);
        }
      });
  });
}

function waitForConnect(socket: Socket, timeoutMs = 2000) {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error("connect timeout")), timeoutMs);
    const onConnect = () => {
      clearTimeout(timer);
      socket.off("connect_error", onError);
      resolve();
    };
    const onError = (err: Error) => {
      clearTimeout(timer);
      socket.off("connect", onConnect);
      reject(err);
    };
    socket.once("connect", onConnect);
    socket.once("connect_error", onError);
  });
}

export async function createTestClient(
  server: SocketTestServer,
  opts: { namespace?: string } = {}
): Promise<TestClient> {
  const events: Array<{ event: string; args: unknown[] }> = [];
  const socket = createClient(`${server.url}${opts.namespace ?? ""}`, {
    transports: ["websocket"],
    autoConnect: false,
    forceNew: true
  });

  socket.onAny((event: string, ...args: unknown[]) => {
    events.push({ event, args });
  });

  const connected = waitForConnect(socket);
  socket.connect();
  await connected;
  return { socket, events };
}

export async function waitForEvent(
  client: TestClient,
  eventName: string,
  timeoutMs = 2000
): Promise<unknown[]> {
  const existing = client.events.find((entry) => entry.event === eventName);
  if (existing) return existing.args;

  return await new Promise<unknown[]>((resolve, reject) => {
    const timer = setTimeout(() => {
      client.socket.off(eventName, onEvent);
      reject(new Error(`Timed out waiting for event "${eventName}"`));
    }, timeoutMs);

    const onEvent = (...args: unknown[]) => {
      clearTimeout(timer);
      resolve(args);
    };

    client.socket.once(eventName, onEvent);
  });
}

export function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const started = Date.now();
    const poll = () => {
      if (condition()) {
        resolve();
        return;
      }
      if (Date.now() - started > timeoutMs) {
        reject(new Error("condition not met in time"));
        return;
      }
      setTimeout(poll, 10);
    };
    poll();
  });
}

export async function disconnectClient(client: TestClient) {
  if (client.socket.connected) {
    client.socket.disconnect();
  }
}
