import express, { Express } from "express";
import { Server } from "node:http";
import { AddressInfo } from "node:net";

export interface RecordedRequest {
  method: string;
  path: string;
  query: Record<string, unknown>;
  headers: Record<string, string | string[] | undefined>;
  body: unknown;
}

export interface StubServer {
  baseUrl: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

/** Local HTTP stand-in for an upstream API; every request is recorded before routing. */
export async function startStubServer(configure: (app: Express) => void): Promise<StubServer> {
  const app = express();
  const requests: RecordedRequest[] = [];
  app.use(express.json({ limit: "1mb" }));
  app.use((request, _response, next) => {
    requests.push({
      method: request.method,
      path: request.path,
      query: { ...request.query },
      headers: { ...request.headers },
      body: request.body,
    });
    next();
  });
  configure(app);

  const server = await listen(app);
  const { port } = addressOf(server);
  return {
    baseUrl: `http://127.0.0.1:${port}`,
    requests,
    close: () => closeServer(server),
  };
}

export function listen(app: Express): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1", () => resolve(server));
    server.once("error", reject);
  });
}

export function addressOf(server: Server): AddressInfo {
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return address;
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
