import { readFile } from "node:fs/promises";
import net, { type AddressInfo, type Socket } from "node:net";
import tls from "node:tls";
import type { Logger } from "pino";
import type { Broadcaster } from "./broadcaster.js";
import type { GameConfig } from "./config.js";
import { ClientConnection } from "./connection.js";
import { GameError, errorMessage } from "./errors.js";
import { componentLogger } from "./logger.js";
import { encodeFrame } from "./protocol.js";
import type { SessionRegistry } from "./sessions.js";
import type { GameEvent } from "./types.js";

export interface TlsCredentials {
  key: Buffer;
  cert: Buffer;
}

export interface GameServerOptions {
  config: GameConfig;
  sessions: SessionRegistry;
  broadcaster: Broadcaster;
  tls?: TlsCredentials | null;
  logger?: Logger;
  onEvent?: (event: GameEvent) => void;
}

/**
 * Reads the key pair named in the config. A missing or unreadable pair
 * means the server runs unencrypted.
 */
export async function loadTlsCredentials(cfg: GameConfig, log: Logger): Promise<TlsCredentials | null> {
  try {
    const [key, cert] = await Promise.all([readFile(cfg.tlsKeyPath), readFile(cfg.tlsCertPath)]);
    log.info({ cert: cfg.tlsCertPath }, "TLS certificate loaded");
    return { key, cert };
  } catch (err) {
    log.warn({ err, key: cfg.tlsKeyPath, cert: cfg.tlsCertPath }, "could not load TLS certificate, serving plain TCP");
    return null;
  }
}

/** Accepts game sockets and hands each one to its own ClientConnection. */
export class GameServer {
  private server: net.Server | null = null;
  private readonly connections = new Set<ClientConnection>();
  private readonly log: Logger;

  constructor(private readonly options: GameServerOptions) {
    this.log = options.logger ?? componentLogger("acceptor");
  }

  get encrypted(): boolean {
    return Boolean(this.options.tls);
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /** Closes the connection of a joined player; its close handler removes the snake. */
  kick(playerId: number): boolean {
    for (const connection of this.connections) {
      if (connection.joinedAs === playerId) {
        connection.close();
        return true;
      }
    }
    return false;
  }

  listen(port: number = this.options.config.port, host: string = this.options.config.host): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new GameError("CONNECT_FAILED", "Server already listening"));
    }

    const credentials = this.options.tls;
    const server = credentials
      ? tls.createServer({ key: credentials.key, cert: credentials.cert }, socket => this.accept(socket))
      : net.createServer(socket => this.accept(socket));

    if (server instanceof tls.Server) {
      server.on("tlsClientError", (err, socket) => {
        this.log.warn({ err: errorMessage(err), remoteAddress: socket.remoteAddress }, "TLS handshake failed");
        socket.destroy();
      });
    }
    server.on("error", err => this.log.error({ err }, "listener error"));
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once("error", onError);
      server.listen(port, host, () => {
        server.off("error", onError);
        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new GameError("CONNECT_FAILED", "Listener has no TCP address"));
          return;
        }
        this.log.info({ host: address.address, port: address.port, tls: this.encrypted }, "game server listening");
        resolve(address);
      });
    });
  }

  /** Stops accepting and drops every live connection at once. */
  close(): Promise<void> {
    const server = this.server;
    this.server = null;
    for (const connection of this.connections) connection.close();
    this.connections.clear();
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close(err => {
        if (err) reject(err);
        else {
          this.log.info("game server closed");
          resolve();
        }
      });
    });
  }

  private accept(socket: Socket) {
    const { sessions } = this.options;
    if (sessions.isFull()) {
      this.log.warn({ remoteAddress: socket.remoteAddress, players: sessions.count }, "server full, refusing connection");
      socket.on("error", err => this.log.debug({ err }, "error on refused socket"));
      socket.end(encodeFrame({ type: "error", message: "Server is full" }), () => socket.destroy());
      return;
    }

    const connection = new ClientConnection(socket, {
      config: this.options.config,
      sessions,
      broadcaster: this.options.broadcaster,
      logger: this.log,
      onEvent: this.options.onEvent,
    });
    this.connections.add(connection);
    socket.on("close", () => this.connections.delete(connection));
    this.log.debug({ remoteAddress: socket.remoteAddress, connections: this.connections.size }, "connection accepted");
  }
}
