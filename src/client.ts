import net, { type Socket } from "node:net";
import tls from "node:tls";
import type { Logger } from "pino";
import { GameError, errorMessage } from "./errors.js";
import { componentLogger } from "./logger.js";
import { encodeFrame, FrameDecoder } from "./protocol.js";
import { ServerMessageSchema, type JoinMessage, type ParsedServerMessage } from "./schemas.js";
import type { PlayerId, StateView } from "./types.js";

export interface GameClientOptions {
  host: string;
  port: number;
  tls?: boolean;
  /** How long a TLS handshake may go unanswered before falling back. */
  handshakeTimeoutMs?: number;
  logger?: Logger;
}

export interface GameClientHandlers {
  onState?: (state: StateView) => void;
  onChat?: (playerId: PlayerId, playerName: string, text: string) => void;
  onServerError?: (message: string) => void;
  onClose?: () => void;
}

type PendingJoin = {
  resolve: (id: PlayerId) => void;
  reject: (err: Error) => void;
};

/**
 * Node client for the game protocol. Tries TLS first (any certificate is
 * accepted) and falls back to plain TCP once if the handshake fails.
 */
export class GameClient {
  private socket: Socket | null = null;
  private readonly decoder = new FrameDecoder();
  private readonly log: Logger;
  private pendingJoin: PendingJoin | null = null;
  private secure = false;

  playerId: PlayerId | null = null;

  constructor(private readonly options: GameClientOptions, private readonly handlers: GameClientHandlers = {}) {
    this.log = options.logger ?? componentLogger("client");
  }

  get encrypted(): boolean {
    return this.secure;
  }

  get connected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  async connect(): Promise<void> {
    if (this.options.tls) {
      try {
        this.attach(await this.connectTls(), true);
        return;
      } catch (err) {
        this.log.warn({ err: errorMessage(err) }, "TLS handshake failed, retrying without encryption");
      }
    }
    this.attach(await this.connectPlain(), false);
  }

  join(message: Omit<JoinMessage, "type">): Promise<PlayerId> {
    if (this.pendingJoin) return Promise.reject(new GameError("INVALID_JOIN", "Join already in progress"));
    return new Promise((resolve, reject) => {
      this.write({ type: "join", ...message });
      this.pendingJoin = { resolve, reject };
    });
  }

  sendInput(dx: number, dy: number): void {
    this.write({ type: "input", dx, dy });
  }

  sendChat(text: string): void {
    this.write({ type: "chat", text });
  }

  close(): void {
    this.socket?.destroy();
  }

  private write(message: object) {
    if (!this.socket || this.socket.destroyed) {
      throw new GameError("NOT_JOINED", "Not connected");
    }
    this.socket.write(encodeFrame(message));
  }

  private connectTls(): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = tls.connect({
        host: this.options.host,
        port: this.options.port,
        rejectUnauthorized: false,
      });
      const onError = (err: Error) => {
        socket.destroy();
        reject(new GameError("TLS_HANDSHAKE_FAILED", errorMessage(err)));
      };
      const onTimeout = () => onError(new Error("TLS handshake timed out"));
      const onClose = () => onError(new Error("Connection closed during TLS handshake"));
      socket.setTimeout(this.options.handshakeTimeoutMs ?? 5000);
      socket.once("error", onError);
      socket.once("timeout", onTimeout);
      socket.once("close", onClose);
      socket.once("secureConnect", () => {
        socket.setTimeout(0);
        socket.off("error", onError);
        socket.off("timeout", onTimeout);
        socket.off("close", onClose);
        resolve(socket);
      });
    });
  }

  private connectPlain(): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host: this.options.host, port: this.options.port });
      const onError = (err: Error) => {
        socket.destroy();
        reject(new GameError("CONNECT_FAILED", errorMessage(err), {
          host: this.options.host,
          port: this.options.port,
        }));
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        resolve(socket);
      });
    });
  }

  private attach(socket: Socket, secure: boolean) {
    this.socket = socket;
    this.secure = secure;
    socket.setNoDelay(true);
    socket.on("data", chunk => this.onData(chunk));
    socket.on("error", err => this.log.warn({ err }, "connection error"));
    socket.on("close", () => {
      this.socket = null;
      this.pendingJoin?.reject(new GameError("CONNECT_FAILED", "Connection closed before join_ack"));
      this.pendingJoin = null;
      this.handlers.onClose?.();
    });
    this.log.info({ host: this.options.host, port: this.options.port, tls: secure }, "connected");
  }

  private onData(chunk: Buffer) {
    for (const frame of this.decoder.push(chunk)) {
      if (!frame.ok) {
        this.log.debug({ code: frame.error.code }, "discarded frame");
        continue;
      }
      const parsed = ServerMessageSchema.safeParse(frame.value);
      if (!parsed.success) {
        this.log.debug({ issues: parsed.error.issues.length }, "unknown server message");
        continue;
      }
      this.dispatch(parsed.data);
    }
  }

  private dispatch(message: ParsedServerMessage) {
    switch (message.type) {
      case "join_ack":
        this.playerId = message.player_id;
        this.pendingJoin?.resolve(message.player_id);
        this.pendingJoin = null;
        return;
      case "state_update":
        this.handlers.onState?.(message.state);
        return;
      case "chat":
        this.handlers.onChat?.(message.player_id, message.player_name, message.text);
        return;
      case "error":
        this.pendingJoin?.reject(new GameError("SERVER_FULL", message.message));
        this.pendingJoin = null;
        this.handlers.onServerError?.(message.message);
        return;
    }
  }
}
