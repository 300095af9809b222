import type { Socket } from "node:net";
import type { Logger } from "pino";
import type { Broadcaster } from "./broadcaster.js";
import type { GameConfig } from "./config.js";
import { GameError, isGameError } from "./errors.js";
import { encodeFrame, FrameDecoder, type DecodedFrame } from "./protocol.js";
import { ClientMessageSchema, type ClientMessage, type JoinMessage } from "./schemas.js";
import type { Connection, SessionRegistry } from "./sessions.js";
import type { GameEvent, JoinRequest, PlayerId, ServerMessage } from "./types.js";

export interface ConnectionDeps {
  config: GameConfig;
  sessions: SessionRegistry;
  broadcaster: Broadcaster;
  logger: Logger;
  onEvent?: (event: GameEvent) => void;
}

export function toJoinRequest(msg: JoinMessage, cfg: GameConfig, fallbackName: string): JoinRequest {
  const name = (msg.name ?? "").trim().slice(0, cfg.maxNameLength);
  return {
    name: name.length > 0 ? name : fallbackName,
    color: msg.color && msg.color.length > 0 ? msg.color : cfg.defaultColor,
    reconnect: msg.reconnect ?? false,
    lastScore: msg.last_score ?? 0,
    lastLength: msg.last_length ?? cfg.baseLength,
    previousId: msg.previous_id,
  };
}

/**
 * One client socket: the join handshake, then relaying input into the
 * player's queue and chat to everyone. Never touches the world directly.
 */
export class ClientConnection implements Connection {
  private readonly decoder: FrameDecoder;
  private readonly log: Logger;
  private playerId: PlayerId | null = null;
  private playerName = "";
  private closed = false;

  constructor(private readonly socket: Socket, private readonly deps: ConnectionDeps) {
    this.decoder = new FrameDecoder(deps.config.maxFrameBytes);
    this.log = deps.logger.child({ remoteAddress: this.remoteAddress });

    socket.setNoDelay(true);
    socket.setTimeout(deps.config.socketIdleTimeoutMs);
    socket.on("data", chunk => this.onData(chunk));
    // Idle reads are "no data yet", not a disconnect.
    socket.on("timeout", () => this.log.debug("socket idle"));
    socket.on("error", err => this.log.warn({ err, playerId: this.playerId }, "socket error"));
    socket.on("close", () => this.onClose());
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get joinedAs(): PlayerId | null {
    return this.playerId;
  }

  send(frame: string): void {
    if (this.closed || !this.socket.writable) return;
    const buffered = this.socket.writableLength;
    if (buffered > this.deps.config.maxBufferedBytes) {
      this.log.warn({ playerId: this.playerId, buffered }, "client is not reading, closing connection");
      this.close();
      return;
    }
    this.socket.write(frame);
  }

  sendMessage(message: ServerMessage): void {
    this.send(encodeFrame(message));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.destroy();
  }

  /** Sends a final error frame, then closes once it is flushed. */
  reject(message: string): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.end(encodeFrame({ type: "error", message }), () => this.socket.destroy());
  }

  private onData(chunk: Buffer | string) {
    for (const frame of this.decoder.push(chunk)) {
      if (this.closed) return;
      this.handleFrame(frame);
    }
  }

  private handleFrame(frame: DecodedFrame) {
    if (!frame.ok) {
      this.rejectFrame(frame.error);
      return;
    }

    const parsed = ClientMessageSchema.safeParse(frame.value);
    if (!parsed.success) {
      this.rejectFrame(new GameError(
        this.playerId === null ? "INVALID_JOIN" : "MALFORMED_FRAME",
        "Invalid message",
        { issues: parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`) },
      ));
      return;
    }

    if (this.playerId === null) {
      this.handleJoin(parsed.data);
    } else {
      this.handleMessage(this.playerId, parsed.data);
    }
  }

  private rejectFrame(error: GameError) {
    if (this.playerId === null) {
      this.log.warn({ code: error.code, context: error.context }, "invalid join, closing connection");
      this.close();
      return;
    }
    this.log.debug({ code: error.code, context: error.context, playerId: this.playerId }, "discarded frame");
  }

  private handleJoin(msg: ClientMessage) {
    if (msg.type !== "join") {
      this.rejectFrame(new GameError("NOT_JOINED", `Expected join, got ${msg.type}`));
      return;
    }

    const { sessions, config: cfg } = this.deps;
    const request = toJoinRequest(msg, cfg, `Player${sessions.count + 1}`);
    try {
      this.playerId = sessions.join(request, this);
    } catch (err) {
      if (isGameError(err, "SERVER_FULL")) {
        this.log.warn({ name: request.name }, "server full, rejecting join");
        this.reject(err.message);
        return;
      }
      this.log.error({ err, name: request.name }, "join failed");
      this.close();
      return;
    }

    this.playerName = request.name;
    this.sendMessage({ type: "join_ack", player_id: this.playerId });
    this.deps.onEvent?.({
      type: "player:joined",
      playerId: this.playerId,
      name: request.name,
      reconnect: request.reconnect && request.lastScore > 0,
    });
  }

  private handleMessage(playerId: PlayerId, msg: ClientMessage) {
    switch (msg.type) {
      case "input":
        this.deps.sessions.enqueueInput(playerId, { dx: msg.dx, dy: msg.dy });
        return;
      case "chat": {
        const text = msg.text.slice(0, this.deps.config.maxChatLength);
        this.log.info({ playerId, name: this.playerName, text }, "chat");
        this.deps.broadcaster.broadcastChat(playerId, this.playerName, text);
        this.deps.onEvent?.({ type: "chat", playerId, name: this.playerName, text });
        return;
      }
      case "join":
        this.log.debug({ playerId }, "ignoring repeated join");
        return;
    }
  }

  private onClose() {
    this.closed = true;
    if (this.playerId === null) return;

    const playerId = this.playerId;
    this.playerId = null;
    this.deps.sessions.leave(playerId);
    this.deps.onEvent?.({ type: "player:left", playerId, name: this.playerName });
  }
}
