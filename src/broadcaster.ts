import type { Logger } from "pino";
import { componentLogger } from "./logger.js";
import { encodeFrame } from "./protocol.js";
import type { Session, SessionRegistry } from "./sessions.js";
import type { PlayerId, ServerMessage, WorldSnapshot } from "./types.js";

/**
 * Fans frames out to every live session. A failed write is only logged;
 * the socket's own close handler does the cleanup.
 */
export class Broadcaster {
  private readonly log: Logger;

  constructor(private readonly sessions: SessionRegistry, logger?: Logger) {
    this.log = logger ?? componentLogger("broadcaster");
  }

  /**
   * Serialises the world once and hands every recipient the same bytes,
   * differing only in the leading `player_id` tag.
   */
  broadcastState(snapshot: WorldSnapshot): number {
    const body = JSON.stringify(snapshot).slice(1); // drop the opening brace
    let sent = 0;
    for (const session of this.sessions.sessions()) {
      const frame = `{"type":"state_update","state":{"player_id":${session.playerId},${body}}\n`;
      if (this.deliver(session, frame)) sent++;
    }
    return sent;
  }

  broadcast(message: ServerMessage): number {
    const frame = encodeFrame(message);
    let sent = 0;
    for (const session of this.sessions.sessions()) {
      if (this.deliver(session, frame)) sent++;
    }
    return sent;
  }

  broadcastChat(playerId: PlayerId, playerName: string, text: string): number {
    return this.broadcast({ type: "chat", player_id: playerId, player_name: playerName, text });
  }

  private deliver(session: Session, frame: string): boolean {
    try {
      session.connection.send(frame);
      return true;
    } catch (err) {
      this.log.warn({ err, playerId: session.playerId }, "failed to send frame");
      return false;
    }
  }
}
