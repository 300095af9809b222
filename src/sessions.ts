import type { Logger } from "pino";
import { buildBody, minSeparation, randomPosition, type Random } from "./arena.js";
import { GameError } from "./errors.js";
import type { IdentityStore } from "./identity.js";
import { InputQueue } from "./input-queue.js";
import { componentLogger } from "./logger.js";
import type { JoinRequest, PlayerId, Position, Vector } from "./types.js";
import type { World } from "./world.js";

/** What the registry needs from a live socket. */
export interface Connection {
  readonly remoteAddress?: string;
  /** Writes one already-encoded frame. */
  send(frame: string): void;
  close(): void;
}

export interface Session {
  playerId: PlayerId;
  name: string;
  connection: Connection;
  inputs: InputQueue;
}

export interface SessionRegistryOptions {
  maxPlayers: number;
  random?: Random;
  logger?: Logger;
}

export class SessionRegistry {
  private readonly sessionsById = new Map<PlayerId, Session>();
  private readonly random: Random;
  private readonly log: Logger;

  constructor(
    private readonly world: World,
    private readonly identities: IdentityStore,
    private readonly options: SessionRegistryOptions,
  ) {
    this.random = options.random ?? Math.random;
    this.log = options.logger ?? componentLogger("sessions");
  }

  get count(): number {
    return this.sessionsById.size;
  }

  get maxPlayers(): number {
    return this.options.maxPlayers;
  }

  isFull(): boolean {
    return this.sessionsById.size >= this.options.maxPlayers;
  }

  get(playerId: PlayerId): Session | undefined {
    return this.sessionsById.get(playerId);
  }

  /** Snapshot of the live sessions; safe to iterate while others join or leave. */
  sessions(): Session[] {
    return [...this.sessionsById.values()];
  }

  /**
   * Admits a player: resolves their id, places their snake and opens the
   * session. Reuses the id last given to `name` when nobody holds it.
   */
  join(request: JoinRequest, connection: Connection): PlayerId {
    if (this.isFull()) {
      throw new GameError("SERVER_FULL", "Server is full", { maxPlayers: this.options.maxPlayers });
    }

    const playerId = this.resolveId(request.name);
    this.identities.set(request.name, playerId);

    const cfg = this.world.config;
    const restoring = request.reconnect && request.lastScore > 0;
    const snake = restoring
      ? this.world.createSnake({
        id: playerId,
        name: request.name,
        color: request.color,
        score: request.lastScore,
        length: request.lastLength > cfg.baseLength ? request.lastLength : cfg.baseLength,
      })
      : this.world.createSnake({
        id: playerId,
        name: request.name,
        color: request.color,
        head: this.findSpawn(),
      });
    this.world.addSnake(snake);

    this.sessionsById.set(playerId, {
      playerId,
      name: request.name,
      connection,
      inputs: new InputQueue(cfg.maxQueuedInputs),
    });

    this.log.info({
      playerId,
      name: request.name,
      reconnect: restoring,
      score: snake.score,
      length: snake.segments.length,
      previousId: request.previousId,
      remoteAddress: connection.remoteAddress,
    }, restoring ? "player reconnected" : "player joined");
    return playerId;
  }

  /** Disconnect: snake and session go at once, bypassing death and respawn. */
  leave(playerId: PlayerId): Session | undefined {
    const session = this.sessionsById.get(playerId);
    this.sessionsById.delete(playerId);
    this.world.removeSnake(playerId);
    if (session) {
      this.log.info({ playerId, name: session.name }, "player left");
    }
    return session;
  }

  enqueueInput(playerId: PlayerId, input: Vector): boolean {
    const session = this.sessionsById.get(playerId);
    if (!session) return false;
    session.inputs.push(input);
    return true;
  }

  /** Applies every queued input to the world, player by player, oldest first. */
  drainInputs(): number {
    let applied = 0;
    for (const session of this.sessionsById.values()) {
      for (const input of session.inputs.drain()) {
        if (this.world.applyDirection(session.playerId, input.dx, input.dy)) applied++;
      }
    }
    return applied;
  }

  private resolveId(name: string): PlayerId {
    const previous = this.identities.get(name);
    if (previous !== undefined && !this.world.isInUse(previous) && !this.sessionsById.has(previous)) {
      return previous;
    }
    return this.identities.nextId();
  }

  /**
   * A head position whose starting body keeps `minSpawnSeparation` from
   * every existing segment. Gives up after `spawnAttempts` and drops the
   * snake in the far corner region, overlap or not.
   */
  findSpawn(): Position {
    const cfg = this.world.config;
    for (let attempt = 0; attempt < cfg.spawnAttempts; attempt++) {
      const head = randomPosition(cfg.spawnMargin, cfg.worldSize - cfg.spawnMargin, this.random);
      const body = buildBody(head, { dx: 1, dy: 0 }, cfg.baseLength, cfg);
      if (this.isClear(body)) return head;
    }
    this.log.warn({ attempts: cfg.spawnAttempts }, "no safe spawn found, using fallback region");
    return randomPosition(
      cfg.worldSize - cfg.fallbackSpawnMin,
      cfg.worldSize - cfg.fallbackSpawnMax,
      this.random,
    );
  }

  private isClear(body: Position[]): boolean {
    for (const other of this.world.snakes.values()) {
      if (other.segments.length === 0) continue;
      if (minSeparation(other.segments, body) < this.world.config.minSpawnSeparation) return false;
    }
    return true;
  }
}
