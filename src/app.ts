import Fastify, { type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import fastifySwagger from "@fastify/swagger";
import fastifySwaggerUi from "@fastify/swagger-ui";
import { jsonSchemaTransform } from "fastify-type-provider-zod";
import { Server as SocketIOServer } from "socket.io";
import type { Logger } from "pino";
import { GameServer, loadTlsCredentials, type TlsCredentials } from "./acceptor.js";
import type { Random } from "./arena.js";
import { Broadcaster } from "./broadcaster.js";
import type { GameConfig } from "./config.js";
import { GameLoop } from "./game.js";
import { InMemoryIdentityStore, type IdentityStore } from "./identity.js";
import { componentLogger, logger as rootLogger } from "./logger.js";
import { registerRoutes } from "./routes.js";
import { SessionRegistry } from "./sessions.js";
import type { GameEvent } from "./types.js";
import { World, type Clock } from "./world.js";

export interface GameAppOptions {
  logger?: Logger;
  identities?: IdentityStore;
  tls?: TlsCredentials | null;
  random?: Random;
  clock?: Clock;
}

export interface GameApp {
  http: FastifyInstance;
  io: SocketIOServer;
  world: World;
  sessions: SessionRegistry;
  loop: GameLoop;
  gameServer: GameServer;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Wires the simulation, the game protocol listener, the status API and
 * the spectator feed together. Nothing listens until `start()`.
 */
export async function createGameApp(cfg: GameConfig, options: GameAppOptions = {}): Promise<GameApp> {
  const log = options.logger ?? rootLogger;

  const http = Fastify({ logger: { level: log.level, name: "http" } });

  // Spectators: read-only socket.io feed on the HTTP port
  const io = new SocketIOServer(http.server, { cors: { origin: "*" } });

  const publish = (event: GameEvent) => {
    log.debug({ event }, event.type);
    io.emit("game:event", event);
  };

  const world = new World({ config: cfg, random: options.random, clock: options.clock, onEvent: publish });
  const sessions = new SessionRegistry(world, options.identities ?? new InMemoryIdentityStore(), {
    maxPlayers: cfg.maxPlayers,
    random: options.random,
    logger: componentLogger("sessions", log),
  });
  const broadcaster = new Broadcaster(sessions, componentLogger("broadcaster", log));
  const loop = new GameLoop(world, sessions, broadcaster, { logger: componentLogger("game-loop", log) });

  const tls = options.tls !== undefined
    ? options.tls
    : cfg.tlsEnabled ? await loadTlsCredentials(cfg, log) : null;
  const gameServer = new GameServer({
    config: cfg,
    sessions,
    broadcaster,
    tls,
    logger: componentLogger("acceptor", log),
    onEvent: publish,
  });

  loop.setOnTick((snapshot, tick) => {
    io.emit("game:state", { tick, ...snapshot });
  });

  io.on("connection", (socket) => {
    log.info({ spectators: io.engine.clientsCount }, "spectator connected");
    socket.emit("game:state", { tick: loop.tickCount, ...world.snapshot() });
    socket.on("disconnect", () => {
      log.info({ spectators: io.engine.clientsCount }, "spectator disconnected");
    });
  });

  await http.register(fastifyCors, { origin: true });
  await http.register(fastifySwagger, {
    openapi: {
      info: {
        title: "Snake Arena Server",
        description: "Status and admin API of the multiplayer snake server",
        version: "1.0.0",
      },
      tags: [
        { name: "status", description: "Read-only game status" },
        { name: "admin", description: "Player administration" },
      ],
    },
    transform: jsonSchemaTransform,
  });
  await http.register(fastifySwaggerUi, { routePrefix: "/docs" });
  await registerRoutes(http, { world, sessions, loop, gameServer });

  http.addHook("onClose", async () => {
    io.disconnectSockets(true);
    io.engine.close();
  });

  return {
    http,
    io,
    world,
    sessions,
    loop,
    gameServer,
    async start() {
      await gameServer.listen(cfg.port, cfg.host);
      await http.listen({ port: cfg.httpPort, host: cfg.host });
      loop.start();
    },
    async stop() {
      loop.stop();
      await gameServer.close();
      await http.close();
    },
  };
}
