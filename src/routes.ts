import type { FastifyInstance } from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import { z } from "zod";
import type { GameServer } from "./acceptor.js";
import type { GameLoop } from "./game.js";
import {
  HealthResponseSchema,
  PlayerIdParamsSchema,
  PlayerSummarySchema,
  StateViewSchema,
} from "./schemas.js";
import type { SessionRegistry } from "./sessions.js";
import type { World } from "./world.js";

export interface RouteDeps {
  world: World;
  sessions: SessionRegistry;
  loop: GameLoop;
  gameServer: GameServer;
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps) {
  const { world, sessions, loop, gameServer } = deps;

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get("/api/health", {
    schema: {
      description: "Liveness and load of the game server",
      tags: ["status"],
      response: { 200: HealthResponseSchema },
    },
  }, async () => ({
    status: "ok" as const,
    running: loop.isRunning,
    tick: loop.tickCount,
    players: sessions.count,
    maxPlayers: sessions.maxPlayers,
    tls: gameServer.encrypted,
  }));

  typedApp.get("/api/state", {
    schema: {
      description: "Full world snapshot, as broadcast to players (player_id 0 = spectator)",
      tags: ["status"],
      response: { 200: StateViewSchema },
    },
  }, async () => ({ player_id: 0, ...world.snapshot() }));

  typedApp.get("/api/players", {
    schema: {
      description: "Connected players with score and lifecycle",
      tags: ["status"],
      response: { 200: z.array(PlayerSummarySchema) },
    },
  }, async () => sessions.sessions().map(session => {
    const snake = world.getSnake(session.playerId);
    return {
      id: session.playerId,
      name: session.name,
      color: snake?.color ?? "",
      score: snake?.score ?? 0,
      length: snake?.segments.length ?? 0,
      status: world.lifecycleOf(session.playerId).kind,
      remoteAddress: session.connection.remoteAddress,
    };
  }));

  typedApp.delete("/api/admin/player/:id", {
    schema: {
      description: "Disconnect a player (kick). Their snake is removed, not killed.",
      tags: ["admin"],
      params: PlayerIdParamsSchema,
    },
  }, async (request, reply) => {
    const { id } = request.params;
    if (!gameServer.kick(id)) {
      return reply.status(404).send({ error: "Player not found" });
    }
    return { status: "kicked" };
  });
}
