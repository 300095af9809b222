import { z } from "zod";

export const config = {
  // Network
  host: "0.0.0.0",
  port: 5555,               // game protocol (TCP / TLS)
  httpPort: 3000,           // status API + spectators
  maxPlayers: 20,
  tlsEnabled: false,
  tlsKeyPath: "server.key",
  tlsCertPath: "server.crt",
  socketIdleTimeoutMs: 30_000,
  maxFrameBytes: 64 * 1024,
  maxBufferedBytes: 1024 * 1024, // unsent output before a slow reader is dropped
  maxQueuedInputs: 64,
  logLevel: "info",

  // Simulation
  worldSize: 3000,
  tickRateMs: 15,
  broadcastEveryTicks: 3,   // bandwidth: one snapshot per 3 ticks
  foodCount: 850,
  snakeSpeed: 4,            // units per tick
  baseLength: 5,
  maxLength: 100,
  segmentSpacing: 3,        // distance between initial segments
  pointsPerSegment: 10,     // +1 target length per 10 points
  pickupRadius: 15,
  collisionRadius: 12,      // snake radius 10 * 1.2
  fastRejectDistance: 500,  // Manhattan distance between heads
  collisionSampleStep: 2,   // every other segment
  killBonus: 10,
  gracePeriodMs: 5000,
  respawnDelayMs: 5000,
  directionEpsilon: 0.05,

  // Spawning
  spawnMargin: 200,
  defaultSpawnMargin: 100,
  minSpawnSeparation: 50,
  spawnAttempts: 20,
  fallbackSpawnMin: 500,    // fallback region is [worldSize - 500, worldSize - 200)
  fallbackSpawnMax: 200,

  defaultColor: "#ff0000",
  maxNameLength: 20,
  maxChatLength: 200,
};

export type GameConfig = typeof config;

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform(v => v === "true" || v === "1");

const EnvSchema = z.object({
  HOST: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  HTTP_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  MAX_PLAYERS: z.coerce.number().int().min(1).max(500).optional(),
  TLS_ENABLED: booleanFlag.optional(),
  TLS_KEY_PATH: z.string().min(1).optional(),
  TLS_CERT_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
});

/**
 * Applies environment overrides on top of the defaults above. Throws a
 * ZodError listing every bad variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
  const parsed = EnvSchema.parse(env);
  return {
    ...config,
    host: parsed.HOST ?? config.host,
    port: parsed.PORT ?? config.port,
    httpPort: parsed.HTTP_PORT ?? config.httpPort,
    maxPlayers: parsed.MAX_PLAYERS ?? config.maxPlayers,
    tlsEnabled: parsed.TLS_ENABLED ?? config.tlsEnabled,
    tlsKeyPath: parsed.TLS_KEY_PATH ?? config.tlsKeyPath,
    tlsCertPath: parsed.TLS_CERT_PATH ?? config.tlsCertPath,
    logLevel: parsed.LOG_LEVEL ?? config.logLevel,
  };
}

export function targetLength(score: number, cfg: GameConfig = config): number {
  const grown = cfg.baseLength + Math.floor(score / cfg.pointsPerSegment);
  return Math.max(cfg.baseLength, Math.min(grown, cfg.maxLength));
}
