import type { Logger } from "pino";
import type { Broadcaster } from "./broadcaster.js";
import { componentLogger } from "./logger.js";
import type { SessionRegistry } from "./sessions.js";
import type { WorldSnapshot } from "./types.js";
import type { World } from "./world.js";

export interface GameLoopOptions {
  tickRateMs?: number;
  broadcastEveryTicks?: number;
  logger?: Logger;
}

/**
 * The driver: the only caller of `world.tick()`. Each tick drains every
 * input queue, advances the world and, every few ticks, broadcasts.
 */
export class GameLoop {
  private tickTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private ticks = 0;
  private ticksSinceBroadcast = 0;
  private onTick: ((snapshot: WorldSnapshot, tick: number) => void) | null = null;

  private readonly tickRateMs: number;
  private readonly broadcastEveryTicks: number;
  private readonly log: Logger;

  constructor(
    private readonly world: World,
    private readonly sessions: SessionRegistry,
    private readonly broadcaster: Broadcaster,
    options: GameLoopOptions = {},
  ) {
    this.tickRateMs = options.tickRateMs ?? world.config.tickRateMs;
    this.broadcastEveryTicks = Math.max(1, options.broadcastEveryTicks ?? world.config.broadcastEveryTicks);
    this.log = options.logger ?? componentLogger("game-loop");
  }

  get isRunning(): boolean {
    return this.running;
  }

  get tickCount(): number {
    return this.ticks;
  }

  /** Called with each broadcast snapshot, after the players got theirs. */
  setOnTick(cb: (snapshot: WorldSnapshot, tick: number) => void) {
    this.onTick = cb;
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.log.info({ tickRateMs: this.tickRateMs, broadcastEveryTicks: this.broadcastEveryTicks }, "game loop started");
    this.scheduleTick(0);
  }

  stop() {
    if (!this.running) return;
    this.running = false;
    if (this.tickTimer) {
      clearTimeout(this.tickTimer);
      this.tickTimer = null;
    }
    this.log.info({ ticks: this.ticks }, "game loop stopped");
  }

  /** One full tick. Returns the snapshot when this tick broadcast one. */
  step(): WorldSnapshot | null {
    this.sessions.drainInputs();
    this.world.tick();
    this.ticks++;

    this.ticksSinceBroadcast++;
    if (this.ticksSinceBroadcast < this.broadcastEveryTicks) return null;
    this.ticksSinceBroadcast = 0;

    const snapshot = this.world.snapshot();
    this.broadcaster.broadcastState(snapshot);
    this.onTick?.(snapshot, this.ticks);
    return snapshot;
  }

  private executeTick() {
    this.tickTimer = null;
    if (!this.running) return;

    const started = performance.now();
    try {
      this.step();
    } catch (err) {
      // No supervisor: a broken tick takes the process down.
      this.log.fatal({ err, tick: this.ticks }, "tick failed");
      this.stop();
      throw err;
    }
    const elapsed = performance.now() - started;
    this.scheduleTick(Math.max(0, this.tickRateMs - elapsed));
  }

  private scheduleTick(delayMs: number) {
    if (this.tickTimer) clearTimeout(this.tickTimer);
    if (!this.running) return;
    this.tickTimer = setTimeout(() => this.executeTick(), delayMs);
  }
}
