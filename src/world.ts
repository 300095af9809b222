import { config as defaultConfig, targetLength, type GameConfig } from "./config.js";
import type {
  GameEvent, PlayerId, PlayerLifecycle, Position, Snake, Vector, WorldSnapshot,
} from "./types.js";
import {
  buildBody, distSq, dot, manhattan, normalize, randomPosition, round1,
  spawnFood, wrapPosition, type Random,
} from "./arena.js";

export type Clock = () => number;

export interface WorldOptions {
  config?: GameConfig;
  random?: Random;
  clock?: Clock;
  onEvent?: (event: GameEvent) => void;
}

export interface SnakeInit {
  id: PlayerId;
  name: string;
  color: string;
  score?: number;
  head?: Position;
  length?: number;
}

const INITIAL_DIRECTION: Vector = { dx: 1, dy: 0 };

/**
 * The authoritative arena. Every mutation of snakes, food, scores and
 * lifecycles goes through this class, driven by the game loop.
 */
export class World {
  readonly config: GameConfig;
  readonly snakes = new Map<PlayerId, Snake>();
  readonly foods: Position[] = [];

  private readonly lifecycles = new Map<PlayerId, PlayerLifecycle>();
  private readonly random: Random;
  private readonly clock: Clock;
  private readonly onEvent?: (event: GameEvent) => void;

  constructor(options: WorldOptions = {}) {
    this.config = options.config ?? defaultConfig;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? Date.now;
    this.onEvent = options.onEvent;

    for (let i = 0; i < this.config.foodCount; i++) {
      this.foods.push(spawnFood(this.random, this.config.worldSize));
    }
  }

  // --- Snakes ---

  /** A snake at `head` (or a random default spot) trailing back from its initial heading. */
  createSnake(init: SnakeInit): Snake {
    const cfg = this.config;
    const head = init.head ?? randomPosition(
      cfg.defaultSpawnMargin, cfg.worldSize - cfg.defaultSpawnMargin, this.random,
    );
    const length = Math.min(init.length ?? cfg.baseLength, cfg.maxLength);
    return {
      id: init.id,
      name: init.name,
      color: init.color,
      alive: true,
      segments: buildBody(wrapPosition(head, cfg.worldSize), INITIAL_DIRECTION, length, cfg),
      direction: { ...INITIAL_DIRECTION },
      speed: cfg.snakeSpeed,
      score: init.score ?? 0,
      createdAt: this.clock(),
    };
  }

  addSnake(snake: Snake): void {
    this.snakes.set(snake.id, snake);
    this.lifecycles.set(snake.id, { kind: "active" });
  }

  /** Disconnect path: the snake goes away at once, any pending respawn with it. */
  removeSnake(id: PlayerId): Snake | undefined {
    const snake = this.snakes.get(id);
    this.snakes.delete(id);
    this.lifecycles.delete(id);
    return snake;
  }

  lifecycleOf(id: PlayerId): PlayerLifecycle {
    return this.lifecycles.get(id) ?? { kind: "disconnected" };
  }

  isInUse(id: PlayerId): boolean {
    return this.lifecycleOf(id).kind !== "disconnected";
  }

  getSnake(id: PlayerId): Snake | undefined {
    return this.snakes.get(id);
  }

  /** Snakes in ascending id order, the order every tick step uses. */
  orderedSnakes(): Snake[] {
    return [...this.snakes.values()].sort((a, b) => a.id - b.id);
  }

  /**
   * Steers a snake. Reversals (negative dot product with the current
   * heading) are rejected, as are zero vectors and changes of at most
   * `directionEpsilon` on both axes. Returns whether the heading changed.
   */
  applyDirection(id: PlayerId, dx: number, dy: number): boolean {
    const snake = this.snakes.get(id);
    if (!snake || !snake.alive) return false;

    const requested = { dx, dy };
    if (dot(snake.direction, requested) < 0) return false;

    const eps = this.config.directionEpsilon;
    if (Math.abs(dx - snake.direction.dx) <= eps && Math.abs(dy - snake.direction.dy) <= eps) {
      return false;
    }

    const unit = normalize(requested);
    if (!unit) return false;
    snake.direction = unit;
    return true;
  }

  // --- Tick ---

  tick(): void {
    const now = this.clock();
    this.processRespawns(now);

    const ordered = this.orderedSnakes();
    for (const snake of ordered) this.moveSnake(snake);
    for (const snake of ordered) this.eatFood(snake);
    this.resolveCollisions(ordered, now);
  }

  private processRespawns(now: number) {
    for (const [id, state] of this.lifecycles) {
      if (state.kind !== "pendingRespawn") continue;
      if (now - state.since < this.config.respawnDelayMs) continue;

      const old = this.snakes.get(id);
      if (!old) {
        this.lifecycles.delete(id);
        continue;
      }
      this.snakes.delete(id);
      const fresh = this.createSnake({
        id,
        name: old.name,
        color: old.color,
        score: Math.floor(old.score / 2),
      });
      this.snakes.set(id, fresh);
      this.lifecycles.set(id, { kind: "active" });
      this.emit({ type: "snake:respawned", playerId: id, score: fresh.score });
    }
  }

  private moveSnake(snake: Snake) {
    if (!snake.alive || snake.segments.length === 0) return;

    const head = snake.segments[0];
    const next = wrapPosition({
      x: head.x + snake.direction.dx * snake.speed,
      y: head.y + snake.direction.dy * snake.speed,
    }, this.config.worldSize);

    snake.segments.unshift(next);
    if (snake.segments.length > targetLength(snake.score, this.config)) {
      snake.segments.pop();
    }
  }

  private eatFood(snake: Snake) {
    if (!snake.alive || snake.segments.length === 0) return;

    const head = snake.segments[0];
    const radiusSq = this.config.pickupRadius ** 2;
    const index = this.foods.findIndex(f => distSq(head.x, head.y, f.x, f.y) < radiusSq);
    if (index === -1) return;

    snake.score += 1;
    const tail = snake.segments[snake.segments.length - 1];
    snake.segments.push({ x: tail.x, y: tail.y });
    this.foods[index] = spawnFood(this.random, this.config.worldSize);
    this.emit({ type: "food:eaten", playerId: snake.id, score: snake.score });
  }

  private resolveCollisions(ordered: Snake[], now: number) {
    // Liveness is frozen here: a snake killed earlier in this pass still
    // counts as an obstacle and as a killer.
    const living = ordered.filter(s => s.alive && s.segments.length > 0);

    for (const snake of living) {
      if (now - snake.createdAt < this.config.gracePeriodMs) continue;

      for (const other of living) {
        if (other.id === snake.id) continue;
        if (!this.headHits(snake, other)) continue;

        snake.alive = false;
        this.lifecycles.set(snake.id, { kind: "pendingRespawn", since: now });
        other.score += this.config.killBonus;
        this.emit({ type: "snake:died", playerId: snake.id, killerId: other.id });
        break;
      }
    }
  }

  /** Does `attacker`'s head touch a sampled segment of `other`? */
  headHits(attacker: Snake, other: Snake): boolean {
    const head = attacker.segments[0];
    const otherHead = other.segments[0];
    if (!head || !otherHead) return false;
    if (manhattan(head, otherHead) > this.config.fastRejectDistance) return false;

    const radiusSq = this.config.collisionRadius ** 2;
    for (let i = 0; i < other.segments.length; i += this.config.collisionSampleStep) {
      const seg = other.segments[i];
      if (distSq(head.x, head.y, seg.x, seg.y) < radiusSq) return true;
    }
    return false;
  }

  // --- Snapshot ---

  snapshot(): WorldSnapshot {
    return {
      snakes: this.orderedSnakes().map(s => ({
        id: s.id,
        name: s.name,
        color: s.color,
        segments: s.segments.map((p): [number, number] => [round1(p.x), round1(p.y)]),
        score: s.score,
        alive: s.alive,
      })),
      foods: this.foods.map((f): [number, number] => [f.x, f.y]),
      world_size: this.config.worldSize,
    };
  }

  private emit(event: GameEvent) {
    this.onEvent?.(event);
  }
}
