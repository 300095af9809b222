import { beforeEach, describe, expect, it } from "vitest";
import { config, type GameConfig } from "./config.js";
import type { GameEvent, Position, Snake, Vector } from "./types.js";
import { World } from "./world.js";

const RIGHT: Vector = { dx: 1, dy: 0 };

function makeWorld(overrides: Partial<GameConfig> = {}) {
  const clock = { now: 0 };
  const events: GameEvent[] = [];
  const world = new World({
    config: { ...config, foodCount: 0, ...overrides },
    random: () => 0.5,
    clock: () => clock.now,
    onEvent: e => events.push(e),
  });
  return { world, clock, events };
}

/** Points trailing back from (x, y) against heading (dx, dy). */
function line(x: number, y: number, dx: number, dy: number, count: number, step: number): Position[] {
  return Array.from({ length: count }, (_, i) => ({ x: x - dx * i * step, y: y - dy * i * step }));
}

function place(world: World, id: number, segments: Position[], direction: Vector = RIGHT, score = 0): Snake {
  const snake = world.createSnake({ id, name: `p${id}`, color: "#ffffff", score });
  snake.segments = segments.map(p => ({ ...p }));
  snake.direction = { ...direction };
  world.addSnake(snake);
  return snake;
}

/** Deterministic pseudo-random source for property-style loops. */
function seeded(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

describe("World", () => {
  describe("setup", () => {
    it("starts with a full food supply", () => {
      const world = new World({ config, random: () => 0.5 });
      expect(world.foods).toHaveLength(config.foodCount);
    });

    it("creates default snakes with base length, unit heading and zero score", () => {
      const { world } = makeWorld();
      const snake = world.createSnake({ id: 7, name: "n", color: "#000000" });
      expect(snake.segments).toHaveLength(5);
      expect(snake.segments[0]).toEqual({ x: 1500, y: 1500 });
      expect(snake.segments[4]).toEqual({ x: 1488, y: 1500 });
      expect(snake.direction).toEqual({ dx: 1, dy: 0 });
      expect(snake.score).toBe(0);
      expect(snake.alive).toBe(true);
    });
  });

  describe("movement", () => {
    it("advances the head by speed and drops the tail", () => {
      const { world } = makeWorld();
      const snake = place(world, 1, line(100, 100, 1, 0, 5, 3));

      world.tick();

      expect(snake.segments).toHaveLength(5);
      expect(snake.segments[0]).toEqual({ x: 104, y: 100 });
      expect(snake.segments[4]).toEqual({ x: 91, y: 100 });
    });

    it("wraps past the right edge", () => {
      const { world } = makeWorld();
      const snake = place(world, 1, line(2998, 10, 1, 0, 5, 3));
      world.tick();
      expect(snake.segments[0]).toEqual({ x: 2, y: 10 });
    });

    it("wraps past the top edge into [0, size)", () => {
      const { world } = makeWorld();
      const up = { dx: 0, dy: -1 };
      const snake = place(world, 1, line(10, 2, 0, -1, 5, 3), up);
      world.tick();
      expect(snake.segments[0]).toEqual({ x: 10, y: 2998 });
    });

    it("keeps every living head inside the world", () => {
      const { world, clock } = makeWorld();
      const random = seeded(42);
      for (let id = 1; id <= 8; id++) {
        world.addSnake(world.createSnake({
          id,
          name: `p${id}`,
          color: "#ffffff",
          head: { x: Math.floor(random() * 3000), y: Math.floor(random() * 3000) },
        }));
      }

      for (let t = 0; t < 400; t++) {
        clock.now += 15;
        for (const snake of world.snakes.values()) {
          world.applyDirection(snake.id, random() * 2 - 1, random() * 2 - 1);
        }
        world.tick();
        for (const snake of world.snakes.values()) {
          if (!snake.alive) continue;
          const head = snake.segments[0];
          expect(head.x).toBeGreaterThanOrEqual(0);
          expect(head.x).toBeLessThan(3000);
          expect(head.y).toBeGreaterThanOrEqual(0);
          expect(head.y).toBeLessThan(3000);
        }
      }
    });

    it("does not move dead snakes", () => {
      const { world } = makeWorld();
      const snake = place(world, 1, line(100, 100, 1, 0, 5, 3));
      snake.alive = false;
      world.tick();
      expect(snake.segments[0]).toEqual({ x: 100, y: 100 });
    });

    it("skips snakes without segments", () => {
      const { world } = makeWorld();
      const snake = place(world, 1, []);
      place(world, 2, line(100, 100, 1, 0, 5, 3));
      expect(() => world.tick()).not.toThrow();
      expect(snake.segments).toEqual([]);
    });
  });

  describe("applyDirection", () => {
    let world: World;
    let snake: Snake;

    beforeEach(() => {
      ({ world } = makeWorld());
      snake = place(world, 1, line(100, 100, 1, 0, 5, 3));
    });

    it("rejects a reversal", () => {
      expect(world.applyDirection(1, -1, 0)).toBe(false);
      expect(snake.direction).toEqual({ dx: 1, dy: 0 });
    });

    it("rejects any request with a negative dot product, normalized or not", () => {
      expect(world.applyDirection(1, 3, 4)).toBe(true);
      expect(world.applyDirection(1, -3, 1)).toBe(false);
      expect(snake.direction).toEqual({ dx: 0.6, dy: 0.8 });
    });

    it("stores accepted directions at unit magnitude", () => {
      expect(world.applyDirection(1, 0, 7)).toBe(true);
      expect(snake.direction).toEqual({ dx: 0, dy: 1 });
      expect(world.applyDirection(1, 2, 2)).toBe(true);
      expect(Math.hypot(snake.direction.dx, snake.direction.dy)).toBeCloseTo(1, 12);
    });

    it("accepts a perpendicular turn", () => {
      expect(world.applyDirection(1, 0, -1)).toBe(true);
      expect(snake.direction).toEqual({ dx: 0, dy: -1 });
    });

    it("ignores insignificant changes and zero vectors", () => {
      expect(world.applyDirection(1, 1.01, 0.02)).toBe(false);
      expect(world.applyDirection(1, 0, 0)).toBe(false);
      expect(snake.direction).toEqual({ dx: 1, dy: 0 });
    });

    it("ignores unknown or dead players", () => {
      expect(world.applyDirection(99, 0, 1)).toBe(false);
      snake.alive = false;
      expect(world.applyDirection(1, 0, 1)).toBe(false);
    });
  });

  describe("food", () => {
    it("scores one point and grows by two segments", () => {
      const { world, events } = makeWorld();
      const snake = place(world, 1, line(100, 100, 1, 0, 5, 3), RIGHT, 20);
      world.foods.push({ x: 104, y: 100 });

      world.tick();

      expect(snake.score).toBe(21);
      expect(snake.segments).toHaveLength(7);
      expect(snake.segments[5]).toEqual({ x: 88, y: 100 });
      expect(snake.segments[6]).toEqual({ x: 88, y: 100 });
      expect(events).toContainEqual({ type: "food:eaten", playerId: 1, score: 21 });
    });

    it("eats only the first item in range and replaces it", () => {
      const { world } = makeWorld();
      const snake = place(world, 1, line(100, 100, 1, 0, 5, 3), RIGHT, 20);
      world.foods.push({ x: 104, y: 100 }, { x: 106, y: 100 });

      world.tick();

      expect(snake.score).toBe(21);
      expect(world.foods).toEqual([{ x: 1500, y: 1500 }, { x: 106, y: 100 }]);
    });

    it("leaves food at exactly the pickup radius", () => {
      const { world } = makeWorld();
      const snake = place(world, 1, line(100, 100, 1, 0, 5, 3));
      world.foods.push({ x: 104, y: 115 });

      world.tick();

      expect(snake.score).toBe(0);
      expect(world.foods).toEqual([{ x: 104, y: 115 }]);
    });
  });

  describe("collisions", () => {
    // Snake 1 heads right into the body of snake 2, which runs downward at x = 104.
    function crossing(overrides: Partial<GameConfig> = {}) {
      const setup = makeWorld(overrides);
      const victim = place(setup.world, 1, line(100, 100, 1, 0, 5, 3), RIGHT, 25);
      const killer = place(setup.world, 2, line(104, 120, 0, 1, 11, 4), { dx: 0, dy: 1 }, 100);
      return { ...setup, victim, killer };
    }

    it("kills a snake whose head touches another body and rewards the other", () => {
      const { world, clock, events, victim, killer } = crossing();
      clock.now = 10_000;

      world.tick();

      expect(victim.alive).toBe(false);
      expect(world.lifecycleOf(1)).toEqual({ kind: "pendingRespawn", since: 10_000 });
      expect(killer.alive).toBe(true);
      expect(killer.score).toBe(110);
      expect(events).toContainEqual({ type: "snake:died", playerId: 1, killerId: 2 });
    });

    it("spares snakes inside the grace period", () => {
      const { world, clock, victim, killer } = crossing();
      clock.now = 4_999;

      world.tick();

      expect(victim.alive).toBe(true);
      expect(killer.score).toBe(100);
      expect(world.lifecycleOf(1)).toEqual({ kind: "active" });
    });

    it("never registers a hit when heads are beyond the fast-reject distance", () => {
      const { world, clock } = makeWorld();
      const victim = place(world, 1, line(110, 96, 0, 1, 5, 3), { dx: 0, dy: 1 });
      place(world, 2, line(700, 100, 1, 0, 151, 4), RIGHT, 2000);
      clock.now = 10_000;

      world.tick();

      expect(victim.segments[0]).toEqual({ x: 110, y: 100 });
      expect(victim.alive).toBe(true);
    });

    it("registers the same overlap once the reject distance allows it", () => {
      const { world, clock } = makeWorld({ fastRejectDistance: 1000 });
      const victim = place(world, 1, line(110, 96, 0, 1, 5, 3), { dx: 0, dy: 1 });
      place(world, 2, line(700, 100, 1, 0, 151, 4), RIGHT, 2000);
      clock.now = 10_000;

      world.tick();

      expect(victim.alive).toBe(false);
    });

    it("resolves mutual head-on hits in the same tick", () => {
      const { world, clock } = makeWorld();
      const a = place(world, 1, line(100, 100, 1, 0, 5, 3));
      const b = place(world, 2, line(110, 100, -1, 0, 5, 3), { dx: -1, dy: 0 });
      clock.now = 10_000;

      world.tick();

      expect(a.alive).toBe(false);
      expect(b.alive).toBe(false);
      expect(a.score).toBe(10);
      expect(b.score).toBe(10);
      expect(world.lifecycleOf(2)).toEqual({ kind: "pendingRespawn", since: 10_000 });
    });

    it("ignores dead snakes as obstacles", () => {
      const { world, clock, victim, killer } = crossing();
      killer.alive = false;
      clock.now = 10_000;

      world.tick();

      expect(victim.alive).toBe(true);
    });
  });

  describe("respawn", () => {
    it("replaces a dead snake after the delay with half its score", () => {
      const { world, clock, events, victim } = (() => {
        const setup = makeWorld();
        const v = place(setup.world, 1, line(100, 100, 1, 0, 5, 3), RIGHT, 25);
        place(setup.world, 2, line(104, 120, 0, 1, 11, 4), { dx: 0, dy: 1 }, 100);
        return { ...setup, victim: v };
      })();
      clock.now = 10_000;
      world.tick();
      expect(victim.alive).toBe(false);
      const corpse = victim.segments.map(p => ({ ...p }));

      clock.now = 14_999;
      world.tick();
      expect(world.lifecycleOf(1)).toEqual({ kind: "pendingRespawn", since: 10_000 });
      expect(world.getSnake(1)?.segments).toEqual(corpse);

      clock.now = 15_000;
      world.tick();
      const fresh = world.getSnake(1);
      expect(fresh).toBeDefined();
      expect(fresh).not.toBe(victim);
      expect(fresh?.alive).toBe(true);
      expect(fresh?.score).toBe(12);
      expect(fresh?.createdAt).toBe(15_000);
      expect(fresh?.segments[0]).toEqual({ x: 1504, y: 1500 });
      expect(world.lifecycleOf(1)).toEqual({ kind: "active" });
      expect(events).toContainEqual({ type: "snake:respawned", playerId: 1, score: 12 });
    });

    it("drops a pending respawn when the player disconnects", () => {
      const { world, clock } = makeWorld();
      place(world, 1, line(100, 100, 1, 0, 5, 3), RIGHT, 25);
      place(world, 2, line(104, 120, 0, 1, 11, 4), { dx: 0, dy: 1 }, 100);
      clock.now = 10_000;
      world.tick();

      world.removeSnake(1);
      clock.now = 20_000;
      world.tick();

      expect(world.getSnake(1)).toBeUndefined();
      expect(world.lifecycleOf(1)).toEqual({ kind: "disconnected" });
      expect(world.isInUse(1)).toBe(false);
    });
  });

  describe("snapshot", () => {
    it("lists snakes by id with rounded segments", () => {
      const { world } = makeWorld();
      place(world, 2, line(50, 50, 1, 0, 2, 3));
      const first = place(world, 1, line(100, 100, 1, 0, 2, 3));
      world.applyDirection(1, 3, 4);
      world.foods.push({ x: 7, y: 9 });
      world.tick();

      const snapshot = world.snapshot();
      expect(snapshot.world_size).toBe(3000);
      expect(snapshot.foods).toEqual([[7, 9]]);
      expect(snapshot.snakes.map(s => s.id)).toEqual([1, 2]);
      expect(snapshot.snakes[0]).toEqual({
        id: 1,
        name: "p1",
        color: "#ffffff",
        segments: [[102.4, 103.2], [100, 100], [97, 100]],
        score: first.score,
        alive: true,
      });
    });
  });
});
