import { config, type GameConfig } from "./config.js";
import type { Position, Vector } from "./types.js";

export type Random = () => number;

// --- Wrap-around ---

export function wrap(v: number, size: number = config.worldSize): number {
  return ((v % size) + size) % size;
}

export function wrapPosition(p: Position, size: number = config.worldSize): Position {
  return { x: wrap(p.x, size), y: wrap(p.y, size) };
}

// --- Distance ---

export function distSq(x1: number, y1: number, x2: number, y2: number): number {
  const dx = x2 - x1;
  const dy = y2 - y1;
  return dx * dx + dy * dy;
}

export function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

// --- Direction ---

export function dot(a: Vector, b: Vector): number {
  return a.dx * b.dx + a.dy * b.dy;
}

export function normalize(v: Vector): Vector | null {
  const length = Math.hypot(v.dx, v.dy);
  if (!Number.isFinite(length) || length === 0) return null;
  return { dx: v.dx / length, dy: v.dy / length };
}

// --- Bodies ---

/** Segments trailing backward from `head` along `direction`, wrapped into the world. */
export function buildBody(
  head: Position,
  direction: Vector,
  length: number,
  cfg: GameConfig = config,
): Position[] {
  const body: Position[] = [];
  for (let i = 0; i < length; i++) {
    body.push(wrapPosition({
      x: head.x - direction.dx * i * cfg.segmentSpacing,
      y: head.y - direction.dy * i * cfg.segmentSpacing,
    }, cfg.worldSize));
  }
  return body;
}

export function minSeparation(a: Position[], b: Position[]): number {
  let best = Infinity;
  for (const p of a) {
    for (const q of b) {
      const d = distSq(p.x, p.y, q.x, q.y);
      if (d < best) best = d;
    }
  }
  return Math.sqrt(best);
}

// --- Spawning ---

export function randomInt(min: number, max: number, random: Random = Math.random): number {
  return Math.floor(random() * (max - min)) + min;
}

export function randomPosition(min: number, max: number, random: Random = Math.random): Position {
  return { x: randomInt(min, max, random), y: randomInt(min, max, random) };
}

export function spawnFood(random: Random = Math.random, size: number = config.worldSize): Position {
  return randomPosition(0, size, random);
}

// --- Rounding for broadcast ---

export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}
