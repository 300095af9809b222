import { config } from "./config.js";
import type { Vector } from "./types.js";

/**
 * Pending direction inputs of one player. The connection handler is the
 * only producer, the game loop the only consumer.
 */
export class InputQueue {
  private items: Vector[] = [];
  private droppedCount = 0;

  constructor(private readonly capacity: number = config.maxQueuedInputs) {}

  push(input: Vector): void {
    if (this.items.length >= this.capacity) {
      this.items.shift();
      this.droppedCount++;
    }
    this.items.push({ dx: input.dx, dy: input.dy });
  }

  /** Removes and returns everything queued, oldest first. */
  drain(): Vector[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }
}
