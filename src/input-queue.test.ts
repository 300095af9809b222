import { describe, expect, it } from "vitest";
import { InputQueue } from "./input-queue.js";

describe("InputQueue", () => {
  it("drains in arrival order and empties", () => {
    const queue = new InputQueue();
    queue.push({ dx: 1, dy: 0 });
    queue.push({ dx: 0, dy: 1 });

    expect(queue.size).toBe(2);
    expect(queue.drain()).toEqual([{ dx: 1, dy: 0 }, { dx: 0, dy: 1 }]);
    expect(queue.size).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  it("drops the oldest input when full", () => {
    const queue = new InputQueue(2);
    queue.push({ dx: 1, dy: 0 });
    queue.push({ dx: 0, dy: 1 });
    queue.push({ dx: -1, dy: 0 });

    expect(queue.dropped).toBe(1);
    expect(queue.drain()).toEqual([{ dx: 0, dy: 1 }, { dx: -1, dy: 0 }]);
  });

  it("copies pushed vectors", () => {
    const queue = new InputQueue();
    const input = { dx: 1, dy: 0 };
    queue.push(input);
    input.dx = 5;
    expect(queue.drain()).toEqual([{ dx: 1, dy: 0 }]);
  });
});
