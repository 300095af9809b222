import type { PlayerId } from "./types.js";

/** Display name → last player id handed out under that name. */
export interface IdentityStore {
  get(name: string): PlayerId | undefined;
  set(name: string, id: PlayerId): void;
  nextId(): PlayerId;
}

export class InMemoryIdentityStore implements IdentityStore {
  private readonly byName = new Map<string, PlayerId>();
  private counter: PlayerId;

  constructor(firstId: PlayerId = 1) {
    this.counter = firstId;
  }

  get(name: string): PlayerId | undefined {
    return this.byName.get(name);
  }

  set(name: string, id: PlayerId): void {
    this.byName.set(name, id);
  }

  nextId(): PlayerId {
    return this.counter++;
  }
}
