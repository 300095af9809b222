export interface Position {
  x: number;
  y: number;
}

export interface Vector {
  dx: number;
  dy: number;
}

export type PlayerId = number;

export interface Snake {
  id: PlayerId;
  name: string;
  color: string;
  alive: boolean;

  // Movement
  segments: Position[]; // segments[0] = head
  direction: Vector;    // unit length
  speed: number;        // units per tick

  // Scoring
  score: number;

  createdAt: number;    // ms, starts the collision grace period
}

export type PlayerLifecycle =
  | { kind: "active" }
  | { kind: "pendingRespawn"; since: number }
  | { kind: "disconnected" };

export interface JoinRequest {
  name: string;
  color: string;
  reconnect: boolean;
  lastScore: number;
  lastLength: number;
  previousId?: number;
}

// --- Wire shapes (snake_case mirrors the protocol) ---

export interface SnakeView {
  id: PlayerId;
  name: string;
  color: string;
  segments: Array<[number, number]>;
  score: number;
  alive: boolean;
}

export interface WorldSnapshot {
  snakes: SnakeView[];
  foods: Array<[number, number]>;
  world_size: number;
}

export interface StateView extends WorldSnapshot {
  player_id: PlayerId;
}

export type ServerMessage =
  | { type: "join_ack"; player_id: PlayerId }
  | { type: "chat"; player_id: PlayerId; player_name: string; text: string }
  | { type: "state_update"; state: StateView }
  | { type: "error"; message: string };

export type GameEvent =
  | { type: "player:joined"; playerId: PlayerId; name: string; reconnect: boolean }
  | { type: "player:left"; playerId: PlayerId; name: string }
  | { type: "snake:died"; playerId: PlayerId; killerId: PlayerId | null }
  | { type: "snake:respawned"; playerId: PlayerId; score: number }
  | { type: "food:eaten"; playerId: PlayerId; score: number }
  | { type: "chat"; playerId: PlayerId; name: string; text: string };
