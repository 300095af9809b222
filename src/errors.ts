export type GameErrorCode =
  | "SERVER_FULL"
  | "INVALID_JOIN"
  | "MALFORMED_FRAME"
  | "FRAME_TOO_LARGE"
  | "TLS_HANDSHAKE_FAILED"
  | "NOT_JOINED"
  | "CONNECT_FAILED";

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GameErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "GameError";
    this.code = code;
    this.context = context;
  }
}

export function isGameError(err: unknown, code?: GameErrorCode): err is GameError {
  return err instanceof GameError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
