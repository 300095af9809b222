import { StringDecoder } from "node:string_decoder";
import { config } from "./config.js";
import { GameError } from "./errors.js";

export const FRAME_DELIMITER = "\n";

/** One message, one line, one write. */
export function encodeFrame(message: object): string {
  return JSON.stringify(message) + FRAME_DELIMITER;
}

/**
 * Splits text holding JSON objects written back to back (`{..}{..}`) into
 * one string per object. Braces inside string literals are ignored. Text
 * outside any object is dropped; an unterminated trailing object is
 * returned as-is so the caller's parse reports it.
 */
export function splitConcatenatedObjects(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === "\"") inString = false;
      continue;
    }
    if (ch === "\"") {
      if (depth > 0) inString = true;
    } else if (ch === "{") {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === "}" && depth > 0) {
      depth--;
      if (depth === 0) {
        parts.push(text.slice(start, i + 1));
        start = -1;
      }
    }
  }
  if (depth > 0 && start !== -1) parts.push(text.slice(start));
  return parts;
}

export type DecodedFrame =
  | { ok: true; value: unknown }
  | { ok: false; error: GameError };

/** Parses one line, falling back to brace splitting when it holds several objects. */
export function parseLine(line: string): DecodedFrame[] {
  const trimmed = line.trim();
  if (trimmed.length === 0) return [];
  try {
    return [{ ok: true, value: JSON.parse(trimmed) }];
  } catch (err) {
    const pieces = splitConcatenatedObjects(trimmed);
    if (pieces.length <= 1) {
      return [malformed(trimmed, err)];
    }
    return pieces.map((piece): DecodedFrame => {
      try {
        return { ok: true, value: JSON.parse(piece) };
      } catch (pieceErr) {
        return malformed(piece, pieceErr);
      }
    });
  }
}

function malformed(text: string, err: unknown): DecodedFrame {
  return {
    ok: false,
    error: new GameError("MALFORMED_FRAME", "Malformed JSON frame", {
      preview: text.slice(0, 80),
      cause: err instanceof Error ? err.message : String(err),
    }),
  };
}

/**
 * Streaming decoder: feed it chunks as they arrive, get back every frame
 * completed by that chunk. Partial lines stay buffered, and so do the
 * bytes of a character split across reads.
 */
export class FrameDecoder {
  private buffer = "";
  private readonly utf8 = new StringDecoder("utf8");

  constructor(private readonly maxFrameBytes: number = config.maxFrameBytes) {}

  push(chunk: string | Buffer): DecodedFrame[] {
    this.buffer += typeof chunk === "string" ? chunk : this.utf8.write(chunk);
    const frames: DecodedFrame[] = [];

    let newline = this.buffer.indexOf(FRAME_DELIMITER);
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      frames.push(...parseLine(line));
      newline = this.buffer.indexOf(FRAME_DELIMITER);
    }

    if (Buffer.byteLength(this.buffer, "utf8") > this.maxFrameBytes) {
      const size = Buffer.byteLength(this.buffer, "utf8");
      this.buffer = "";
      frames.push({
        ok: false,
        error: new GameError("FRAME_TOO_LARGE", "Frame exceeds maximum size", { size }),
      });
    }
    return frames;
  }

  /** Whatever is left once the stream ends, parsed as a last line. */
  end(): DecodedFrame[] {
    const rest = this.buffer + this.utf8.end();
    this.buffer = "";
    return parseLine(rest);
  }

  get pending(): number {
    return this.buffer.length;
  }
}
