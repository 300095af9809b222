import { describe, expect, it } from "vitest";
import { encodeFrame, FrameDecoder, parseLine, splitConcatenatedObjects } from "./protocol.js";

describe("encodeFrame", () => {
  it("writes one JSON object followed by a single newline", () => {
    const frame = encodeFrame({ type: "join_ack", player_id: 3 });
    expect(frame).toBe("{\"type\":\"join_ack\",\"player_id\":3}\n");
  });
});

describe("splitConcatenatedObjects", () => {
  it("splits objects written back to back", () => {
    expect(splitConcatenatedObjects("{\"a\":1}{\"b\":2}")).toEqual(["{\"a\":1}", "{\"b\":2}"]);
  });

  it("ignores braces and escaped quotes inside strings", () => {
    const text = "{\"t\":\"a\\\"}\"}{\"n\":{\"x\":1}}";
    expect(splitConcatenatedObjects(text)).toEqual(["{\"t\":\"a\\\"}\"}", "{\"n\":{\"x\":1}}"]);
  });

  it("returns an unterminated trailing object as-is", () => {
    expect(splitConcatenatedObjects("{\"a\":1}{\"b\":")).toEqual(["{\"a\":1}", "{\"b\":"]);
  });
});

describe("parseLine", () => {
  it("returns nothing for blank lines", () => {
    expect(parseLine("   ")).toEqual([]);
  });

  it("reports malformed JSON", () => {
    const [frame] = parseLine("{nope");
    expect(frame.ok).toBe(false);
    if (!frame.ok) expect(frame.error.code).toBe("MALFORMED_FRAME");
  });
});

describe("FrameDecoder", () => {
  it("buffers partial reads until the newline arrives", () => {
    const decoder = new FrameDecoder();
    expect(decoder.push("{\"type\":\"in")).toEqual([]);
    expect(decoder.pending).toBe(11);
    expect(decoder.push("put\",\"dx\":1,\"dy\":0}\n")).toEqual([
      { ok: true, value: { type: "input", dx: 1, dy: 0 } },
    ]);
    expect(decoder.pending).toBe(0);
  });

  it("decodes several frames from one chunk and skips empty lines", () => {
    const decoder = new FrameDecoder();
    const frames = decoder.push("{\"n\":1}\n\n{\"n\":2}\n{\"n\":");
    expect(frames).toEqual([
      { ok: true, value: { n: 1 } },
      { ok: true, value: { n: 2 } },
    ]);
    expect(decoder.push("3}\n")).toEqual([{ ok: true, value: { n: 3 } }]);
  });

  it("joins a character whose bytes arrive in separate reads", () => {
    const decoder = new FrameDecoder();
    const bytes = Buffer.from("{\"type\":\"chat\",\"text\":\"h\u00e9llo\"}\n", "utf8");
    const cut = bytes.indexOf(0xc3) + 1;

    expect(decoder.push(bytes.subarray(0, cut))).toEqual([]);
    expect(decoder.push(bytes.subarray(cut))).toEqual([
      { ok: true, value: { type: "chat", text: "h\u00e9llo" } },
    ]);
  });

  it("recovers objects concatenated without a newline", () => {
    const decoder = new FrameDecoder();
    const frames = decoder.push(Buffer.from("{\"type\":\"chat\",\"text\":\"}{\"}{\"type\":\"input\",\"dx\":0,\"dy\":1}\n"));
    expect(frames).toEqual([
      { ok: true, value: { type: "chat", text: "}{" } },
      { ok: true, value: { type: "input", dx: 0, dy: 1 } },
    ]);
  });

  it("keeps decoding after a malformed line", () => {
    const decoder = new FrameDecoder();
    const frames = decoder.push("garbage\n{\"ok\":true}\n");
    expect(frames).toHaveLength(2);
    expect(frames[0].ok).toBe(false);
    expect(frames[1]).toEqual({ ok: true, value: { ok: true } });
  });

  it("drops an oversized unterminated frame", () => {
    const decoder = new FrameDecoder(16);
    const frames = decoder.push("x".repeat(20));
    expect(frames).toHaveLength(1);
    const [frame] = frames;
    expect(frame.ok).toBe(false);
    if (!frame.ok) expect(frame.error.code).toBe("FRAME_TOO_LARGE");
    expect(decoder.pending).toBe(0);
  });

  it("parses what is left when the stream ends", () => {
    const decoder = new FrameDecoder();
    decoder.push("{\"last\":1}");
    expect(decoder.end()).toEqual([{ ok: true, value: { last: 1 } }]);
    expect(decoder.pending).toBe(0);
  });
});
