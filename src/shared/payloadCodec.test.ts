import { describe, expect, it } from "vitest";
import {
  decodePairPayload,
  decodePayload,
  encodePairPayload,
  encodePayload,
  type PayloadCodec,
  PayloadOverflowError,
  PayloadReader,
  PayloadUnderflowError,
  PayloadWriter,
} from "./payloadCodec.js";

interface Move {
  dx: number;
  dy: number;
  jump: boolean;
}

const moveCodec: PayloadCodec<Move> = {
  encode(m, w) {
    w.writeI8(m.dx);
    w.writeI8(m.dy);
    w.writeBool(m.jump);
  },
  decode(r) {
    return { dx: r.readI8(), dy: r.readI8(), jump: r.readBool() };
  },
};

const positionCodec: PayloadCodec<{ x: number; y: number }> = {
  encode(p, w) {
    w.writeF64(p.x);
    w.writeF64(p.y);
  },
  decode(r) {
    return { x: r.readF64(), y: r.readF64() };
  },
};

describe("PayloadWriter", () => {
  it("writes little-endian values", () => {
    const writer = new PayloadWriter(16);
    writer.writeU16(0x0102);
    writer.writeI32(-2);
    writer.writeU8(255);

    expect([...writer.finish()]).toEqual([0x02, 0x01, 0xfe, 0xff, 0xff, 0xff, 0xff]);
  });

  it("throws once the scratch capacity is exceeded", () => {
    const writer = new PayloadWriter(10);
    writer.writeF64(1);
    writer.writeU16(2);
    expect(writer.length).toBe(10);

    expect(() => writer.writeU8(3)).toThrow(PayloadOverflowError);
    expect(() => writer.writeU8(3)).toThrow(
      "Payload of 11 bytes exceeds scratch capacity of 10 bytes",
    );
  });

  it("finish returns a copy that survives reuse of the scratch", () => {
    const writer = new PayloadWriter(8);
    const first = encodePayload(moveCodec, { dx: 1, dy: -1, jump: true }, writer);
    encodePayload(moveCodec, { dx: 0, dy: 0, jump: false }, writer);

    expect([...first]).toEqual([1, 255, 1]);
  });
});

describe("PayloadReader", () => {
  it("reads back what the writer wrote", () => {
    const writer = new PayloadWriter();
    writer.writeU32(4_000_000_000);
    writer.writeF32(0.5);
    writer.writeF64(-1.25);
    writer.writeU16(513);

    const reader = new PayloadReader(writer.finish());
    expect(reader.readU32()).toBe(4_000_000_000);
    expect(reader.readF32()).toBe(0.5);
    expect(reader.readF64()).toBe(-1.25);
    expect(reader.readU16()).toBe(513);
    expect(reader.remaining).toBe(0);
  });

  it("respects the byte offset of a subarray", () => {
    const backing = new Uint8Array([9, 9, 7, 0, 9]);
    const reader = new PayloadReader(backing.subarray(2, 4));
    expect(reader.readU16()).toBe(7);
  });

  it("throws on truncated payloads", () => {
    const reader = new PayloadReader(new Uint8Array([1, 2, 3]));
    expect(() => reader.readI32()).toThrow(PayloadUnderflowError);
  });
});

describe("payload helpers", () => {
  it("encodes an input/state pair back to back", () => {
    const writer = new PayloadWriter();
    const bytes = encodePairPayload(
      moveCodec,
      { dx: -1, dy: 1, jump: false },
      positionCodec,
      { x: 3.5, y: -2 },
      writer,
    );

    expect(bytes.byteLength).toBe(3 + 16);
    expect(decodePairPayload(moveCodec, positionCodec, bytes)).toEqual([
      { dx: -1, dy: 1, jump: false },
      { x: 3.5, y: -2 },
    ]);
  });

  it("rejects trailing bytes", () => {
    const bytes = new Uint8Array([1, 1, 0, 42]);
    expect(() => decodePayload(moveCodec, bytes)).toThrow(
      "Payload has 1 trailing bytes (length 4)",
    );
  });

  it("fails loudly when a value does not fit the scratch", () => {
    const writer = new PayloadWriter(12);
    expect(() => encodePayload(positionCodec, { x: 1, y: 2 }, writer)).toThrow(
      PayloadOverflowError,
    );
  });
});
