/**
 * Fixed-capacity binary payloads for inputs and states.
 *
 * A controller owns one PayloadWriter whose scratch buffer is reused for
 * every message it sends; `finish()` copies the written bytes out so the
 * scratch can be reused immediately. Writing past the capacity throws
 * PayloadOverflowError rather than growing the buffer.
 *
 * All multi-byte values are little-endian.
 */

import { PAYLOAD_CAPACITY } from "../config/constants.js";

export class PayloadOverflowError extends Error {
  constructor(
    readonly capacity: number,
    readonly attempted: number,
  ) {
    super(`Payload of ${attempted} bytes exceeds scratch capacity of ${capacity} bytes`);
    this.name = "PayloadOverflowError";
  }
}

export class PayloadUnderflowError extends Error {
  constructor(
    readonly length: number,
    readonly attempted: number,
  ) {
    super(`Payload of ${length} bytes truncated: needed ${attempted}`);
    this.name = "PayloadUnderflowError";
  }
}

export interface PayloadCodec<T> {
  encode(value: T, writer: PayloadWriter): void;
  decode(reader: PayloadReader): T;
}

export class PayloadWriter {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(readonly capacity = PAYLOAD_CAPACITY) {
    this.bytes = new Uint8Array(capacity);
    this.view = new DataView(this.bytes.buffer);
  }

  get length(): number {
    return this.offset;
  }

  reset(): this {
    this.offset = 0;
    return this;
  }

  writeU8(v: number): void {
    this.view.setUint8(this.claim(1), v);
  }

  writeI8(v: number): void {
    this.view.setInt8(this.claim(1), v);
  }

  writeU16(v: number): void {
    this.view.setUint16(this.claim(2), v, true);
  }

  writeI32(v: number): void {
    this.view.setInt32(this.claim(4), v, true);
  }

  writeU32(v: number): void {
    this.view.setUint32(this.claim(4), v, true);
  }

  writeF32(v: number): void {
    this.view.setFloat32(this.claim(4), v, true);
  }

  writeF64(v: number): void {
    this.view.setFloat64(this.claim(8), v, true);
  }

  writeBool(v: boolean): void {
    this.writeU8(v ? 1 : 0);
  }

  /** Copy of the bytes written since the last reset. */
  finish(): Uint8Array {
    return this.bytes.slice(0, this.offset);
  }

  private claim(size: number): number {
    const at = this.offset;
    if (at + size > this.capacity) {
      throw new PayloadOverflowError(this.capacity, at + size);
    }
    this.offset = at + size;
    return at;
  }
}

export class PayloadReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  readU8(): number {
    return this.view.getUint8(this.take(1));
  }

  readI8(): number {
    return this.view.getInt8(this.take(1));
  }

  readU16(): number {
    return this.view.getUint16(this.take(2), true);
  }

  readI32(): number {
    return this.view.getInt32(this.take(4), true);
  }

  readU32(): number {
    return this.view.getUint32(this.take(4), true);
  }

  readF32(): number {
    return this.view.getFloat32(this.take(4), true);
  }

  readF64(): number {
    return this.view.getFloat64(this.take(8), true);
  }

  readBool(): boolean {
    return this.readU8() !== 0;
  }

  private take(size: number): number {
    const at = this.offset;
    if (at + size > this.bytes.byteLength) {
      throw new PayloadUnderflowError(this.bytes.byteLength, at + size);
    }
    this.offset = at + size;
    return at;
  }
}

/** Encode one value into `writer` from scratch and return a copy of the bytes. */
export function encodePayload<T>(
  codec: PayloadCodec<T>,
  value: T,
  writer: PayloadWriter,
): Uint8Array {
  codec.encode(value, writer.reset());
  return writer.finish();
}

/** Encode an (input, state) pair back to back. */
export function encodePairPayload<A, B>(
  first: PayloadCodec<A>,
  a: A,
  second: PayloadCodec<B>,
  b: B,
  writer: PayloadWriter,
): Uint8Array {
  writer.reset();
  first.encode(a, writer);
  second.encode(b, writer);
  return writer.finish();
}

/** Decode a single value, rejecting trailing bytes. */
export function decodePayload<T>(codec: PayloadCodec<T>, bytes: Uint8Array): T {
  const reader = new PayloadReader(bytes);
  const value = codec.decode(reader);
  assertConsumed(reader, bytes);
  return value;
}

export function decodePairPayload<A, B>(
  first: PayloadCodec<A>,
  second: PayloadCodec<B>,
  bytes: Uint8Array,
): [A, B] {
  const reader = new PayloadReader(bytes);
  const a = first.decode(reader);
  const b = second.decode(reader);
  assertConsumed(reader, bytes);
  return [a, b];
}

function assertConsumed(reader: PayloadReader, bytes: Uint8Array): void {
  if (reader.remaining !== 0) {
    throw new Error(`Payload has ${reader.remaining} trailing bytes (length ${bytes.byteLength})`);
  }
}
