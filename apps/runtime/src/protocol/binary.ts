/**
 * Big-endian binary writer/reader used by the codec and payload codecs.
 *
 * Strings and byte arrays are u32-length-prefixed. Readers copy
 * variable-length data into owned buffers so nothing keeps a view on a
 * channel's receive buffer.
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export class PayloadDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PayloadDecodeError";
  }
}

export class BinaryWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset = 0;

  constructor(initialCapacity = 64) {
    this.buffer = new Uint8Array(initialCapacity);
    this.view = new DataView(this.buffer.buffer);
  }

  get length(): number {
    return this.offset;
  }

  u8(value: number): this {
    this.ensure(1);
    this.view.setUint8(this.offset, value);
    this.offset += 1;
    return this;
  }

  u16(value: number): this {
    this.ensure(2);
    this.view.setUint16(this.offset, value);
    this.offset += 2;
    return this;
  }

  u32(value: number): this {
    this.ensure(4);
    this.view.setUint32(this.offset, value);
    this.offset += 4;
    return this;
  }

  i32(value: number): this {
    this.ensure(4);
    this.view.setInt32(this.offset, value);
    this.offset += 4;
    return this;
  }

  bool(value: boolean): this {
    return this.u8(value ? 1 : 0);
  }

  /** Raw bytes with no length prefix. */
  raw(bytes: Uint8Array): this {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
    return this;
  }

  bytes(bytes: Uint8Array): this {
    return this.u32(bytes.length).raw(bytes);
  }

  string(value: string): this {
    return this.bytes(encoder.encode(value));
  }

  /** A copy of the written bytes. */
  finish(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }

  private ensure(extra: number): void {
    const needed = this.offset + extra;
    if (needed <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < needed) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.offset));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }
}

export class BinaryReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly source: Uint8Array) {
    this.view = new DataView(source.buffer, source.byteOffset, source.byteLength);
  }

  get remaining(): number {
    return this.source.length - this.offset;
  }

  u8(): number {
    this.require(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(): number {
    this.require(2);
    const value = this.view.getUint16(this.offset);
    this.offset += 2;
    return value;
  }

  u32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  i32(): number {
    this.require(4);
    const value = this.view.getInt32(this.offset);
    this.offset += 4;
    return value;
  }

  bool(): boolean {
    return this.u8() !== 0;
  }

  bytes(): Uint8Array {
    const length = this.u32();
    this.require(length);
    const copy = this.source.slice(this.offset, this.offset + length);
    this.offset += length;
    return copy;
  }

  string(): string {
    const length = this.u32();
    this.require(length);
    const view = this.source.subarray(this.offset, this.offset + length);
    this.offset += length;
    try {
      return decoder.decode(view);
    } catch {
      throw new PayloadDecodeError("Invalid UTF-8 in string field");
    }
  }

  /** Fail when trailing bytes remain after a complete payload. */
  end(): void {
    if (this.remaining !== 0) {
      throw new PayloadDecodeError(`${this.remaining} unexpected trailing bytes`);
    }
  }

  private require(count: number): void {
    if (this.offset + count > this.source.length) {
      throw new PayloadDecodeError(
        `Payload truncated: need ${count} bytes at offset ${this.offset}, have ${this.remaining}`,
      );
    }
  }
}
