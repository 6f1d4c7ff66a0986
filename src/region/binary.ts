// src/region/binary.ts
import { CorruptFormatError } from "./errors.js";

const UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Sequential reader over a byte buffer. Every read names its endianness and
 * is bounds-checked; running past the end raises CorruptFormatError with the
 * offset and byte count that were wanted.
 */
export class ByteCursor {
  private offset = 0;
  private readonly view: DataView;

  public constructor(
    private readonly buf: Uint8Array,
    private readonly label = "buffer",
  ) {
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  public get position(): number {
    return this.offset;
  }

  public get length(): number {
    return this.buf.length;
  }

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.buf.length) {
      throw new CorruptFormatError(
        `${this.label}: seek to ${offset} outside 0..${this.buf.length}`,
        { offset },
      );
    }
    this.offset = offset;
  }

  public readU8(): number {
    this.ensure(1);
    const v = this.view.getUint8(this.offset);
    this.offset += 1;
    return v;
  }

  public readI8(): number {
    this.ensure(1);
    const v = this.view.getInt8(this.offset);
    this.offset += 1;
    return v;
  }

  public readU16BE(): number {
    this.ensure(2);
    const v = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return v;
  }

  public readU16LE(): number {
    this.ensure(2);
    const v = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return v;
  }

  public readU32BE(): number {
    this.ensure(4);
    const v = this.view.getUint32(this.offset, false);
    this.offset += 4;
    return v;
  }

  public readU32LE(): number {
    this.ensure(4);
    const v = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return v;
  }

  /** Returns a view into the underlying buffer, not a copy. */
  public readBytes(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0) {
      throw new CorruptFormatError(`${this.label}: invalid read length ${n}`, {
        offset: this.offset,
      });
    }
    this.ensure(n);
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  public readUtf8(n: number): string {
    const start = this.offset;
    const bytes = this.readBytes(n);
    try {
      return UTF8.decode(bytes);
    } catch {
      throw new CorruptFormatError(`${this.label}: invalid UTF-8 in ${n} bytes at offset ${start}`, {
        offset: start,
      });
    }
  }

  private ensure(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new CorruptFormatError(
        `${this.label}: unexpected EOF at offset ${this.offset}: need ${n} bytes, have ${this.remaining()}`,
        { offset: this.offset, expected: n },
      );
    }
  }
}
