/**
 * TraCI binary codec.
 *
 * All integers and doubles are big-endian. Strings are a 4-byte length
 * followed by UTF-8 bytes. A message is a 4-byte total length (including the
 * length field itself) followed by one or more commands.
 */

import { ProtocolError } from '../errors';
import {
  POSITION_2D,
  RTYPE_ERR,
  RTYPE_NOTIMPLEMENTED,
  RTYPE_OK,
  TYPE_BYTE,
  TYPE_COLOR,
  TYPE_COMPOUND,
  TYPE_DOUBLE,
  TYPE_INTEGER,
  TYPE_STRING,
  TYPE_STRINGLIST,
  TYPE_UBYTE,
} from './constants';

// ── Values ──────────────────────────────────────────────────────────

export interface Position2D {
  readonly x: number;
  readonly y: number;
}

export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export interface Compound {
  readonly compound: readonly TraciValue[];
}

export type TraciValue = number | string | readonly string[] | Position2D | Color | Compound;

export function isStringList(value: TraciValue | undefined): value is readonly string[] {
  return Array.isArray(value);
}

export function asStringList(value: TraciValue | undefined, label: string): readonly string[] {
  if (value === undefined) return [];
  if (isStringList(value)) return value;
  throw new ProtocolError(`Expected a string list for ${label}, got ${JSON.stringify(value)}`);
}

export function asNumber(value: TraciValue | undefined, label: string): number {
  if (typeof value === 'number') return value;
  throw new ProtocolError(`Expected a number for ${label}, got ${JSON.stringify(value)}`);
}

export function asString(value: TraciValue | undefined, label: string): string {
  if (typeof value === 'string') return value;
  throw new ProtocolError(`Expected a string for ${label}, got ${JSON.stringify(value)}`);
}

// ── Reading ─────────────────────────────────────────────────────────

export class StorageReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  readUbyte(): number {
    this.ensure(1);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readByte(): number {
    this.ensure(1);
    const value = this.buffer.readInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readInt(): number {
    this.ensure(4);
    const value = this.buffer.readInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  readDouble(): number {
    this.ensure(8);
    const value = this.buffer.readDoubleBE(this.offset);
    this.offset += 8;
    return value;
  }

  readString(): string {
    const length = this.readInt();
    if (length < 0) {
      throw new ProtocolError(`Negative string length ${length}`);
    }
    this.ensure(length);
    const value = this.buffer.toString('utf8', this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  readStringList(): string[] {
    const count = this.readInt();
    const list: string[] = [];
    for (let i = 0; i < count; i++) {
      list.push(this.readString());
    }
    return list;
  }

  /** Command length: one byte, or 0 followed by a 4-byte length. */
  readLength(): number {
    const short = this.readUbyte();
    return short > 0 ? short : this.readInt();
  }

  readTypedValue(): TraciValue {
    const type = this.readUbyte();
    switch (type) {
      case TYPE_UBYTE:
        return this.readUbyte();
      case TYPE_BYTE:
        return this.readByte();
      case TYPE_INTEGER:
        return this.readInt();
      case TYPE_DOUBLE:
        return this.readDouble();
      case TYPE_STRING:
        return this.readString();
      case TYPE_STRINGLIST:
        return this.readStringList();
      case POSITION_2D:
        return { x: this.readDouble(), y: this.readDouble() };
      case TYPE_COLOR:
        return { r: this.readUbyte(), g: this.readUbyte(), b: this.readUbyte(), a: this.readUbyte() };
      case TYPE_COMPOUND: {
        const count = this.readInt();
        const items: TraciValue[] = [];
        for (let i = 0; i < count; i++) {
          items.push(this.readTypedValue());
        }
        return { compound: items };
      }
      default:
        throw new ProtocolError(`Unsupported value type 0x${type.toString(16)}`);
    }
  }

  private ensure(bytes: number): void {
    if (this.remaining < bytes) {
      throw new ProtocolError(`Truncated message: needed ${bytes} bytes, ${this.remaining} left`);
    }
  }
}

// ── Writing ─────────────────────────────────────────────────────────

export class StorageWriter {
  private readonly parts: Buffer[] = [];

  writeUbyte(value: number): this {
    const buf = Buffer.alloc(1);
    buf.writeUInt8(value);
    this.parts.push(buf);
    return this;
  }

  writeInt(value: number): this {
    const buf = Buffer.alloc(4);
    buf.writeInt32BE(value);
    this.parts.push(buf);
    return this;
  }

  writeDouble(value: number): this {
    const buf = Buffer.alloc(8);
    buf.writeDoubleBE(value);
    this.parts.push(buf);
    return this;
  }

  writeString(value: string): this {
    const bytes = Buffer.from(value, 'utf8');
    this.writeInt(bytes.length);
    this.parts.push(bytes);
    return this;
  }

  writeStringList(values: readonly string[]): this {
    this.writeInt(values.length);
    for (const value of values) {
      this.writeString(value);
    }
    return this;
  }

  writeTypedInt(value: number): this {
    return this.writeUbyte(TYPE_INTEGER).writeInt(value);
  }

  writeTypedDouble(value: number): this {
    return this.writeUbyte(TYPE_DOUBLE).writeDouble(value);
  }

  writeTypedString(value: string): this {
    return this.writeUbyte(TYPE_STRING).writeString(value);
  }

  writeTypedStringList(values: readonly string[]): this {
    return this.writeUbyte(TYPE_STRINGLIST).writeStringList(values);
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.parts);
  }
}

// ── Framing ─────────────────────────────────────────────────────────

/** Frame one command; commands over 255 bytes use the extended length form. */
export function encodeCommand(commandId: number, content: Buffer = Buffer.alloc(0)): Buffer {
  const shortLength = 1 + 1 + content.length;
  if (shortLength <= 255) {
    return Buffer.concat([Buffer.from([shortLength, commandId]), content]);
  }

  const header = Buffer.alloc(6);
  header.writeUInt8(0, 0);
  header.writeInt32BE(1 + 4 + 1 + content.length, 1);
  header.writeUInt8(commandId, 5);
  return Buffer.concat([header, content]);
}

export function encodeMessage(commands: readonly Buffer[]): Buffer {
  const body = Buffer.concat(commands);
  const header = Buffer.alloc(4);
  header.writeInt32BE(body.length + 4);
  return Buffer.concat([header, body]);
}

export interface CommandStatus {
  commandId: number;
  result: number;
  description: string;
}

export function readStatus(reader: StorageReader): CommandStatus {
  reader.readLength();
  return {
    commandId: reader.readUbyte(),
    result: reader.readUbyte(),
    description: reader.readString(),
  };
}

/** Read a status block and fail unless it acknowledges `commandId` with OK. */
export function expectOk(reader: StorageReader, commandId: number): CommandStatus {
  const status = readStatus(reader);

  if (status.commandId !== commandId) {
    throw new ProtocolError(
      `Received answer 0x${status.commandId.toString(16)} for command 0x${commandId.toString(16)}`,
    );
  }

  if (status.result !== RTYPE_OK) {
    const kind =
      status.result === RTYPE_NOTIMPLEMENTED ? 'not implemented'
        : status.result === RTYPE_ERR ? 'error'
          : `status 0x${status.result.toString(16)}`;
    throw new ProtocolError(`Command 0x${commandId.toString(16)} failed (${kind}): ${status.description}`);
  }

  return status;
}
