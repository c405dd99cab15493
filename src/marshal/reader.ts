/**
 * Marshal reader
 *
 * Decodes the Marshal 4.8 binary format served by gem registries
 * (dependency API responses, specs.4.8 indexes, quick/Marshal.4.8 gemspecs)
 * into a typed value tree. Only data types are supported; class and module
 * references, regexps and custom `_load` data other than raw bytes are
 * rejected.
 */

import type { MarshalValue } from "./marshal.types";
import { MarshalHash, MarshalObject, MarshalSymbol, MarshalUserDump, MarshalUserMarshal } from "./marshal.types";

const MAJOR_VERSION = 4;
const MINOR_VERSION = 8;

export class MarshalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MarshalError";
  }
}

class MarshalReader {
  private offset = 0;
  private readonly symbols: string[] = [];
  private readonly objects: MarshalValue[] = [];

  constructor(private readonly data: Buffer) {}

  readHeader(): void {
    const major = this.readByte();
    const minor = this.readByte();
    if (major !== MAJOR_VERSION || minor > MINOR_VERSION) {
      throw new MarshalError(`incompatible marshal file format (can't be read): format version ${major}.${minor}`);
    }
  }

  private readByte(): number {
    const byte = this.data[this.offset];
    if (byte === undefined) {
      throw new MarshalError("marshal data too short");
    }
    this.offset += 1;
    return byte;
  }

  private readSignedByte(): number {
    const byte = this.readByte();
    return byte > 127 ? byte - 256 : byte;
  }

  private readLong(): number {
    const c = this.readSignedByte();
    if (c === 0) return 0;
    if (c > 4) return c - 5;
    if (c < -4) return c + 5;

    const length = Math.abs(c);
    let value = 0;
    for (let i = 0; i < length; i++) {
      value += this.readByte() * 2 ** (8 * i);
    }
    return c > 0 ? value : value - 2 ** (8 * length);
  }

  private readBytes(): Buffer {
    const length = this.readLong();
    if (length < 0 || this.offset + length > this.data.length) {
      throw new MarshalError("marshal data too short");
    }
    const bytes = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  private register<T extends MarshalValue>(value: T): T {
    this.objects.push(value);
    return value;
  }

  private readSymbolName(): string {
    const type = String.fromCharCode(this.readByte());
    if (type === ":") {
      const name = this.readBytes().toString("utf-8");
      this.symbols.push(name);
      return name;
    }
    if (type === ";") {
      const index = this.readLong();
      const name = this.symbols[index];
      if (name === undefined) {
        throw new MarshalError(`bad symbol link ${index}`);
      }
      return name;
    }
    if (type === "I") {
      // Symbol with encoding ivars
      const name = this.readSymbolName();
      this.readIvars();
      return name;
    }
    throw new MarshalError(`dump format error for symbol (0x${type.charCodeAt(0).toString(16)})`);
  }

  private readIvars(): Map<string, MarshalValue> {
    const count = this.readLong();
    const ivars = new Map<string, MarshalValue>();
    for (let i = 0; i < count; i++) {
      const name = this.readSymbolName();
      ivars.set(name, this.readValue());
    }
    return ivars;
  }

  readValue(): MarshalValue {
    const type = String.fromCharCode(this.readByte());

    switch (type) {
      case "0":
        return null;
      case "T":
        return true;
      case "F":
        return false;
      case "i":
        return this.readLong();
      case ":":
      case ";":
        this.offset -= 1;
        return new MarshalSymbol(this.readSymbolName());
      case "\"":
        return this.register(this.readBytes().toString("utf-8"));
      case "l": {
        const sign = String.fromCharCode(this.readByte());
        const shorts = this.readLong();
        let value = 0;
        for (let i = 0; i < shorts * 2; i++) {
          value += this.readByte() * 2 ** (8 * i);
        }
        return this.register(sign === "-" ? -value : value);
      }
      case "f": {
        const text = this.readBytes().toString("latin1").split("\0")[0] ?? "";
        const value = text === "nan" ? NaN : text === "inf" ? Infinity : text === "-inf" ? -Infinity : Number(text);
        return this.register(value);
      }
      case "[": {
        const length = this.readLong();
        const array: MarshalValue[] = this.register([]);
        for (let i = 0; i < length; i++) {
          array.push(this.readValue());
        }
        return array;
      }
      case "{":
      case "}": {
        const length = this.readLong();
        const hash = this.register(new MarshalHash());
        for (let i = 0; i < length; i++) {
          const key = this.readValue();
          hash.entries.push([key, this.readValue()]);
        }
        if (type === "}") {
          hash.defaultValue = this.readValue();
        }
        return hash;
      }
      case "@": {
        const index = this.readLong();
        if (index >= this.objects.length) {
          throw new MarshalError(`dump format error (unlinked index ${index})`);
        }
        return this.objects[index] ?? null;
      }
      case "I": {
        const value = this.readValue();
        const ivars = this.readIvars();
        if (value instanceof MarshalObject) {
          for (const [name, ivar] of ivars) value.ivars.set(name, ivar);
        }
        return value;
      }
      case "o": {
        const object = this.register(new MarshalObject(this.readSymbolName()));
        for (const [name, ivar] of this.readIvars()) object.ivars.set(name, ivar);
        return object;
      }
      case "S": {
        const struct = this.register(new MarshalObject(this.readSymbolName()));
        const count = this.readLong();
        for (let i = 0; i < count; i++) {
          const member = this.readSymbolName();
          struct.ivars.set(member, this.readValue());
        }
        return struct;
      }
      case "u": {
        const className = this.readSymbolName();
        return this.register(new MarshalUserDump(className, Buffer.from(this.readBytes())));
      }
      case "U": {
        const userMarshal = this.register(new MarshalUserMarshal(this.readSymbolName()));
        userMarshal.data = this.readValue();
        return userMarshal;
      }
      case "e":
        // Extended by a module: the module does not change the data
        this.readSymbolName();
        return this.readValue();
      case "C":
        // Subclass of String/Array/Hash: keep the underlying value
        this.readSymbolName();
        return this.readValue();
      default:
        throw new MarshalError(
          `dump format error (unsupported type 0x${type.charCodeAt(0).toString(16)} at offset ${this.offset - 1})`
        );
    }
  }
}

/**
 * Decode one Marshal-encoded value. Bytes after the value are ignored.
 */
export function loadMarshal(data: Buffer): MarshalValue {
  const reader = new MarshalReader(data);
  reader.readHeader();
  return reader.readValue();
}
