/**
 * Conversion of Marshal value trees into plain data for schema validation.
 *
 * - symbols become strings, hashes become objects keyed by the key's text
 * - objects become `{ "@class": name, ...ivars }` with the "@" dropped
 * - marshal_dump objects become `{ "@class": name, "@data": value }`
 * - _dump objects become `{ "@class": name, "@bytes": Buffer }`
 */

import type { MarshalValue } from "./marshal.types";
import { MarshalHash, MarshalObject, MarshalSymbol, MarshalUserDump, MarshalUserMarshal } from "./marshal.types";

export type PlainValue = null | boolean | number | string | Buffer | PlainValue[] | { [key: string]: PlainValue };

function keyText(key: MarshalValue): string {
  if (key instanceof MarshalSymbol) return key.name;
  if (typeof key === "string" || typeof key === "number" || typeof key === "boolean") return String(key);
  if (key === null) return "";
  throw new TypeError("hash keys must be symbols, strings or numbers");
}

export function toPlain(value: MarshalValue, seen: Set<object> = new Set()): PlainValue {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (value instanceof MarshalSymbol) {
    return value.name;
  }
  if (seen.has(value)) {
    throw new TypeError("cyclic marshal data cannot be converted");
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => toPlain(item, seen));
    }
    // fromEntries defines own properties, so a "__proto__" key stays data
    if (value instanceof MarshalHash) {
      return Object.fromEntries<PlainValue>(value.entries.map(([k, v]) => [keyText(k), toPlain(v, seen)] as const));
    }
    if (value instanceof MarshalObject) {
      const ivars = [...value.ivars].map(([name, ivar]) => [name.replace(/^@/, ""), toPlain(ivar, seen)] as const);
      return Object.fromEntries<PlainValue>([["@class", value.className], ...ivars]);
    }
    if (value instanceof MarshalUserMarshal) {
      return { "@class": value.className, "@data": toPlain(value.data, seen) };
    }
    if (value instanceof MarshalUserDump) {
      return { "@class": value.className, "@bytes": value.bytes };
    }
    throw new TypeError("unknown marshal value");
  } finally {
    seen.delete(value);
  }
}
