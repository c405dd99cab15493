/**
 * Test utilities - Marshal 4.8 writer for building registry fixtures
 *
 * Writes the subset of the format that registries emit: nil, booleans,
 * fixnums, UTF-8 strings, symbols (with symbol links), arrays, hashes,
 * plain objects and marshal_dump / _dump objects.
 */

import { deflateSync, gzipSync } from "zlib";

export type Dumpable =
  | null
  | boolean
  | number
  | string
  | Dumpable[]
  | { $: "symbol"; name: string }
  | { $: "hash"; entries: Array<[Dumpable, Dumpable]> }
  | { $: "object"; className: string; ivars: Array<[string, Dumpable]> }
  | { $: "userMarshal"; className: string; data: Dumpable }
  | { $: "userDump"; className: string; bytes: Buffer };

export const sym = (name: string): Dumpable => ({ $: "symbol", name });

export const hash = (entries: Array<[Dumpable, Dumpable]>): Dumpable => ({ $: "hash", entries });

/** Hash keyed by symbols, the shape of dependency API records */
export const symbolHash = (fields: Record<string, Dumpable>): Dumpable =>
  hash(Object.entries(fields).map(([key, value]) => [sym(key), value]));

export const marshalObject = (className: string, ivars: Record<string, Dumpable>): Dumpable => ({
  $: "object",
  className,
  ivars: Object.entries(ivars).map(([name, value]) => [`@${name}`, value]),
});

export const userMarshal = (className: string, data: Dumpable): Dumpable => ({ $: "userMarshal", className, data });

export const userDump = (className: string, bytes: Buffer): Dumpable => ({ $: "userDump", className, bytes });

export const gemVersion = (version: string): Dumpable => userMarshal("Gem::Version", [version]);

class MarshalWriter {
  private readonly chunks: number[] = [4, 8];
  private readonly symbols = new Map<string, number>();

  bytes(): Buffer {
    return Buffer.from(this.chunks);
  }

  private byte(value: number): void {
    this.chunks.push(value & 0xff);
  }

  private long(value: number): void {
    if (!Number.isInteger(value) || Math.abs(value) >= 2 ** 30) {
      throw new Error(`fixnum out of range: ${value}`);
    }
    if (value === 0) {
      this.byte(0);
    } else if (value > 0 && value < 123) {
      this.byte(value + 5);
    } else if (value < 0 && value > -124) {
      this.byte(value - 5);
    } else {
      const out: number[] = [];
      let rest = value;
      for (let i = 1; i <= 4; i++) {
        out.push(rest & 0xff);
        rest >>= 8;
        if (rest === 0) {
          this.byte(i);
          break;
        }
        if (rest === -1) {
          this.byte(-i);
          break;
        }
      }
      out.forEach((b) => this.byte(b));
    }
  }

  private raw(data: Buffer): void {
    this.long(data.length);
    data.forEach((b) => this.byte(b));
  }

  private symbol(name: string): void {
    const index = this.symbols.get(name);
    if (index !== undefined) {
      this.byte(0x3b); // ;
      this.long(index);
      return;
    }
    this.symbols.set(name, this.symbols.size);
    this.byte(0x3a); // :
    this.raw(Buffer.from(name, "utf-8"));
  }

  write(value: Dumpable): void {
    if (value === null) {
      this.byte(0x30); // 0
    } else if (value === true) {
      this.byte(0x54); // T
    } else if (value === false) {
      this.byte(0x46); // F
    } else if (typeof value === "number") {
      this.byte(0x69); // i
      this.long(value);
    } else if (typeof value === "string") {
      // UTF-8 string: I"<bytes> with ivar :E => true
      this.byte(0x49); // I
      this.byte(0x22); // "
      this.raw(Buffer.from(value, "utf-8"));
      this.long(1);
      this.symbol("E");
      this.byte(0x54);
    } else if (Array.isArray(value)) {
      this.byte(0x5b); // [
      this.long(value.length);
      value.forEach((item) => this.write(item));
    } else {
      switch (value.$) {
        case "symbol":
          this.symbol(value.name);
          break;
        case "hash":
          this.byte(0x7b); // {
          this.long(value.entries.length);
          for (const [k, v] of value.entries) {
            this.write(k);
            this.write(v);
          }
          break;
        case "object":
          this.byte(0x6f); // o
          this.symbol(value.className);
          this.long(value.ivars.length);
          for (const [name, ivar] of value.ivars) {
            this.symbol(name);
            this.write(ivar);
          }
          break;
        case "userMarshal":
          this.byte(0x55); // U
          this.symbol(value.className);
          this.write(value.data);
          break;
        case "userDump":
          this.byte(0x75); // u
          this.symbol(value.className);
          this.raw(value.bytes);
          break;
      }
    }
  }
}

export function dumpMarshal(value: Dumpable): Buffer {
  const writer = new MarshalWriter();
  writer.write(value);
  return writer.bytes();
}

/**
 * Dependency API response body for a list of records.
 */
export function dependencyApiBody(
  records: Array<{ name: string; number: string; platform?: string; dependencies?: Array<[string, string]> }>
): Buffer {
  return dumpMarshal(
    records.map((r) =>
      symbolHash({
        name: r.name,
        number: r.number,
        platform: r.platform ?? "ruby",
        dependencies: (r.dependencies ?? []).map(([name, requirement]) => [name, requirement]),
      })
    )
  );
}

/**
 * Gzipped specs.4.8 index for a list of [name, version, platform] triples.
 */
export function fullIndexBody(entries: Array<[string, string, string]>): Buffer {
  return gzipSync(dumpMarshal(entries.map(([name, version, platform]) => [name, gemVersion(version), platform])));
}

/**
 * quick/Marshal.4.8 gemspec payload: a deflated Gem::Specification _dump.
 */
export function gemspecBody(spec: {
  name: string;
  version: string;
  platform?: string;
  dependencies?: Array<{ name: string; requirements: Array<[string, string]>; type?: "runtime" | "development" }>;
}): Buffer {
  const platform = spec.platform ?? "ruby";
  const dependencies = (spec.dependencies ?? []).map((dep) =>
    marshalObject("Gem::Dependency", {
      name: dep.name,
      requirement: userMarshal("Gem::Requirement", [
        dep.requirements.map(([op, version]) => [op, gemVersion(version)]),
      ]),
      type: sym(dep.type ?? "runtime"),
      prerelease: false,
    })
  );
  const fields: Dumpable[] = [
    "3.5.0",
    4,
    spec.name,
    gemVersion(spec.version),
    null,
    "A test gem",
    userMarshal("Gem::Requirement", [[[">=", gemVersion("0")]]]),
    userMarshal("Gem::Requirement", [[[">=", gemVersion("0")]]]),
    platform,
    dependencies,
    "",
    "test@example.com",
    ["Test Author"],
    "",
    "https://example.com",
    true,
    platform,
    ["MIT"],
    hash([]),
  ];
  return deflateSync(dumpMarshal(userDump("Gem::Specification", dumpMarshal(fields))));
}
