/**
 * Value tree produced by the Marshal reader.
 *
 * Strings decode to JS strings and integers/floats to numbers; everything
 * that has no direct JS counterpart gets a small class so callers can tell a
 * symbol from a string and a user-marshalled object from a plain array.
 */

export type MarshalValue =
  | null
  | boolean
  | number
  | string
  | MarshalValue[]
  | MarshalSymbol
  | MarshalHash
  | MarshalObject
  | MarshalUserDump
  | MarshalUserMarshal;

export class MarshalSymbol {
  constructor(readonly name: string) {}
}

export class MarshalHash {
  readonly entries: Array<[MarshalValue, MarshalValue]> = [];
  defaultValue: MarshalValue = null;

  /**
   * Look up by symbol or string key.
   */
  get(key: string): MarshalValue | undefined {
    for (const [k, v] of this.entries) {
      if (k === key || (k instanceof MarshalSymbol && k.name === key)) {
        return v;
      }
    }
    return undefined;
  }
}

/** Plain object ('o') or struct ('S'); ivar names keep their leading "@" */
export class MarshalObject {
  readonly ivars = new Map<string, MarshalValue>();

  constructor(readonly className: string) {}
}

/** Object dumped through `_dump`: raw bytes only the class can interpret */
export class MarshalUserDump {
  constructor(
    readonly className: string,
    readonly bytes: Buffer
  ) {}
}

/** Object dumped through `marshal_dump`: the class plus a nested value */
export class MarshalUserMarshal {
  data: MarshalValue = null;

  constructor(readonly className: string) {}
}
