/**
 * Marshal module
 *
 * Decoding of the binary serialisation used by gem registries.
 */

export { loadMarshal, MarshalError } from "./reader";
export { toPlain, type PlainValue } from "./plain";
export {
  MarshalHash,
  MarshalObject,
  MarshalSymbol,
  MarshalUserDump,
  MarshalUserMarshal,
  type MarshalValue,
} from "./marshal.types";
