export { createCodec } from "./codec.js";
export type { Codec, CodecOptions } from "./codec.js";
export { ExtensionCodec, BuiltinTypeId } from "./extension-codec.js";
export type { WireExtensionNode, WireExtra } from "./extension-codec.js";
export {
  writeFrame,
  readFrame,
  WIRE_MAGIC,
  FORMAT_VERSION,
  MIN_SUPPORTED_VERSION,
  MAX_SUPPORTED_VERSION,
  HEADER_LENGTH,
} from "./wire-format.js";
export type { Frame } from "./wire-format.js";
