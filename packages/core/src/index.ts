// Type registry
export { TypeRegistry, createTypeRegistry, RESERVED_TYPE_PREFIX } from "./infrastructure/index.js";

// Codec
export {
  createCodec,
  ExtensionCodec,
  BuiltinTypeId,
  writeFrame,
  readFrame,
  WIRE_MAGIC,
  FORMAT_VERSION,
  MIN_SUPPORTED_VERSION,
  MAX_SUPPORTED_VERSION,
  HEADER_LENGTH,
} from "./codec/index.js";
export type { Codec, CodecOptions, WireExtensionNode, WireExtra, Frame } from "./codec/index.js";
