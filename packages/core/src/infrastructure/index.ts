export { TypeRegistry, createTypeRegistry, RESERVED_TYPE_PREFIX } from "./type-registry.js";
