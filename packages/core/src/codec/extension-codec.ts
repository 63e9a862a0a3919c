/**
 * Encoding of extension-map values as `{ t: typeId, v: payload }` nodes.
 *
 * Built-in ids cover JSON scalars, undefined, arrays and plain objects and
 * need no registration. Everything else must resolve through the registry;
 * a registered type's encoded form is itself encoded as a node, so typed
 * values may nest inside one another.
 */

import { z } from "zod";
import {
  CorruptPayloadError,
  UnknownExtensionTypeError,
  UnregisteredExtensionValueError,
  isRecord,
  type Extra,
  type ITypeRegistry,
} from "@agentic-wire/sdk";
import { formatZodError } from "@agentic-wire/shared";
import { RESERVED_TYPE_PREFIX } from "../infrastructure/type-registry.js";

export const BuiltinTypeId = {
  STRING: "std.string",
  NUMBER: "std.number",
  BOOLEAN: "std.boolean",
  NULL: "std.null",
  UNDEFINED: "std.undefined",
  LIST: "std.list",
  MAP: "std.map",
} as const;

/** One extension value on the wire. `v` is absent for std.null and std.undefined. */
export interface WireExtensionNode {
  t: string;
  v?: unknown;
}

export type WireExtra = Record<string, WireExtensionNode>;

const NodeSchema = z.object({ t: z.string().min(1), v: z.unknown() });

/** std.number payloads for the values JSON has no literal for. */
const SPECIAL_NUMBERS = {
  NaN: Number.NaN,
  Infinity: Number.POSITIVE_INFINITY,
  "-Infinity": Number.NEGATIVE_INFINITY,
  "-0": -0,
} as const;

type SpecialNumber = keyof typeof SPECIAL_NUMBERS;

const NumberPayloadSchema = z.union([z.number(), z.enum(["NaN", "Infinity", "-Infinity", "-0"])]);

function encodeNumber(value: number): number | SpecialNumber {
  if (Number.isNaN(value)) return "NaN";
  if (Object.is(value, -0)) return "-0";
  if (value === Number.POSITIVE_INFINITY) return "Infinity";
  if (value === Number.NEGATIVE_INFINITY) return "-Infinity";
  return value;
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "Object";
  if (typeof value === "number") return `number ${String(value)}`;
  return typeof value;
}

export class ExtensionCodec {
  constructor(
    private readonly registry: ITypeRegistry,
    private readonly maxDepth: number,
  ) {}

  encodeExtra(extra: Extra, path: string): WireExtra {
    return Object.fromEntries(
      Object.entries(extra).map(([key, value]) => [key, this.encodeValue(value, `${path}.${key}`, 1, [])]),
    );
  }

  decodeExtra(extra: Record<string, unknown>, path: string): Extra {
    return Object.fromEntries(
      Object.entries(extra).map(([key, node]) => [key, this.decodeValue(node, `${path}.${key}`, 1)]),
    );
  }

  /** @param ancestors - Objects currently being encoded above this value, for cycle detection */
  private encodeValue(value: unknown, path: string, depth: number, ancestors: object[]): WireExtensionNode {
    if (depth > this.maxDepth) {
      throw new UnregisteredExtensionValueError(path, describeValue(value), `is nested deeper than ${this.maxDepth} levels`);
    }

    switch (typeof value) {
      case "string":
        return { t: BuiltinTypeId.STRING, v: value };
      case "boolean":
        return { t: BuiltinTypeId.BOOLEAN, v: value };
      case "undefined":
        return { t: BuiltinTypeId.UNDEFINED };
      case "number":
        return { t: BuiltinTypeId.NUMBER, v: encodeNumber(value) };
      default:
        if (value === null) {
          return { t: BuiltinTypeId.NULL };
        }
    }

    const registered = this.registry.resolve(value);
    if (registered) {
      let payload: unknown;
      try {
        payload = registered.encode(value);
      } catch (err) {
        throw new UnregisteredExtensionValueError(
          path,
          describeValue(value),
          `could not be encoded as "${registered.typeId}"`,
          { cause: err },
        );
      }
      return {
        t: registered.typeId,
        v: this.encodeValue(payload, `${path}<${registered.typeId}>`, depth + 1, ancestors),
      };
    }

    if (typeof value === "object" && value !== null && (Array.isArray(value) || isPlainObject(value))) {
      if (ancestors.includes(value)) {
        throw new UnregisteredExtensionValueError(path, describeValue(value), "contains a reference cycle");
      }
      const inner = [...ancestors, value];
      if (Array.isArray(value)) {
        return {
          t: BuiltinTypeId.LIST,
          v: Array.from(value, (item: unknown, i) => this.encodeValue(item, `${path}[${i}]`, depth + 1, inner)),
        };
      }
      return {
        t: BuiltinTypeId.MAP,
        v: Object.fromEntries(
          Object.entries(value).map(([key, item]) => [key, this.encodeValue(item, `${path}.${key}`, depth + 1, inner)]),
        ),
      };
    }

    throw new UnregisteredExtensionValueError(path, describeValue(value));
  }

  private decodeValue(raw: unknown, path: string, depth: number): unknown {
    if (depth > this.maxDepth) {
      throw new CorruptPayloadError(`extension value at ${path} is nested deeper than ${this.maxDepth} levels`);
    }
    const parsed = NodeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptPayloadError(`malformed extension node at ${path}: ${formatZodError(parsed.error)}`);
    }
    const { t: typeId, v: payload } = parsed.data;

    switch (typeId) {
      case BuiltinTypeId.STRING:
        return this.expect(z.string(), payload, path);
      case BuiltinTypeId.NUMBER: {
        const number = this.expect(NumberPayloadSchema, payload, path);
        return typeof number === "number" ? number : SPECIAL_NUMBERS[number];
      }
      case BuiltinTypeId.BOOLEAN:
        return this.expect(z.boolean(), payload, path);
      case BuiltinTypeId.NULL:
        return null;
      case BuiltinTypeId.UNDEFINED:
        return undefined;
      case BuiltinTypeId.LIST:
        return this.expect(z.array(z.unknown()), payload, path).map((item, i) =>
          this.decodeValue(item, `${path}[${i}]`, depth + 1),
        );
      case BuiltinTypeId.MAP:
        if (!isRecord(payload)) {
          throw new CorruptPayloadError(`extension value at ${path} should be a map`);
        }
        return Object.fromEntries(
          Object.entries(payload).map(([key, item]) => [key, this.decodeValue(item, `${path}.${key}`, depth + 1)]),
        );
      default:
        return this.decodeRegistered(typeId, payload, path, depth);
    }
  }

  private decodeRegistered(typeId: string, payload: unknown, path: string, depth: number): unknown {
    if (typeId.startsWith(RESERVED_TYPE_PREFIX)) {
      throw new CorruptPayloadError(`unknown built-in type "${typeId}" at ${path}`);
    }
    if (!this.registry.has(typeId)) {
      throw new UnknownExtensionTypeError(typeId, path);
    }
    const type = this.registry.lookup(typeId);
    const data = this.decodeValue(payload, `${path}<${typeId}>`, depth + 1);
    const checked = type.payload.safeParse(data);
    if (!checked.success) {
      throw new CorruptPayloadError(
        `payload of "${typeId}" at ${path} is invalid: ${formatZodError(checked.error)}`,
      );
    }
    try {
      return type.decode(checked.data);
    } catch (err) {
      throw new CorruptPayloadError(`decoder for "${typeId}" at ${path} failed`, { cause: err });
    }
  }

  private expect<T>(schema: z.ZodType<T>, payload: unknown, path: string): T {
    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new CorruptPayloadError(`extension value at ${path}: ${formatZodError(result.error)}`);
    }
    return result.data;
  }
}
