/**
 * Extension maps and the contract for typed values stored in them.
 */

import type { z } from "zod";

/** Open, caller-extensible metadata attached to many content entities. */
export type Extra = Record<string, unknown>;

/** Constructor of the class an extension type stands for. */
export type ExtensionClass<T> = abstract new (...args: never[]) => T;

/**
 * Describes how a concrete value type survives an encode/decode round trip.
 *
 * `encode` turns the value into plain data (which may itself hold other
 * registered values); `payload` validates that data again before `decode`
 * rebuilds the value.
 */
export interface ExtensionType<T = unknown, P = unknown> {
  /** Stable name written to the wire, e.g. "openai.output-status". */
  readonly typeId: string;
  /** Class the descriptor stands for, when there is one. */
  readonly ctor?: ExtensionClass<T>;
  readonly payload: z.ZodType<P>;
  is(value: unknown): value is T;
  encode(value: T): P;
  decode(payload: P): T;
}

/**
 * Registry of extension types shared by the codecs that hold it.
 * Implementation lives in packages/core.
 */
export interface ITypeRegistry {
  /**
   * Bind a descriptor to its typeId.
   * @throws RegistrationConflictError if the id is taken by another type, the
   * class is already bound to another id, the id is reserved, or the registry is sealed
   */
  register(type: ExtensionType): void;

  /** @throws UnknownExtensionTypeError if nothing is registered under typeId */
  lookup(typeId: string): ExtensionType;

  has(typeId: string): boolean;

  /**
   * Reverse lookup. A class instance resolves to the nearest registered
   * class on its prototype chain; other values to the first class-less
   * descriptor whose guard accepts them.
   */
  resolve(value: unknown): ExtensionType | undefined;

  list(): ExtensionType[];

  /** End the registration phase. Later register() calls throw. */
  seal(): void;

  readonly sealed: boolean;
}

/** Identity helper that lets TypeScript infer T and P for a structural descriptor. */
export function defineExtensionType<T, P>(type: ExtensionType<T, P>): ExtensionType<T, P> {
  return type;
}

/** Build a descriptor for instances of a class. */
export function defineClassType<T, P>(
  typeId: string,
  ctor: ExtensionClass<T>,
  codec: {
    payload: z.ZodType<P>;
    encode(value: T): P;
    decode(payload: P): T;
  },
): ExtensionType<T, P> {
  return {
    typeId,
    ctor,
    payload: codec.payload,
    is: (value: unknown): value is T => value instanceof ctor,
    encode: (value) => codec.encode(value),
    decode: (payload) => codec.decode(payload),
  };
}
