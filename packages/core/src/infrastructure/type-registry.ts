/**
 * TypeRegistry — maps stable type ids to extension type descriptors.
 */

import type { ExtensionClass, ExtensionType, ITypeRegistry } from "@agentic-wire/sdk";
import { RegistrationConflictError, UnknownExtensionTypeError } from "@agentic-wire/sdk";
import { createLogger, type Logger } from "@agentic-wire/shared";

const moduleLogger = createLogger("TypeRegistry");

/** Namespace of the built-in encodings (strings, numbers, lists, maps...). */
export const RESERVED_TYPE_PREFIX = "std.";

/**
 * In-memory registry of extension types.
 *
 * Register types during start-up, then seal() it; lookups are plain map
 * reads and never mutate state.
 */
export class TypeRegistry implements ITypeRegistry {
  private readonly types = new Map<string, ExtensionType>();
  private readonly classes = new Map<ExtensionClass<unknown>, string>();
  /** Class prototypes of registered types, for nearest-class resolution. */
  private readonly prototypes = new Map<object, string>();
  private readonly logger: Logger;
  private isSealed = false;

  constructor(private readonly name = "default") {
    this.logger = moduleLogger.child(name);
    this.logger.setContext({ registryId: name });
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  /**
   * Bind a descriptor to its typeId. Registering the same descriptor (or
   * another descriptor for the same class) under the same id again is a no-op.
   *
   * @throws RegistrationConflictError
   */
  register(type: ExtensionType): void {
    const { typeId } = type;

    if (this.isSealed) {
      throw new RegistrationConflictError(typeId, `registry "${this.name}" is sealed`);
    }
    if (typeof typeId !== "string" || typeId.trim() === "") {
      throw new RegistrationConflictError(String(typeId), "typeId must be a non-empty string");
    }
    if (typeId.startsWith(RESERVED_TYPE_PREFIX)) {
      throw new RegistrationConflictError(typeId, `the "${RESERVED_TYPE_PREFIX}" namespace is reserved for built-in encodings`);
    }

    const existing = this.types.get(typeId);
    if (existing) {
      if (existing === type || (existing.ctor !== undefined && existing.ctor === type.ctor)) {
        this.logger.debug(`Extension type already registered: ${typeId}`);
        return;
      }
      throw new RegistrationConflictError(typeId, "the id is already bound to a different type");
    }

    if (type.ctor) {
      const boundId = this.classes.get(type.ctor);
      if (boundId !== undefined) {
        throw new RegistrationConflictError(
          typeId,
          `class ${type.ctor.name} is already registered as "${boundId}"`,
        );
      }
      this.classes.set(type.ctor, typeId);
      this.prototypes.set(type.ctor.prototype, typeId);
    }

    this.types.set(typeId, type);
    this.logger.debug(`Registered extension type: ${typeId}`);
  }

  /** @throws UnknownExtensionTypeError */
  lookup(typeId: string): ExtensionType {
    const type = this.types.get(typeId);
    if (!type) {
      throw new UnknownExtensionTypeError(typeId);
    }
    return type;
  }

  has(typeId: string): boolean {
    return this.types.has(typeId);
  }

  /**
   * Reverse lookup. Objects resolve to the nearest registered class on their
   * prototype chain, so a registered subclass wins over its registered base
   * whatever the registration order. Descriptors without a class are then
   * tried by guard, in registration order.
   */
  resolve(value: unknown): ExtensionType | undefined {
    if (typeof value === "object" && value !== null) {
      const byClass = this.resolveByClass(value);
      if (byClass) return byClass;
    }
    for (const type of this.types.values()) {
      if (type.ctor === undefined && type.is(value)) return type;
    }
    return undefined;
  }

  private resolveByClass(value: object): ExtensionType | undefined {
    let proto: object | null = Object.getPrototypeOf(value);
    while (proto !== null) {
      const typeId = this.prototypes.get(proto);
      if (typeId !== undefined) return this.types.get(typeId);
      proto = Object.getPrototypeOf(proto);
    }
    return undefined;
  }

  list(): ExtensionType[] {
    return Array.from(this.types.values());
  }

  seal(): void {
    if (!this.isSealed) {
      this.isSealed = true;
      this.logger.debug(`Sealed registry with ${this.types.size} type(s)`);
    }
  }
}

/**
 * Create a registry, optionally pre-loaded with types.
 *
 * @param types - Descriptors to register immediately
 * @param name - Label used in log lines and errors
 */
export function createTypeRegistry(types: ExtensionType[] = [], name?: string): ITypeRegistry {
  const registry = new TypeRegistry(name);
  for (const type of types) {
    registry.register(type);
  }
  return registry;
}
