import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import {
  defineClassType,
  defineExtensionType,
  RegistrationConflictError,
  UnknownExtensionTypeError,
} from "@agentic-wire/sdk";
import { ProviderStatus, dateType, providerStatusType } from "@agentic-wire/sdk/testing";
import { TypeRegistry, createTypeRegistry } from "../type-registry.js";

class Animal {
  constructor(public readonly name: string) {}
}

class Dog extends Animal {
  bark(): string {
    return `${this.name}: woof`;
  }
}

class Puppy extends Dog {}

const animalType = defineClassType("test.animal", Animal, {
  payload: z.object({ name: z.string() }),
  encode: (animal) => ({ name: animal.name }),
  decode: ({ name }) => new Animal(name),
});

const dogType = defineClassType("test.dog", Dog, {
  payload: z.object({ name: z.string() }),
  encode: (dog) => ({ name: dog.name }),
  decode: ({ name }) => new Dog(name),
});

describe("TypeRegistry", () => {
  it("registers and looks up a type by id", () => {
    const registry = new TypeRegistry();
    registry.register(providerStatusType);

    expect(registry.has("test.provider-status")).toBe(true);
    expect(registry.lookup("test.provider-status")).toBe(providerStatusType);
  });

  it("throws UnknownExtensionTypeError for an unregistered id", () => {
    const registry = new TypeRegistry();
    expect(() => registry.lookup("test.missing")).toThrow(UnknownExtensionTypeError);
    expect(() => registry.lookup("test.missing")).toThrow('Unknown extension type "test.missing"');
  });

  it("treats re-registering the same descriptor as a no-op", () => {
    const registry = new TypeRegistry();
    registry.register(providerStatusType);
    registry.register(providerStatusType);
    expect(registry.list()).toEqual([providerStatusType]);
  });

  it("treats a second descriptor for the same class and id as the same type", () => {
    const registry = new TypeRegistry();
    const again = defineClassType("test.provider-status", ProviderStatus, {
      payload: z.object({ state: z.enum(["in_progress", "completed", "failed"]), providerId: z.string() }),
      encode: (s) => ({ state: s.state, providerId: s.providerId }),
      decode: (p) => new ProviderStatus(p.state, p.providerId),
    });

    registry.register(providerStatusType);
    expect(() => registry.register(again)).not.toThrow();
    expect(registry.lookup("test.provider-status")).toBe(providerStatusType);
  });

  it("rejects a different type under a taken id", () => {
    const registry = new TypeRegistry();
    registry.register(providerStatusType);
    const impostor = defineClassType("test.provider-status", Date, {
      payload: z.string(),
      encode: (d) => d.toISOString(),
      decode: (s) => new Date(s),
    });

    expect(() => registry.register(impostor)).toThrow(RegistrationConflictError);
    expect(registry.lookup("test.provider-status")).toBe(providerStatusType);
  });

  it("rejects the same class under a second id", () => {
    const registry = new TypeRegistry();
    registry.register(dateType);
    const alias = defineClassType("test.timestamp", Date, {
      payload: z.string(),
      encode: (d) => d.toISOString(),
      decode: (s) => new Date(s),
    });

    expect(() => registry.register(alias)).toThrow('class Date is already registered as "test.date"');
    expect(registry.has("test.timestamp")).toBe(false);
  });

  it("rejects ids in the reserved std. namespace", () => {
    const registry = new TypeRegistry();
    const reserved = defineExtensionType({
      typeId: "std.bigint",
      payload: z.string(),
      is: (value: unknown): value is bigint => typeof value === "bigint",
      encode: (value: bigint) => value.toString(),
      decode: (payload: string) => BigInt(payload),
    });

    expect(() => registry.register(reserved)).toThrow(RegistrationConflictError);
  });

  it("rejects an empty id", () => {
    const registry = new TypeRegistry();
    const blank = defineExtensionType({
      typeId: "  ",
      payload: z.string(),
      is: (value: unknown): value is symbol => typeof value === "symbol",
      encode: (value: symbol) => value.description ?? "",
      decode: (payload: string) => Symbol(payload),
    });

    expect(() => registry.register(blank)).toThrow("typeId must be a non-empty string");
  });

  it("refuses registration once sealed but keeps serving lookups", () => {
    const registry = new TypeRegistry("sealed-test");
    registry.register(providerStatusType);
    registry.seal();

    expect(registry.sealed).toBe(true);
    expect(() => registry.register(dateType)).toThrow('registry "sealed-test" is sealed');
    expect(registry.lookup("test.provider-status")).toBe(providerStatusType);
  });

  it("resolves class instances by their own registered class", () => {
    const registry = createTypeRegistry([providerStatusType, dateType]);

    expect(registry.resolve(new ProviderStatus("completed", "p1"))).toBe(providerStatusType);
    expect(registry.resolve(new Date(0))).toBe(dateType);
    expect(registry.resolve({ state: "completed", providerId: "p1" })).toBeUndefined();
    expect(registry.resolve("text")).toBeUndefined();
  });

  it("resolves a subclass to its own type even when the base was registered first", () => {
    const registry = createTypeRegistry([animalType, dogType]);

    expect(registry.resolve(new Dog("rex"))).toBe(dogType);
    expect(registry.resolve(new Animal("cat"))).toBe(animalType);
    expect(registry.resolve(new Puppy("bit"))).toBe(dogType);
  });

  it("falls back to guards for descriptors without a class", () => {
    const bigintType = defineExtensionType({
      typeId: "test.bigint",
      payload: z.string(),
      is: (value: unknown): value is bigint => typeof value === "bigint",
      encode: (value: bigint) => value.toString(),
      decode: (payload: string) => BigInt(payload),
    });
    const registry = createTypeRegistry([animalType, bigintType]);

    expect(registry.resolve(7n)).toBe(bigintType);
    expect(registry.resolve(new Dog("rex"))).toBe(animalType);
  });

  it("tags its log lines with the registry id", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    vi.stubEnv("LOG_FORMAT", "json");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    try {
      const registry = new TypeRegistry("audit");
      registry.register(providerStatusType);

      expect(spy).toHaveBeenCalledTimes(1);
      const entry = JSON.parse(String(spy.mock.calls[0][0]));
      expect(entry).toMatchObject({
        level: "debug",
        module: "TypeRegistry:audit",
        message: "Registered extension type: test.provider-status",
        registry_id: "audit",
      });
    } finally {
      spy.mockRestore();
      vi.unstubAllEnvs();
    }
  });

  it("keeps independent registries isolated", () => {
    const a = createTypeRegistry([providerStatusType]);
    const b = createTypeRegistry();

    expect(a.has("test.provider-status")).toBe(true);
    expect(b.has("test.provider-status")).toBe(false);
  });
});
