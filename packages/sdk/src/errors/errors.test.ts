import { describe, it, expect } from "vitest";
import {
  AgenticError,
  ConfigError,
  CorruptPayloadError,
  InvalidResponseError,
  RegistrationConflictError,
  UnknownExtensionTypeError,
  UnregisteredExtensionValueError,
  UnsupportedVersionError,
  VariantMismatchError,
} from "./base.js";
import { ErrorCode } from "./codes.js";

describe("Error System", () => {
  describe("AgenticError", () => {
    it("should preserve cause when provided", () => {
      const rootCause = new Error("root cause");
      const err = new AgenticError("test error", "TEST_CODE", { cause: rootCause });
      expect(err.cause).toBe(rootCause);
      expect(err.code).toBe("TEST_CODE");
      expect(err.message).toBe("test error");
    });

    it("should work without cause", () => {
      const err = new AgenticError("test error", "TEST_CODE");
      expect(err.cause).toBeUndefined();
    });
  });

  it("VariantMismatchError carries the path", () => {
    const err = new VariantMismatchError("blocks[0]", "bad tag");
    expect(err).toBeInstanceOf(AgenticError);
    expect(err.name).toBe("VariantMismatchError");
    expect(err.code).toBe(ErrorCode.VARIANT_MISMATCH);
    expect(err.path).toBe("blocks[0]");
    expect(err.message).toBe("Variant mismatch at blocks[0]: bad tag");
  });

  it("UnregisteredExtensionValueError names the value type", () => {
    const err = new UnregisteredExtensionValueError("extra.when", "Map");
    expect(err.valueType).toBe("Map");
    expect(err.code).toBe(ErrorCode.UNREGISTERED_EXTENSION_VALUE);
    expect(err.message).toBe("Extension value at extra.when (Map) has no registered extension type");
  });

  it("InvalidResponseError prefixes its message", () => {
    const err = new InvalidResponseError("usage.inputTokens: Number must be greater than or equal to 0");
    expect(err.name).toBe("InvalidResponseError");
    expect(err.code).toBe(ErrorCode.INVALID_RESPONSE);
    expect(err.message).toBe("Invalid response: usage.inputTokens: Number must be greater than or equal to 0");
  });

  it("UnregisteredExtensionValueError keeps the cause of a failed encoder", () => {
    const cause = new TypeError("boom");
    const err = new UnregisteredExtensionValueError("extra.k", "Opaque", 'could not be encoded as "test.x"', { cause });
    expect(err.cause).toBe(cause);
    expect(err.message).toBe('Extension value at extra.k (Opaque) could not be encoded as "test.x"');
  });

  it("UnknownExtensionTypeError includes the path only when known", () => {
    expect(new UnknownExtensionTypeError("acme.x").message).toBe('Unknown extension type "acme.x"');
    expect(new UnknownExtensionTypeError("acme.x", "extra.k").message).toBe('Unknown extension type "acme.x" at extra.k');
  });

  it("CorruptPayloadError prefixes its message", () => {
    const cause = new SyntaxError("Unexpected end of JSON input");
    const err = new CorruptPayloadError("body is not valid UTF-8 JSON", { cause });
    expect(err.message).toBe("Corrupt payload: body is not valid UTF-8 JSON");
    expect(err.code).toBe(ErrorCode.CORRUPT_PAYLOAD);
    expect(err.cause).toBe(cause);
  });

  it("UnsupportedVersionError reports the supported range", () => {
    const err = new UnsupportedVersionError(7, 1, 2);
    expect(err.message).toBe("Unsupported format version 7 (supported: 1..2)");
    expect(err.version).toBe(7);
  });

  it("RegistrationConflictError names the type id", () => {
    const err = new RegistrationConflictError("acme.x", "already taken");
    expect(err.message).toBe('Cannot register extension type "acme.x": already taken');
    expect(err.code).toBe(ErrorCode.REGISTRATION_CONFLICT);
  });

  it("ConfigError defaults its code and accepts an override", () => {
    expect(new ConfigError("bad").code).toBe(ErrorCode.CONFIG_ERROR);
    expect(new ConfigError("bad", { code: ErrorCode.CONFIG_VALIDATION_ERROR }).code).toBe("CONFIG_VALIDATION_ERROR");
  });
});
