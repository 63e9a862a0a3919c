/**
 * Error hierarchy for the content model, type registry and codec.
 */

import { ErrorCode } from "./codes.js";

export class AgenticError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AgenticError";
  }
}

/** A union's type tag does not match the single populated payload field. */
export class VariantMismatchError extends AgenticError {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(`Variant mismatch at ${path}: ${message}`, ErrorCode.VARIANT_MISMATCH);
    this.name = "VariantMismatchError";
  }
}

/** A response holds a value the wire format cannot carry, such as a fractional index. */
export class InvalidResponseError extends AgenticError {
  constructor(message: string) {
    super(`Invalid response: ${message}`, ErrorCode.INVALID_RESPONSE);
    this.name = "InvalidResponseError";
  }
}

/** An extension value has no registered type and no built-in encoding. */
export class UnregisteredExtensionValueError extends AgenticError {
  constructor(
    public readonly path: string,
    public readonly valueType: string,
    reason = "has no registered extension type",
    options?: { cause?: unknown },
  ) {
    super(`Extension value at ${path} (${valueType}) ${reason}`, ErrorCode.UNREGISTERED_EXTENSION_VALUE, options);
    this.name = "UnregisteredExtensionValueError";
  }
}

/** A typeId read from the wire (or passed to lookup) is not registered. */
export class UnknownExtensionTypeError extends AgenticError {
  constructor(
    public readonly typeId: string,
    public readonly path?: string,
  ) {
    super(
      path
        ? `Unknown extension type "${typeId}" at ${path}`
        : `Unknown extension type "${typeId}"`,
      ErrorCode.UNKNOWN_EXTENSION_TYPE,
    );
    this.name = "UnknownExtensionTypeError";
  }
}

export class CorruptPayloadError extends AgenticError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Corrupt payload: ${message}`, ErrorCode.CORRUPT_PAYLOAD, options);
    this.name = "CorruptPayloadError";
  }
}

export class UnsupportedVersionError extends AgenticError {
  constructor(
    public readonly version: number,
    public readonly minSupported: number,
    public readonly maxSupported: number,
  ) {
    super(
      `Unsupported format version ${version} (supported: ${minSupported}..${maxSupported})`,
      ErrorCode.UNSUPPORTED_VERSION,
    );
    this.name = "UnsupportedVersionError";
  }
}

export class RegistrationConflictError extends AgenticError {
  constructor(
    public readonly typeId: string,
    message: string,
  ) {
    super(`Cannot register extension type "${typeId}": ${message}`, ErrorCode.REGISTRATION_CONFLICT);
    this.name = "RegistrationConflictError";
  }
}

export class ConfigError extends AgenticError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}
