/**
 * Error codes carried by every AgenticError.
 */
export const ErrorCode = {
  AGENTIC_ERROR: "AGENTIC_ERROR",
  VARIANT_MISMATCH: "VARIANT_MISMATCH",
  INVALID_RESPONSE: "INVALID_RESPONSE",
  UNREGISTERED_EXTENSION_VALUE: "UNREGISTERED_EXTENSION_VALUE",
  UNKNOWN_EXTENSION_TYPE: "UNKNOWN_EXTENSION_TYPE",
  CORRUPT_PAYLOAD: "CORRUPT_PAYLOAD",
  UNSUPPORTED_VERSION: "UNSUPPORTED_VERSION",
  REGISTRATION_CONFLICT: "REGISTRATION_CONFLICT",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
