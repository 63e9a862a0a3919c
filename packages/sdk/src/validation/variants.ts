/**
 * Runtime checks for the single-populated-variant invariant.
 *
 * The TypeScript unions already rule out mixed variants for values built in
 * typed code. These checks cover everything else: decoded payloads, values
 * assembled from `unknown`, and objects that went through a cast.
 */

import { VariantMismatchError } from "../errors/base.js";
import {
  CONTENT_BLOCK_PAYLOAD_KEYS,
  CONTENT_BLOCK_TYPES,
  ROLE_TYPES,
  TOOL_CALL_OUTPUT_TYPES,
  type ContentBlock,
  type ContentBlockToolCallOutput,
} from "../types/content.js";
import { INPUT_PART_TYPES, OUTPUT_PART_TYPES } from "../types/parts.js";
import type { AgenticResponse } from "../types/response.js";

const BLOCK_PAYLOAD_KEYS = Object.values(CONTENT_BLOCK_PAYLOAD_KEYS);

const TOOL_OUTPUT_PAYLOAD_KEYS = {
  custom_tool_call_output: "customTool",
  mcp_tool_call_output: "mcpTool",
} as const;

const MESSAGE_CONTENT_KEYS = ["inputText", "userInputMultiContent", "assistantGenMultiContent"] as const;

/** True for non-null, non-array objects. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(options: readonly T[], value: unknown): value is T {
  return options.some((option) => option === value);
}

/**
 * Check that `record` has exactly one of `candidates` set, and that it is
 * `expected`. Returns the payload under that key.
 */
function requireSinglePayload(
  record: Record<string, unknown>,
  candidates: readonly string[],
  expected: string,
  tag: string,
  path: string,
): Record<string, unknown> {
  const populated = candidates.filter((key) => record[key] !== undefined);
  if (populated.length !== 1 || populated[0] !== expected) {
    const found = populated.length === 0 ? "none" : populated.join(", ");
    throw new VariantMismatchError(path, `type "${tag}" requires exactly "${expected}", found: ${found}`);
  }
  const payload = record[expected];
  if (!isRecord(payload)) {
    throw new VariantMismatchError(`${path}.${expected}`, "payload must be an object");
  }
  return payload;
}

function validateParts(
  value: unknown,
  allowed: readonly string[],
  path: string,
): void {
  if (!Array.isArray(value)) {
    throw new VariantMismatchError(path, "parts must be an array");
  }
  value.forEach((part, i) => {
    const partPath = `${path}[${i}]`;
    if (!isRecord(part) || !isOneOf(allowed, part.type)) {
      throw new VariantMismatchError(partPath, `part type must be one of: ${allowed.join(", ")}`);
    }
    requireSinglePayload(part, INPUT_PART_TYPES, part.type, part.type, partPath);
  });
}

function validateMessage(message: Record<string, unknown>, path: string): void {
  if (!isOneOf(ROLE_TYPES, message.role)) {
    throw new VariantMismatchError(`${path}.role`, `role must be one of: ${ROLE_TYPES.join(", ")}`);
  }
  const populated = MESSAGE_CONTENT_KEYS.filter((key) => message[key] !== undefined);
  if (populated.length !== 1) {
    throw new VariantMismatchError(
      path,
      `message requires exactly one of ${MESSAGE_CONTENT_KEYS.join(", ")}, found: ${populated.join(", ") || "none"}`,
    );
  }
  if (message.userInputMultiContent !== undefined) {
    validateParts(message.userInputMultiContent, INPUT_PART_TYPES, `${path}.userInputMultiContent`);
  }
  if (message.assistantGenMultiContent !== undefined) {
    validateParts(message.assistantGenMultiContent, OUTPUT_PART_TYPES, `${path}.assistantGenMultiContent`);
  }
}

/** Assert that a tool call output carries exactly the payload its type names. */
export function validateToolCallOutput(
  value: unknown,
  path = "toolCallOutput",
): asserts value is ContentBlockToolCallOutput {
  if (!isRecord(value) || !isOneOf(TOOL_CALL_OUTPUT_TYPES, value.type)) {
    throw new VariantMismatchError(path, `type must be one of: ${TOOL_CALL_OUTPUT_TYPES.join(", ")}`);
  }
  requireSinglePayload(
    value,
    Object.values(TOOL_OUTPUT_PAYLOAD_KEYS),
    TOOL_OUTPUT_PAYLOAD_KEYS[value.type],
    value.type,
    path,
  );
}

/** Assert that a value is a well-formed ContentBlock. Throws VariantMismatchError. */
export function validateContentBlock(value: unknown, path = "block"): asserts value is ContentBlock {
  if (!isRecord(value) || !isOneOf(CONTENT_BLOCK_TYPES, value.type)) {
    throw new VariantMismatchError(path, `type must be one of: ${CONTENT_BLOCK_TYPES.join(", ")}`);
  }
  const key = CONTENT_BLOCK_PAYLOAD_KEYS[value.type];
  const payload = requireSinglePayload(value, BLOCK_PAYLOAD_KEYS, key, value.type, path);

  switch (value.type) {
    case "message":
      validateMessage(payload, `${path}.${key}`);
      break;
    case "tool_call_output":
      validateToolCallOutput(payload, `${path}.${key}`);
      break;
    default:
      break;
  }
}

export function validateResponse(response: AgenticResponse): void {
  for (const [i, block] of response.blocks.entries()) {
    validateContentBlock(block, `blocks[${i}]`);
  }
}
