/**
 * Codec — encodes an AgenticResponse to bytes and back without losing the
 * concrete types of extension values.
 */

import { TextDecoder } from "node:util";
import {
  AgenticError,
  ConfigError,
  CorruptPayloadError,
  ErrorCode,
  InvalidResponseError,
  validateContentBlock,
  validateResponse,
  type AgenticMessageInputPart,
  type AgenticMessageOutputPart,
  type AgenticResponse,
  type ContentBlock,
  type ContentBlockMessage,
  type Extra,
  type ITypeRegistry,
} from "@agentic-wire/sdk";
import { CodecConfigSchema, createLogger, formatZodError, validateInput, type Logger } from "@agentic-wire/shared";
import { ExtensionCodec, type WireExtra } from "./extension-codec.js";
import { readFrame, writeFrame } from "./wire-format.js";
import {
  WireResponseSchema,
  type WireContentBlock,
  type WireInputPart,
  type WireMessage,
  type WireOutputPart,
  type WireResponse,
} from "./wire-schema.js";

const defaultLogger = createLogger("Codec");

export interface CodecOptions {
  /** Registry used to encode and resolve extension values. */
  registry: ITypeRegistry;
  /** Deepest nesting allowed inside one extension value. Default: 64 */
  maxDepth?: number;
  logger?: Logger;
}

export interface Codec {
  /**
   * @throws VariantMismatchError if a block breaks the single-variant invariant
   * @throws UnregisteredExtensionValueError if an extension value cannot be encoded
   * @throws InvalidResponseError if a field is outside what the wire format carries
   */
  encode(response: AgenticResponse): Uint8Array;

  /**
   * @throws CorruptPayloadError, UnsupportedVersionError, UnknownExtensionTypeError, VariantMismatchError
   */
  decode(bytes: Uint8Array): AgenticResponse;
}

function compact(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

export function createCodec(options: CodecOptions): Codec {
  const config = validateInput(CodecConfigSchema, { maxDepth: options.maxDepth });
  if (!config.success) {
    throw new ConfigError(`Invalid codec options: ${config.error}`, { code: ErrorCode.CONFIG_VALIDATION_ERROR });
  }

  const logger = options.logger ?? defaultLogger;
  const extensions = new ExtensionCodec(options.registry, config.data.maxDepth);
  const utf8 = new TextDecoder("utf-8", { fatal: true });

  // --- model -> wire ---

  function toWireExtra<T extends { extra?: Extra }>(node: T, path: string): Omit<T, "extra"> & { extra?: WireExtra } {
    const { extra, ...rest } = node;
    return extra === undefined ? rest : { ...rest, extra: extensions.encodeExtra(extra, `${path}.extra`) };
  }

  function encodeInputPart(part: AgenticMessageInputPart, path: string): WireInputPart {
    switch (part.type) {
      case "text":
        return part;
      case "image":
        return { type: part.type, image: toWireExtra(part.image, `${path}.image`) };
      case "audio":
        return { type: part.type, audio: toWireExtra(part.audio, `${path}.audio`) };
      case "video":
        return { type: part.type, video: toWireExtra(part.video, `${path}.video`) };
      case "file":
        return { type: part.type, file: toWireExtra(part.file, `${path}.file`) };
    }
  }

  function encodeOutputPart(part: AgenticMessageOutputPart, path: string): WireOutputPart {
    switch (part.type) {
      case "text":
        return { type: part.type, text: toWireExtra(part.text, `${path}.text`) };
      case "image":
        return { type: part.type, image: toWireExtra(part.image, `${path}.image`) };
      case "audio":
        return { type: part.type, audio: toWireExtra(part.audio, `${path}.audio`) };
      case "video":
        return { type: part.type, video: toWireExtra(part.video, `${path}.video`) };
    }
  }

  function encodeMessage(message: ContentBlockMessage, path: string): WireMessage {
    return {
      ...toWireExtra(message, path),
      userInputMultiContent: message.userInputMultiContent?.map((part, i) =>
        encodeInputPart(part, `${path}.userInputMultiContent[${i}]`),
      ),
      assistantGenMultiContent: message.assistantGenMultiContent?.map((part, i) =>
        encodeOutputPart(part, `${path}.assistantGenMultiContent[${i}]`),
      ),
    };
  }

  function encodeBlock(block: ContentBlock, path: string): WireContentBlock {
    switch (block.type) {
      case "message":
        return { type: block.type, message: encodeMessage(block.message, `${path}.message`) };
      case "reasoning": {
        const { reasoning } = block;
        return {
          type: block.type,
          reasoning: {
            ...toWireExtra(reasoning, `${path}.reasoning`),
            summary: reasoning.summary.map((item, i) => toWireExtra(item, `${path}.reasoning.summary[${i}]`)),
          },
        };
      }
      case "tool_call":
        return { type: block.type, toolCall: toWireExtra(block.toolCall, `${path}.toolCall`) };
      case "tool_call_output": {
        const output = block.toolCallOutput;
        return {
          type: block.type,
          toolCallOutput:
            output.type === "mcp_tool_call_output"
              ? { ...output, mcpTool: toWireExtra(output.mcpTool, `${path}.toolCallOutput.mcpTool`) }
              : output,
        };
      }
      case "mcp_list_tools":
        return { type: block.type, mcpListTools: block.mcpListTools };
      case "mcp_tool_approval_request":
        return { type: block.type, mcpToolApprovalRequest: block.mcpToolApprovalRequest };
      case "mcp_tool_approval_response":
        return { type: block.type, mcpToolApprovalResponse: block.mcpToolApprovalResponse };
    }
  }

  // --- wire -> model ---

  function fromWireExtra<T extends { extra?: Record<string, unknown> }>(
    node: T,
    path: string,
  ): Omit<T, "extra"> & { extra?: Extra } {
    const { extra, ...rest } = node;
    return extra === undefined ? rest : { ...rest, extra: extensions.decodeExtra(extra, `${path}.extra`) };
  }

  function decodeInputPart(part: WireInputPart, path: string): Record<string, unknown> {
    return compact({
      type: part.type,
      text: part.text,
      image: part.image && fromWireExtra(part.image, `${path}.image`),
      audio: part.audio && fromWireExtra(part.audio, `${path}.audio`),
      video: part.video && fromWireExtra(part.video, `${path}.video`),
      file: part.file && fromWireExtra(part.file, `${path}.file`),
    });
  }

  function decodeOutputPart(part: WireOutputPart, path: string): Record<string, unknown> {
    return compact({
      type: part.type,
      text: part.text && fromWireExtra(part.text, `${path}.text`),
      image: part.image && fromWireExtra(part.image, `${path}.image`),
      audio: part.audio && fromWireExtra(part.audio, `${path}.audio`),
      video: part.video && fromWireExtra(part.video, `${path}.video`),
    });
  }

  function decodeMessage(message: WireMessage, path: string): Record<string, unknown> {
    return compact({
      ...fromWireExtra(message, path),
      userInputMultiContent: message.userInputMultiContent?.map((part, i) =>
        decodeInputPart(part, `${path}.userInputMultiContent[${i}]`),
      ),
      assistantGenMultiContent: message.assistantGenMultiContent?.map((part, i) =>
        decodeOutputPart(part, `${path}.assistantGenMultiContent[${i}]`),
      ),
    });
  }

  function decodeBlock(block: WireContentBlock, path: string): ContentBlock {
    const { reasoning, toolCallOutput } = block;
    const candidate = compact({
      type: block.type,
      message: block.message && decodeMessage(block.message, `${path}.message`),
      reasoning: reasoning && {
        ...fromWireExtra(reasoning, `${path}.reasoning`),
        summary: reasoning.summary.map((item, i) => fromWireExtra(item, `${path}.reasoning.summary[${i}]`)),
      },
      toolCall: block.toolCall && fromWireExtra(block.toolCall, `${path}.toolCall`),
      toolCallOutput: toolCallOutput && compact({
        ...toolCallOutput,
        mcpTool: toolCallOutput.mcpTool && fromWireExtra(toolCallOutput.mcpTool, `${path}.toolCallOutput.mcpTool`),
      }),
      mcpListTools: block.mcpListTools,
      mcpToolApprovalRequest: block.mcpToolApprovalRequest,
      mcpToolApprovalResponse: block.mcpToolApprovalResponse,
    });
    validateContentBlock(candidate, path);
    return candidate;
  }

  function readEnvelope(bytes: Uint8Array): WireResponse {
    const { body } = readFrame(bytes);

    let json: unknown;
    try {
      json = JSON.parse(utf8.decode(body));
    } catch (err) {
      throw new CorruptPayloadError("body is not valid UTF-8 JSON", { cause: err });
    }

    const parsed = WireResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new CorruptPayloadError(formatZodError(parsed.error), { cause: parsed.error });
    }
    return parsed.data;
  }

  function logFailure(log: Logger, operation: string, err: unknown): void {
    if (err instanceof AgenticError) {
      log.warn(`${operation} failed`, { code: err.code, error: err.message });
    }
  }

  return {
    encode(response: AgenticResponse): Uint8Array {
      const log = logger.child("encode");
      log.setContext({ responseId: response.id });
      const stop = log.time("encode");
      try {
        validateResponse(response);
        const envelope: WireResponse = {
          id: response.id,
          finishReason: response.finishReason,
          usage: response.usage,
          blocks: response.blocks.map((block, i) => encodeBlock(block, `blocks[${i}]`)),
        };
        // Refuse what decode would reject: fractional indexes, negative counts.
        const checked = WireResponseSchema.safeParse(envelope);
        if (!checked.success) {
          throw new InvalidResponseError(formatZodError(checked.error));
        }
        const bytes = writeFrame(Buffer.from(JSON.stringify(envelope), "utf8"));
        log.debug("Encoded response", { blocks: response.blocks.length, bytes: bytes.byteLength });
        return bytes;
      } catch (err) {
        logFailure(log, "Encode", err);
        throw err;
      } finally {
        stop();
      }
    },

    decode(bytes: Uint8Array): AgenticResponse {
      const log = logger.child("decode");
      const stop = log.time("decode");
      try {
        const envelope = readEnvelope(bytes);
        log.setContext({ responseId: envelope.id });
        const response: AgenticResponse = {
          id: envelope.id,
          blocks: envelope.blocks.map((block, i) => decodeBlock(block, `blocks[${i}]`)),
        };
        if (envelope.finishReason) response.finishReason = envelope.finishReason;
        if (envelope.usage) response.usage = envelope.usage;

        log.debug("Decoded response", { blocks: response.blocks.length, bytes: bytes.byteLength });
        return response;
      } catch (err) {
        logFailure(log, "Decode", err);
        throw err;
      } finally {
        stop();
      }
    },
  };
}
