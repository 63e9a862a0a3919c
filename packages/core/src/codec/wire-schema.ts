/**
 * Zod schemas for the JSON body of an encoded response.
 *
 * The body mirrors the content model, except that every extension map holds
 * `{ t, v }` nodes (see extension-codec.ts). Unions are kept loose here: the
 * payload fields are all optional so that a tag/payload mismatch surfaces as
 * VariantMismatchError from validateContentBlock rather than as a parse
 * failure. Unknown object keys are stripped, which lets older decoders read
 * bodies written by newer encoders.
 */

import { z } from "zod";
import {
  CONTENT_BLOCK_TYPES,
  FINISH_STATUSES,
  IMAGE_URL_DETAILS,
  INPUT_PART_TYPES,
  MCP_TOOL_CALL_STATUSES,
  OUTPUT_PART_TYPES,
  ROLE_TYPES,
  TOOL_CALL_OUTPUT_TYPES,
  TOOL_CALL_TYPES,
  isRecord,
  type JsonSchemaDocument,
} from "@agentic-wire/sdk";

/** Extension map: contents are checked node by node while decoding. */
const ExtraSchema = z.custom<Record<string, unknown>>(isRecord, "extension map must be an object");

/** Opaque JSON-schema document, stored as parsed. */
const JsonSchemaDocumentSchema = z.custom<JsonSchemaDocument>(isRecord, "input schema must be an object");

const index = z.number().int();
const count = z.number().int().nonnegative();

const MediaSchema = z.object({
  url: z.string().optional(),
  base64Data: z.string().optional(),
  mimeType: z.string(),
  extra: ExtraSchema.optional(),
});

const InputPartSchema = z.object({
  type: z.enum(INPUT_PART_TYPES),
  text: z.object({ content: z.string() }).optional(),
  image: MediaSchema.extend({ detail: z.enum(IMAGE_URL_DETAILS).optional() }).optional(),
  audio: MediaSchema.optional(),
  video: MediaSchema.optional(),
  file: MediaSchema.extend({ name: z.string().optional() }).optional(),
});

const OutputPartSchema = z.object({
  type: z.enum(OUTPUT_PART_TYPES),
  text: z.object({ content: z.string(), extra: ExtraSchema.optional() }).optional(),
  image: MediaSchema.optional(),
  audio: MediaSchema.optional(),
  video: MediaSchema.optional(),
});

const MessageSchema = z.object({
  index: index.optional(),
  role: z.enum(ROLE_TYPES),
  inputText: z.string().optional(),
  userInputMultiContent: z.array(InputPartSchema).optional(),
  assistantGenMultiContent: z.array(OutputPartSchema).optional(),
  extra: ExtraSchema.optional(),
});

const ReasoningSchema = z.object({
  index: index.optional(),
  summaryIndex: index.optional(),
  summary: z.array(z.object({ text: z.string(), extra: ExtraSchema.optional() })),
  encryptedContent: z.string(),
  extra: ExtraSchema.optional(),
});

const ToolCallSchema = z.object({
  index: index.optional(),
  type: z.enum(TOOL_CALL_TYPES),
  id: z.string(),
  name: z.string(),
  arguments: z.string(),
  extra: ExtraSchema.optional(),
});

const ToolCallOutputSchema = z.object({
  index: index.optional(),
  type: z.enum(TOOL_CALL_OUTPUT_TYPES),
  toolCallId: z.string(),
  toolName: z.string(),
  customTool: z.object({ content: z.string() }).optional(),
  mcpTool: z
    .object({
      content: z.string(),
      approvalRequestId: z.string().optional(),
      status: z.enum(MCP_TOOL_CALL_STATUSES),
      error: z.string().optional(),
      extra: ExtraSchema.optional(),
    })
    .optional(),
});

const MCPListToolsSchema = z.object({
  serverLabel: z.string(),
  tools: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      inputSchema: JsonSchemaDocumentSchema.optional(),
    }),
  ),
  error: z.string().optional(),
});

const MCPToolApprovalRequestSchema = z.object({
  name: z.string(),
  arguments: z.string(),
  serverLabel: z.string(),
});

const MCPToolApprovalResponseSchema = z.object({
  approvalRequestId: z.string(),
  approve: z.boolean(),
  reason: z.string().optional(),
});

const ContentBlockSchema = z.object({
  type: z.enum(CONTENT_BLOCK_TYPES),
  message: MessageSchema.optional(),
  reasoning: ReasoningSchema.optional(),
  toolCall: ToolCallSchema.optional(),
  toolCallOutput: ToolCallOutputSchema.optional(),
  mcpListTools: MCPListToolsSchema.optional(),
  mcpToolApprovalRequest: MCPToolApprovalRequestSchema.optional(),
  mcpToolApprovalResponse: MCPToolApprovalResponseSchema.optional(),
});

export const WireResponseSchema = z.object({
  id: z.string(),
  finishReason: z
    .object({ status: z.enum(FINISH_STATUSES), reason: z.string() })
    .optional(),
  usage: z
    .object({
      inputTokens: count,
      inputTokensDetails: z.object({ cachedTokens: count }),
      outputTokens: count,
      outputTokensDetails: z.object({ reasoningTokens: count }),
      totalTokens: count,
    })
    .optional(),
  blocks: z.array(ContentBlockSchema),
});

export type WireResponse = z.infer<typeof WireResponseSchema>;
export type WireContentBlock = z.infer<typeof ContentBlockSchema>;
export type WireMessage = z.infer<typeof MessageSchema>;
export type WireInputPart = z.infer<typeof InputPartSchema>;
export type WireOutputPart = z.infer<typeof OutputPartSchema>;
