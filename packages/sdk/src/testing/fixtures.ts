/**
 * Shared fixtures for codec and content-model tests.
 */

import { z } from "zod";
import {
  assistantOutputMessage,
  customToolOutput,
  inputTextMessage,
  mcpListToolsBlock,
  mcpToolApprovalRequestBlock,
  mcpToolApprovalResponseBlock,
  mcpToolOutput,
  messageBlock,
  reasoningBlock,
  toolCallBlock,
  toolCallOutputBlock,
  userInputMessage,
} from "../builders/blocks.js";
import {
  inputAudioPart,
  inputFilePart,
  inputImagePart,
  inputTextPart,
  inputVideoPart,
  outputAudioPart,
  outputImagePart,
  outputTextPart,
  outputVideoPart,
} from "../builders/parts.js";
import { defineClassType } from "../types/extension.js";
import type { AgenticResponse } from "../types/response.js";

/** A structured, provider-specific status of the kind stashed in extension maps. */
export class ProviderStatus {
  constructor(
    public readonly state: "in_progress" | "completed" | "failed",
    public readonly providerId: string,
  ) {}

  get done(): boolean {
    return this.state !== "in_progress";
  }
}

export const providerStatusType = defineClassType("test.provider-status", ProviderStatus, {
  payload: z.object({
    state: z.enum(["in_progress", "completed", "failed"]),
    providerId: z.string(),
  }),
  encode: (status) => ({ state: status.state, providerId: status.providerId }),
  decode: ({ state, providerId }) => new ProviderStatus(state, providerId),
});

export const dateType = defineClassType("test.date", Date, {
  payload: z.string().datetime(),
  encode: (date) => date.toISOString(),
  decode: (iso) => new Date(iso),
});

/**
 * The two-block scenario: an assistant message with text and an image,
 * followed by a custom tool call.
 */
export function createHelloResponse(): AgenticResponse {
  return {
    id: "resp-hello",
    blocks: [
      messageBlock(
        assistantOutputMessage([
          outputTextPart("Hello"),
          outputImagePart({ url: "https://example.com/cat.png" }, "image/png"),
        ]),
      ),
      toolCallBlock({
        type: "custom_tool_call",
        id: "call-1",
        name: "lookup",
        arguments: '{"q":"x"}',
      }),
    ],
  };
}

/** A response with every block type and typed values in every extension map. */
export function createSampleResponse(): AgenticResponse {
  const startedAt = new Date("2025-03-01T12:00:00.000Z");

  return {
    id: "resp-sample",
    finishReason: { status: "completed", reason: "stop" },
    usage: {
      inputTokens: 120,
      inputTokensDetails: { cachedTokens: 40 },
      outputTokens: 80,
      outputTokensDetails: { reasoningTokens: 25 },
      totalTokens: 200,
    },
    blocks: [
      messageBlock(inputTextMessage("system", "You are a helpful assistant.")),
      messageBlock(
        userInputMessage(
          [
            inputTextPart("What is in these files?"),
            inputImagePart({ base64Data: "aW1hZ2U=" }, "image/jpeg", { detail: "high" }),
            inputAudioPart({ url: "https://example.com/a.wav" }, "audio/wav"),
            inputVideoPart({ url: "https://example.com/v.mp4", base64Data: "dmlkZW8=" }, "video/mp4"),
            inputFilePart({ url: "https://example.com/r.pdf" }, "application/pdf", {
              name: "report.pdf",
              extra: { pages: 3 },
            }),
          ],
          { index: 0 },
        ),
      ),
      reasoningBlock({
        index: 1,
        summaryIndex: 0,
        summary: [
          { text: "Looking at the attachments.", extra: { startedAt } },
          { text: "Calling the search tool." },
        ],
        encryptedContent: "opaque-ciphertext",
        extra: { status: new ProviderStatus("completed", "rs_1") },
      }),
      toolCallBlock({
        index: 2,
        type: "mcp_tool_call",
        id: "call-7",
        name: "search",
        arguments: '{"query":"quarterly report"}',
        extra: { serverLabel: "docs", attempts: [1, 2], trace: { spans: [{ name: "dispatch", at: startedAt }] } },
      }),
      mcpToolApprovalRequestBlock({
        name: "search",
        arguments: '{"query":"quarterly report"}',
        serverLabel: "docs",
      }),
      mcpToolApprovalResponseBlock({ approvalRequestId: "apr-1", approve: true, reason: "read-only" }),
      toolCallOutputBlock(
        mcpToolOutput(
          { toolCallId: "call-7", toolName: "search", index: 3 },
          {
            content: "2 results",
            approvalRequestId: "apr-1",
            status: "success",
            extra: { status: new ProviderStatus("completed", "mcp_1") },
          },
        ),
      ),
      toolCallOutputBlock(customToolOutput({ toolCallId: "call-8", toolName: "lookup" }, "42")),
      mcpListToolsBlock({
        serverLabel: "docs",
        tools: [
          {
            name: "search",
            description: "Full-text search",
            inputSchema: {
              type: "object",
              properties: { query: { type: "string" } },
              required: ["query"],
            },
          },
          { name: "ping", description: "Health check" },
        ],
      }),
      messageBlock(
        assistantOutputMessage(
          [
            outputTextPart("Here is the summary.", { extra: { annotations: [] } }),
            outputImagePart({ url: "https://example.com/chart.png" }, "image/png"),
            outputAudioPart({ base64Data: "YXVkaW8=" }, "audio/mpeg"),
            outputVideoPart({ url: "https://example.com/clip.webm" }, "video/webm"),
          ],
          {
            index: 4,
            extra: {
              id: "msg_1",
              status: new ProviderStatus("completed", "msg_1"),
              flags: { cached: false, retries: 0, note: null },
            },
          },
        ),
      ),
    ],
  };
}
