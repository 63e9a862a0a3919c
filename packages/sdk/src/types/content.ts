/**
 * Content blocks: the discriminated units of an agent response.
 */

import type { Extra } from "./extension.js";
import type { JsonSchemaDocument } from "./json.js";
import type { AgenticMessageInputPart, AgenticMessageOutputPart } from "./parts.js";

export const CONTENT_BLOCK_TYPES = [
  "message",
  "reasoning",
  "tool_call",
  "tool_call_output",
  "mcp_list_tools",
  "mcp_tool_approval_request",
  "mcp_tool_approval_response",
] as const;

export type ContentBlockType = (typeof CONTENT_BLOCK_TYPES)[number];

/** Field that carries the payload for each block type. */
export const CONTENT_BLOCK_PAYLOAD_KEYS = {
  message: "message",
  reasoning: "reasoning",
  tool_call: "toolCall",
  tool_call_output: "toolCallOutput",
  mcp_list_tools: "mcpListTools",
  mcp_tool_approval_request: "mcpToolApprovalRequest",
  mcp_tool_approval_response: "mcpToolApprovalResponse",
} as const satisfies Record<ContentBlockType, string>;

export const ROLE_TYPES = ["system", "user", "assistant"] as const;

/** Tool results travel as tool_call_output blocks, so there is no "tool" role. */
export type RoleType = (typeof ROLE_TYPES)[number];

/** Exactly one content representation per message. */
export type MessageContent =
  | { inputText: string; userInputMultiContent?: never; assistantGenMultiContent?: never }
  | { inputText?: never; userInputMultiContent: AgenticMessageInputPart[]; assistantGenMultiContent?: never }
  | { inputText?: never; userInputMultiContent?: never; assistantGenMultiContent: AgenticMessageOutputPart[] };

export type ContentBlockMessage = {
  index?: number;
  role: RoleType;
  /** Model-specific metadata, e.g. a provider-assigned id or status. */
  extra?: Extra;
} & MessageContent;

export interface ReasoningSummary {
  text: string;
  extra?: Extra;
}

export interface ContentBlockReasoning {
  index?: number;
  summaryIndex?: number;
  summary: ReasoningSummary[];
  /** Provider-specific, opaque. */
  encryptedContent: string;
  extra?: Extra;
}

export const TOOL_CALL_TYPES = ["custom_tool_call", "mcp_tool_call"] as const;
export type ToolCallType = (typeof TOOL_CALL_TYPES)[number];

export interface ContentBlockToolCall {
  index?: number;
  type: ToolCallType;
  id: string;
  name: string;
  /** Serialized JSON arguments, passed through unparsed. */
  arguments: string;
  extra?: Extra;
}

export const TOOL_CALL_OUTPUT_TYPES = ["custom_tool_call_output", "mcp_tool_call_output"] as const;
export type ToolCallOutputType = (typeof TOOL_CALL_OUTPUT_TYPES)[number];

export interface ToolCallOutputCustom {
  content: string;
}

export const MCP_TOOL_CALL_STATUSES = ["success", "error"] as const;
export type MCPToolCallStatus = (typeof MCP_TOOL_CALL_STATUSES)[number];

export interface ToolCallOutputMCP {
  content: string;
  /** Approval request this call was run under, if any. */
  approvalRequestId?: string;
  status: MCPToolCallStatus;
  error?: string;
  extra?: Extra;
}

interface ToolCallOutputBase {
  index?: number;
  toolCallId: string;
  toolName: string;
}

export type ContentBlockToolCallOutput =
  | (ToolCallOutputBase & { type: "custom_tool_call_output"; customTool: ToolCallOutputCustom })
  | (ToolCallOutputBase & { type: "mcp_tool_call_output"; mcpTool: ToolCallOutputMCP });

export interface MCPListToolsItem {
  name: string;
  description: string;
  inputSchema?: JsonSchemaDocument;
}

export interface ContentBlockMCPListTools {
  serverLabel: string;
  tools: MCPListToolsItem[];
  /** Set when the server could not list its tools. */
  error?: string;
}

export interface ContentBlockMCPToolApprovalRequest {
  name: string;
  /** JSON text of the arguments the tool would run with. */
  arguments: string;
  serverLabel: string;
}

export interface ContentBlockMCPToolApprovalResponse {
  approvalRequestId: string;
  approve: boolean;
  reason?: string;
}

export type ContentBlock =
  | { type: "message"; message: ContentBlockMessage }
  | { type: "reasoning"; reasoning: ContentBlockReasoning }
  | { type: "tool_call"; toolCall: ContentBlockToolCall }
  | { type: "tool_call_output"; toolCallOutput: ContentBlockToolCallOutput }
  | { type: "mcp_list_tools"; mcpListTools: ContentBlockMCPListTools }
  | { type: "mcp_tool_approval_request"; mcpToolApprovalRequest: ContentBlockMCPToolApprovalRequest }
  | { type: "mcp_tool_approval_response"; mcpToolApprovalResponse: ContentBlockMCPToolApprovalResponse };

export type ContentBlockOf<K extends ContentBlockType> = Extract<ContentBlock, { type: K }>;
