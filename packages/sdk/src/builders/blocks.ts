/**
 * Constructors for content blocks, messages and tool outputs.
 *
 * Block constructors run validateContentBlock, so a block returned from here
 * is always well-formed.
 */

import type {
  ContentBlock,
  ContentBlockMCPListTools,
  ContentBlockMCPToolApprovalRequest,
  ContentBlockMCPToolApprovalResponse,
  ContentBlockMessage,
  ContentBlockOf,
  ContentBlockReasoning,
  ContentBlockToolCall,
  ContentBlockToolCallOutput,
  RoleType,
  ToolCallOutputMCP,
} from "../types/content.js";
import type { Extra } from "../types/extension.js";
import type { AgenticMessageInputPart, AgenticMessageOutputPart } from "../types/parts.js";
import { validateContentBlock } from "../validation/variants.js";

export interface MessageOptions {
  index?: number;
  extra?: Extra;
}

function checked<B extends ContentBlock>(block: B): B {
  validateContentBlock(block);
  return block;
}

// Messages

export function inputTextMessage(role: RoleType, text: string, options: MessageOptions = {}): ContentBlockMessage {
  return { role, inputText: text, ...options };
}

export function userInputMessage(parts: AgenticMessageInputPart[], options: MessageOptions = {}): ContentBlockMessage {
  return { role: "user", userInputMultiContent: parts, ...options };
}

export function assistantOutputMessage(parts: AgenticMessageOutputPart[], options: MessageOptions = {}): ContentBlockMessage {
  return { role: "assistant", assistantGenMultiContent: parts, ...options };
}

// Tool call outputs

export interface ToolOutputTarget {
  toolCallId: string;
  toolName: string;
  index?: number;
}

export function customToolOutput(target: ToolOutputTarget, content: string): ContentBlockToolCallOutput {
  return { ...target, type: "custom_tool_call_output", customTool: { content } };
}

export function mcpToolOutput(target: ToolOutputTarget, output: ToolCallOutputMCP): ContentBlockToolCallOutput {
  return { ...target, type: "mcp_tool_call_output", mcpTool: output };
}

// Blocks

export function messageBlock(message: ContentBlockMessage): ContentBlockOf<"message"> {
  return checked({ type: "message", message });
}

export function reasoningBlock(reasoning: ContentBlockReasoning): ContentBlockOf<"reasoning"> {
  return checked({ type: "reasoning", reasoning });
}

export function toolCallBlock(toolCall: ContentBlockToolCall): ContentBlockOf<"tool_call"> {
  return checked({ type: "tool_call", toolCall });
}

export function toolCallOutputBlock(toolCallOutput: ContentBlockToolCallOutput): ContentBlockOf<"tool_call_output"> {
  return checked({ type: "tool_call_output", toolCallOutput });
}

export function mcpListToolsBlock(mcpListTools: ContentBlockMCPListTools): ContentBlockOf<"mcp_list_tools"> {
  return checked({ type: "mcp_list_tools", mcpListTools });
}

export function mcpToolApprovalRequestBlock(
  mcpToolApprovalRequest: ContentBlockMCPToolApprovalRequest,
): ContentBlockOf<"mcp_tool_approval_request"> {
  return checked({ type: "mcp_tool_approval_request", mcpToolApprovalRequest });
}

export function mcpToolApprovalResponseBlock(
  mcpToolApprovalResponse: ContentBlockMCPToolApprovalResponse,
): ContentBlockOf<"mcp_tool_approval_response"> {
  return checked({ type: "mcp_tool_approval_response", mcpToolApprovalResponse });
}
