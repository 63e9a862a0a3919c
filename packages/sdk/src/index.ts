// Content model
export type {
  AgenticResponse,
  FinishReason,
  FinishStatus,
  TokenUsageMeta,
  InputTokensUsageDetails,
  OutputTokensUsageDetails,
} from "./types/response.js";
export { FINISH_STATUSES } from "./types/response.js";

export type {
  ContentBlock,
  ContentBlockOf,
  ContentBlockType,
  ContentBlockMessage,
  MessageContent,
  RoleType,
  ContentBlockReasoning,
  ReasoningSummary,
  ContentBlockToolCall,
  ToolCallType,
  ContentBlockToolCallOutput,
  ToolCallOutputType,
  ToolCallOutputCustom,
  ToolCallOutputMCP,
  MCPToolCallStatus,
  ContentBlockMCPListTools,
  MCPListToolsItem,
  ContentBlockMCPToolApprovalRequest,
  ContentBlockMCPToolApprovalResponse,
} from "./types/content.js";
export {
  CONTENT_BLOCK_TYPES,
  CONTENT_BLOCK_PAYLOAD_KEYS,
  ROLE_TYPES,
  TOOL_CALL_TYPES,
  TOOL_CALL_OUTPUT_TYPES,
  MCP_TOOL_CALL_STATUSES,
} from "./types/content.js";

export type {
  AgenticMessagePartType,
  AgenticMessageMedia,
  AgenticMessageInputPart,
  AgenticMessageInputText,
  AgenticMessageInputImage,
  AgenticMessageInputAudio,
  AgenticMessageInputVideo,
  AgenticMessageInputFile,
  AgenticMessageOutputPart,
  AgenticMessageOutputText,
  AgenticMessageOutputImage,
  AgenticMessageOutputAudio,
  AgenticMessageOutputVideo,
  ImageURLDetail,
} from "./types/parts.js";
export { INPUT_PART_TYPES, OUTPUT_PART_TYPES, IMAGE_URL_DETAILS } from "./types/parts.js";

export type { JsonPrimitive, JsonValue, JsonSchemaDocument } from "./types/json.js";

// Extension types
export type { Extra, ExtensionClass, ExtensionType, ITypeRegistry } from "./types/extension.js";
export { defineExtensionType, defineClassType } from "./types/extension.js";

// Construction & validation
export {
  inputTextMessage,
  userInputMessage,
  assistantOutputMessage,
  customToolOutput,
  mcpToolOutput,
  messageBlock,
  reasoningBlock,
  toolCallBlock,
  toolCallOutputBlock,
  mcpListToolsBlock,
  mcpToolApprovalRequestBlock,
  mcpToolApprovalResponseBlock,
} from "./builders/blocks.js";
export type { MessageOptions, ToolOutputTarget } from "./builders/blocks.js";

export {
  inputTextPart,
  inputImagePart,
  inputAudioPart,
  inputVideoPart,
  inputFilePart,
  outputTextPart,
  outputImagePart,
  outputAudioPart,
  outputVideoPart,
} from "./builders/parts.js";
export type { MediaSource, MediaOptions } from "./builders/parts.js";

export { validateContentBlock, validateToolCallOutput, validateResponse, isRecord } from "./validation/variants.js";

// Errors
export {
  AgenticError,
  VariantMismatchError,
  InvalidResponseError,
  UnregisteredExtensionValueError,
  UnknownExtensionTypeError,
  CorruptPayloadError,
  UnsupportedVersionError,
  RegistrationConflictError,
  ConfigError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
