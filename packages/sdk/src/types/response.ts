/**
 * Top-level agent response.
 */

import type { ContentBlock } from "./content.js";

export const FINISH_STATUSES = ["completed", "incomplete"] as const;
export type FinishStatus = (typeof FINISH_STATUSES)[number];

export interface FinishReason {
  status: FinishStatus;
  reason: string;
}

export interface InputTokensUsageDetails {
  cachedTokens: number;
}

export interface OutputTokensUsageDetails {
  reasoningTokens: number;
}

/**
 * Token counters reported by the model. Producers should keep
 * totalTokens = inputTokens + outputTokens; nothing here enforces it.
 */
export interface TokenUsageMeta {
  inputTokens: number;
  inputTokensDetails: InputTokensUsageDetails;
  outputTokens: number;
  outputTokensDetails: OutputTokensUsageDetails;
  totalTokens: number;
}

export interface AgenticResponse {
  id: string;
  finishReason?: FinishReason;
  usage?: TokenUsageMeta;
  blocks: ContentBlock[];
}
