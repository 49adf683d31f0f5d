export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  cachedTokens?: number;
}

export interface AIResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  finishReason?: string;
  latencyMs?: number;
}

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  timeoutMs?: number;
}

export interface ModelUsageStats {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  requestCount: number;
  errorCount: number;
  totalLatencyMs: number;
}

export interface UsageStats {
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  totalCachedTokens: number;
  requestCount: number;
  errorCount: number;
  totalLatencyMs: number;
  avgLatencyMs: number;
  byModel: Record<string, ModelUsageStats>;
}
