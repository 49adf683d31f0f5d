import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenAI } from '@google/genai';
import { config, type AIProvider } from '../../config.js';
import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { withRetry, withTimeout, createRateLimiter } from '../../utils/retry.js';
import type { CompletionFn, CompletionOptions } from '../scoring/analyzer.js';
import type { TokenUsage, AIResponse, GenerateOptions, UsageStats } from './types.js';

const logger = createLogger('ai-clients');

const DEFAULT_TIMEOUT_MS = 60_000;

// ---------------------------------------------------------------------------
// Rate limiters
// ---------------------------------------------------------------------------
const claudeRateLimiter = createRateLimiter({ maxRequests: 10, windowMs: 60000, name: 'claude' });
const geminiRateLimiter = createRateLimiter({ maxRequests: 60, windowMs: 60000, name: 'gemini' });

// ---------------------------------------------------------------------------
// Lazy-initialized clients
// ---------------------------------------------------------------------------
let anthropicClient: Anthropic | null = null;
let googleClient: GoogleGenAI | null = null;

function getAnthropicClient(): Anthropic {
  if (!anthropicClient) {
    if (!config.apiKeys.anthropic) {
      throw new Error('ANTHROPIC_API_KEY is not configured');
    }
    anthropicClient = new Anthropic({ apiKey: config.apiKeys.anthropic });
  }
  return anthropicClient;
}

function getGoogleClient(): GoogleGenAI {
  if (!googleClient) {
    if (!config.apiKeys.googleAi) {
      throw new Error('GOOGLE_AI_API_KEY is not configured');
    }
    googleClient = new GoogleGenAI({ apiKey: config.apiKeys.googleAi });
  }
  return googleClient;
}

function isTransient(error: Error, markers: string[]): boolean {
  const msg = error.message.toLowerCase();
  return markers.some((m) => msg.includes(m));
}

// ---------------------------------------------------------------------------
// Usage tracker
// ---------------------------------------------------------------------------
function emptyStats(): UsageStats {
  return {
    totalInputTokens: 0,
    totalOutputTokens: 0,
    totalTokens: 0,
    totalCachedTokens: 0,
    requestCount: 0,
    errorCount: 0,
    totalLatencyMs: 0,
    avgLatencyMs: 0,
    byModel: {},
  };
}

export class UsageTracker {
  private stats: UsageStats = emptyStats();

  track(model: string, usage: TokenUsage, latencyMs: number): void {
    this.stats.totalInputTokens += usage.inputTokens;
    this.stats.totalOutputTokens += usage.outputTokens;
    this.stats.totalTokens += usage.totalTokens;
    this.stats.totalCachedTokens += usage.cachedTokens ?? 0;
    this.stats.requestCount++;
    this.stats.totalLatencyMs += latencyMs;
    this.stats.avgLatencyMs = Math.round(this.stats.totalLatencyMs / this.stats.requestCount);

    const modelStats = this.modelStats(model);
    modelStats.inputTokens += usage.inputTokens;
    modelStats.outputTokens += usage.outputTokens;
    modelStats.totalTokens += usage.totalTokens;
    modelStats.requestCount++;
    modelStats.totalLatencyMs += latencyMs;
  }

  trackError(model: string): void {
    this.stats.errorCount++;
    this.modelStats(model).errorCount++;
  }

  getStats(): UsageStats {
    return { ...this.stats, byModel: { ...this.stats.byModel } };
  }

  reset(): void {
    this.stats = emptyStats();
  }

  private modelStats(model: string) {
    let modelStats = this.stats.byModel[model];
    if (!modelStats) {
      modelStats = {
        inputTokens: 0,
        outputTokens: 0,
        totalTokens: 0,
        requestCount: 0,
        errorCount: 0,
        totalLatencyMs: 0,
      };
      this.stats.byModel[model] = modelStats;
    }
    return modelStats;
  }
}

export const usageTracker = new UsageTracker();

// ---------------------------------------------------------------------------
// generateWithClaude
// ---------------------------------------------------------------------------
export async function generateWithClaude(
  prompt: string,
  options: GenerateOptions = {}
): Promise<AIResponse> {
  const model = config.ai.claude.model;
  const maxTokens = options.maxTokens ?? config.ai.claude.maxTokens;

  await claudeRateLimiter.acquire();

  logger.info('Claude call', { model, promptLength: prompt.length });

  const startTime = performance.now();

  try {
    const response = await withRetry(
      () =>
        withTimeout(
          () =>
            getAnthropicClient().messages.create({
              model,
              max_tokens: maxTokens,
              temperature: options.temperature ?? 0.7,
              system: options.systemPrompt ?? '',
              messages: [{ role: 'user', content: prompt }],
            }),
          { timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS }
        ),
      {
        maxRetries: 3,
        baseDelayMs: 2000,
        retryOn: (error: Error) => isTransient(error, ['rate', 'overloaded', '529', 'timed out']),
      }
    );

    const latencyMs = Math.round(performance.now() - startTime);

    const usage: TokenUsage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      cachedTokens: response.usage.cache_read_input_tokens ?? 0,
    };

    usageTracker.track(model, usage, latencyMs);

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    logger.debug('Claude response received', {
      model,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      latencyMs,
    });

    return {
      text,
      usage,
      model,
      finishReason: response.stop_reason ?? undefined,
      latencyMs,
    };
  } catch (error) {
    usageTracker.trackError(model);
    logger.error('Claude generation failed', { model, error: errorMessage(error) });
    throw error;
  }
}

// ---------------------------------------------------------------------------
// generateWithGemini
// ---------------------------------------------------------------------------
export async function generateWithGemini(
  prompt: string,
  options: GenerateOptions = {}
): Promise<AIResponse> {
  const model = config.ai.gemini.model;

  await geminiRateLimiter.acquire();

  logger.info('Gemini call', { model, promptLength: prompt.length });

  const startTime = performance.now();

  try {
    const response = await withRetry(
      () =>
        withTimeout(
          () =>
            getGoogleClient().models.generateContent({
              model,
              contents: [
                {
                  role: 'user',
                  parts: [{ text: options.systemPrompt ? `${options.systemPrompt}\n\n${prompt}` : prompt }],
                },
              ],
              config: {
                ...(options.maxTokens ? { maxOutputTokens: options.maxTokens } : {}),
                temperature: options.temperature ?? 0.7,
              },
            }),
          { timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS }
        ),
      {
        maxRetries: 3,
        baseDelayMs: 2000,
        retryOn: (error: Error) => isTransient(error, ['rate', 'quota', '503', 'timed out']),
      }
    );

    const latencyMs = Math.round(performance.now() - startTime);

    const usageMeta = response.usageMetadata;
    const usage: TokenUsage = {
      inputTokens: usageMeta?.promptTokenCount ?? 0,
      outputTokens: usageMeta?.candidatesTokenCount ?? 0,
      totalTokens: usageMeta?.totalTokenCount ?? 0,
      cachedTokens: usageMeta?.cachedContentTokenCount ?? 0,
    };

    usageTracker.track(model, usage, latencyMs);

    const text = response.text ?? '';

    logger.debug('Gemini response received', {
      model,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      latencyMs,
    });

    return {
      text,
      usage,
      model,
      finishReason: response.candidates?.[0]?.finishReason ?? undefined,
      latencyMs,
    };
  } catch (error) {
    usageTracker.trackError(model);
    logger.error('Gemini generation failed', { model, error: errorMessage(error) });
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Provider-agnostic completion used by the analyzer and drafter
// ---------------------------------------------------------------------------
export function isProviderConfigured(provider: AIProvider = config.ai.provider): boolean {
  return provider === 'claude' ? Boolean(config.apiKeys.anthropic) : Boolean(config.apiKeys.googleAi);
}

export function createCompletion(provider: AIProvider = config.ai.provider): CompletionFn {
  const generate = provider === 'claude' ? generateWithClaude : generateWithGemini;
  return async (prompt: string, options: CompletionOptions = {}) => {
    const response = await generate(prompt, options);
    return response.text;
  };
}
