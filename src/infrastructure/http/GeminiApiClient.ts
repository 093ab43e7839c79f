import fetch, { RequestInit } from 'node-fetch';
import { IGeneratorClient } from '../../core/interfaces/IGeneratorClient.js';
import { ConversationEntry } from '../../core/entities/Message.js';
import { errorMessage } from '../../core/errors.js';
import { EMPTY_REPLY_FALLBACK, UNAVAILABLE_FALLBACK } from '../../core/fallbacks.js';
import {
  CircuitBreaker,
  CircuitBreakerStats,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  createErrorLog,
  isRetryableError,
  withRetry,
} from '../../utils/retry.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { DEFAULT_EXTRACTION_STRATEGIES, ExtractionStrategy, extractReply } from './replyExtraction.js';


export const DEFAULT_GEMINI_API_URL =
  'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent';

export interface GeneratorSettings {
  apiUrl: string;
  apiKey: string;
  timeoutMs: number;
  temperature: number;
  maxOutputTokens: number;
  historyLimit: number;
  retryAttempts: number;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<HttpResponseLike>;

export interface GeminiClientDeps {
  fetch?: FetchLike;
  circuitBreaker?: CircuitBreaker;
  strategies?: readonly ExtractionStrategy[];
  logger?: Logger;
}

/**
 * Renders history and prompt into the single text block sent upstream.
 * Only the most recent `historyLimit` entries are kept, oldest first.
 */
export function buildContext(
  prompt: string,
  history: ConversationEntry[],
  historyLimit: number
): string {
  const recent = historyLimit > 0 ? history.slice(-historyLimit) : [];
  if (recent.length === 0) {
    return `User: ${prompt}\nAI:`;
  }

  let context = 'Previous conversation:\n';
  for (const entry of recent) {
    context += `${entry.speaker}: ${entry.text}\n`;
  }
  context += `\nUser: ${prompt}\nAI:`;
  return context;
}

/**
 * Gemini generateContent client.
 * `generate` never rejects: transport problems resolve to UNAVAILABLE_FALLBACK
 * and responses without usable text to EMPTY_REPLY_FALLBACK.
 */
export class GeminiApiClient implements IGeneratorClient {
  private readonly settings: Readonly<GeneratorSettings>;
  private readonly fetchImpl: FetchLike;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly strategies: readonly ExtractionStrategy[];
  private readonly retryConfig: RetryConfig;
  private readonly logger: Logger;

  constructor(settings: GeneratorSettings, deps: GeminiClientDeps = {}) {
    this.settings = Object.freeze({ ...settings });
    this.fetchImpl = deps.fetch ?? fetch;
    this.circuitBreaker = deps.circuitBreaker ?? new CircuitBreaker(5, 60000);
    this.strategies = deps.strategies ?? DEFAULT_EXTRACTION_STRATEGIES;
    this.logger = deps.logger ?? silentLogger;
    this.retryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      maxAttempts: Math.max(1, settings.retryAttempts),
      timeoutMs: settings.timeoutMs,
    };
  }

  async generate(prompt: string, history: ConversationEntry[]): Promise<string> {
    const context = buildContext(prompt, history, this.settings.historyLimit);

    let payload: unknown;
    try {
      payload = await this.circuitBreaker.execute(() =>
        withRetry(
          () => this.post(context),
          this.retryConfig,
          (log) => {
            if (!log.success) {
              this.logger.debug(
                `attempt ${log.attempt} failed: ${this.redact(log.error ?? 'unknown error')}`
              );
            }
          },
          isRetryableError
        )
      );
    } catch (error) {
      this.logger.error(
        JSON.stringify(
          createErrorLog(
            new Date(),
            this.retryConfig.maxAttempts,
            this.settings.apiUrl,
            this.redact(errorMessage(error))
          )
        )
      );
      return UNAVAILABLE_FALLBACK;
    }

    const text = extractReply(payload, this.strategies);
    if (text === undefined) {
      this.logger.warn('response carried no usable text');
      return EMPTY_REPLY_FALLBACK;
    }
    return text;
  }

  async healthCheck(): Promise<boolean> {
    return this.circuitBreaker.getState() !== 'open';
  }

  getCircuitBreakerStats(): CircuitBreakerStats {
    return this.circuitBreaker.getStats();
  }

  private async post(context: string): Promise<unknown> {
    const res = await this.fetchImpl(this.requestUrl(), {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        contents: [{ parts: [{ text: context }] }],
        generationConfig: {
          temperature: this.settings.temperature,
          maxOutputTokens: this.settings.maxOutputTokens,
        },
      }),
      timeout: this.settings.timeoutMs,
    });

    if (!res.ok) {
      throw new Error(`HTTP ${res.status}`);
    }

    return res.json();
  }

  private requestUrl(): string {
    const separator = this.settings.apiUrl.includes('?') ? '&' : '?';
    return `${this.settings.apiUrl}${separator}key=${encodeURIComponent(this.settings.apiKey)}`;
  }

  /**
   * Transport errors may echo the request URL, key included
   */
  private redact(message: string): string {
    const { apiKey } = this.settings;
    if (!apiKey) {
      return message;
    }
    return message
      .split(encodeURIComponent(apiKey))
      .join('***')
      .split(apiKey)
      .join('***');
  }
}
