import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { ENV_DEFAULTS } from '../config/env.validation';
import {
  CircuitBreaker,
  CircuitOpenError,
  exponentialBackoff,
  withRetry,
} from '../common/utils/resilience';
import { SummarizationClient } from './summarization.client';
import { SummarizationError } from './summary.errors';

/**
 * Gemini `generateContent` over REST.
 *
 * Each model gets up to SUMMARY_MAX_ATTEMPTS tries, retrying transient
 * failures only. A 404 moves on to the next configured model; the first model
 * that answers is used from then on.
 */
@Injectable()
export class GeminiSummarizationClient extends SummarizationClient {
  private readonly log = new Logger(GeminiSummarizationClient.name);
  private readonly circuitBreaker: CircuitBreaker;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private models: string[];

  constructor(private readonly cfg: ConfigService) {
    super();
    this.baseUrl = (
      cfg.get<string>('GEMINI_BASE_URL') ?? ENV_DEFAULTS.GEMINI_BASE_URL
    ).replace(/\/+$/, '');
    this.timeoutMs =
      cfg.get<number>('SUMMARY_TIMEOUT_MS') ?? ENV_DEFAULTS.SUMMARY_TIMEOUT_MS;
    this.maxAttempts =
      cfg.get<number>('SUMMARY_MAX_ATTEMPTS') ??
      ENV_DEFAULTS.SUMMARY_MAX_ATTEMPTS;
    this.retryDelayMs =
      cfg.get<number>('SUMMARY_RETRY_DELAY_MS') ??
      ENV_DEFAULTS.SUMMARY_RETRY_DELAY_MS;

    const primary = cfg.get<string>('GEMINI_MODEL') ?? ENV_DEFAULTS.GEMINI_MODEL;
    const fallbacks = (
      cfg.get<string>('GEMINI_FALLBACK_MODELS') ??
      ENV_DEFAULTS.GEMINI_FALLBACK_MODELS
    )
      .split(',')
      .map((m) => m.trim())
      .filter(Boolean);
    this.models = [...new Set([primary, ...fallbacks])];

    // 5 consecutive failures -> fail fast for 30s
    this.circuitBreaker = new CircuitBreaker('gemini', 5, 30_000);
  }

  async summarize(prompt: string): Promise<string> {
    for (const model of this.models) {
      try {
        const text = await this.generate(model, prompt);
        this.preferModel(model);
        return text;
      } catch (err) {
        if (err instanceof SummarizationError && err.code === 'MODEL_NOT_FOUND') {
          this.log.warn(`[summarize] Model ${model} not available, trying next`);
          continue;
        }
        throw err;
      }
    }

    throw new SummarizationError(
      'MODEL_NOT_FOUND',
      `None of the configured models are available: ${this.models.join(', ')}`,
    );
  }

  /** Models in the order they will be tried. */
  getModels(): readonly string[] {
    return this.models;
  }

  private preferModel(model: string) {
    if (this.models[0] === model) return;
    this.log.log(`[summarize] Using model ${model} from now on`);
    this.models = [model, ...this.models.filter((m) => m !== model)];
  }

  private async generate(model: string, prompt: string): Promise<string> {
    const url = `${this.baseUrl}/v1beta/models/${encodeURIComponent(model)}:generateContent`;
    const body = {
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: { temperature: 0.3 },
    };

    const data = await withRetry(
      async () => {
        const startedAt = Date.now();
        try {
          const result = await this.circuitBreaker.execute(async () => {
            const { data } = await axios.post<unknown>(url, body, {
              timeout: this.timeoutMs,
              headers: {
                'Content-Type': 'application/json',
                'x-goog-api-key': this.cfg.get<string>('GOOGLE_API_KEY') ?? '',
              },
            });
            return data;
          });
          this.log.debug(
            `[generate] ${model} answered in ${Date.now() - startedAt}ms`,
          );
          return result;
        } catch (err) {
          const mapped = this.toSummarizationError(err);
          this.log.warn(
            `[generate] ${model} failed (${mapped.code}): ${mapped.message}`,
          );
          throw mapped;
        }
      },
      {
        maxAttempts: this.maxAttempts,
        backoff: exponentialBackoff(this.retryDelayMs, 5_000),
        shouldRetry: (err) => err instanceof SummarizationError && err.transient,
      },
    );

    return this.extractText(data);
  }

  private extractText(data: unknown): string {
    if (!isRecord(data)) {
      throw new SummarizationError('EMPTY_RESPONSE', 'Response is not a JSON object');
    }

    const candidate: unknown = Array.isArray(data.candidates)
      ? data.candidates[0]
      : undefined;
    const content = isRecord(candidate) ? candidate.content : undefined;
    const parts: unknown[] =
      isRecord(content) && Array.isArray(content.parts) ? content.parts : [];

    const text = parts
      .map((p) =>
        isRecord(p) && typeof p.text === 'string' ? p.text : '',
      )
      .join('')
      .trim();

    if (text) return text;

    const feedback = isRecord(data.promptFeedback) ? data.promptFeedback : undefined;
    const blocked =
      (isRecord(candidate) && candidate.finishReason === 'SAFETY') ||
      (feedback !== undefined && typeof feedback.blockReason === 'string');
    if (blocked) {
      throw new SummarizationError('BLOCKED', 'Response blocked by safety settings');
    }
    throw new SummarizationError('EMPTY_RESPONSE', 'Gemini returned no text');
  }

  private toSummarizationError(err: unknown): SummarizationError {
    if (err instanceof SummarizationError) return err;

    if (err instanceof CircuitOpenError) {
      return new SummarizationError('UNAVAILABLE', err.message);
    }

    if (axios.isAxiosError(err)) {
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        return new SummarizationError(
          'TIMEOUT',
          `No response within ${this.timeoutMs}ms`,
        );
      }

      const status = err.response?.status;
      const detail = describeApiError(err.response?.data) ?? err.message;

      if (status === undefined) {
        return new SummarizationError('NETWORK', `${err.code ?? 'network error'}: ${err.message}`);
      }
      if (
        status === 401 ||
        status === 403 ||
        JSON.stringify(err.response?.data ?? '').includes('API_KEY_INVALID')
      ) {
        return new SummarizationError('AUTH', `Rejected API key (${status}): ${detail}`);
      }
      if (status === 404) {
        return new SummarizationError('MODEL_NOT_FOUND', detail);
      }
      if (status === 429) {
        return new SummarizationError('RATE_LIMITED', detail);
      }
      if (status >= 500) {
        return new SummarizationError('UPSTREAM', `Gemini ${status}: ${detail}`);
      }
      return new SummarizationError('BAD_REQUEST', `Gemini ${status}: ${detail}`);
    }

    return new SummarizationError(
      'UPSTREAM',
      err instanceof Error ? err.message : String(err),
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeApiError(data: unknown): string | undefined {
  if (isRecord(data) && isRecord(data.error) && typeof data.error.message === 'string') {
    return data.error.message;
  }
  return undefined;
}
