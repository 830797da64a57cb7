import { Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import {
  FetchAbortedError,
  FetchTimeoutError,
  fetchWithTimeout,
} from '../common/http/fetch-with-timeout';
import { resolveAssetPath } from '../common/utils/asset-path';
import { compileSchemaValidator } from '../common/utils/schema-validate';
import { DIMENSION_CEILINGS } from './dimensions';
import type {
  JudgeOptions,
  Judgment,
  JudgmentClient,
  JudgmentRequest,
} from './judgment-client.interface';
import { JudgmentUnavailableError } from './judgment.errors';
import { LlmConfigService } from './llm-config.service';
import { buildJudgmentPrompt } from './prompts/judgment.user.template';

type ChatCompletion = {
  choices?: Array<{ message?: { content?: string }; text?: string }>;
};

type CompletionResult =
  | { ok: true; status: number; data: ChatCompletion | null }
  | { ok: false; status: number; errorText: string };

type RawJudgment = {
  score: number;
  feedback: string;
  issues: string[];
  suggestions?: string[];
};

const validateJudgment = compileSchemaValidator<RawJudgment>('judgment/schemas/judgment.schema.json');

/**
 * Judge backed by an OpenAI-compatible chat completions endpoint. Timeouts
 * and API errors are retried up to `LLM_MAX_ATTEMPTS`; malformed output is not.
 */
@Injectable()
export class LlmJudgmentClient implements JudgmentClient {
  private readonly logger = new Logger(LlmJudgmentClient.name);
  private readonly systemPrompt: string;

  constructor(private readonly llmConfigService: LlmConfigService) {
    const systemPromptPath = resolveAssetPath('judgment/prompts/judgment.system.txt');
    this.systemPrompt = readFileSync(systemPromptPath, 'utf-8').trim();
  }

  isConfigured(): boolean {
    return this.llmConfigService.isConfigured();
  }

  async judge(request: JudgmentRequest, options: JudgeOptions = {}): Promise<Judgment> {
    if (!this.isConfigured()) {
      throw new JudgmentUnavailableError('LLM_NOT_CONFIGURED', 'LLM_BASE_URL and LLM_MODEL must be set');
    }

    const { maxAttempts } = this.llmConfigService.getConfig();
    let lastError: JudgmentUnavailableError | undefined;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        return await this.runAttempt(request, options.signal);
      } catch (error) {
        if (!(error instanceof JudgmentUnavailableError) || !error.retryable) {
          throw error;
        }
        lastError = error;
        if (attempt < maxAttempts) {
          this.logger.warn(
            `Judge ${request.dimension} attempt ${attempt}/${maxAttempts} failed (${error.code}), retrying`,
          );
        }
      }
    }

    throw lastError ?? new JudgmentUnavailableError('LLM_API_ERROR', 'No judge attempt was made');
  }

  private async runAttempt(request: JudgmentRequest, signal?: AbortSignal): Promise<Judgment> {
    const config = this.llmConfigService.getConfig();
    const payload: Record<string, unknown> = {
      model: config.model,
      messages: [
        { role: 'system', content: this.systemPrompt },
        { role: 'user', content: buildJudgmentPrompt(request) },
      ],
      max_tokens: config.maxTokens,
      temperature: config.temperature,
    };
    if (config.responseFormat === 'json_object') {
      payload.response_format = { type: 'json_object' };
    }

    const apiUrl = this.resolveApiUrl(config.baseUrl);
    const startedAt = Date.now();
    let response = await this.fetchCompletion(apiUrl, payload, signal);
    if (!response.ok && payload.response_format && this.isResponseFormatUnsupported(response)) {
      const fallbackPayload = { ...payload };
      delete fallbackPayload.response_format;
      response = await this.fetchCompletion(apiUrl, fallbackPayload, signal);
    }

    if (!response.ok) {
      throw new JudgmentUnavailableError(
        'LLM_API_ERROR',
        `LLM API error: ${response.status} ${response.errorText.slice(0, 200)}`,
      );
    }
    this.logger.debug(`Judge ${request.dimension} answered in ${Date.now() - startedAt}ms`);

    return this.toJudgment(request, this.parseJson(this.extractContent(response.data)));
  }

  private toJudgment(request: JudgmentRequest, parsed: unknown): Judgment {
    const validation = validateJudgment(parsed);
    if (!validation.valid) {
      throw new JudgmentUnavailableError('LLM_SCHEMA_INVALID', validation.errors);
    }

    const ceiling = DIMENSION_CEILINGS[request.dimension];
    const { score, feedback, issues, suggestions } = validation.value;
    if (!Number.isFinite(score) || score > ceiling) {
      throw new JudgmentUnavailableError(
        'LLM_SCHEMA_INVALID',
        `${request.dimension} score ${score} is outside 0-${ceiling}`,
      );
    }

    return {
      score,
      feedback: feedback.trim(),
      issues: issues.map((issue) => issue.trim()).filter(Boolean),
      suggestions: (suggestions ?? []).map((suggestion) => suggestion.trim()).filter(Boolean),
    };
  }

  private async fetchCompletion(
    url: string,
    payload: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<CompletionResult> {
    const { apiKey, timeoutMs } = this.llmConfigService.getConfig();
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (apiKey) {
      headers.Authorization = `Bearer ${apiKey}`;
    }

    let response: { ok: boolean; status: number; text: string };
    try {
      response = await fetchWithTimeout(
        url,
        { method: 'POST', headers, body: JSON.stringify(payload) },
        timeoutMs,
        async (res) => ({ ok: res.ok, status: res.status, text: await res.text() }),
        signal,
      );
    } catch (error) {
      if (error instanceof FetchTimeoutError) {
        throw new JudgmentUnavailableError('LLM_TIMEOUT', error.message, { cause: error });
      }
      if (error instanceof FetchAbortedError) {
        throw new JudgmentUnavailableError('LLM_ABORTED', error.message, { cause: error });
      }
      const message = error instanceof Error ? error.message : 'Unknown network error';
      throw new JudgmentUnavailableError('LLM_API_ERROR', `LLM request failed: ${message}`, {
        cause: error,
      });
    }

    const { text } = response;
    if (!response.ok) {
      return { ok: false, status: response.status, errorText: text };
    }

    try {
      return { ok: true, status: response.status, data: text ? (JSON.parse(text) as ChatCompletion) : null };
    } catch (error) {
      this.logger.warn(`LLM response body is not JSON: ${error instanceof Error ? error.message : String(error)}`);
      return { ok: true, status: response.status, data: null };
    }
  }

  private extractContent(data: ChatCompletion | null): string {
    const content = data?.choices?.[0]?.message?.content ?? data?.choices?.[0]?.text;
    if (!content) {
      this.logger.warn('LLM response missing content');
      throw new JudgmentUnavailableError('LLM_API_ERROR', 'LLM response missing content');
    }
    return content.trim();
  }

  private parseJson(raw: string): unknown {
    const cleaned = this.stripCodeFences(raw.trim());
    try {
      return JSON.parse(cleaned);
    } catch {
      const start = cleaned.indexOf('{');
      const end = cleaned.lastIndexOf('}');
      if (start >= 0 && end > start) {
        try {
          return JSON.parse(cleaned.slice(start, end + 1));
        } catch (error) {
          throw new JudgmentUnavailableError('LLM_SCHEMA_INVALID', 'Invalid JSON output', { cause: error });
        }
      }
      throw new JudgmentUnavailableError('LLM_SCHEMA_INVALID', 'Invalid JSON output');
    }
  }

  private stripCodeFences(input: string): string {
    if (input.startsWith('```')) {
      return input.replace(/^```[a-zA-Z]*\n?/, '').replace(/```$/, '').trim();
    }
    return input;
  }

  private resolveApiUrl(baseUrl: string): string {
    const base = baseUrl.replace(/\/$/, '');
    if (base.endsWith('/chat/completions')) {
      return base;
    }
    if (base.endsWith('/v1')) {
      return `${base}/chat/completions`;
    }
    return `${base}/v1/chat/completions`;
  }

  private isResponseFormatUnsupported(response: { status: number; errorText: string }): boolean {
    if (response.status !== 400 && response.status !== 422) {
      return false;
    }
    const text = response.errorText.toLowerCase();
    return text.includes('response_format') || text.includes('json_object');
  }
}
