/**
 * openai.ts - OpenAI adapter for the Model Bus
 * -----------------------------------------------------------------------------
 * - Calls the Chat Completions API through the internal HTTP client.
 * - Validates the response body before reading it.
 * - Maps usage and finish reason into provenance.
 *
 * INVARIANT: No 'openai' npm package is imported anywhere.
 */

import { z } from 'zod';
import { ModelBusHttpClient } from '../http-client';
import {
  ModelBusAdapter,
  ModelBusRequest,
  ModelBusResponse,
  ProviderConfig,
  TokenUsage,
  FinishReason,
  assertValidRequest,
} from '../types';

// ============================================================================
// OpenAI API Types (internal, not exported)
// ============================================================================

interface OpenAIRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
  temperature?: number;
  max_tokens?: number;
  stop?: string[];
  top_p?: number;
}

const OpenAIResponseSchema = z.object({
  id: z.string(),
  model: z.string(),
  choices: z.array(
    z.object({
      index: z.number(),
      message: z.object({
        role: z.string(),
        content: z.string().nullable(),
      }),
      finish_reason: z.string().nullable(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

const OpenAIErrorSchema = z.object({
  error: z.object({
    message: z.string(),
  }),
});

// ============================================================================
// OpenAI Adapter Implementation
// ============================================================================

export class OpenAIAdapter implements ModelBusAdapter {
  readonly provider = 'openai';

  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private client: ModelBusHttpClient;

  constructor(config?: ProviderConfig, env: Record<string, string | undefined> = process.env) {
    this.apiKey = config?.api_key ?? env.OPENAI_API_KEY ?? '';
    this.baseUrl = (config?.base_url ?? env.OPENAI_BASE_URL ?? 'https://api.openai.com').replace(/\/+$/, '');
    this.timeoutMs = config?.timeout_ms ?? 60000;
    this.client = new ModelBusHttpClient({
      default_timeout_ms: this.timeoutMs,
      max_retries: config?.max_retries,
      retry_base_delay_ms: config?.retry_base_delay_ms,
    });
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async invoke(request: ModelBusRequest): Promise<ModelBusResponse> {
    if (!this.apiKey) {
      throw new Error('OpenAI API key not configured (set OPENAI_API_KEY)');
    }
    assertValidRequest(request);

    const startTime = Date.now();
    const params = request.parameters;

    const openaiRequest: OpenAIRequest = {
      model: request.model_id,
      messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
      ...(params?.temperature !== undefined && { temperature: params.temperature }),
      ...(params?.max_tokens !== undefined && { max_tokens: params.max_tokens }),
      ...(params?.stop_sequences && { stop: params.stop_sequences }),
      ...(params?.top_p !== undefined && { top_p: params.top_p }),
    };

    const response = await this.client.request({
      method: 'POST',
      url: `${this.baseUrl}/v1/chat/completions`,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: openaiRequest,
      timeout_ms: this.timeoutMs,
    });

    const latencyMs = Date.now() - startTime;

    if (response.status >= 400) {
      const errorBody = OpenAIErrorSchema.safeParse(response.body);
      const detail = errorBody.success ? errorBody.data.error.message : response.raw;
      throw new Error(`OpenAI API error (${response.status}): ${detail}`);
    }

    const parsed = OpenAIResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new Error(`OpenAI returned an unexpected response body: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const openaiResponse = parsed.data;
    const choice = openaiResponse.choices[0];
    if (!choice) {
      throw new Error('OpenAI returned no choices');
    }

    const usage: TokenUsage = {
      input_tokens: openaiResponse.usage?.prompt_tokens ?? 0,
      output_tokens: openaiResponse.usage?.completion_tokens ?? 0,
      total_tokens: openaiResponse.usage?.total_tokens,
    };

    return {
      content: choice.message.content ?? '',
      finish_reason: this.mapFinishReason(choice.finish_reason),
      provenance: {
        provider: this.provider,
        model_id: openaiResponse.model,
        usage,
        latency_ms: latencyMs,
        trace_id: request.trace_id,
        vendor_request_id: openaiResponse.id,
        timestamp: new Date(),
      },
    };
  }

  private mapFinishReason(reason: string | null): FinishReason {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }
}

export function createOpenAIAdapter(
  config?: ProviderConfig,
  env: Record<string, string | undefined> = process.env
): OpenAIAdapter {
  return new OpenAIAdapter(config, env);
}
