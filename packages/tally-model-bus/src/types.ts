/**
 * types.ts - Core type definitions for the Model Bus
 * -----------------------------------------------------------------------------
 * - Request/response shapes shared by every reasoning backend.
 * - Provenance attached to each response for tracing.
 *
 * INVARIANT: Adapters validate requests against ModelBusRequestSchema.
 * INVARIANT: Responses always carry provenance.
 */

import { z } from 'zod';

// ============================================================================
// Model Message Types
// ============================================================================

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().min(1).max(100000),
});

// ============================================================================
// Model Request Types
// ============================================================================

/**
 * Model generation parameters
 */
export interface ModelParameters {
  /** Temperature for sampling (0.0 - 2.0) */
  temperature?: number;
  max_tokens?: number;
  /** Generation halts before emitting any of these */
  stop_sequences?: string[];
  top_p?: number;
}

export const ModelParametersSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().min(1).max(200000).optional(),
  stop_sequences: z.array(z.string()).max(4).optional(),
  top_p: z.number().min(0).max(1).optional(),
});

/**
 * Request to invoke a model through the bus
 */
export interface ModelBusRequest {
  /** Model identifier (e.g., 'gpt-4o-mini', 'local') */
  model_id: string;
  messages: ChatMessage[];
  parameters?: ModelParameters;
  /** Trace ID for correlating every call made for one record */
  trace_id: string;
}

export const ModelBusRequestSchema = z.object({
  model_id: z.string().min(1).max(255),
  messages: z.array(ChatMessageSchema).min(1).max(1000),
  parameters: ModelParametersSchema.optional(),
  trace_id: z.string().uuid(),
});

/**
 * Validate a request before it reaches a backend.
 * Throws with every schema issue listed.
 */
export function assertValidRequest(request: ModelBusRequest): void {
  const result = ModelBusRequestSchema.safeParse(request);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid model request: ${detail}`);
  }
}

// ============================================================================
// Model Response Types
// ============================================================================

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens?: number;
}

export type FinishReason = 'stop' | 'length' | 'error' | 'content_filter';

/**
 * Provenance information for tracing
 */
export interface ModelProvenance {
  /** Provider that handled the request (openai, local) */
  provider: string;
  /** Actual model ID used */
  model_id: string;
  usage: TokenUsage;
  latency_ms: number;
  trace_id: string;
  /** Vendor-specific request ID (if available) */
  vendor_request_id?: string;
  timestamp: Date;
}

export interface ModelBusResponse {
  content: string;
  finish_reason: FinishReason;
  provenance: ModelProvenance;
}

// ============================================================================
// Adapter Types
// ============================================================================

/**
 * Provider configuration
 */
export interface ProviderConfig {
  /** API key; falls back to the provider's environment variable */
  api_key?: string;
  base_url?: string;
  timeout_ms?: number;
  /** Maximum retries for transient failures */
  max_retries?: number;
  /** Base delay for exponential backoff in ms */
  retry_base_delay_ms?: number;
}

/**
 * Reasoning backend capability: one call per reasoning step
 */
export interface ModelBusAdapter {
  readonly provider: string;

  /** Whether the adapter holds what it needs to call out (e.g. an API key) */
  isConfigured(): boolean;

  /**
   * Invoke the model. Rejects on transport, API or validation failure.
   */
  invoke(request: ModelBusRequest): Promise<ModelBusResponse>;
}
