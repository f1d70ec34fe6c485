/**
 * local.ts - Scripted adapter for tests and offline runs
 * -----------------------------------------------------------------------------
 * - Plays back queued responses in order, then per-model or default ones.
 * - Can simulate backend failures.
 * - Records every invocation for assertions.
 *
 * INVARIANT: This adapter NEVER makes network calls.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ModelBusAdapter,
  ModelBusRequest,
  ModelBusResponse,
  TokenUsage,
  FinishReason,
  assertValidRequest,
} from '../types';

// ============================================================================
// Local Adapter Types
// ============================================================================

export interface MockResponseConfig {
  content: string;
  finish_reason?: FinishReason;
  /** Simulated latency in ms */
  latency_ms?: number;
  usage?: Partial<TokenUsage>;
  /** Error to throw instead of responding */
  error?: string;
}

export interface LocalInvocationRecord {
  request: ModelBusRequest;
  response?: ModelBusResponse;
  error?: Error;
  timestamp: Date;
}

export interface LocalAdapterConfig {
  /** Played back one per invocation, before any other source */
  script?: Array<MockResponseConfig | string>;
  default_response?: MockResponseConfig;
}

// ============================================================================
// Local Adapter Implementation
// ============================================================================

export class LocalAdapter implements ModelBusAdapter {
  readonly provider = 'local';

  private script: MockResponseConfig[];
  private defaultResponse: MockResponseConfig;
  private modelResponses: Map<string, MockResponseConfig> = new Map();
  private invocations: LocalInvocationRecord[] = [];

  constructor(config?: LocalAdapterConfig) {
    this.script = (config?.script ?? []).map(toMockResponse);
    this.defaultResponse = config?.default_response ?? {
      content: 'Final Answer: NEEDS_REVIEW. No scripted response was configured. Confidence: 50%',
      finish_reason: 'stop',
    };
  }

  isConfigured(): boolean {
    return true;
  }

  /**
   * Queue responses to be returned by the next invocations, in order
   */
  enqueue(...responses: Array<MockResponseConfig | string>): void {
    this.script.push(...responses.map(toMockResponse));
  }

  /**
   * Configure the response for a model ID once the script is exhausted
   */
  setResponse(model_id: string, config: MockResponseConfig): void {
    this.modelResponses.set(model_id, config);
  }

  clearAllResponses(): void {
    this.script = [];
    this.modelResponses.clear();
  }

  pendingScript(): number {
    return this.script.length;
  }

  getInvocations(): LocalInvocationRecord[] {
    return [...this.invocations];
  }

  clearInvocations(): void {
    this.invocations = [];
  }

  async invoke(request: ModelBusRequest): Promise<ModelBusResponse> {
    assertValidRequest(request);

    const startTime = Date.now();
    const config = this.script.shift() ?? this.modelResponses.get(request.model_id) ?? this.defaultResponse;

    if (config.latency_ms && config.latency_ms > 0) {
      await this.sleep(config.latency_ms);
    }

    if (config.error) {
      const error = new Error(config.error);
      this.invocations.push({ request, error, timestamp: new Date() });
      throw error;
    }

    const usage: TokenUsage = {
      input_tokens: config.usage?.input_tokens ?? this.estimateTokens(request.messages.map((m) => m.content).join('')),
      output_tokens: config.usage?.output_tokens ?? this.estimateTokens(config.content),
      total_tokens: config.usage?.total_tokens,
    };
    usage.total_tokens = usage.total_tokens ?? usage.input_tokens + usage.output_tokens;

    const response: ModelBusResponse = {
      content: applyStopSequences(config.content, request.parameters?.stop_sequences),
      finish_reason: config.finish_reason ?? 'stop',
      provenance: {
        provider: this.provider,
        model_id: request.model_id,
        usage,
        latency_ms: Date.now() - startTime,
        trace_id: request.trace_id,
        vendor_request_id: `local-${uuidv4()}`,
        timestamp: new Date(),
      },
    };

    this.invocations.push({ request, response, timestamp: new Date() });

    return response;
  }

  /**
   * Rough estimate: ~4 chars per token
   */
  private estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function toMockResponse(entry: MockResponseConfig | string): MockResponseConfig {
  return typeof entry === 'string' ? { content: entry } : entry;
}

/**
 * Cut content at the first stop sequence, as a real backend would
 */
function applyStopSequences(content: string, stops: string[] | undefined): string {
  let end = content.length;
  for (const stop of stops ?? []) {
    const index = content.indexOf(stop);
    if (stop.length > 0 && index !== -1 && index < end) {
      end = index;
    }
  }
  return content.slice(0, end);
}

export function createLocalAdapter(config?: LocalAdapterConfig): LocalAdapter {
  return new LocalAdapter(config);
}
