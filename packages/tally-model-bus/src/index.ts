/**
 * index.ts - Model Bus package entry point
 * -----------------------------------------------------------------------------
 * The reasoning backend capability used by the reconciliation agent.
 *
 * INVARIANT: All vendor API calls go through this package's HTTP client.
 */

// Types
export {
  MessageRole,
  ChatMessage,
  ChatMessageSchema,
  ModelParameters,
  ModelParametersSchema,
  ModelBusRequest,
  ModelBusRequestSchema,
  assertValidRequest,
  TokenUsage,
  FinishReason,
  ModelProvenance,
  ModelBusResponse,
  ProviderConfig,
  ModelBusAdapter,
} from './types';

// HTTP Client (internal, but exposed for testing)
export { ModelBusHttpClient, HttpRequestOptions, HttpResponse, HttpClientConfig } from './http-client';

// Adapters
export {
  OpenAIAdapter,
  createOpenAIAdapter,
  LocalAdapter,
  LocalAdapterConfig,
  createLocalAdapter,
  MockResponseConfig,
  LocalInvocationRecord,
} from './adapters';
