export { OpenAIAdapter, createOpenAIAdapter } from './openai';
export {
  LocalAdapter,
  LocalAdapterConfig,
  createLocalAdapter,
  MockResponseConfig,
  LocalInvocationRecord,
} from './local';
