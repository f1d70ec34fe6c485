/**
 * local-adapter.test.ts - Scripted local adapter
 */

import { v4 as uuidv4 } from 'uuid';
import { LocalAdapter, ModelBusRequest, createLocalAdapter } from '../src';

function request(overrides: Partial<ModelBusRequest> = {}): ModelBusRequest {
  return {
    model_id: 'local',
    messages: [{ role: 'user', content: 'Hello' }],
    trace_id: uuidv4(),
    ...overrides,
  };
}

describe('LocalAdapter', () => {
  let adapter: LocalAdapter;

  beforeEach(() => {
    adapter = createLocalAdapter({ script: ['first', { content: 'second', finish_reason: 'length' }] });
  });

  it('plays the script in order, then falls back to the default', async () => {
    const first = await adapter.invoke(request());
    const second = await adapter.invoke(request());
    const third = await adapter.invoke(request());

    expect(first.content).toBe('first');
    expect(second.content).toBe('second');
    expect(second.finish_reason).toBe('length');
    expect(third.content).toBe(
      'Final Answer: NEEDS_REVIEW. No scripted response was configured. Confidence: 50%'
    );
    expect(adapter.pendingScript()).toBe(0);
  });

  it('prefers a per-model response over the default once the script is empty', async () => {
    adapter.clearAllResponses();
    adapter.setResponse('local-custom', { content: 'custom', usage: { input_tokens: 10, output_tokens: 20 } });

    const response = await adapter.invoke(request({ model_id: 'local-custom' }));

    expect(response.content).toBe('custom');
    expect(response.provenance.usage).toEqual({ input_tokens: 10, output_tokens: 20, total_tokens: 30 });
  });

  it('records invocations with provenance', async () => {
    const traceId = uuidv4();
    const response = await adapter.invoke(request({ trace_id: traceId }));

    const invocations = adapter.getInvocations();
    expect(invocations).toHaveLength(1);
    expect(invocations[0].request.trace_id).toBe(traceId);
    expect(response.provenance.provider).toBe('local');
    expect(response.provenance.trace_id).toBe(traceId);
    expect(response.provenance.vendor_request_id).toMatch(/^local-/);
  });

  it('throws a scripted error and records it', async () => {
    adapter.clearAllResponses();
    adapter.enqueue({ content: '', error: 'Simulated model failure' });

    await expect(adapter.invoke(request())).rejects.toThrow('Simulated model failure');
    expect(adapter.getInvocations()[0].error?.message).toBe('Simulated model failure');
  });

  it('cuts content at the first stop sequence', async () => {
    adapter.clearAllResponses();
    adapter.enqueue('Action: check_duplicate\nObservation: made up');

    const response = await adapter.invoke(
      request({ parameters: { stop_sequences: ['\nObservation:'] } })
    );

    expect(response.content).toBe('Action: check_duplicate');
  });

  it('rejects a malformed request', async () => {
    await expect(adapter.invoke(request({ trace_id: 'not-a-uuid' }))).rejects.toThrow(
      'Invalid model request'
    );
    expect(adapter.pendingScript()).toBe(2);
  });
});
