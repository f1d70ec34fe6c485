/**
 * ReceiptValidator - bounded ReAct loop over the rule tools
 *
 * Thought -> Action -> Observation, repeated until the model gives a Final
 * Answer or the iteration cap is hit. The cap yields NEEDS_REVIEW, never
 * success. Any exception (backend down, timeout, bad request) yields ERROR
 * with confidence 0; it is not retried.
 */

import { v4 as uuidv4 } from 'uuid';
import { ChatMessage, ModelBusAdapter } from 'tally-model-bus';
import { ReconciliationConfig } from '../config';
import { Receipt, formatReceiptForAgent } from '../receipt';
import { ToolRegistry, classifyToolVerdict } from '../tools';
import { Verdict } from '../types';
import { OBSERVATION_STOP, buildQuestion, buildSystemPrompt } from './prompt';
import { DEFAULT_CONFIDENCE, parseAgentTurn, parseVerdict, truncateAtObservation } from './parse';

export interface ReceiptValidatorOptions {
  adapter: ModelBusAdapter;
  tools: ToolRegistry;
  config: Pick<ReconciliationConfig, 'model' | 'temperature' | 'maxIterations'>;
}

/**
 * Anything that turns a receipt into a verdict. The orchestrator depends on
 * this, so tests can substitute a scripted validator.
 */
export interface Validator {
  validate(receipt: Receipt): Promise<Verdict>;
}

export class ReceiptValidator implements Validator {
  private adapter: ModelBusAdapter;
  private tools: ToolRegistry;
  private config: ReceiptValidatorOptions['config'];
  private systemPrompt: string;

  constructor(options: ReceiptValidatorOptions) {
    this.adapter = options.adapter;
    this.tools = options.tools;
    this.config = options.config;
    this.systemPrompt = buildSystemPrompt(this.tools.list());
  }

  async validate(receipt: Receipt): Promise<Verdict> {
    const traceId = uuidv4();
    const toolCalls: string[] = [];
    const messages: ChatMessage[] = [
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: buildQuestion(formatReceiptForAgent(receipt)) },
    ];

    let iterations = 0;
    let lastOutput = '';

    try {
      while (iterations < this.config.maxIterations) {
        iterations++;

        const response = await this.adapter.invoke({
          model_id: this.config.model,
          messages: [...messages],
          parameters: {
            temperature: this.config.temperature,
            stop_sequences: [OBSERVATION_STOP],
          },
          trace_id: traceId,
        });

        const output = truncateAtObservation(response.content);
        lastOutput = output.trim();
        const turn = parseAgentTurn(output);

        if (turn.kind === 'final') {
          const parsed = parseVerdict(turn.answer);
          return {
            ...parsed,
            reasoning: turn.answer,
            receiptId: receipt.id,
            receiptNumber: receipt.receiptNumber,
            iterations,
            toolCalls,
          };
        }

        if (lastOutput) {
          messages.push({ role: 'assistant', content: output });
        }

        const observation =
          turn.kind === 'action' ? await this.runTool(turn.tool, receipt, toolCalls) : turn.reason;
        messages.push({ role: 'user', content: `Observation: ${observation}` });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`✗ Validation error for receipt ${receipt.id}: ${message}`);
      return {
        status: 'ERROR',
        confidence: 0,
        reasoning: `Validation error: ${message}`,
        issues: [`Validation failed: ${message}`],
        receiptId: receipt.id,
        receiptNumber: receipt.receiptNumber,
        iterations,
        toolCalls,
      };
    }

    const note = `Agent stopped after ${iterations} iterations without a final answer`;
    console.warn(`⚠ ${note} (receipt ${receipt.id})`);
    return {
      status: 'NEEDS_REVIEW',
      confidence: DEFAULT_CONFIDENCE,
      reasoning: lastOutput ? `${note}. Last output:\n${lastOutput}` : note,
      issues: [],
      receiptId: receipt.id,
      receiptNumber: receipt.receiptNumber,
      iterations,
      toolCalls,
    };
  }

  /**
   * Unknown tools and tool failures become observations; the loop goes on.
   */
  private async runTool(name: string, receipt: Receipt, toolCalls: string[]): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return `${name} is not a valid tool, try one of [${this.tools.names().join(', ')}].`;
    }

    toolCalls.push(tool.name);
    let observation: string;
    try {
      observation = await tool.invoke(receipt);
    } catch (error) {
      observation = `ERROR: ${error instanceof Error ? error.message : String(error)}`;
    }

    const verdict = classifyToolVerdict(observation);
    if (verdict.outcome === 'warn') {
      console.warn(`⚠ ${tool.name} on receipt ${receipt.id}: ${verdict.text}`);
    } else if (verdict.outcome === 'error') {
      console.error(`✗ ${tool.name} on receipt ${receipt.id}: ${verdict.text}`);
    }
    return observation;
  }
}
