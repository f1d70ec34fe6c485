/**
 * ReAct prompt for receipt validation
 */

import { ReceiptTool } from '../tools';

export const OBSERVATION_STOP = '\nObservation:';

export function buildSystemPrompt(tools: ReceiptTool[]): string {
  const toolLines = tools.map((tool) => `${tool.name}: ${tool.description}`).join('\n');
  const toolNames = tools.map((tool) => tool.name).join(', ');

  return `You are an expert receipt validation agent. Your task is to validate receipts for reconciliation.

You have access to the following tools:
${toolLines}

Every tool checks the receipt given in the question. Action Input may be left empty.

Use the following format:

Question: the input question you must answer
Thought: you should always think about what to do
Action: the action to take, should be one of [${toolNames}]
Action Input: the input to the action
Observation: the result of the action
... (this Thought/Action/Action Input/Observation can repeat N times)
Thought: I now know the final answer
Final Answer: Provide a comprehensive validation result with:
1. Overall validation status (VALID/INVALID/NEEDS_REVIEW)
2. Confidence score (0-100)
3. Detailed reasoning
4. Any issues found`;
}

export function buildQuestion(formattedReceipt: string): string {
  return `Question: Validate this receipt for reconciliation:\n${formattedReceipt}`;
}
