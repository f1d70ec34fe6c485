/**
 * Parsing of model output: one ReAct turn, and the final verdict text
 */

import { VerdictStatus } from '../types';

export const DEFAULT_CONFIDENCE = 50;

export type AgentTurn =
  | { kind: 'final'; answer: string }
  | { kind: 'action'; tool: string; input: string }
  | { kind: 'invalid'; reason: string };

const FINAL_ANSWER = /Final Answer\s*:/i;
const ACTION_LINE = /^\s*Action\s*:[ \t]*(.*)$/im;
const ACTION_INPUT_LINE = /^\s*Action Input\s*:[ \t]*(.*)$/im;

/**
 * Drop anything the model wrote after a made-up Observation
 */
export function truncateAtObservation(output: string): string {
  const index = output.search(/(^|\n)\s*Observation\s*:/i);
  return index === -1 ? output : output.slice(0, index);
}

export function parseAgentTurn(output: string): AgentTurn {
  const finalMatch = FINAL_ANSWER.exec(output);
  const actionMatch = ACTION_LINE.exec(output);

  if (finalMatch && actionMatch) {
    return {
      kind: 'invalid',
      reason: 'Invalid format: give either an Action or a Final Answer, not both.',
    };
  }

  if (finalMatch) {
    return { kind: 'final', answer: output.slice(finalMatch.index + finalMatch[0].length).trim() };
  }

  if (actionMatch) {
    const tool = actionMatch[1].trim().replace(/^[`'"[\s]+|[`'"\]\s]+$/g, '');
    const inputMatch = ACTION_INPUT_LINE.exec(output);
    return { kind: 'action', tool, input: inputMatch ? inputMatch[1].trim() : '' };
  }

  return {
    kind: 'invalid',
    reason: "Invalid format: missing 'Action:' after 'Thought:'. Name one tool on an Action line, or give the Final Answer.",
  };
}

// ============================================================================
// Final answer
// ============================================================================

export interface ParsedVerdict {
  status: VerdictStatus;
  confidence: number;
  issues: string[];
}

const LABELLED_CONFIDENCE = /confidence(?:\s+score)?\s*(?:\([^)]*\))?\s*(?:of|is|:|=)?\s*(\d{1,3})/i;
const NUMERIC_CONFIDENCE = /(\d+)\s*(?:%|confidence|score)/i;
const ISSUE_WORDS = /\b(missing|invalid|error|violation)/i;
const STATUS_LINE = /^(overall\s+)?(validation\s+)?status\s*:/i;
const BULLET = /^\s*(?:[-*•]|\d+[.)])\s*/;

/**
 * INVALID wins over everything; then an explicit NEEDS_REVIEW; then VALID.
 */
export function parseStatus(text: string): VerdictStatus {
  const upper = text.toUpperCase();
  if (/\bINVALID\b/.test(upper)) return 'INVALID';
  if (/\bNEEDS[_ ]REVIEW\b/.test(upper)) return 'NEEDS_REVIEW';
  if (/\bVALID\b/.test(upper)) return 'VALID';
  return 'NEEDS_REVIEW';
}

export function parseConfidence(text: string): number {
  const match = LABELLED_CONFIDENCE.exec(text) ?? NUMERIC_CONFIDENCE.exec(text);
  if (!match) return DEFAULT_CONFIDENCE;
  return Math.min(100, Math.max(0, Number(match[1])));
}

/**
 * Issue lines, only when the text carries an INVALID/ERROR/VIOLATION marker.
 * Repeats are dropped by exact match.
 */
export function parseIssues(text: string): string[] {
  if (!/INVALID|ERROR|VIOLATION/.test(text)) {
    return [];
  }

  const issues: string[] = [];
  for (const rawLine of text.split('\n')) {
    const line = rawLine.replace(BULLET, '').trim();
    if (!line || STATUS_LINE.test(line) || !ISSUE_WORDS.test(line)) continue;
    if (!issues.includes(line)) {
      issues.push(line);
    }
  }
  return issues;
}

export function parseVerdict(text: string): ParsedVerdict {
  return {
    status: parseStatus(text),
    confidence: parseConfidence(text),
    issues: parseIssues(text),
  };
}
