/**
 * Type guards for Claude Agent SDK message types.
 *
 * These give the decomposer typed access to messages from the SDK's query()
 * function without `as any` casts.
 */

import type {
  SDKAssistantMessage,
  SDKMessage,
  SDKResultMessage,
} from '@anthropic-ai/claude-agent-sdk';

export type { SDKMessage, SDKResultMessage, SDKAssistantMessage };

/**
 * Result messages close a query and carry total_cost_usd.
 */
export function isResultMessage(message: SDKMessage): message is SDKResultMessage {
  return message.type === 'result';
}

export function isAssistantMessage(message: SDKMessage): message is SDKAssistantMessage {
  return message.type === 'assistant';
}

/**
 * Concatenated text blocks of an assistant message. Thinking and tool_use
 * blocks are skipped.
 */
export function extractAssistantText(message: SDKAssistantMessage): string {
  let text = '';
  for (const block of message.message.content) {
    if ('text' in block && typeof block.text === 'string') {
      text += block.text;
    }
  }
  return text;
}

/**
 * Final answer of a successful run, or null for error subtypes
 * (turn limit, execution error).
 */
export function extractResultText(message: SDKResultMessage): string | null {
  return message.subtype === 'success' ? message.result : null;
}

export function extractCost(message: SDKResultMessage): number {
  return message.total_cost_usd;
}
